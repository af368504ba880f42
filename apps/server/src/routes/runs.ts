import { Router } from "express";
import { z } from "zod";
import { isPipelineError } from "../services/pipelineError.js";
import type { PipelineService } from "../services/pipelineService.js";
import { ResultCache } from "../services/resultCache.js";

const createRunSchema = z.object({
  inputFolder: z.string().min(1),
  outputFolder: z.string().min(1),
  reclassify: z.boolean().optional(),
  skipTextReading: z.boolean().optional()
});

const imageIdSchema = z
  .string()
  .min(1)
  .regex(/^[^/\\]+$/)
  .refine((value) => value !== "." && value !== "..");

export function createRunRouter(pipelineService: PipelineService) {
  const runRouter = Router();

  runRouter.post("/api/runs", async (req, res) => {
    const parsed = createRunSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "invalid_run_request", detail: parsed.error.flatten() });
    }
    try {
      const run = await pipelineService.startRun(parsed.data);
      return res.status(202).json({
        runId: run.runId,
        status: run.status,
        statusUrl: `/api/runs/${run.runId}`,
        eventsUrl: `/api/events/stream?runId=${run.runId}`
      });
    } catch (error) {
      if (isPipelineError(error) && (error.code === "missing_config" || error.code === "model_not_running")) {
        return res.status(503).json({ error: error.code, detail: error.message });
      }
      if (isPipelineError(error) && error.code === "service_call_failed") {
        return res.status(502).json({ error: error.code, detail: error.message });
      }
      return res.status(500).json({
        error: "run_start_failed",
        detail: error instanceof Error ? error.message : "unknown_error"
      });
    }
  });

  runRouter.get("/api/runs", (_req, res) => {
    res.json({ runs: pipelineService.listRuns() });
  });

  runRouter.get("/api/runs/:runId", (req, res) => {
    const run = pipelineService.getRun(req.params.runId);
    if (!run) return res.status(404).json({ error: "run_not_found" });
    return res.json(run);
  });

  runRouter.get("/api/runs/:runId/records/:imageId", async (req, res) => {
    const run = pipelineService.getRun(req.params.runId);
    if (!run) return res.status(404).json({ error: "run_not_found" });
    const imageId = imageIdSchema.safeParse(req.params.imageId);
    if (!imageId.success) return res.status(400).json({ error: "invalid_image_id" });

    try {
      const cache = new ResultCache(run.outputFolder);
      const known = await cache.listKnownIds();
      if (!known.includes(imageId.data)) return res.status(404).json({ error: "record_not_found" });
      return res.json(await cache.read(imageId.data));
    } catch (error) {
      return res.status(500).json({
        error: isPipelineError(error) ? error.code : "record_read_failed",
        detail: error instanceof Error ? error.message : "unknown_error"
      });
    }
  });

  return runRouter;
}
