import { randomUUID } from "node:crypto";
import pino from "pino";
import type { LabelService, PipelineStage, ProgressObserver, StageRunOptions, StageSummary } from "../types/pipeline.js";
import type { RuleSets } from "../types/rules.js";
import type { PipelineRunSummary, RunInput, RunRecord } from "../types/run.js";
import { Dispatcher } from "./dispatcher.js";
import { isImagePath, listImageFiles } from "./imageSource.js";
import { type ForwardSet, LocationClassifier } from "./locationClassifier.js";
import { MaterialClassifier } from "./materialClassifier.js";
import { normalizeStageError, PipelineError } from "./pipelineError.js";
import type { RealtimeEventBus } from "./realtimeEventBus.js";
import { ResultCache } from "./resultCache.js";
import { TextReadingService } from "./textReadingService.js";
import type { ClassifierConfig, ConfiguredVlm } from "./vision/visionServices.js";

const logger = pino({ name: "pipeline" });

export interface PipelineObserver extends ProgressObserver {
  onStageChanged?(stage: PipelineStage): void;
}

export interface PipelineDependencies {
  labelService: LabelService;
  vlm: ConfiguredVlm | null;
  rules: RuleSets;
  prompt: string;
  /** Rejects with `missing_config` or `model_not_running` when a run may not start. */
  classifierConfig: () => Promise<ClassifierConfig>;
  concurrency?: number;
  eventBus?: RealtimeEventBus;
}

/**
 * Runs the classification stages for one input folder and keeps a registry
 * of background runs started through the HTTP API.
 */
export class PipelineService {
  private readonly runs = new Map<string, RunRecord>();

  constructor(private readonly deps: PipelineDependencies) {}

  async runPipeline(input: RunInput, observer?: PipelineObserver, signal?: AbortSignal): Promise<PipelineRunSummary> {
    const models = await this.deps.classifierConfig();
    const { rules } = this.deps;
    const cache = new ResultCache(input.outputFolder);
    const options: StageRunOptions = {
      observer,
      signal,
      concurrency: this.deps.concurrency,
      reclassify: input.reclassify ?? false
    };

    const filePaths = input.filePaths ?? (await this.discover(input.inputFolder));
    const summary: PipelineRunSummary = {
      inputFolder: input.inputFolder,
      outputFolder: input.outputFolder,
      imageCount: filePaths.filter(isImagePath).length,
      forwardedCount: 0,
      stages: [],
      textReading: "skipped",
      aborted: false
    };
    logger.info({ inputFolder: input.inputFolder, outputFolder: input.outputFolder, images: summary.imageCount }, "Pipeline run started");

    const stage = async (name: PipelineStage, task: () => Promise<StageSummary>) => {
      if (signal?.aborted) {
        summary.aborted = true;
        return false;
      }
      observer?.onStageChanged?.(name);
      summary.stages.push(await task());
      return true;
    };

    let forwardSet: ForwardSet = { forwarded: [], deviceHints: new Map<string, string>() };
    await stage("location", async () => {
      const locationClassifier = new LocationClassifier(cache, this.deps.labelService, models.locationModelArn, rules.location);
      const result = await locationClassifier.run(filePaths, options);
      forwardSet = result;
      return result.summary;
    });
    const { forwarded, deviceHints } = forwardSet;
    summary.forwardedCount = forwarded.length;

    await stage("material", () =>
      new MaterialClassifier(cache, this.deps.labelService, models.materialModelArn, rules.material).run(forwarded, deviceHints, options)
    );

    if (input.skipTextReading) {
      logger.info("Text reading disabled for this run");
    } else if (!this.deps.vlm) {
      logger.warn("No VLM configured; text reading skipped");
    } else {
      const vlm = this.deps.vlm;
      try {
        const ran = await stage("text_reading", () =>
          new TextReadingService(cache, vlm.service, vlm.modelId, this.deps.prompt, rules.textReading).run(input.inputFolder, options)
        );
        if (ran) summary.textReading = "completed";
      } catch (error) {
        summary.textReading = "failed";
        logger.warn({ err: error }, "Text reading stage failed; continuing with dispatch");
      }
    }

    await stage("dispatch", () => new Dispatcher(cache, rules.material, rules.location).run(input.inputFolder, options));

    logger.info(
      {
        outputFolder: input.outputFolder,
        forwarded: summary.forwardedCount,
        failures: summary.stages.reduce((count, item) => count + item.failures.length, 0),
        aborted: summary.aborted
      },
      "Pipeline run finished"
    );
    return summary;
  }

  /** Checks the classifier models, then registers a run and executes it in the background. */
  async startRun(input: RunInput): Promise<RunRecord> {
    await this.deps.classifierConfig();

    const now = new Date().toISOString();
    const record: RunRecord = {
      runId: randomUUID(),
      status: "queued",
      inputFolder: input.inputFolder,
      outputFolder: input.outputFolder,
      reclassify: input.reclassify ?? false,
      skipTextReading: input.skipTextReading ?? false,
      stage: null,
      progress: null,
      createdAt: now,
      updatedAt: now
    };
    this.runs.set(record.runId, record);

    void this.executeRun(record.runId, input);
    return { ...record };
  }

  getRun(runId: string): RunRecord | null {
    const record = this.runs.get(runId);
    return record ? { ...record } : null;
  }

  listRuns(): RunRecord[] {
    return [...this.runs.values()]
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map((record) => ({ ...record }));
  }

  private async executeRun(runId: string, input: RunInput) {
    this.update(runId, { status: "running" });

    const observer: PipelineObserver = {
      onProgress: (current, total, message) => {
        this.update(runId, { progress: { current, total, message } });
        this.deps.eventBus?.publish({ type: "run.progress", runId, data: { current, total, message } });
      },
      onStageChanged: (stage) => {
        this.update(runId, { stage, progress: null });
        this.deps.eventBus?.publish({ type: "run.stage_changed", runId, data: { stage } });
      }
    };

    try {
      const summary = await this.runPipeline(input, observer);
      this.update(runId, { status: "completed", summary });
      this.deps.eventBus?.publish({ type: "run.completed", runId, data: { status: "completed", summary } });
    } catch (error) {
      const normalized = normalizeStageError(error);
      this.update(runId, { status: "failed", errorCode: normalized.code, errorReason: normalized.message });
      this.deps.eventBus?.publish({
        type: "run.completed",
        runId,
        data: { status: "failed", errorCode: normalized.code, errorReason: normalized.message }
      });
      logger.error({ err: error, runId }, "Pipeline run failed");
    }
  }

  private update(runId: string, patch: Partial<Omit<RunRecord, "runId" | "createdAt">>) {
    const record = this.runs.get(runId);
    if (!record) return;
    this.runs.set(runId, { ...record, ...patch, updatedAt: new Date().toISOString() });
  }

  private async discover(inputFolder: string): Promise<string[]> {
    try {
      return await listImageFiles(inputFolder);
    } catch (error) {
      throw new PipelineError("image_unresolved", `Failed listing input folder ${inputFolder}`, { cause: error });
    }
  }
}
