import { Router } from "express";
import type { RealtimeEventBus, RealtimeEventEnvelope } from "../services/realtimeEventBus.js";

function writeSseEvent(res: { write: (chunk: string) => void }, eventId: string, type: string, payload: unknown) {
  res.write(`id: ${eventId}\n`);
  res.write(`event: ${type}\n`);
  res.write(`data: ${JSON.stringify(payload)}\n\n`);
}

export function createEventsRouter(eventBus: RealtimeEventBus) {
  const eventsRouter = Router();

  eventsRouter.get("/api/events/stream", (req, res) => {
    const runId = typeof req.query.runId === "string" ? req.query.runId : undefined;

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.flushHeaders();

    writeSseEvent(res, "connected", "connected", { runId: runId ?? null, timestamp: new Date().toISOString() });

    const unsubscribe = eventBus.subscribe({ runId }, (event: RealtimeEventEnvelope) => {
      writeSseEvent(res, event.eventId, event.type, event);
    });

    const keepAlive = setInterval(() => {
      res.write(": keepalive\n\n");
    }, 20000);

    req.on("close", () => {
      clearInterval(keepAlive);
      unsubscribe();
    });
  });

  return eventsRouter;
}
