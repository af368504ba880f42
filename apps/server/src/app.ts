import { randomUUID } from "node:crypto";
import cors from "cors";
import express from "express";
import { createEventsRouter } from "./routes/events.js";
import { healthRouter } from "./routes/health.js";
import { createRunRouter } from "./routes/runs.js";
import type { PipelineService } from "./services/pipelineService.js";
import type { RealtimeEventBus } from "./services/realtimeEventBus.js";

export interface AppOptions {
  pipelineService: PipelineService;
  eventBus: RealtimeEventBus;
  corsOrigin: string;
}

export function createApp({ pipelineService, eventBus, corsOrigin }: AppOptions) {
  const app = express();
  const allowedOrigins = new Set([corsOrigin, "http://localhost:5173"]);

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.has(origin)) {
          callback(null, true);
          return;
        }
        callback(new Error("cors_not_allowed"));
      }
    })
  );
  app.use((req, res, next) => {
    const requestId = req.header("x-request-id") || randomUUID();
    res.setHeader("x-request-id", requestId);
    req.headers["x-request-id"] = requestId;
    next();
  });
  app.use(express.json());

  app.use(healthRouter);
  app.use(createEventsRouter(eventBus));
  app.use(createRunRouter(pipelineService));

  return app;
}
