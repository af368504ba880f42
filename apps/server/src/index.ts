import pino from "pino";
import { createApp } from "./app.js";
import { buildPipelineService } from "./bootstrap.js";
import { env } from "./config/env.js";
import { realtimeEventBus } from "./services/realtimeEventBus.js";
import { runStartupDependencyChecks } from "./services/startupDependencyChecks.js";

const logger = pino({ name: "api", level: env.LOG_LEVEL });

await runStartupDependencyChecks(env, logger);
const pipelineService = await buildPipelineService(env, realtimeEventBus);
const app = createApp({ pipelineService, eventBus: realtimeEventBus, corsOrigin: env.CORS_ORIGIN });

app.listen(env.PORT, () => {
  logger.info({ port: env.PORT, vlmProvider: env.VLM_PROVIDER }, "Bale sorter API listening");
});
