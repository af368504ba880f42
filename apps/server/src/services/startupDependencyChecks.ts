import type pino from "pino";
import type { Env } from "../config/env.js";

/**
 * Fail fast when the image codec is unavailable; warn about configuration that
 * only matters once a run starts.
 */
export async function runStartupDependencyChecks(config: Env, logger: pino.Logger): Promise<void> {
  await assertModule("sharp", logger, "Image normalization");
  if (!config.LOCATION_MODEL_ARN || !config.MATERIAL_MODEL_ARN) {
    logger.warn(
      {
        locationModelConfigured: Boolean(config.LOCATION_MODEL_ARN),
        materialModelConfigured: Boolean(config.MATERIAL_MODEL_ARN)
      },
      "Classifier models not configured; run requests will return service-unavailable errors"
    );
  }
  if (!config.LOCATION_PROJECT_ARN || !config.MATERIAL_PROJECT_ARN) {
    logger.warn(
      {
        locationStatusChecked: Boolean(config.LOCATION_PROJECT_ARN),
        materialStatusChecked: Boolean(config.MATERIAL_PROJECT_ARN)
      },
      "Project ARNs not configured; runs start without checking that the models are RUNNING"
    );
  }
  if (config.VLM_PROVIDER === "none") {
    logger.warn("VLM_PROVIDER=none; text reading will be skipped");
  }
}

async function assertModule(moduleName: string, logger: pino.Logger, feature: string): Promise<void> {
  try {
    await import(moduleName);
    logger.info({ moduleName, feature }, "Startup dependency check passed");
  } catch (error) {
    logger.fatal(
      {
        moduleName,
        feature,
        err: error
      },
      "Startup dependency check failed"
    );
    throw new Error(`missing_runtime_dependency:${moduleName}`);
  }
}
