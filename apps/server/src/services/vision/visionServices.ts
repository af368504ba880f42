import Anthropic from "@anthropic-ai/sdk";
import { BedrockRuntimeClient } from "@aws-sdk/client-bedrock-runtime";
import { RekognitionClient } from "@aws-sdk/client-rekognition";
import { fromIni } from "@aws-sdk/credential-providers";
import pino from "pino";
import type { Env } from "../../config/env.js";
import type { ModelStatusService, VlmService } from "../../types/pipeline.js";
import { isPipelineError, PipelineError } from "../pipelineError.js";
import { AnthropicVlmService } from "./anthropicVlmService.js";
import { BedrockVlmService } from "./bedrockVlmService.js";
import { RekognitionLabelService } from "./rekognitionLabelService.js";

const logger = pino({ name: "vision-services" });

export interface ClassifierConfig {
  locationModelArn: string;
  materialModelArn: string;
  /** Projects to query for model status; without them the status check is skipped. */
  locationProjectArn?: string;
  materialProjectArn?: string;
}

export interface ConfiguredVlm {
  service: VlmService;
  modelId: string;
}

type VisionEnv = Pick<
  Env,
  | "AWS_REGION"
  | "AWS_PROFILE"
  | "LOCATION_MODEL_ARN"
  | "MATERIAL_MODEL_ARN"
  | "LOCATION_PROJECT_ARN"
  | "MATERIAL_PROJECT_ARN"
  | "VLM_PROVIDER"
  | "BEDROCK_MODEL_ID"
  | "BEDROCK_REGION"
  | "ANTHROPIC_API_KEY"
  | "ANTHROPIC_MODEL"
>;

function awsCredentials(config: VisionEnv) {
  return config.AWS_PROFILE ? fromIni({ profile: config.AWS_PROFILE }) : undefined;
}

/** Both custom-label models must be named before a run may start. */
export function requireClassifierConfig(config: VisionEnv): ClassifierConfig {
  const missing = [
    config.LOCATION_MODEL_ARN ? null : "LOCATION_MODEL_ARN",
    config.MATERIAL_MODEL_ARN ? null : "MATERIAL_MODEL_ARN"
  ].filter((name): name is string => name !== null);
  if (!config.LOCATION_MODEL_ARN || !config.MATERIAL_MODEL_ARN) {
    throw new PipelineError("missing_config", `Missing classifier configuration: ${missing.join(", ")}`);
  }
  return {
    locationModelArn: config.LOCATION_MODEL_ARN,
    materialModelArn: config.MATERIAL_MODEL_ARN,
    locationProjectArn: config.LOCATION_PROJECT_ARN,
    materialProjectArn: config.MATERIAL_PROJECT_ARN
  };
}

/**
 * Read-only check that every model with a configured project reports
 * `RUNNING`. Starting and stopping models stays outside this service.
 */
export async function assertModelsRunning(models: ClassifierConfig, statusService: ModelStatusService): Promise<void> {
  const checks = [
    { projectArn: models.locationProjectArn, modelArn: models.locationModelArn },
    { projectArn: models.materialProjectArn, modelArn: models.materialModelArn }
  ];
  const notRunning: string[] = [];

  for (const { projectArn, modelArn } of checks) {
    if (!projectArn) continue;
    let status: string | null;
    try {
      status = await statusService.modelStatus(projectArn, modelArn);
    } catch (error) {
      if (isPipelineError(error)) throw error;
      throw new PipelineError("service_call_failed", `Failed reading status of ${modelArn}`, { cause: error });
    }
    logger.debug({ modelArn, status }, "Classifier model status");
    if (status !== "RUNNING") notRunning.push(`${modelArn} (${status ?? "not found"})`);
  }

  if (notRunning.length > 0) {
    throw new PipelineError("model_not_running", `Classifier models not running: ${notRunning.join(", ")}`);
  }
}

export function createLabelService(config: VisionEnv): RekognitionLabelService {
  const client = new RekognitionClient({ region: config.AWS_REGION, credentials: awsCredentials(config) });
  return new RekognitionLabelService(client);
}

/** VLM used for text reading, or `null` when text reading is switched off. */
export function createVlmService(config: VisionEnv): ConfiguredVlm | null {
  switch (config.VLM_PROVIDER) {
    case "bedrock": {
      const client = new BedrockRuntimeClient({ region: config.BEDROCK_REGION, credentials: awsCredentials(config) });
      return { service: new BedrockVlmService(client), modelId: config.BEDROCK_MODEL_ID };
    }
    case "anthropic": {
      if (!config.ANTHROPIC_API_KEY) {
        logger.warn("VLM_PROVIDER=anthropic but ANTHROPIC_API_KEY is not set; text reading disabled");
        return null;
      }
      return { service: new AnthropicVlmService(new Anthropic({ apiKey: config.ANTHROPIC_API_KEY })), modelId: config.ANTHROPIC_MODEL };
    }
    case "none":
      return null;
  }
}
