import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(3000),
  LOG_LEVEL: z.string().default("info"),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  AWS_REGION: z.string().default("us-east-1"),
  AWS_PROFILE: optionalString,
  LOCATION_MODEL_ARN: optionalString,
  MATERIAL_MODEL_ARN: optionalString,
  LOCATION_PROJECT_ARN: optionalString,
  MATERIAL_PROJECT_ARN: optionalString,
  VLM_PROVIDER: z.enum(["bedrock", "anthropic", "none"]).default("bedrock"),
  BEDROCK_MODEL_ID: z.string().default("us.meta.llama3-2-90b-instruct-v1:0"),
  BEDROCK_REGION: z.string().default("us-east-2"),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default("claude-3-5-sonnet-latest"),
  TEXT_READING_PROMPT: optionalString,
  TEXT_READING_PROMPT_FILE: optionalString,
  RULES_DIR: optionalString,
  PIPELINE_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1)
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
