import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import pino from "pino";
import { z } from "zod";
import type { LocationRuleSet, MaterialRuleSet, RuleSets, TextReadingRules } from "../../types/rules.js";
import { PipelineError } from "../pipelineError.js";

const logger = pino({ name: "rule-sets" });

export const DEFAULT_RULES_DIR = fileURLToPath(new URL("../../../rules/", import.meta.url));

const confidence = z.number().min(0).max(100);
const nameList = z.array(z.string().min(1));
const thresholdTable = z.record(z.string(), confidence);
const directoryTable = z.record(z.string(), z.string().min(1));

const locationRuleSetSchema = z.object({
  locationNames: nameList.min(1),
  deviceNames: nameList,
  extraNames: nameList,
  floorExtra: z.string().min(1),
  floorClass: z.string().min(1).default("floor"),
  screenMarker: z.string().min(1),
  thresholds: thresholdTable.default({}),
  defaultThreshold: confidence.default(0),
  minConfidence: confidence,
  classToDir: directoryTable,
  unknownDir: z.string().min(1).default("classified/unknown")
});

const materialRuleSetSchema = z.object({
  materialNames: nameList.min(1),
  objectNames: nameList,
  extraNames: nameList,
  floorExtra: z.string().min(1),
  waterMeterObjects: nameList,
  radiometerObject: z.string().min(1),
  signObject: z.string().min(1),
  signSuffixes: nameList,
  defaultSuffix: z.string().min(1),
  prefixAliases: z.record(z.string(), z.string().min(1)).default({}),
  deviceToObject: z.record(z.string(), z.string().min(1)).default({}),
  thresholds: thresholdTable.default({}),
  defaultThreshold: confidence.default(0),
  minConfidence: confidence,
  classToDir: directoryTable,
  unknownDir: z.string().min(1).default("classified/unknown")
});

const textReadingRulesSchema = z.object({
  eligibilityThresholds: thresholdTable,
  screenLabelPrefix: z.string().min(1),
  screenConfidenceFloor: confidence,
  cropLabelNames: nameList,
  cropConfidenceFloor: confidence,
  minCropWidth: z.number().int().min(1),
  minCropHeight: z.number().int().min(1)
});

export function parseLocationRuleSet(input: unknown): LocationRuleSet {
  const rules = parseWith(locationRuleSetSchema, input, "location");
  if (!rules.classToDir[rules.floorClass]) {
    throw new PipelineError("invalid_rule_set", `location rule set has no directory for floor class: ${rules.floorClass}`);
  }
  return rules;
}

export function parseMaterialRuleSet(input: unknown): MaterialRuleSet {
  const rules = parseWith(materialRuleSetSchema, input, "material");
  const unknownObjects = [...rules.waterMeterObjects, rules.radiometerObject, rules.signObject].filter(
    (name) => !rules.objectNames.includes(name)
  );
  if (unknownObjects.length > 0) {
    throw new PipelineError("invalid_rule_set", `material rule set references unknown objects: ${unknownObjects.join(", ")}`);
  }
  return rules;
}

export function parseTextReadingRules(input: unknown): TextReadingRules {
  return parseWith(textReadingRulesSchema, input, "text-reading");
}

/**
 * Loads the three rule files of one deployment. Each stage receives its own
 * value, so several deployments can be loaded side by side.
 */
export async function loadRuleSets(rulesDir: string = DEFAULT_RULES_DIR): Promise<RuleSets> {
  const [location, material, textReading] = await Promise.all([
    readJson(join(rulesDir, "location.json")),
    readJson(join(rulesDir, "material.json")),
    readJson(join(rulesDir, "text-reading.json"))
  ]);

  const ruleSets: RuleSets = {
    location: parseLocationRuleSet(location),
    material: parseMaterialRuleSet(material),
    textReading: parseTextReadingRules(textReading)
  };
  logger.debug(
    {
      rulesDir,
      locationNames: ruleSets.location.locationNames.length,
      materialNames: ruleSets.material.materialNames.length
    },
    "Rule sets loaded"
  );
  return ruleSets;
}

async function readJson(path: string): Promise<unknown> {
  try {
    return JSON.parse(await readFile(path, "utf-8"));
  } catch (error) {
    throw new PipelineError("invalid_rule_set", `Failed reading rule file ${path}`, { cause: error });
  }
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, name: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
    throw new PipelineError("invalid_rule_set", `Invalid ${name} rule set: ${detail}`);
  }
  return result.data;
}

export interface PromptSource {
  promptFile?: string;
  prompt?: string;
  rulesDir?: string;
}

/**
 * Text-reading prompt: an explicit file (relative to the working directory),
 * then an inline value with `\n` escapes, then the bundled default.
 */
export async function loadTextReadingPrompt(source: PromptSource = {}): Promise<string> {
  if (source.promptFile) {
    return readPrompt(resolve(source.promptFile));
  }
  if (source.prompt) {
    return source.prompt.replace(/\\n/g, "\n");
  }
  return readPrompt(join(source.rulesDir ?? DEFAULT_RULES_DIR, "text-reading-prompt.txt"));
}

async function readPrompt(path: string): Promise<string> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new PipelineError("missing_config", `Failed reading text-reading prompt ${path}`, { cause: error });
  }
  if (text.trim().length === 0) {
    throw new PipelineError("missing_config", `Text-reading prompt ${path} is empty`);
  }
  return text.trim();
}
