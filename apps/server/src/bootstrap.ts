import type { Env } from "./config/env.js";
import { PipelineService } from "./services/pipelineService.js";
import type { RealtimeEventBus } from "./services/realtimeEventBus.js";
import { DEFAULT_RULES_DIR, loadRuleSets, loadTextReadingPrompt } from "./services/rules/ruleSetLoader.js";
import {
  assertModelsRunning,
  createLabelService,
  createVlmService,
  requireClassifierConfig
} from "./services/vision/visionServices.js";

/** Loads rule sets and the prompt, then wires the remote services from `config`. */
export async function buildPipelineService(config: Env, eventBus?: RealtimeEventBus): Promise<PipelineService> {
  const rulesDir = config.RULES_DIR ?? DEFAULT_RULES_DIR;
  const [rules, prompt] = await Promise.all([
    loadRuleSets(rulesDir),
    loadTextReadingPrompt({ promptFile: config.TEXT_READING_PROMPT_FILE, prompt: config.TEXT_READING_PROMPT, rulesDir })
  ]);

  const labelService = createLabelService(config);
  return new PipelineService({
    labelService,
    vlm: createVlmService(config),
    rules,
    prompt,
    classifierConfig: async () => {
      const models = requireClassifierConfig(config);
      await assertModelsRunning(models, labelService);
      return models;
    },
    concurrency: config.PIPELINE_CONCURRENCY,
    eventBus
  });
}
