import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import pino from "pino";
import type { ImageRecord, StageRunOptions, StageSummary } from "../types/pipeline.js";
import type { LocationRuleSet, MaterialRuleSet } from "../types/rules.js";
import { normalizeImage, resolveSourceImage } from "./imageSource.js";
import { PipelineError } from "./pipelineError.js";
import type { ResultCache } from "./resultCache.js";
import { runStage } from "./stageRunner.js";

const logger = pino({ name: "dispatcher" });

/**
 * Output directory (relative to the output root) for one record. Stage 3's
 * answer wins over stage 2's; `null` means the image stays where it is.
 */
export function resolveDestination(record: ImageRecord, materialRules: MaterialRuleSet, locationRules: LocationRuleSet): string | null {
  if (record.materialClass) {
    return materialRules.classToDir[record.materialClass] ?? materialRules.unknownDir;
  }
  if (record.locationClass) {
    return locationRules.classToDir[record.locationClass] ?? null;
  }
  return null;
}

/**
 * Stage 5: copies every classified image into its category directory as a
 * normalized JPEG. Reads the cache and never writes to it.
 */
export class Dispatcher {
  constructor(
    private readonly cache: ResultCache,
    private readonly materialRules: MaterialRuleSet,
    private readonly locationRules: LocationRuleSet
  ) {}

  async run(inputFolder: string, options: StageRunOptions = {}): Promise<StageSummary> {
    const ids = await this.cache.listKnownIds();
    const items = ids.map((imageId) => ({ imageId }));

    const summary = await runStage("dispatch", items, options, logger, async ({ imageId }) => {
      const record = await this.cache.read(imageId);
      const destination = resolveDestination(record, this.materialRules, this.locationRules);
      if (!destination) {
        return { outcome: "skipped", message: `No destination for ${imageId}, skipping` };
      }

      const sourcePath = await resolveSourceImage(inputFolder, imageId);
      if (!sourcePath) {
        logger.warn({ imageId, inputFolder }, "Source image not found; dispatch skipped");
        return { outcome: "skipped", message: `Image not found for ${imageId}, skipping` };
      }
      const image = await readFile(sourcePath)
        .then((bytes) => normalizeImage(bytes))
        .catch((error: unknown) => {
          throw new PipelineError("image_unresolved", `Failed reading ${sourcePath}`, { cause: error });
        });

      const targetDir = join(this.cache.outputRoot, destination);
      await mkdir(targetDir, { recursive: true });
      await writeFile(join(targetDir, `${imageId}.jpg`), image);
      return { outcome: "processed", message: `Dispatched ${imageId} -> ${destination}` };
    });

    logger.info(
      { total: summary.total, dispatched: summary.processed, skipped: summary.skipped, failed: summary.failures.length },
      "Dispatch finished"
    );
    return summary;
  }
}
