import pino from "pino";
import type { ImageRecord, Label, StageRunOptions, StageSummary, TextReading, VlmService } from "../types/pipeline.js";
import type { TextReadingRules } from "../types/rules.js";
import { cropImage, loadOrientedImage, normalizeImage, type PixelRegion, resolveSourceImage } from "./imageSource.js";
import { PipelineError } from "./pipelineError.js";
import type { ResultCache } from "./resultCache.js";
import { runStage } from "./stageRunner.js";

const logger = pino({ name: "text-reading" });

const FLAG_SEPARATOR = " - ";

function meetsEligibility(label: Label, rules: TextReadingRules): boolean {
  const threshold = rules.eligibilityThresholds[label.name];
  return threshold !== undefined && label.confidence >= threshold;
}

/**
 * Only images showing a sign, a meter/radiometer or a display panel are worth
 * a VLM call. Display panels only come from the location model.
 */
export function isEligibleForTextReading(record: ImageRecord, rules: TextReadingRules): boolean {
  const locationHit = (record.locationLabels ?? []).some(
    (label) =>
      (label.name.startsWith(rules.screenLabelPrefix) && label.confidence >= rules.screenConfidenceFloor) ||
      meetsEligibility(label, rules)
  );
  if (locationHit) return true;
  return (record.materialLabels ?? []).some((label) => meetsEligibility(label, rules));
}

/**
 * Pixel region of the most confident display-panel box, widened to the
 * minimum crop size and clamped to the image. `null` means use the full image.
 */
export function selectCropRegion(labels: Label[], width: number, height: number, rules: TextReadingRules): PixelRegion | null {
  let best: Label | null = null;
  let bestConfidence = rules.cropConfidenceFloor;
  for (const label of labels) {
    if (rules.cropLabelNames.includes(label.name) && label.geometry && label.confidence > bestConfidence) {
      best = label;
      bestConfidence = label.confidence;
    }
  }
  if (!best?.geometry) return null;

  const box = best.geometry;
  let left = Math.trunc(box.left * width);
  let top = Math.trunc(box.top * height);
  let right = Math.trunc((box.left + box.width) * width);
  let bottom = Math.trunc((box.top + box.height) * height);

  if (right - left < rules.minCropWidth) {
    const pad = Math.floor((rules.minCropWidth - (right - left)) / 2);
    left -= pad;
    right += pad;
  }
  if (bottom - top < rules.minCropHeight) {
    const pad = Math.floor((rules.minCropHeight - (bottom - top)) / 2);
    top -= pad;
    bottom += pad;
  }

  left = clamp(left, 0, width);
  top = clamp(top, 0, height);
  right = clamp(right, 0, width);
  bottom = clamp(bottom, 0, height);

  if (right <= left || bottom <= top) return null;
  return { left, top, width: right - left, height: bottom - top };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * The model is asked to end its answer with `"{digit} - {flagged|None}"`.
 * Anything else yields an empty, unflagged reading.
 */
export function parseTextReadingOutput(raw: string): TextReading {
  const lines = raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const last = lines.at(-1) ?? "";
  const separator = last.indexOf(FLAG_SEPARATOR);
  if (separator < 0) return { digit: "", flagged: false };

  let digit = last.slice(0, separator).trim();
  const flag = last.slice(separator + FLAG_SEPARATOR.length).trim().toLowerCase();

  if (digit.toUpperCase().startsWith("HSCODE")) {
    const match = /^\S+\s+([\s\S]+)$/.exec(digit);
    digit = match ? match[1] : "";
  }
  return { digit, flagged: flag.includes("flagged") };
}

/**
 * Stage 4: reads the digits shown on signs and meter displays with a VLM and
 * stores them beside the classification. Runs over every cached identity.
 */
export class TextReadingService {
  constructor(
    private readonly cache: ResultCache,
    private readonly vlm: VlmService,
    private readonly modelId: string,
    private readonly prompt: string,
    private readonly rules: TextReadingRules
  ) {}

  async run(inputFolder: string, options: StageRunOptions = {}): Promise<StageSummary> {
    const ids = await this.cache.listKnownIds();
    const items = ids.map((imageId) => ({ imageId }));

    const summary = await runStage("text_reading", items, options, logger, async ({ imageId }) => {
      const record = await this.cache.read(imageId);
      if (record.textReading) {
        return { outcome: "cached", message: `Skipping ${imageId} (already has text reading)` };
      }
      if (!isEligibleForTextReading(record, this.rules)) {
        return { outcome: "skipped", message: `Skipping ${imageId} (no target labels)` };
      }

      const sourcePath = await resolveSourceImage(inputFolder, imageId);
      if (!sourcePath) {
        logger.warn({ imageId, inputFolder }, "Source image not found; text reading skipped");
        return { outcome: "skipped", message: `Image not found for ${imageId}, skipping` };
      }

      const textReading = await this.read(sourcePath, record.locationLabels ?? []);
      await this.cache.write(imageId, { textReading });
      return { outcome: "processed", message: `Text reading: ${imageId} -> ${textReading.digit || "none"}` };
    });

    logger.info(
      { total: summary.total, processed: summary.processed, skipped: summary.skipped, failed: summary.failures.length },
      "Text reading finished"
    );
    return summary;
  }

  private async read(sourcePath: string, locationLabels: Label[]): Promise<TextReading> {
    const { image, width, height } = await loadOrientedImage(sourcePath).catch((error: unknown) => {
      throw new PipelineError("image_unresolved", `Failed reading ${sourcePath}`, { cause: error });
    });
    const region = selectCropRegion(locationLabels, width, height, this.rules);
    const cropped = region ? await cropImage(image, region) : image;
    const raw = await this.vlm.generate(this.modelId, this.prompt, await normalizeImage(cropped));
    return parseTextReadingOutput(raw);
  }
}
