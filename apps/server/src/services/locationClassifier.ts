import { readFile } from "node:fs/promises";
import pino from "pino";
import type { ImageRecord, Label, LabelService, StageRunOptions, StageSummary } from "../types/pipeline.js";
import { NEXT_STAGE, UNKNOWN_DEVICE } from "../types/pipeline.js";
import type { LocationRuleSet } from "../types/rules.js";
import { type Candidate, clearsThreshold, strongest, strongestAboveThreshold, toCandidate } from "./labelSelection.js";
import { imageIdentity, isImagePath, normalizeImage } from "./imageSource.js";
import { PipelineError } from "./pipelineError.js";
import type { ResultCache } from "./resultCache.js";
import { runStage } from "./stageRunner.js";

const logger = pino({ name: "location-classifier" });

export interface LocationDecision {
  locationClass: string;
  location: Candidate | null;
  device: Candidate | null;
  extras: string[];
  screenObserved: boolean;
}

export interface ForwardSet {
  forwarded: string[];
  deviceHints: Map<string, string>;
}

export interface LocationStageResult extends ForwardSet {
  summary: StageSummary;
}

/** Canonical device name contained in `labelName`, if any. */
export function matchDevice(labelName: string, rules: LocationRuleSet): string | null {
  return rules.deviceNames.find((device) => labelName.includes(device)) ?? null;
}

export function isDeviceClass(locationClass: string | null, rules: LocationRuleSet): boolean {
  return locationClass !== null && rules.deviceNames.includes(locationClass);
}

/** Stage-2 decisions that hand the image on to material classification. */
export function shouldForward(locationClass: string | null, rules: LocationRuleSet): boolean {
  return locationClass === NEXT_STAGE || isDeviceClass(locationClass, rules);
}

/**
 * Stage-3 input rebuilt from what stage 2 persisted, in input order, so a
 * restarted run forwards exactly the images an uninterrupted one would.
 */
export async function rederiveForwardSet(cache: ResultCache, filePaths: string[], rules: LocationRuleSet): Promise<ForwardSet> {
  const forwarded: string[] = [];
  const deviceHints = new Map<string, string>();

  for (const path of filePaths) {
    if (!isImagePath(path)) continue;
    const imageId = imageIdentity(path);
    let locationClass: string | null;
    try {
      locationClass = (await cache.read(imageId)).locationClass;
    } catch (error) {
      logger.error({ err: error, imageId }, "Cache record unreadable; image not forwarded");
      continue;
    }
    if (!shouldForward(locationClass, rules)) continue;
    forwarded.push(path);
    if (locationClass && isDeviceClass(locationClass, rules)) {
      deviceHints.set(imageId, locationClass);
    }
  }
  return { forwarded, deviceHints };
}

export function decideLocationClass(labels: Label[], rules: LocationRuleSet): LocationDecision {
  const locations: Candidate[] = [];
  const devices: Candidate[] = [];
  const extras: Candidate[] = [];
  let screenObserved = false;

  for (const label of labels) {
    if (label.name.includes(rules.screenMarker)) {
      screenObserved = true;
      continue;
    }
    if (rules.extraNames.includes(label.name)) {
      extras.push(toCandidate(label));
      continue;
    }
    if (rules.locationNames.includes(label.name)) {
      locations.push(toCandidate(label));
      continue;
    }
    const device = matchDevice(label.name, rules);
    if (device) devices.push(toCandidate(label, device));
  }

  let location = strongestAboveThreshold(locations, rules);
  const device = strongestAboveThreshold(devices, rules);
  const extraNames = new Set(extras.filter((extra) => clearsThreshold(rules, extra)).map((extra) => extra.name));

  if (!location) {
    location = strongest(locations);
    if (extras.some((extra) => extra.name === rules.floorExtra)) {
      extraNames.add(rules.floorExtra);
    }
  }

  const decision = { location, device, extras: [...extraNames], screenObserved };
  if (device) {
    return { ...decision, locationClass: device.name };
  }
  if (location) {
    const floorClass = extraNames.has(rules.floorExtra) ? rules.floorClass : null;
    return { ...decision, locationClass: floorClass ?? location.name };
  }
  return { ...decision, locationClass: screenObserved ? UNKNOWN_DEVICE : NEXT_STAGE };
}

/**
 * Stage 2: detects where/what kind of scale apparatus is in each photo and
 * decides which images continue to material classification.
 */
export class LocationClassifier {
  constructor(
    private readonly cache: ResultCache,
    private readonly labelService: LabelService,
    private readonly modelArn: string,
    private readonly rules: LocationRuleSet
  ) {}

  async run(filePaths: string[], options: StageRunOptions = {}): Promise<LocationStageResult> {
    const items = filePaths.filter(isImagePath).map((path) => ({ path, imageId: imageIdentity(path) }));

    const summary = await runStage("location", items, options, logger, async ({ path, imageId }) => {
      const cached = await this.cache.read(imageId);
      const { record, fromCache } = await this.classify(path, imageId, cached, options.reclassify ?? false);
      return {
        outcome: fromCache ? "cached" : "processed",
        message: `Location: ${imageId} -> ${record.locationClass ?? "undecided"}`
      };
    });

    const { forwarded, deviceHints } = await rederiveForwardSet(this.cache, filePaths, this.rules);
    logger.info(
      { total: summary.total, processed: summary.processed, cached: summary.cached, failed: summary.failures.length, forwarded: forwarded.length },
      "Location classification finished"
    );
    return { forwarded, deviceHints, summary };
  }

  private async classify(
    path: string,
    imageId: string,
    cached: ImageRecord,
    reclassify: boolean
  ): Promise<{ record: ImageRecord; fromCache: boolean }> {
    if (cached.locationLabels) {
      if (cached.locationClass && !reclassify) {
        return { record: cached, fromCache: true };
      }
      const decision = decideLocationClass(cached.locationLabels, this.rules);
      const record = await this.cache.write(imageId, { locationClass: decision.locationClass });
      return { record, fromCache: true };
    }

    const image = await readFile(path)
      .then((bytes) => normalizeImage(bytes))
      .catch((error: unknown) => {
        throw new PipelineError("image_unresolved", `Failed reading ${path}`, { cause: error });
      });
    const labels = await this.labelService.detect(image, this.modelArn, this.rules.minConfidence);
    const decision = decideLocationClass(labels, this.rules);
    const record = await this.cache.write(imageId, { locationLabels: labels, locationClass: decision.locationClass });
    return { record, fromCache: false };
  }
}
