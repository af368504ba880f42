import { readFile } from "node:fs/promises";
import pino from "pino";
import type { ImageRecord, Label, LabelService, StageRunOptions, StageSummary } from "../types/pipeline.js";
import { UNKNOWN_MATERIAL } from "../types/pipeline.js";
import type { MaterialRuleSet } from "../types/rules.js";
import { type Candidate, clearsThreshold, strongest, strongestAboveThreshold, toCandidate } from "./labelSelection.js";
import { imageIdentity, isImagePath, normalizeImage } from "./imageSource.js";
import { PipelineError } from "./pipelineError.js";
import type { ResultCache } from "./resultCache.js";
import { runStage } from "./stageRunner.js";

const logger = pino({ name: "material-classifier" });

export interface MaterialWinners {
  material: Candidate | null;
  object: string | null;
  extras: string[];
}

export function selectMaterialWinners(labels: Label[], rules: MaterialRuleSet): MaterialWinners {
  const materials: Candidate[] = [];
  const objects: Candidate[] = [];
  const extras: Candidate[] = [];

  for (const label of labels) {
    if (rules.materialNames.includes(label.name)) {
      materials.push(toCandidate(label));
    } else if (rules.objectNames.includes(label.name)) {
      objects.push(toCandidate(label));
    } else if (rules.extraNames.includes(label.name)) {
      extras.push(toCandidate(label));
    }
  }

  let material = strongestAboveThreshold(materials, rules);
  const object = strongestAboveThreshold(objects, rules);
  const extraNames = new Set(extras.filter((extra) => clearsThreshold(rules, extra)).map((extra) => extra.name));

  if (!material) {
    material = strongest(materials);
    if (extras.some((extra) => extra.name === rules.floorExtra)) {
      extraNames.add(rules.floorExtra);
    }
  }

  return { material, object: object?.name ?? null, extras: [...extraNames] };
}

/** Replaces the detected object with the one implied by the stage-2 device type. */
export function applyDeviceHint(winners: MaterialWinners, deviceHint: string | undefined, rules: MaterialRuleSet): MaterialWinners {
  if (!deviceHint) return winners;
  const object = rules.deviceToObject[deviceHint];
  return object ? { ...winners, object } : winners;
}

export function materialPrefix(materialName: string, rules: MaterialRuleSet): string {
  const family = materialName.split("_")[0];
  return rules.prefixAliases[family] ?? family;
}

export function materialSuffix(materialName: string): string {
  const separator = materialName.indexOf("_");
  return separator >= 0 ? materialName.slice(separator + 1) : "";
}

export function composeMaterialClass(winners: MaterialWinners, rules: MaterialRuleSet): string {
  const { material, object, extras } = winners;
  if (!material) return UNKNOWN_MATERIAL;

  const prefix = materialPrefix(material.name, rules);
  const suffix = materialSuffix(material.name);

  if (object && rules.waterMeterObjects.includes(object)) {
    return `${prefix} - ${object}`;
  }
  if (object === rules.radiometerObject) {
    if (extras.includes(rules.floorExtra)) {
      return `${rules.radiometerObject} - ${rules.floorExtra}`;
    }
    return `${prefix} - ${rules.radiometerObject} - closeup`;
  }
  if (object === rules.signObject && rules.signSuffixes.includes(suffix)) {
    return `${prefix} - ${suffix}`;
  }
  return `${prefix} - ${rules.defaultSuffix}`;
}

export function decideMaterialClass(labels: Label[], deviceHint: string | undefined, rules: MaterialRuleSet): string {
  return composeMaterialClass(applyDeviceHint(selectMaterialWinners(labels, rules), deviceHint, rules), rules);
}

/**
 * Stage 3: paper material and photo role for the images stage 2 could not
 * settle, using the stage-2 device type as a hint when there is one.
 */
export class MaterialClassifier {
  constructor(
    private readonly cache: ResultCache,
    private readonly labelService: LabelService,
    private readonly modelArn: string,
    private readonly rules: MaterialRuleSet
  ) {}

  async run(filePaths: string[], deviceHints: ReadonlyMap<string, string>, options: StageRunOptions = {}): Promise<StageSummary> {
    const items = filePaths.filter(isImagePath).map((path) => ({ path, imageId: imageIdentity(path) }));

    const summary = await runStage("material", items, options, logger, async ({ path, imageId }) => {
      const cached = await this.cache.read(imageId);
      const hint = deviceHints.get(imageId);
      const { record, fromCache } = await this.classify(path, imageId, cached, hint, options.reclassify ?? false);
      return {
        outcome: fromCache ? "cached" : "processed",
        message: `Material: ${imageId} -> ${record.materialClass ?? "undecided"}`
      };
    });

    logger.info(
      { total: summary.total, processed: summary.processed, cached: summary.cached, failed: summary.failures.length },
      "Material classification finished"
    );
    return summary;
  }

  private async classify(
    path: string,
    imageId: string,
    cached: ImageRecord,
    deviceHint: string | undefined,
    reclassify: boolean
  ): Promise<{ record: ImageRecord; fromCache: boolean }> {
    if (cached.materialLabels) {
      if (cached.materialClass && !reclassify) {
        return { record: cached, fromCache: true };
      }
      const materialClass = decideMaterialClass(cached.materialLabels, deviceHint, this.rules);
      const record = await this.cache.write(imageId, { materialClass });
      return { record, fromCache: true };
    }

    const image = await readFile(path)
      .then((bytes) => normalizeImage(bytes))
      .catch((error: unknown) => {
        throw new PipelineError("image_unresolved", `Failed reading ${path}`, { cause: error });
      });
    const labels = await this.labelService.detect(image, this.modelArn, this.rules.minConfidence);
    const materialClass = decideMaterialClass(labels, deviceHint, this.rules);
    const record = await this.cache.write(imageId, { materialLabels: labels, materialClass });
    return { record, fromCache: false };
  }
}
