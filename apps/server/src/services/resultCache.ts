import { randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { extname, join } from "node:path";
import { z } from "zod";
import type { ImageRecord, ImageRecordUpdate, Label } from "../types/pipeline.js";
import { PipelineError } from "./pipelineError.js";

export const CACHE_DIRNAME = "json";

const boundingBoxSchema = z.object({
  left: z.number(),
  top: z.number(),
  width: z.number(),
  height: z.number()
});

const labelSchema = z.object({
  name: z.string(),
  confidence: z.number(),
  geometry: boundingBoxSchema.optional()
});

const persistedRecordSchema = z.object({
  image_name: z.string().optional(),
  location_labels: z.array(labelSchema).nullish(),
  location_class: z.string().nullish(),
  material_labels: z.array(labelSchema).nullish(),
  material_class: z.string().nullish(),
  text_reading: z.object({ digit: z.string(), flagged: z.boolean() }).nullish()
});

type PersistedRecord = z.infer<typeof persistedRecordSchema>;

export function zeroRecord(imageName: string): ImageRecord {
  return {
    imageName,
    locationLabels: null,
    locationClass: null,
    materialLabels: null,
    materialClass: null,
    textReading: null
  };
}

/**
 * Applies every supplied field of `update` over `record`. `undefined` and
 * `null` mean "not supplied", so a merge never clears a field.
 */
export function mergeRecord(record: ImageRecord, update: ImageRecordUpdate): ImageRecord {
  return {
    imageName: record.imageName,
    locationLabels: update.locationLabels ?? record.locationLabels,
    locationClass: update.locationClass ?? record.locationClass,
    materialLabels: update.materialLabels ?? record.materialLabels,
    materialClass: update.materialClass ?? record.materialClass,
    textReading: update.textReading ?? record.textReading
  };
}

/**
 * File-backed per-image result store: one JSON document per image identity
 * under `<outputRoot>/json`. Writes for the same identity are serialised.
 */
export class ResultCache {
  private readonly cacheDir: string;
  private readonly pending = new Map<string, Promise<unknown>>();

  constructor(readonly outputRoot: string) {
    this.cacheDir = join(outputRoot, CACHE_DIRNAME);
  }

  recordPath(imageId: string): string {
    return join(this.cacheDir, `${imageId}.json`);
  }

  async read(imageId: string): Promise<ImageRecord> {
    let raw: string;
    try {
      raw = await readFile(this.recordPath(imageId), "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return zeroRecord(imageId);
      throw new PipelineError("cache_io_failed", `Failed reading cache record for ${imageId}`, { cause: error });
    }

    let parsed: PersistedRecord;
    try {
      parsed = persistedRecordSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new PipelineError("cache_io_failed", `Malformed cache record for ${imageId}`, { cause: error });
    }
    return fromPersisted(imageId, parsed);
  }

  async write(imageId: string, update: ImageRecordUpdate): Promise<ImageRecord> {
    return this.withLock(imageId, async () => {
      const current = await this.read(imageId);
      const merged = mergeRecord(current, update);
      await this.persist(imageId, merged);
      return merged;
    });
  }

  async listKnownIds(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.cacheDir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw new PipelineError("cache_io_failed", `Failed listing ${this.cacheDir}`, { cause: error });
    }
    return names
      .filter((name) => extname(name).toLowerCase() === ".json")
      .map((name) => name.slice(0, -extname(name).length))
      .sort();
  }

  private async persist(imageId: string, record: ImageRecord) {
    const target = this.recordPath(imageId);
    const temp = `${target}.${randomUUID()}.tmp`;
    try {
      await mkdir(this.cacheDir, { recursive: true });
      await writeFile(temp, `${JSON.stringify(toPersisted(record), null, 2)}\n`, "utf-8");
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true }).catch(() => undefined);
      throw new PipelineError("cache_io_failed", `Failed writing cache record for ${imageId}`, { cause: error });
    }
  }

  private async withLock<T>(imageId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.pending.get(imageId) ?? Promise.resolve();
    const next = previous.then(task, task);
    const settled = next.then(
      () => undefined,
      () => undefined
    );
    this.pending.set(imageId, settled);
    try {
      return await next;
    } finally {
      if (this.pending.get(imageId) === settled) {
        this.pending.delete(imageId);
      }
    }
  }
}

function fromPersisted(imageId: string, data: PersistedRecord): ImageRecord {
  return {
    imageName: data.image_name ?? imageId,
    locationLabels: data.location_labels ?? null,
    locationClass: data.location_class ?? null,
    materialLabels: data.material_labels ?? null,
    materialClass: data.material_class ?? null,
    textReading: data.text_reading ?? null
  };
}

function toPersisted(record: ImageRecord) {
  return {
    image_name: record.imageName,
    location_labels: record.locationLabels?.map(toPersistedLabel) ?? null,
    location_class: record.locationClass,
    material_labels: record.materialLabels?.map(toPersistedLabel) ?? null,
    material_class: record.materialClass,
    text_reading: record.textReading
  };
}

function toPersistedLabel(label: Label): Label {
  return label.geometry
    ? { name: label.name, confidence: label.confidence, geometry: label.geometry }
    : { name: label.name, confidence: label.confidence };
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
