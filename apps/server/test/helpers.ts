import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { extname, join } from "node:path";
import type { TestContext } from "node:test";
import sharp from "sharp";
import type { Label, LabelService, VlmService } from "../src/types/pipeline.js";

export const LOCATION_ARN = "arn:test:location";
export const MATERIAL_ARN = "arn:test:material";

export async function makeTempDir(t: TestContext, prefix = "bale-sorter-"): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  t.after(() => rm(dir, { recursive: true, force: true }));
  return dir;
}

/**
 * Writes a flat-colour image. Fakes below key their answers on the image
 * width, so every image in one test gets its own width.
 */
export async function writeTestImage(folder: string, name: string, width: number, height = 40): Promise<string> {
  const path = join(folder, name);
  const image = sharp({ create: { width, height, channels: 3, background: { r: 120, g: 90, b: 60 } } });
  if (extname(name).toLowerCase() === ".png") {
    await image.png().toFile(path);
  } else {
    await image.jpeg().toFile(path);
  }
  return path;
}

export interface DetectCall {
  modelArn: string;
  width: number;
  minConfidence: number;
}

export class FakeLabelService implements LabelService {
  readonly calls: DetectCall[] = [];

  constructor(readonly responses: Record<string, Record<number, Label[] | Error>>) {}

  async detect(image: Buffer, modelArn: string, minConfidence: number): Promise<Label[]> {
    const { width = 0 } = await sharp(image).metadata();
    this.calls.push({ modelArn, width, minConfidence });
    const response = this.responses[modelArn]?.[width];
    if (response instanceof Error) throw response;
    return response ?? [];
  }

  callsFor(modelArn: string): number {
    return this.calls.filter((call) => call.modelArn === modelArn).length;
  }
}

export interface GenerateCall {
  modelId: string;
  prompt: string;
  width: number;
  height: number;
}

export class FakeVlmService implements VlmService {
  readonly calls: GenerateCall[] = [];

  constructor(readonly responses: Record<number, string | Error>) {}

  async generate(modelId: string, prompt: string, image: Buffer): Promise<string> {
    const { width = 0, height = 0 } = await sharp(image).metadata();
    this.calls.push({ modelId, prompt, width, height });
    const response = this.responses[width];
    if (response instanceof Error) throw response;
    return response ?? "";
  }
}

/** Relative path → contents for every file under `dir`. */
export async function readTree(dir: string, prefix = ""): Promise<Map<string, Buffer>> {
  const files = new Map<string, Buffer>();
  for (const entry of await readdir(join(dir, prefix), { withFileTypes: true })) {
    const relative = prefix ? join(prefix, entry.name) : entry.name;
    if (entry.isDirectory()) {
      for (const [path, contents] of await readTree(dir, relative)) files.set(path, contents);
    } else if (entry.isFile()) {
      files.set(relative, await readFile(join(dir, relative)));
    }
  }
  return files;
}
