import { readdir, stat } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import sharp from "sharp";

export const IMAGE_EXTENSIONS = new Set([".jpg", ".jpeg", ".png"]);
const RESOLVE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".JPG", ".JPEG", ".PNG"];

const NORMALIZED_MAX_SIZE = 1024;
const NORMALIZED_QUALITY = 85;

export interface PixelRegion {
  left: number;
  top: number;
  width: number;
  height: number;
}

export function isImagePath(path: string): boolean {
  return IMAGE_EXTENSIONS.has(extname(path).toLowerCase());
}

/** Image identity: base filename without its extension. */
export function imageIdentity(path: string): string {
  const name = basename(path);
  return name.slice(0, name.length - extname(name).length);
}

export async function listImageFiles(folder: string): Promise<string[]> {
  const entries = await readdir(folder, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isImagePath(entry.name))
    .map((entry) => join(folder, entry.name))
    .sort();
}

export async function resolveSourceImage(inputFolder: string, imageId: string): Promise<string | null> {
  for (const ext of RESOLVE_EXTENSIONS) {
    const candidate = join(inputFolder, `${imageId}${ext}`);
    const isFile = await stat(candidate).then((info) => info.isFile()).catch(() => false);
    if (isFile) return candidate;
  }
  return null;
}

/**
 * Orientation-corrected JPEG whose longest side is at most 1024 pixels.
 * Every remote call and every dispatched copy goes through this.
 */
export async function normalizeImage(input: Buffer): Promise<Buffer> {
  return sharp(input)
    .rotate()
    .resize({ width: NORMALIZED_MAX_SIZE, height: NORMALIZED_MAX_SIZE, fit: "inside", withoutEnlargement: true })
    .jpeg({ quality: NORMALIZED_QUALITY })
    .toBuffer();
}

export async function loadOrientedImage(path: string): Promise<{ image: Buffer; width: number; height: number }> {
  const { data, info } = await sharp(path).rotate().toBuffer({ resolveWithObject: true });
  return { image: data, width: info.width, height: info.height };
}

export async function cropImage(image: Buffer, region: PixelRegion): Promise<Buffer> {
  return sharp(image).extract(region).toBuffer();
}
