import sharp from "sharp";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

export function tmpDir(label = "test"): string {
  return path.join(os.tmpdir(), `img-compactor-${label}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

export async function cleanup(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Deterministic high-entropy pixels, so lower quality reliably produces a
 * smaller file.
 */
export function noisePixels(width: number, height: number, channels = 3, seed = 1): Buffer {
  const pixels = Buffer.alloc(width * height * channels);
  let state = seed;
  for (let i = 0; i < pixels.length; i++) {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    pixels[i] = state >>> 24;
  }
  return pixels;
}

export async function createTestJpeg(
  filePath: string,
  { width = 64, height = 48, quality = 95, seed = 1 }: { width?: number; height?: number; quality?: number; seed?: number } = {},
): Promise<Buffer> {
  const jpeg = await sharp(noisePixels(width, height, 3, seed), { raw: { width, height, channels: 3 } })
    .jpeg({ quality })
    .toBuffer();
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, jpeg);
  return jpeg;
}

export async function createTestPng(filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await sharp({
    create: { width: 10, height: 10, channels: 3, background: { r: 255, g: 0, b: 0 } },
  })
    .png()
    .toFile(filePath);
}

export async function fileExists(filePath: string): Promise<boolean> {
  return fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
}
