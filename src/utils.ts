import path from "node:path";
import readline from "node:readline";
import type { Readable } from "node:stream";

/** Extension without the dot, case preserved; "" when there is none. */
export function fileExtension(fileName: string): string {
  return path.extname(fileName).slice(1);
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let size = Math.abs(bytes);
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${bytes < 0 ? "-" : ""}${size.toFixed(2)} ${units[unit]}`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${seconds}s`;
}

/**
 * Reads a newline separated source list. Surrounding whitespace is trimmed;
 * blank lines and lines starting with `#` are skipped.
 */
export async function readSourceList(stream: Readable): Promise<string[]> {
  const sources: string[] = [];
  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });

  for await (const line of lines) {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;
    sources.push(trimmed);
  }

  return sources;
}
