import path from "node:path";
import fs from "node:fs/promises";
import os from "node:os";
import crypto from "node:crypto";
import { FetchError, ImageIoError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ImageSource, StagedInput } from "./types.js";

const TEMP_PREFIX = "img_compactor_";
const TEMP_SUFFIX = ".jpg";
const DEFAULT_FETCH_TIMEOUT = 30000;

export type FetchFunction = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface ResolverOptions {
  fetch?: FetchFunction;
  fetchTimeoutMs?: number;
  /** Keep downloaded files after processing instead of deleting them */
  retainTempFiles?: boolean;
  tempDir?: string;
  logger?: Logger;
}

export function classifySource(source: string): ImageSource {
  if (source.startsWith("http://") || source.startsWith("https://")) {
    return { kind: "remote", url: source };
  }
  return { kind: "local", path: source };
}

/**
 * Name of the file a source refers to: the last path component of a local
 * path, or the last pathname segment of a URL (query and fragment dropped).
 */
export function sourceFileName(source: ImageSource): string {
  if (source.kind === "local") {
    return path.basename(source.path);
  }

  let pathname: string;
  try {
    pathname = new URL(source.url).pathname;
  } catch {
    return "";
  }
  const segment = pathname.slice(pathname.lastIndexOf("/") + 1);
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export class InputResolver {
  private readonly fetch: FetchFunction;
  private readonly fetchTimeoutMs: number;
  private readonly retainTempFiles: boolean;
  private readonly tempDir: string;
  private readonly logger: Logger;

  constructor(options: ResolverOptions = {}) {
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT;
    this.retainTempFiles = options.retainTempFiles ?? false;
    this.tempDir = options.tempDir ?? os.tmpdir();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Local sources pass through untouched. Remote ones are downloaded to a
   * `.jpg` temp file; their `name` is the file name from the URL, or the temp
   * file's own name when the URL has none.
   */
  async resolve(sourceString: string): Promise<StagedInput> {
    const source = classifySource(sourceString);

    if (source.kind === "local") {
      return { source, path: source.path, name: sourceFileName(source), temporary: false };
    }

    const bytes = await this.download(source.url);
    const tempPath = path.join(this.tempDir, `${TEMP_PREFIX}${crypto.randomBytes(8).toString("hex")}${TEMP_SUFFIX}`);

    try {
      await fs.writeFile(tempPath, bytes, { flag: "wx" });
    } catch (err) {
      throw new ImageIoError(`Cannot stage download of ${source.url}`, err);
    }
    this.logger.debug({ source: source.url, file: tempPath, bytes: bytes.length }, "temporary file created");

    const name = sourceFileName(source) || path.basename(tempPath);
    return { source, path: tempPath, name, temporary: true };
  }

  /** Deletes a staged download unless temp files are retained. Local inputs are never touched. */
  async release(staged: StagedInput): Promise<void> {
    if (!staged.temporary || this.retainTempFiles) return;
    await fs.rm(staged.path, { force: true });
  }

  private async download(url: string): Promise<Buffer> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.fetchTimeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetch(url, { signal: controller.signal });
      } catch (err) {
        const reason = controller.signal.aborted
          ? `timed out after ${this.fetchTimeoutMs}ms`
          : err instanceof Error ? err.message : String(err);
        throw new FetchError(url, reason, { cause: err });
      }

      if (!response.ok) {
        throw new FetchError(url, `HTTP ${response.status} ${response.statusText}`.trim(), {
          status: response.status,
        });
      }

      try {
        return Buffer.from(await response.arrayBuffer());
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new FetchError(url, `could not read response body: ${reason}`, {
          status: response.status,
          cause: err,
        });
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
