import path from "node:path";
import fs from "node:fs/promises";
import os from "node:os";
import pLimit from "p-limit";
import { ImageIoError, toProcessingError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { DefaultProcessorFactory, type ProcessorFactory } from "./processor.js";
import type { Quality } from "./quality.js";
import { InputResolver } from "./resolver.js";
import type { BatchReport, BatchResult, BatchSummary, ProgressCallback } from "./types.js";
import { formatBytes, formatDuration } from "./utils.js";

export function defaultConcurrency(): number {
  return Math.max(1, Math.min(os.cpus().length - 1, 4));
}

export interface BatchRunnerOptions {
  factory?: ProcessorFactory;
  resolver?: InputResolver;
  logger?: Logger;
  /** Items processed at once; defaults to cpus - 1, capped at 4 */
  concurrency?: number;
  onProgress?: ProgressCallback;
}

/**
 * Shrinks every source into `outputDir`. Items run concurrently and fail
 * independently: the returned report has exactly one result per source, in
 * input order.
 */
export class BatchRunner {
  readonly concurrency: number;
  private readonly factory: ProcessorFactory;
  private readonly resolver: InputResolver;
  private readonly logger: Logger;
  private readonly onProgress: ProgressCallback | undefined;

  constructor(options: BatchRunnerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.factory = options.factory ?? new DefaultProcessorFactory({ logger: this.logger });
    this.resolver = options.resolver ?? new InputResolver({ logger: this.logger });
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? defaultConcurrency()));
    this.onProgress = options.onProgress;
  }

  async run(sources: readonly string[], outputDir: string, quality: Quality): Promise<BatchReport> {
    const startTime = Date.now();
    const outputDirError = await this.prepareOutputDir(outputDir);

    const limit = pLimit(this.concurrency);
    let done = 0;

    const results = await Promise.all(
      sources.map((source) =>
        limit(async () => {
          const result = await this.processSource(source, outputDir, quality, outputDirError);
          done++;
          this.reportProgress(done, sources.length, result);
          return result;
        }),
      ),
    );

    const summary = buildSummary(results, Date.now() - startTime);
    this.logger.info(
      { total: summary.total, succeeded: summary.succeeded, failed: summary.failed, duration: summary.duration },
      "batch finished",
    );
    return { results, summary };
  }

  /** An unusable output directory fails every item rather than the run. */
  private async prepareOutputDir(outputDir: string): Promise<ImageIoError | undefined> {
    try {
      await fs.mkdir(outputDir, { recursive: true });
      return undefined;
    } catch (err) {
      const error = new ImageIoError(`Cannot create output directory ${outputDir}`, err);
      this.logger.error({ outputDir, err: error }, error.message);
      return error;
    }
  }

  private reportProgress(done: number, total: number, result: BatchResult): void {
    if (!this.onProgress) return;
    try {
      this.onProgress(done, total, result);
    } catch (err) {
      this.logger.warn({ source: result.source, err }, "progress callback failed");
    }
  }

  private async processSource(
    source: string,
    outputDir: string,
    quality: Quality,
    outputDirError: ImageIoError | undefined,
  ): Promise<BatchResult> {
    const itemStart = Date.now();

    try {
      if (outputDirError) throw outputDirError;

      const staged = await this.resolver.resolve(source);
      try {
        // the staged path decides the codec; the name only decides where output lands
        const processor = this.factory.create(staged.path);
        const outputPath = path.join(outputDir, staged.name);
        const { inputSize, outputSize } = await processor.shrink(outputPath, quality);

        this.logger.info({ source, outputPath, inputSize, outputSize }, "image processed");
        return {
          status: "succeeded",
          source,
          outputPath,
          inputSize,
          outputSize,
          durationMs: Date.now() - itemStart,
        };
      } finally {
        await this.resolver.release(staged).catch((err: unknown) => {
          this.logger.warn({ source, file: staged.path, err }, "could not remove temporary file");
        });
      }
    } catch (err) {
      const error = toProcessingError(err);
      this.logger.error({ source, err: error }, `error processing image ${source}: ${error.message}`);
      return {
        status: "failed",
        source,
        error,
        message: error.message,
        durationMs: Date.now() - itemStart,
      };
    }
  }
}

function buildSummary(results: readonly BatchResult[], durationMs: number): BatchSummary {
  let totalBytes = 0;
  let outputBytes = 0;
  let succeeded = 0;

  for (const result of results) {
    if (result.status === "succeeded") {
      succeeded++;
      totalBytes += result.inputSize;
      outputBytes += result.outputSize;
    }
  }

  const savedBytes = totalBytes - outputBytes;
  const ratio = totalBytes > 0
    ? ((savedBytes / totalBytes) * 100).toFixed(2) + "%"
    : "0%";

  return {
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    totalBytes,
    outputBytes,
    savedBytes,
    duration: formatDuration(durationMs),
    totalSize: formatBytes(totalBytes),
    savedSize: formatBytes(savedBytes),
    compressionRatio: ratio,
  };
}
