import sharp from "sharp";
import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import { DecodingError, ImageIoError, UnsupportedFormatError, isErrnoException } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Quality } from "./quality.js";
import type { ShrinkResult } from "./types.js";
import { fileExtension } from "./utils.js";

// 16384 x 16384
const LIMIT_INPUT_PIXELS = 268402689;

export interface ImageProcessor {
  readonly inputPath: string;
  /** Re-encodes the bound input at `quality` and writes it to `outputPath`. */
  shrink(outputPath: string, quality: Quality): Promise<ShrinkResult>;
}

export type ProcessorConstructor = new (inputPath: string, logger: Logger) => ImageProcessor;

export interface ProcessorFactory {
  readonly supportedExtensions: readonly string[];
  /** Picks a processor by the extension of `inputPath`; no I/O. */
  create(inputPath: string): ImageProcessor;
}

export class JpegProcessor implements ImageProcessor {
  readonly inputPath: string;
  private readonly logger: Logger;

  constructor(inputPath: string, logger: Logger = silentLogger) {
    this.inputPath = inputPath;
    this.logger = logger;
  }

  async shrink(outputPath: string, quality: Quality): Promise<ShrinkResult> {
    let input: Buffer;
    try {
      input = await fs.readFile(this.inputPath);
    } catch (err) {
      throw new ImageIoError(`Cannot read ${this.inputPath}`, err);
    }

    const { data, info, greyscale } = await this.decode(input);
    const encoded = await this.encode(data, info, greyscale, quality);
    await this.writeAtomically(outputPath, encoded);

    return {
      inputSize: input.length,
      outputSize: encoded.length,
      width: info.width,
      height: info.height,
    };
  }

  private async decode(input: Buffer): Promise<{ data: Buffer; info: sharp.OutputInfo; greyscale: boolean }> {
    try {
      const image = sharp(input, {
        failOn: "warning",
        limitInputPixels: LIMIT_INPUT_PIXELS,
      });

      const metadata = await image.metadata();
      if (metadata.format !== "jpeg") {
        throw new DecodingError(`Not a JPEG image (detected ${metadata.format ?? "unknown format"})`);
      }

      const { data, info } = await image.raw().toBuffer({ resolveWithObject: true });
      return { data, info, greyscale: metadata.channels === 1 || metadata.space === "b-w" };
    } catch (err) {
      if (err instanceof DecodingError) throw err;
      throw new DecodingError(`Failed to decode JPEG ${this.inputPath}`, err);
    }
  }

  private async encode(data: Buffer, info: sharp.OutputInfo, greyscale: boolean, quality: Quality): Promise<Buffer> {
    try {
      let pipeline = sharp(data, {
        raw: { width: info.width, height: info.height, channels: info.channels },
      });
      // sharp writes JPEG as sRGB unless told otherwise
      if (greyscale) {
        pipeline = pipeline.toColourspace("b-w");
      }

      return await pipeline
        .jpeg({
          // libjpeg scales quality 0 the same as 1; sharp only accepts 1-100
          quality: Math.max(1, quality.value),
        })
        .toBuffer();
    } catch (err) {
      throw new DecodingError(`Failed to encode JPEG ${this.inputPath}`, err);
    }
  }

  private async writeAtomically(outputPath: string, encoded: Buffer): Promise<void> {
    const tempOutput = path.join(
      path.dirname(outputPath),
      `.img-compactor-${crypto.randomBytes(8).toString("hex")}.jpg`,
    );

    try {
      await refuseSymlink(outputPath);
      await fs.writeFile(tempOutput, encoded, { flag: "wx" });
      await fs.rename(tempOutput, outputPath);
    } catch (err) {
      await fs.rm(tempOutput, { force: true }).catch((cleanupErr: unknown) => {
        this.logger.warn({ file: tempOutput, err: cleanupErr }, "could not remove partial output");
      });
      if (err instanceof ImageIoError) throw err;
      throw new ImageIoError(`Cannot write ${outputPath}`, err);
    }
  }
}

async function refuseSymlink(outputPath: string): Promise<void> {
  try {
    const stat = await fs.lstat(outputPath);
    if (stat.isSymbolicLink()) {
      throw new ImageIoError(`Output path ${outputPath} is a symbolic link, refusing to overwrite`);
    }
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return;
    throw err;
  }
}

export const DEFAULT_PROCESSORS: Readonly<Record<string, ProcessorConstructor>> = {
  jpg: JpegProcessor,
  jpeg: JpegProcessor,
};

export class DefaultProcessorFactory implements ProcessorFactory {
  private readonly processors: ReadonlyMap<string, ProcessorConstructor>;
  private readonly logger: Logger;

  constructor(
    options: { processors?: Readonly<Record<string, ProcessorConstructor>>; logger?: Logger } = {},
  ) {
    this.processors = new Map(Object.entries(options.processors ?? DEFAULT_PROCESSORS));
    this.logger = options.logger ?? silentLogger;
  }

  get supportedExtensions(): readonly string[] {
    return [...this.processors.keys()];
  }

  create(inputPath: string): ImageProcessor {
    const extension = fileExtension(inputPath);
    const Processor = this.processors.get(extension);
    if (!Processor) {
      throw new UnsupportedFormatError(extension);
    }
    return new Processor(inputPath, this.logger);
  }
}
