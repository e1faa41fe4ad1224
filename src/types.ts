import type { ImageProcessingError } from "./errors.js";

export type ImageSource =
  | { kind: "local"; path: string }
  | { kind: "remote"; url: string };

export interface StagedInput {
  source: ImageSource;
  /** Local file the processor reads */
  path: string;
  /** File name the source was given, used for format dispatch and output naming */
  name: string;
  temporary: boolean;
}

export interface ShrinkResult {
  inputSize: number;
  outputSize: number;
  width: number;
  height: number;
}

export type BatchResult =
  | {
      status: "succeeded";
      source: string;
      outputPath: string;
      inputSize: number;
      outputSize: number;
      durationMs: number;
    }
  | {
      status: "failed";
      source: string;
      error: ImageProcessingError;
      message: string;
      durationMs: number;
    };

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  totalBytes: number;
  outputBytes: number;
  savedBytes: number;
  duration: string;
  totalSize: string;
  savedSize: string;
  compressionRatio: string;
}

export interface BatchReport {
  results: BatchResult[];
  summary: BatchSummary;
}

export type ProgressCallback = (done: number, total: number, result: BatchResult) => void;

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface ParsedArgs {
  inputs: string[];
  outputDir?: string;
  quality?: number;
  concurrency?: number;
  fromFile?: string;
  stdin: boolean;
  configPath?: string;
  retainTempFiles?: boolean;
  logLevel?: LogLevel;
  help: boolean;
  version: boolean;
}
