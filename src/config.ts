/**
 * Run configuration
 * Priority: CLI flags > environment > config file > defaults
 */

import path from "node:path";
import fs from "node:fs/promises";
import os from "node:os";
import { z } from "zod";
import { ConfigurationError, isErrnoException, type ConfigIssue } from "./errors.js";
import { Quality } from "./quality.js";
import { defaultConcurrency } from "./runner.js";

export const CONFIG_FILE_NAME = "img-compactor.config.json";
export const ENV_PREFIX = "IMG_COMPACTOR_";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

// quality stays a raw integer here: Quality.from is where the range is enforced
export const CompactorConfigSchema = z.object({
  outputDir: z.string().min(1),
  quality: z.number().int(),
  concurrency: z.number().int().positive(),
  retainTempFiles: z.boolean(),
  fetchTimeoutMs: z.number().int().positive(),
  logLevel: z.enum(LOG_LEVELS),
});

export const PartialCompactorConfigSchema = CompactorConfigSchema.partial().strict();

export type CompactorConfig = z.infer<typeof CompactorConfigSchema>;

const booleanString = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  OUTPUT_DIR: z.string().min(1).optional(),
  QUALITY: z.coerce.number().int().optional(),
  CONCURRENCY: z.coerce.number().int().positive().optional(),
  RETAIN_TEMP_FILES: booleanString.optional(),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export function defaultConfig(): CompactorConfig {
  return {
    outputDir: os.tmpdir(),
    quality: Quality.DEFAULT_VALUE,
    concurrency: defaultConcurrency(),
    retainTempFiles: false,
    fetchTimeoutMs: 30000,
    logLevel: "info",
  };
}

function toIssues(error: z.ZodError, prefix: string): ConfigIssue[] {
  return error.issues.map((issue) => ({
    field: `${prefix}${issue.path.join(".")}`,
    message: issue.message,
  }));
}

/**
 * Reads the IMG_COMPACTOR_* variables. Unset and empty variables are left out.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<CompactorConfig> {
  const raw: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ENV_PREFIX) && value !== undefined && value !== "") {
      raw[key.slice(ENV_PREFIX.length)] = value;
    }
  }

  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(toIssues(parsed.error, ENV_PREFIX));
  }

  const values = parsed.data;
  return {
    outputDir: values.OUTPUT_DIR,
    quality: values.QUALITY,
    concurrency: values.CONCURRENCY,
    retainTempFiles: values.RETAIN_TEMP_FILES,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
  };
}

/**
 * Loads a JSON config file. Returns null when `required` is false and the
 * file does not exist.
 */
export async function configFromFile(filePath: string, required: boolean): Promise<Partial<CompactorConfig> | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (!required && isErrnoException(err) && err.code === "ENOENT") {
      return null;
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError([{ field: filePath, message: `cannot read config file: ${reason}` }]);
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError([{ field: filePath, message: `invalid JSON: ${reason}` }]);
  }

  const parsed = PartialCompactorConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(toIssues(parsed.error, `${filePath}: `));
  }
  return parsed.data;
}

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Values from the command line, applied last */
  overrides?: Partial<CompactorConfig>;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<CompactorConfig> {
  const cwd = options.cwd ?? process.cwd();
  const fileConfig = options.configPath
    ? await configFromFile(path.resolve(cwd, options.configPath), true)
    : await configFromFile(path.join(cwd, CONFIG_FILE_NAME), false);
  const envConfig = configFromEnv(options.env ?? process.env);

  const merged = {
    ...defaultConfig(),
    ...definedEntries(fileConfig ?? {}),
    ...definedEntries(envConfig),
    ...definedEntries(options.overrides ?? {}),
  };

  const parsed = CompactorConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(toIssues(parsed.error, ""));
  }
  return parsed.data;
}

function definedEntries(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}
