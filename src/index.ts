#!/usr/bin/env node

import { createRequire } from "node:module";
import fsSync from "node:fs";
import { loadConfig, type CompactorConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { DefaultProcessorFactory } from "./processor.js";
import { Quality } from "./quality.js";
import { InputResolver } from "./resolver.js";
import { BatchRunner } from "./runner.js";
import type { LogLevel, ParsedArgs } from "./types.js";
import { readSourceList } from "./utils.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

const SUPPORTED_FORMATS = new DefaultProcessorFactory().supportedExtensions.join(", ");

const HELP = `
img-compactor v${VERSION} — Shrink JPEG images by re-encoding them at a lower quality

Usage:
  img-compactor <source...>                 Shrink local files or http(s) URLs
  img-compactor -o <dir> <source...>        Write results to <dir>
  img-compactor -q 40 <source...>           Custom quality (default: ${Quality.DEFAULT_VALUE})
  img-compactor -f list.txt                 Read sources from a file, one per line
  img-compactor --stdin < list.txt          Read sources from standard input

Options:
  -q, --quality <n>       JPEG quality ${Quality.MIN}-${Quality.MAX} (default: ${Quality.DEFAULT_VALUE})
  -o, --output <dir>      Output directory (default: system temp directory)
  -c, --concurrency <n>   Images processed at once (default: cpus - 1, max 4)
  -f, --from-file <file>  Read newline separated sources from a file
      --stdin             Read newline separated sources from standard input
      --config <file>     JSON config file (default: ./img-compactor.config.json)
      --keep-temp         Keep downloaded files in the temp directory
      --log-level <lvl>   fatal, error, warn, info, debug, trace or silent
  -h, --help              Show this help message
  -v, --version           Show version number

Environment:
  IMG_COMPACTOR_OUTPUT_DIR, IMG_COMPACTOR_QUALITY, IMG_COMPACTOR_CONCURRENCY,
  IMG_COMPACTOR_RETAIN_TEMP_FILES, IMG_COMPACTOR_FETCH_TIMEOUT_MS, IMG_COMPACTOR_LOG_LEVEL

Supported formats: ${SUPPORTED_FORMATS}
`.trim();

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error("Run img-compactor --help for usage");
  process.exit(1);
}

function requireValue(args: string[], i: number, flag: string, what: string): string {
  const next = args[i];
  if (next === undefined) {
    fail(`${flag} requires ${what}`);
  }
  return next;
}

function parseInteger(value: string, flag: string): number {
  if (!/^-?\d+$/.test(value)) {
    fail(`invalid ${flag} value: ${value}`);
  }
  return parseInt(value, 10);
}

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    inputs: [],
    stdin: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      return result;
    }

    if (arg === "-v" || arg === "--version") {
      result.version = true;
      return result;
    }

    if (arg === "--stdin") {
      result.stdin = true;
      continue;
    }

    if (arg === "--keep-temp") {
      result.retainTempFiles = true;
      continue;
    }

    if (arg === "-q" || arg === "--quality") {
      // range is checked by Quality.from, never clamped
      result.quality = parseInteger(requireValue(args, ++i, arg, "a numeric argument"), "quality");
      continue;
    }

    if (arg === "-c" || arg === "--concurrency") {
      const value = parseInteger(requireValue(args, ++i, arg, "a numeric argument"), "concurrency");
      if (value < 1) {
        fail(`concurrency must be at least 1, got ${value}`);
      }
      result.concurrency = value;
      continue;
    }

    if (arg === "-o" || arg === "--output") {
      result.outputDir = requireValue(args, ++i, arg, "a directory argument");
      continue;
    }

    if (arg === "-f" || arg === "--from-file") {
      result.fromFile = requireValue(args, ++i, arg, "a file argument");
      continue;
    }

    if (arg === "--config") {
      result.configPath = requireValue(args, ++i, arg, "a file argument");
      continue;
    }

    if (arg === "--log-level") {
      const level = requireValue(args, ++i, arg, "a level argument");
      const match = LOG_LEVELS.find((l) => l === level);
      if (!match) {
        fail(`invalid log level: ${level}`);
      }
      result.logLevel = match;
      continue;
    }

    if (arg.startsWith("-")) {
      fail(`unknown option: ${arg}`);
    }

    result.inputs.push(arg);
  }

  return result;
}

async function collectSources(parsed: ParsedArgs): Promise<string[]> {
  const sources = [...parsed.inputs];

  if (parsed.fromFile) {
    sources.push(...(await readSourceList(fsSync.createReadStream(parsed.fromFile))));
  }

  if (parsed.stdin) {
    sources.push(...(await readSourceList(process.stdin)));
  }

  return sources;
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  if (parsed.help) {
    console.log(HELP);
    return;
  }

  if (parsed.version) {
    console.log(VERSION);
    return;
  }

  const config: CompactorConfig = await loadConfig({
    configPath: parsed.configPath,
    overrides: {
      outputDir: parsed.outputDir,
      quality: parsed.quality,
      concurrency: parsed.concurrency,
      retainTempFiles: parsed.retainTempFiles,
      logLevel: parsed.logLevel,
    },
  });

  // One bad quality value applies to every item, so it ends the run before any work starts
  const quality = Quality.from(config.quality);

  const sources = await collectSources(parsed);
  if (sources.length === 0) {
    fail("no input file or URL specified");
  }

  const logger = createLogger(config.logLevel);
  logger.info({ outputDir: config.outputDir, quality: quality.value, concurrency: config.concurrency }, "starting batch");

  const runner = new BatchRunner({
    logger,
    concurrency: config.concurrency,
    factory: new DefaultProcessorFactory({ logger }),
    resolver: new InputResolver({
      logger,
      fetchTimeoutMs: config.fetchTimeoutMs,
      retainTempFiles: config.retainTempFiles,
    }),
    onProgress: (done, total) => {
      const progress = ((done / total) * 100).toFixed(1);
      process.stdout.write(`\rProgress: ${progress}% (${done}/${total})`);
    },
  });

  const { results, summary } = await runner.run(sources, config.outputDir, quality);
  process.stdout.write("\n");

  console.log("\nShrink completed:");
  console.log(`  Total images: ${summary.total}`);
  console.log(`  Succeeded:    ${summary.succeeded}`);
  console.log(`  Failed:       ${summary.failed}`);
  console.log(`  Duration:     ${summary.duration}`);
  console.log(`  Total size:   ${summary.totalSize}`);
  console.log(`  Saved:        ${summary.savedSize}`);
  console.log(`  Compression:  ${summary.compressionRatio}`);

  if (summary.failed > 0) {
    console.log("\nFailed images:");
    for (const result of results) {
      if (result.status === "failed") {
        console.log(`  - ${result.source}: ${result.message}`);
      }
    }
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
