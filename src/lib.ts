export { Quality } from "./quality.js";
export {
  DefaultProcessorFactory,
  DEFAULT_PROCESSORS,
  JpegProcessor,
  type ImageProcessor,
  type ProcessorConstructor,
  type ProcessorFactory,
} from "./processor.js";
export { InputResolver, classifySource, sourceFileName, type FetchFunction, type ResolverOptions } from "./resolver.js";
export { BatchRunner, defaultConcurrency, type BatchRunnerOptions } from "./runner.js";
export { loadConfig, defaultConfig, configFromEnv, configFromFile, type CompactorConfig, type LoadConfigOptions } from "./config.js";
export { createLogger, silentLogger, type Logger } from "./logger.js";
export * from "./errors.js";
export type * from "./types.js";
