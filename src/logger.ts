import pino from "pino";
import type { Logger } from "pino";
import type { LogLevel } from "./types.js";

export type { Logger };

/** JSON lines on stderr, leaving stdout to the CLI report. */
export function createLogger(level: LogLevel = "info"): Logger {
  return pino(
    {
      name: "img-compactor",
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

export const silentLogger: Logger = pino({ level: "silent" });
