import pino, { type Logger as PinoLogger } from "pino";
import { resolveLogLevel } from "../config/env.js";

export type Logger = PinoLogger;

/**
 * Structured logger shared by the pipeline. Writes JSON lines to stderr so
 * that CLI output on stdout (including `--json`) stays machine-readable.
 */
export const logger: Logger = pino(
  {
    level: resolveLogLevel(),
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { service: "memento-merge" },
  },
  pino.destination(2),
);

export function createLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
