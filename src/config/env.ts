import os from "node:os";
import path from "node:path";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_LOG_LEVEL: LogLevel = "info";

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function expandTilde(p: string, homedir: () => string): string {
  if (p === "~") {
    return homedir();
  }
  if (p.startsWith("~/")) {
    return path.join(homedir(), p.slice(2));
  }
  return p;
}

/**
 * Log level from MEMENTO_LOG_LEVEL. Unknown values fall back to "info".
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.MEMENTO_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return DEFAULT_LOG_LEVEL;
}

/** ffmpeg binary override. Undefined means fluent-ffmpeg looks it up on PATH. */
export function resolveFfmpegPath(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env.MEMENTO_FFMPEG_PATH?.trim() || env.FFMPEG_PATH?.trim() || undefined;
}

/** ffprobe binary override. Undefined means the bundled ffprobe-static binary. */
export function resolveFfprobePath(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env.MEMENTO_FFPROBE_PATH?.trim() || env.FFPROBE_PATH?.trim() || undefined;
}

/**
 * Parent directory for archive scratch directories.
 * Can be overridden via MEMENTO_SCRATCH_DIR (`~` is expanded).
 * Default: the OS temp dir.
 */
export function resolveScratchRoot(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.MEMENTO_SCRATCH_DIR?.trim();
  if (override) {
    return path.resolve(expandTilde(override, homedir));
  }
  return os.tmpdir();
}

/**
 * Default number of entries processed at once, from MEMENTO_CONCURRENCY.
 * Anything that is not a positive integer yields 1.
 */
export function resolveConcurrency(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.MEMENTO_CONCURRENCY?.trim();
  if (!raw || !/^\d+$/.test(raw)) {
    return 1;
  }
  const parsed = Number.parseInt(raw, 10);
  return parsed > 0 ? parsed : 1;
}
