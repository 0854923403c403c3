import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  resolveConcurrency,
  resolveFfmpegPath,
  resolveFfprobePath,
  resolveLogLevel,
  resolveScratchRoot,
} from "./env.js";

describe("resolveLogLevel", () => {
  it("defaults to info", () => {
    expect(resolveLogLevel({})).toBe("info");
  });

  it("accepts known levels case-insensitively", () => {
    expect(resolveLogLevel({ MEMENTO_LOG_LEVEL: " DEBUG " })).toBe("debug");
    expect(resolveLogLevel({ MEMENTO_LOG_LEVEL: "silent" })).toBe("silent");
  });

  it("falls back to info for unknown levels", () => {
    expect(resolveLogLevel({ MEMENTO_LOG_LEVEL: "verbose" })).toBe("info");
  });
});

describe("binary overrides", () => {
  it("returns undefined when unset or blank", () => {
    expect(resolveFfmpegPath({})).toBeUndefined();
    expect(resolveFfprobePath({ MEMENTO_FFPROBE_PATH: "  " })).toBeUndefined();
  });

  it("prefers MEMENTO_* over the generic variables", () => {
    expect(
      resolveFfmpegPath({ MEMENTO_FFMPEG_PATH: "/opt/ffmpeg", FFMPEG_PATH: "/usr/bin/ffmpeg" }),
    ).toBe("/opt/ffmpeg");
    expect(resolveFfprobePath({ FFPROBE_PATH: "/usr/bin/ffprobe" })).toBe("/usr/bin/ffprobe");
  });
});

describe("resolveScratchRoot", () => {
  it("defaults to the OS temp dir", () => {
    expect(resolveScratchRoot({})).toBe(os.tmpdir());
  });

  it("expands ~ against the provided home dir", () => {
    const result = resolveScratchRoot({ MEMENTO_SCRATCH_DIR: "~/scratch" }, () => "/home/tester");
    expect(result).toBe(path.resolve("/home/tester/scratch"));
  });

  it("resolves relative overrides to absolute paths", () => {
    expect(resolveScratchRoot({ MEMENTO_SCRATCH_DIR: "tmp/unpack" })).toBe(
      path.resolve("tmp/unpack"),
    );
  });
});

describe("resolveConcurrency", () => {
  it("defaults to 1", () => {
    expect(resolveConcurrency({})).toBe(1);
  });

  it("parses positive integers", () => {
    expect(resolveConcurrency({ MEMENTO_CONCURRENCY: "4" })).toBe(4);
  });

  it("rejects zero, negatives and garbage", () => {
    expect(resolveConcurrency({ MEMENTO_CONCURRENCY: "0" })).toBe(1);
    expect(resolveConcurrency({ MEMENTO_CONCURRENCY: "-2" })).toBe(1);
    expect(resolveConcurrency({ MEMENTO_CONCURRENCY: "two" })).toBe(1);
    expect(resolveConcurrency({ MEMENTO_CONCURRENCY: "1.5" })).toBe(1);
  });
});
