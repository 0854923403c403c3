import { describe, expect, it } from "vitest";
import type { BatchSummary, EntryResult } from "./types.js";
import { formatSummary, summarizeBatch } from "./summary.js";

const ENTRIES: EntryResult[] = [
  {
    name: "a.jpg",
    base_name: "a",
    kind: "image",
    status: "copied",
    output: "/out/a.jpg",
  },
  {
    name: "bundle.zip",
    base_name: "bundle",
    kind: "archive",
    status: "merged",
    output: "/out/bundle.jpg",
  },
  { name: "old.png", base_name: "old", status: "skipped_exists" },
  {
    name: "notes.txt",
    base_name: "notes",
    kind: "unsupported",
    status: "failed",
    error: { code: "UNSUPPORTED_ENTRY", message: "boom" },
  },
];

function makeSummary(dryRun: boolean): BatchSummary {
  return {
    source_path: "/in",
    dest_path: "/out",
    dry_run: dryRun,
    overwrite: false,
    started_at: "2024-01-01T00:00:00.000Z",
    finished_at: "2024-01-01T00:00:00.012Z",
    elapsed_ms: 12,
    totals: {
      entry_count: 4,
      copied_count: 1,
      merged_count: 1,
      skipped_count: 1,
      failed_count: 1,
    },
    entries: ENTRIES,
  };
}

describe("summarizeBatch", () => {
  it("counts entries by status", () => {
    const summary = summarizeBatch(
      {
        source_path: "/in",
        dest_path: "/out",
        dry_run: false,
        overwrite: false,
        started_at: "2024-01-01T00:00:00.000Z",
      },
      ENTRIES,
      Date.now(),
    );
    expect(summary.totals).toEqual({
      entry_count: 4,
      copied_count: 1,
      merged_count: 1,
      skipped_count: 1,
      failed_count: 1,
    });
    expect(summary.entries).toBe(ENTRIES);
    expect(summary.elapsed_ms).toBeGreaterThanOrEqual(0);
  });
});

describe("formatSummary", () => {
  it("lists only failures by default", () => {
    expect(formatSummary(makeSummary(false)).split("\n")).toEqual([
      "FAILED       notes.txt: boom",
      "4 entries: 1 merged, 1 copied, 1 skipped, 1 failed (12ms)",
    ]);
  });

  it("lists every entry when verbose", () => {
    expect(formatSummary(makeSummary(false), { verbose: true }).split("\n")).toEqual([
      "copied       a.jpg -> /out/a.jpg",
      "merged       bundle.zip -> /out/bundle.jpg",
      "skipped      old.png",
      "FAILED       notes.txt: boom",
      "4 entries: 1 merged, 1 copied, 1 skipped, 1 failed (12ms)",
    ]);
  });

  it("phrases a dry run as intentions", () => {
    expect(formatSummary(makeSummary(true), { verbose: true }).split("\n")).toEqual([
      "would copy   a.jpg -> /out/a.jpg",
      "would merge  bundle.zip -> /out/bundle.jpg",
      "skipped      old.png",
      "FAILED       notes.txt: boom",
      "Dry run: 4 entries: 1 merged, 1 copied, 1 skipped, 1 failed (12ms)",
    ]);
  });
});
