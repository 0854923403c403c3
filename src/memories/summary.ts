import type { BatchSummary, EntryResult, EntryStatus } from "./types.js";

export function summarizeBatch(
  meta: Omit<BatchSummary, "totals" | "entries" | "finished_at" | "elapsed_ms">,
  entries: EntryResult[],
  startMs: number,
): BatchSummary {
  const count = (status: EntryStatus) => entries.filter((e) => e.status === status).length;
  return {
    ...meta,
    finished_at: new Date().toISOString(),
    elapsed_ms: Date.now() - startMs,
    totals: {
      entry_count: entries.length,
      copied_count: count("copied"),
      merged_count: count("merged"),
      skipped_count: count("skipped_exists"),
      failed_count: count("failed"),
    },
    entries,
  };
}

const STATUS_LABELS: Record<EntryStatus, string> = {
  copied: "copied",
  merged: "merged",
  skipped_exists: "skipped",
  failed: "FAILED",
};

function describeEntry(entry: EntryResult, dryRun: boolean): string {
  const label = dryRun && entry.status !== "failed" && entry.status !== "skipped_exists"
    ? `would ${entry.status === "copied" ? "copy" : "merge"}`
    : STATUS_LABELS[entry.status];
  if (entry.status === "failed") {
    return `${label.padEnd(12)} ${entry.name}: ${entry.error?.message ?? "unknown error"}`;
  }
  if (entry.output) {
    return `${label.padEnd(12)} ${entry.name} -> ${entry.output}`;
  }
  return `${label.padEnd(12)} ${entry.name}`;
}

/**
 * Human-readable report. Failures are always listed; other entries only
 * when `verbose` is set.
 */
export function formatSummary(summary: BatchSummary, opts: { verbose?: boolean } = {}): string {
  const lines: string[] = [];
  for (const entry of summary.entries) {
    if (opts.verbose || entry.status === "failed") {
      lines.push(describeEntry(entry, summary.dry_run));
    }
  }
  const t = summary.totals;
  const prefix = summary.dry_run ? "Dry run: " : "";
  lines.push(
    `${prefix}${t.entry_count} entries: ${t.merged_count} merged, ${t.copied_count} copied, ` +
      `${t.skipped_count} skipped, ${t.failed_count} failed (${summary.elapsed_ms}ms)`,
  );
  return lines.join("\n");
}
