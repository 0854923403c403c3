import fs from "node:fs/promises";
import path from "node:path";
import pMap from "p-map";
import type { Logger } from "../logging/logger.js";
import type { BatchParams, BatchSummary, EntryKind, EntryResult, OnProgress, Pair } from "./types.js";
import type { VideoCodec } from "./video-codec.js";
import { resolveFfmpegPath, resolveFfprobePath, resolveScratchRoot } from "../config/env.js";
import { createLogger } from "../logging/logger.js";
import { ARCHIVE_MEMBER_COUNT, readArchiveMembers, withUnpacked } from "./archive.js";
import {
  classifyEntry,
  entryBaseName,
  extensionForFormat,
  imageExtension,
  inspectBuffer,
  type BufferInspection,
} from "./classify.js";
import { combineMedia, VIDEO_OUTPUT_EXTENSION } from "./composite.js";
import { copyEntry, copyTargetName } from "./copy.js";
import {
  InvalidArchiveError,
  isMementoError,
  NotFoundError,
  UnsupportedEntryError,
} from "./errors.js";
import { existsIn, snapshotExisting } from "./existing.js";
import { isPairCandidateName, pickPair, resolvePair, type PairCandidate } from "./pairing.js";
import { summarizeBatch } from "./summary.js";
import { createFfmpegVideoCodec } from "./video-codec.js";

export type BatchOptions = {
  videoCodec?: VideoCodec;
  /** Parent for archive scratch directories. Default: MEMENTO_SCRATCH_DIR or the OS temp dir. */
  scratchRoot?: string;
  onProgress?: OnProgress;
  logger?: Logger;
};

/** Everything one entry needs; shared read-only across concurrent entries. */
export type EntryContext = {
  sourceDir: string;
  destDir: string;
  existing: ReadonlySet<string>;
  overwrite: boolean;
  dryRun: boolean;
  videoCodec: VideoCodec;
  scratchRoot: string;
};

type EntryOutcome = {
  result: EntryResult;
  error?: unknown;
};

function failure(base: Omit<EntryResult, "status">, err: unknown): EntryOutcome {
  return {
    result: {
      ...base,
      status: "failed",
      error: {
        code: isMementoError(err) ? err.code : "UNKNOWN",
        message: err instanceof Error ? err.message : String(err),
      },
    },
    error: err,
  };
}

async function plannedMergeOutput(pair: Pair, outputBase: string, ctx: EntryContext): Promise<string> {
  const kind = await classifyEntry(pair.media, ctx);
  if (kind === "video") {
    return `${outputBase}.${VIDEO_OUTPUT_EXTENSION}`;
  }
  return `${outputBase}.${await imageExtension(pair.media)}`;
}

/**
 * Dry-run plan for an archive. Members are read in memory, the role
 * candidates are classified from their bytes and the pairing rules applied,
 * so the plan fails wherever the real merge would fail to pair. Returns the
 * path the merge would write.
 */
async function planArchive(archivePath: string, outputBase: string): Promise<string> {
  const members = await readArchiveMembers(archivePath);
  if (members.length !== ARCHIVE_MEMBER_COUNT) {
    throw new InvalidArchiveError(
      `expected exactly ${ARCHIVE_MEMBER_COUNT} top-level entries, found ${members.length}`,
      archivePath,
    );
  }

  const candidates: PairCandidate<{ name: string; inspection: BufferInspection | null }>[] = [];
  for (const member of members) {
    if (!isPairCandidateName(member.name)) {
      continue;
    }
    const inspection = member.data ? await inspectBuffer(member.data) : null;
    candidates.push({
      name: member.name,
      kind: inspection?.kind ?? "directory",
      item: { name: member.name, inspection },
    });
  }

  const { media } = pickPair(archivePath, candidates);
  if (media.inspection?.kind === "image") {
    return `${outputBase}.${extensionForFormat(media.name, media.inspection.format)}`;
  }
  return `${outputBase}.${VIDEO_OUTPUT_EXTENSION}`;
}

async function runEntry(name: string, ctx: EntryContext): Promise<EntryOutcome> {
  const src = path.join(ctx.sourceDir, name);
  const baseName = entryBaseName(name);

  if (!ctx.overwrite && existsIn(baseName, ctx.existing)) {
    return { result: { name, base_name: baseName, status: "skipped_exists" } };
  }

  const kind: EntryKind = await classifyEntry(src, ctx);
  const base = { name, base_name: baseName, kind };
  const outputBase = path.join(ctx.destDir, baseName);

  try {
    switch (kind) {
      case "archive": {
        if (ctx.dryRun) {
          const output = await planArchive(src, outputBase);
          return { result: { ...base, status: "merged", output } };
        }
        const output = await withUnpacked(
          src,
          async (dir) => {
            const pair = await resolvePair(dir, ctx);
            return combineMedia(pair.media, pair.overlay, outputBase, ctx);
          },
          { scratchRoot: ctx.scratchRoot },
        );
        return { result: { ...base, status: "merged", output } };
      }

      case "directory": {
        const pair = await resolvePair(src, ctx);
        const output = ctx.dryRun
          ? await plannedMergeOutput(pair, outputBase, ctx)
          : await combineMedia(pair.media, pair.overlay, outputBase, ctx);
        return { result: { ...base, status: "merged", output, pair } };
      }

      case "video":
      case "image": {
        const output = ctx.dryRun
          ? path.join(ctx.destDir, await copyTargetName(src, kind))
          : await copyEntry(src, ctx.destDir, kind);
        return { result: { ...base, status: "copied", output } };
      }

      case "unsupported":
        throw new UnsupportedEntryError(src);
    }
  } catch (err) {
    return failure(base, err);
  }
}

/**
 * Route one top-level entry: skip when its output exists, merge archives
 * and folders, copy loose videos and images. Never throws; failures come
 * back as `failed` results naming the path and the violated precondition.
 */
export async function processEntry(name: string, ctx: EntryContext): Promise<EntryResult> {
  return (await runEntry(name, ctx)).result;
}

async function assertSourceDir(sourcePath: string): Promise<void> {
  try {
    if ((await fs.stat(sourcePath)).isDirectory()) {
      return;
    }
  } catch {
    // fall through
  }
  throw new NotFoundError("Source directory", sourcePath);
}

export async function runBatch(params: BatchParams, opts: BatchOptions = {}): Promise<BatchSummary> {
  const startedAt = new Date().toISOString();
  const startMs = Date.now();
  const log = opts.logger ?? createLogger({ module: "batch" });
  const onProgress = opts.onProgress;
  const dryRun = params.dry_run === true;

  const sourceDir = path.resolve(params.source_path);
  const destDir = path.resolve(params.dest_path);
  await assertSourceDir(sourceDir);

  if (!dryRun) {
    await fs.mkdir(destDir, { recursive: true });
  }

  // Taken once, before any entry runs, and never re-read mid-batch.
  const existing = await snapshotExisting(destDir);

  const names = (await fs.readdir(sourceDir))
    .filter((name) => !name.startsWith("."))
    .toSorted((a, b) => a.localeCompare(b));

  const ctx: EntryContext = {
    sourceDir,
    destDir,
    existing,
    overwrite: params.overwrite,
    dryRun,
    videoCodec:
      opts.videoCodec ??
      createFfmpegVideoCodec({ ffmpegPath: resolveFfmpegPath(), ffprobePath: resolveFfprobePath() }),
    scratchRoot: opts.scratchRoot ?? resolveScratchRoot(),
  };

  log.info(
    { source: sourceDir, dest: destDir, entries: names.length, overwrite: params.overwrite, dryRun },
    "batch started",
  );
  onProgress?.({
    type: "batch.start",
    source_path: sourceDir,
    dest_path: destDir,
    entry_count: names.length,
  });

  let abortError: unknown = undefined;
  let aborted = false;

  const outcomes = await pMap(
    names.map((name, i) => ({ name, index: i + 1 })),
    async ({ name, index }): Promise<EntryResult | null> => {
      if (aborted) {
        return null;
      }
      onProgress?.({ type: "batch.entry.start", index, total: names.length, name });

      const outcome = await runEntry(name, ctx);
      const result = outcome.result;
      if (result.status === "failed") {
        log.warn(
          { entry: path.join(sourceDir, name), code: result.error?.code },
          result.error?.message ?? "entry failed",
        );
        if (params.fail_fast && !aborted) {
          aborted = true;
          abortError = outcome.error;
        }
      } else {
        log.debug({ entry: name, status: result.status, output: result.output }, "entry done");
      }

      onProgress?.({ type: "batch.entry.done", index, total: names.length, result });
      return result;
    },
    { concurrency: params.concurrency ?? 1 },
  );

  if (aborted) {
    log.error({ source: sourceDir }, "batch aborted on first failure");
    throw abortError;
  }

  const summary = summarizeBatch(
    {
      source_path: sourceDir,
      dest_path: destDir,
      dry_run: dryRun,
      overwrite: params.overwrite,
      started_at: startedAt,
    },
    outcomes.filter((r): r is EntryResult => r !== null),
    startMs,
  );

  log.info({ totals: summary.totals, elapsedMs: summary.elapsed_ms }, "batch finished");
  onProgress?.({
    type: "batch.done",
    copied_count: summary.totals.copied_count,
    merged_count: summary.totals.merged_count,
    skipped_count: summary.totals.skipped_count,
    failed_count: summary.totals.failed_count,
    elapsed_ms: summary.elapsed_ms,
  });

  return summary;
}
