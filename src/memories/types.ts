import type { MementoErrorCode } from "./errors.js";

export type EntryKind = "image" | "video" | "archive" | "directory" | "unsupported";

export type Pair = {
  media: string;
  overlay: string;
};

export type VideoProbe = {
  width: number;
  height: number;
  duration: number; // seconds
  has_audio: boolean;
};

export type BatchParams = {
  source_path: string;
  dest_path: string;
  overwrite: boolean;
  dry_run?: boolean;
  concurrency?: number; // entries in flight, default 1
  fail_fast?: boolean; // rethrow the first failure after in-flight entries settle
};

export type EntryStatus = "skipped_exists" | "copied" | "merged" | "failed";

export type EntryResult = {
  name: string; // top-level entry name under source_path
  base_name: string;
  kind?: EntryKind; // absent when the entry was skipped before classification
  status: EntryStatus;
  output?: string; // absolute path written (or that would be written in a dry run)
  pair?: Pair; // only for merges of directories; archive pairs live in scratch space
  error?: {
    code: MementoErrorCode | "UNKNOWN";
    message: string;
  };
};

export type BatchSummary = {
  source_path: string;
  dest_path: string;
  dry_run: boolean;
  overwrite: boolean;
  started_at: string; // ISO 8601
  finished_at: string;
  elapsed_ms: number;
  totals: {
    entry_count: number;
    copied_count: number;
    merged_count: number;
    skipped_count: number;
    failed_count: number;
  };
  entries: EntryResult[];
};

// Progress events emitted via onProgress callback
export type BatchProgressEvent =
  | { type: "batch.start"; source_path: string; dest_path: string; entry_count: number }
  | { type: "batch.entry.start"; index: number; total: number; name: string }
  | { type: "batch.entry.done"; index: number; total: number; result: EntryResult }
  | {
      type: "batch.done";
      copied_count: number;
      merged_count: number;
      skipped_count: number;
      failed_count: number;
      elapsed_ms: number;
    };

export type OnProgress = (event: BatchProgressEvent) => void;
