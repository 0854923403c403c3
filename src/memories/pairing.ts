import fs from "node:fs/promises";
import path from "node:path";
import type { EntryKind, Pair } from "./types.js";
import { classifyEntry, type ClassifyOptions } from "./classify.js";
import { NotFoundError, PairingError } from "./errors.js";

const MAIN_MARKER = "main";
const OVERLAY_MARKER = "overlay";

export type PairCandidate<T> = {
  name: string;
  kind: EntryKind;
  item: T;
};

/** Whether `name` carries a role marker and so needs classifying at all. */
export function isPairCandidateName(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.includes(MAIN_MARKER) || lower.includes(OVERLAY_MARKER);
}

/**
 * Apply the pairing rules to classified candidates found in `where`.
 *
 * The media is the single candidate whose name contains "main" and that is an
 * image or video; the overlay is the single candidate whose name contains
 * "overlay" and that is an image. Missing or ambiguous roles are rejected with
 * PairingError rather than guessed.
 */
export function pickPair<T>(where: string, candidates: PairCandidate<T>[]): { media: T; overlay: T } {
  const mains = candidates.filter(
    (c) => c.name.toLowerCase().includes(MAIN_MARKER) && (c.kind === "image" || c.kind === "video"),
  );
  const overlays = candidates.filter(
    (c) => c.name.toLowerCase().includes(OVERLAY_MARKER) && c.kind === "image",
  );

  if (mains.length !== 1) {
    throw new PairingError(where, "main", mains.length);
  }
  if (overlays.length !== 1) {
    throw new PairingError(where, "overlay", overlays.length);
  }
  return { media: mains[0].item, overlay: overlays[0].item };
}

/**
 * Find the media/overlay pair among the direct children of `dir`. Files that
 * match a marker but do not decode (empty, corrupt) are not candidates.
 */
export async function resolvePair(dir: string, opts: ClassifyOptions): Promise<Pair> {
  let isDir = false;
  try {
    isDir = (await fs.stat(dir)).isDirectory();
  } catch {
    isDir = false;
  }
  if (!isDir) {
    throw new NotFoundError("Directory", dir);
  }

  const candidates: PairCandidate<string>[] = [];
  for (const name of (await fs.readdir(dir)).toSorted()) {
    if (!isPairCandidateName(name)) {
      continue;
    }
    const absPath = path.join(dir, name);
    candidates.push({ name, kind: await classifyEntry(absPath, opts), item: absPath });
  }

  return pickPair(dir, candidates);
}
