import fs from "node:fs/promises";
import { entryBaseName } from "./classify.js";

const PARTIAL_SUFFIX = ".partial";

/**
 * Lowercased base names of everything already in `destDir`, read once per
 * batch. A missing destination yields an empty set.
 */
export async function snapshotExisting(destDir: string): Promise<ReadonlySet<string>> {
  let names: string[];
  try {
    names = await fs.readdir(destDir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return new Set();
    }
    throw err;
  }
  // A `.partial` is an interrupted write, not an output.
  return new Set(
    names
      .filter((name) => !name.endsWith(PARTIAL_SUFFIX))
      .map((name) => entryBaseName(name).toLowerCase()),
  );
}

/**
 * Whether an output for `baseName` is already present, ignoring case and
 * extension: `photo.PNG` counts for `photo`.
 */
export function existsIn(baseName: string, existing: ReadonlySet<string>): boolean {
  return existing.has(baseName.toLowerCase());
}
