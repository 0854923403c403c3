import { createReadStream, createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { extensionMatchesFormat, imageFormat } from "./classify.js";

export type CopyKind = "image" | "video";

/**
 * File name a loose entry gets in the destination. Videos keep their name;
 * images get `.<format>` appended when their extension does not already
 * name the decoded format (`IMG_1` → `IMG_1.jpeg`, `a.jpg` holding PNG data
 * → `a.jpg.png`).
 */
export async function copyTargetName(src: string, kind: CopyKind): Promise<string> {
  const name = path.basename(src);
  if (kind === "video") {
    return name;
  }
  const format = await imageFormat(src);
  return extensionMatchesFormat(src, format) ? name : `${name}.${format}`;
}

/**
 * Copy bytes through `<dst>.partial`, rename into place and carry over the
 * source's access/modification times.
 */
export async function copyFilePreservingTimes(src: string, dst: string): Promise<void> {
  const partial = dst + ".partial";
  try {
    await fs.mkdir(path.dirname(dst), { recursive: true });
    const stat = await fs.stat(src);

    await pipeline(createReadStream(src), createWriteStream(partial));
    await fs.utimes(partial, stat.atime, stat.mtime);

    // Atomic rename
    await fs.rename(partial, dst);
  } catch (err) {
    await fs.rm(partial, { force: true });
    throw err;
  }
}

/** Copy a loose image or video into `destDir`. Returns the path written. */
export async function copyEntry(src: string, destDir: string, kind: CopyKind): Promise<string> {
  const dst = path.join(destDir, await copyTargetName(src, kind));
  await copyFilePreservingTimes(src, dst);
  return dst;
}
