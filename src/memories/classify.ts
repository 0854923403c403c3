import fs from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import type { EntryKind } from "./types.js";
import type { VideoCodec } from "./video-codec.js";
import { UnsupportedMediaError } from "./errors.js";
import { sniffBufferType } from "./sniff.js";

// libvips caches decoded files by name; outputs here get rewritten in place
// between runs, so a cached read would return stale pixels.
sharp.cache(false);

/** Archive suffixes, longest first so `.tar.gz` wins over a bare `.gz`. */
const ARCHIVE_SUFFIXES = [".tar.gz", ".tgz", ".tar", ".zip"] as const;

export type ArchiveSuffix = (typeof ARCHIVE_SUFFIXES)[number];

/** Extensions that already name a decoded format correctly. */
const FORMAT_EXTENSIONS: Record<string, readonly string[]> = {
  jpeg: ["jpg", "jpeg", "jpe", "jfif"],
  png: ["png"],
  webp: ["webp"],
  gif: ["gif"],
  tiff: ["tif", "tiff"],
  heif: ["heic", "heif", "avif"],
  svg: ["svg"],
  jp2: ["jp2", "j2k", "jpf", "jpx"],
  jxl: ["jxl"],
};

export type ImageFormat = keyof sharp.FormatEnum;

export type ClassifyOptions = {
  videoCodec: VideoCodec;
};

export function archiveSuffix(filePath: string): ArchiveSuffix | null {
  const lower = path.basename(filePath).toLowerCase();
  return ARCHIVE_SUFFIXES.find((suffix) => lower.endsWith(suffix)) ?? null;
}

export function isArchivePath(filePath: string): boolean {
  return archiveSuffix(filePath) !== null;
}

/**
 * Logical name of a top-level entry: everything before the first dot.
 * `bundle.tar.gz`, `bundle.zip` and `bundle` all map to `bundle`, and so do
 * the outputs written for them, which keeps the skip check consistent.
 */
export function entryBaseName(name: string): string {
  const stem = name.split(".")[0];
  return stem ? stem : name;
}

/**
 * Decoded image format as sharp reports it (`jpeg`, `png`, ...).
 * Fails with UnsupportedMediaError when the file does not decode as an image.
 */
export async function imageFormat(filePath: string): Promise<ImageFormat> {
  try {
    const meta = await sharp(filePath).metadata();
    if (meta.format && (meta.width ?? 0) > 0 && (meta.height ?? 0) > 0) {
      return meta.format;
    }
  } catch {
    // fall through
  }
  throw new UnsupportedMediaError(filePath);
}

/** True when the extension of `filePath` already names `format`. */
export function extensionMatchesFormat(filePath: string, format: string): boolean {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  return ext !== "" && (FORMAT_EXTENSIONS[format] ?? [format]).includes(ext);
}

/**
 * Extension (without dot) to use for an image: its own extension when that
 * already matches the decoded format, otherwise the format name.
 */
export async function imageExtension(filePath: string): Promise<string> {
  return extensionForFormat(filePath, await imageFormat(filePath));
}

/** `imageExtension` for a name whose decoded format is already known. */
export function extensionForFormat(name: string, format: string): string {
  if (extensionMatchesFormat(name, format)) {
    return path.extname(name).slice(1).toLowerCase();
  }
  return format;
}

export type BufferInspection =
  | { kind: "image"; format: ImageFormat }
  | { kind: "video" }
  | { kind: "unsupported" };

/**
 * Classify bytes held in memory without touching the filesystem: an image
 * when sharp decodes them, a video when their magic bytes are a `video/*`
 * container. Used to plan archive merges without extracting anything.
 */
export async function inspectBuffer(data: Buffer): Promise<BufferInspection> {
  try {
    const meta = await sharp(data).metadata();
    if (meta.format && (meta.width ?? 0) > 0 && (meta.height ?? 0) > 0) {
      return { kind: "image", format: meta.format };
    }
  } catch {
    // not an image
  }
  const detected = await sniffBufferType(data);
  if (detected?.mime.startsWith("video/")) {
    return { kind: "video" };
  }
  return { kind: "unsupported" };
}

async function isImage(filePath: string): Promise<boolean> {
  try {
    await imageFormat(filePath);
    return true;
  } catch {
    return false;
  }
}

async function isVideo(filePath: string, codec: VideoCodec): Promise<boolean> {
  try {
    return (await codec.probe(filePath)) !== null;
  } catch {
    return false;
  }
}

/**
 * Determine what an entry is by looking at it: directories by stat, archives
 * by suffix, images and videos by attempting a decode / probe. Never throws;
 * missing paths and special files are "unsupported".
 */
export async function classifyEntry(filePath: string, opts: ClassifyOptions): Promise<EntryKind> {
  let stat;
  try {
    stat = await fs.stat(filePath);
  } catch {
    return "unsupported";
  }

  if (stat.isDirectory()) {
    return "directory";
  }
  if (!stat.isFile()) {
    return "unsupported";
  }
  if (isArchivePath(filePath)) {
    return "archive";
  }
  // Images first: ffprobe also accepts stills.
  if (await isImage(filePath)) {
    return "image";
  }
  if (await isVideo(filePath, opts.videoCodec)) {
    return "video";
  }
  return "unsupported";
}
