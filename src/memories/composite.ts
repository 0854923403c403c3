import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import sharp from "sharp";
import type { VideoCodec } from "./video-codec.js";
import { classifyEntry, imageExtension, imageFormat } from "./classify.js";
import {
  CodecError,
  InvalidArgumentError,
  NotFoundError,
  UnsupportedMediaError,
} from "./errors.js";

export const VIDEO_OUTPUT_EXTENSION = "mp4";

export type CombineOptions = {
  videoCodec: VideoCodec;
  /** Parent for the private directory holding a resized video overlay. */
  scratchRoot?: string;
};

async function assertFile(filePath: string, what: string): Promise<void> {
  try {
    if ((await fs.stat(filePath)).isFile()) {
      return;
    }
  } catch {
    // fall through
  }
  throw new NotFoundError(what, filePath);
}

/**
 * Write through `<finalPath>.partial` and rename into place, so a failed
 * encode never leaves a truncated output behind.
 */
async function writeAtomically(
  finalPath: string,
  write: (partialPath: string) => Promise<void>,
): Promise<void> {
  await fs.mkdir(path.dirname(finalPath), { recursive: true });
  const partial = finalPath + ".partial";
  try {
    await write(partial);
    await fs.rename(partial, finalPath);
  } catch (err) {
    await fs.rm(partial, { force: true });
    throw err;
  }
}

async function composeImage(media: string, overlay: string, outputBase: string): Promise<string> {
  const format = await imageFormat(media);
  const outputPath = `${outputBase}.${await imageExtension(media)}`;

  let composited: Buffer;
  try {
    const { width, height } = await sharp(media).metadata();
    const overlayMeta = await sharp(overlay).metadata();
    let overlayImage = sharp(overlay).ensureAlpha();
    if (overlayMeta.width !== width || overlayMeta.height !== height) {
      overlayImage = overlayImage.resize(width, height, { fit: "fill" });
    }
    const overlayBuffer = await overlayImage.png().toBuffer();
    composited = await sharp(media)
      .ensureAlpha()
      .composite([{ input: overlayBuffer, blend: "over" }])
      .png()
      .toBuffer();
  } catch (err) {
    throw new CodecError("Image composite", media, err);
  }

  await writeAtomically(outputPath, async (partial) => {
    try {
      await sharp(composited).removeAlpha().toFormat(format).toFile(partial);
    } catch (err) {
      throw new CodecError("Image encode", outputPath, err);
    }
  });
  return outputPath;
}

async function composeVideo(
  media: string,
  overlay: string,
  outputBase: string,
  opts: CombineOptions,
): Promise<string> {
  const probe = await opts.videoCodec.probe(media);
  if (!probe) {
    throw new UnsupportedMediaError(media);
  }
  const outputPath = `${outputBase}.${VIDEO_OUTPUT_EXTENSION}`;

  const scratchRoot = opts.scratchRoot ?? os.tmpdir();
  await fs.mkdir(scratchRoot, { recursive: true, mode: 0o700 });
  const scratch = await fs.mkdtemp(path.join(scratchRoot, "memento-overlay-"));
  try {
    const sizedOverlay = path.join(scratch, "overlay.png");
    try {
      const overlayMeta = await sharp(overlay).metadata();
      let overlayImage = sharp(overlay).ensureAlpha();
      if (overlayMeta.width !== probe.width || overlayMeta.height !== probe.height) {
        overlayImage = overlayImage.resize(probe.width, probe.height, { fit: "fill" });
      }
      await overlayImage.png().toFile(sizedOverlay);
    } catch (err) {
      throw new CodecError("Overlay resize", overlay, err);
    }

    await writeAtomically(outputPath, async (partial) => {
      try {
        await opts.videoCodec.overlay({ media, overlay: sizedOverlay, output: partial, probe });
      } catch (err) {
        throw new CodecError("Video encode", media, err);
      }
    });
  } finally {
    await fs.rm(scratch, { recursive: true, force: true });
  }
  return outputPath;
}

/**
 * Merge one media/overlay pair into a single file at `outputBase` plus an
 * extension chosen here: the media's own image format for stills, MP4 for
 * video. The overlay is always resized to the media, never the reverse.
 * Returns the path written.
 */
export async function combineMedia(
  media: string,
  overlay: string,
  outputBase: string,
  opts: CombineOptions,
): Promise<string> {
  if (path.extname(outputBase) !== "") {
    throw new InvalidArgumentError(
      `Output base must not carry an extension (the compositor picks it): ${outputBase}`,
      outputBase,
    );
  }
  await assertFile(media, "Media file");
  await assertFile(overlay, "Overlay file");
  // Throws UnsupportedMediaError when the overlay is not an image.
  await imageFormat(overlay);

  const kind = await classifyEntry(media, opts);
  if (kind === "image") {
    return composeImage(media, overlay, outputBase);
  }
  if (kind === "video") {
    return composeVideo(media, overlay, outputBase, opts);
  }
  throw new UnsupportedMediaError(media);
}
