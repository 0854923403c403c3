import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import sharp from "sharp";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { combineMedia } from "./composite.js";
import {
  CodecError,
  InvalidArgumentError,
  NotFoundError,
  UnsupportedMediaError,
} from "./errors.js";
import { writeImage } from "./fixtures.mocks.js";
import { createFakeVideoCodec, readFakeVideo, writeFakeVideo } from "./video-codec.mocks.js";

async function firstPixel(filePath: string): Promise<number[]> {
  const { data } = await sharp(filePath).raw().toBuffer({ resolveWithObject: true });
  return [data[0], data[1], data[2]];
}

describe("combineMedia", () => {
  let tmpDir: string;
  let scratchRoot: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "memento-composite-test-"));
    scratchRoot = path.join(tmpDir, "scratch");
    await fs.mkdir(scratchRoot);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  // ── Images ──

  it("keeps the media's dimensions and format for a JPEG", async () => {
    const media = path.join(tmpDir, "x_main.jpg");
    const overlay = path.join(tmpDir, "x_overlay.png");
    await writeImage(media, 800, 600, "jpeg");
    await writeImage(overlay, 400, 300, "png", { r: 0, g: 0, b: 255, alpha: 0.5 });

    const out = await combineMedia(media, overlay, path.join(tmpDir, "out", "bundle"), {
      videoCodec: createFakeVideoCodec(),
    });

    expect(out).toBe(path.join(tmpDir, "out", "bundle.jpg"));
    const meta = await sharp(out).metadata();
    expect(meta.format).toBe("jpeg");
    expect(meta.width).toBe(800);
    expect(meta.height).toBe(600);
    expect(await fs.readdir(path.join(tmpDir, "out"))).toEqual(["bundle.jpg"]);
  });

  it("writes PNG for PNG media and drops the alpha channel", async () => {
    const media = path.join(tmpDir, "m.png");
    const overlay = path.join(tmpDir, "o.png");
    await writeImage(media, 200, 100, "png");
    await writeImage(overlay, 50, 25, "png", { r: 0, g: 0, b: 0, alpha: 0 });

    const out = await combineMedia(media, overlay, path.join(tmpDir, "merged"), {
      videoCodec: createFakeVideoCodec(),
    });

    expect(out).toBe(path.join(tmpDir, "merged.png"));
    const meta = await sharp(out).metadata();
    expect(meta.format).toBe("png");
    expect([meta.width, meta.height, meta.channels]).toEqual([200, 100, 3]);
  });

  it("shrinks an overlay larger than the media to the media's size", async () => {
    const media = path.join(tmpDir, "small.png");
    const overlay = path.join(tmpDir, "big_overlay.png");
    await writeImage(media, 40, 30, "png");
    await writeImage(overlay, 400, 300, "png", { r: 0, g: 0, b: 255, alpha: 0.5 });

    const out = await combineMedia(media, overlay, path.join(tmpDir, "small_merged"), {
      videoCodec: createFakeVideoCodec(),
    });

    const meta = await sharp(out).metadata();
    expect([meta.width, meta.height]).toEqual([40, 30]);
  });

  it("draws an opaque overlay over the media and leaves it visible under a transparent one", async () => {
    const media = path.join(tmpDir, "m.png");
    const opaque = path.join(tmpDir, "opaque.png");
    const clear = path.join(tmpDir, "clear.png");
    await writeImage(media, 10, 10, "png", { r: 255, g: 0, b: 0, alpha: 1 });
    await writeImage(opaque, 2, 2, "png", { r: 0, g: 0, b: 255, alpha: 1 });
    await writeImage(clear, 10, 10, "png", { r: 0, g: 255, b: 0, alpha: 0 });
    const videoCodec = createFakeVideoCodec();

    const covered = await combineMedia(media, opaque, path.join(tmpDir, "covered"), { videoCodec });
    const visible = await combineMedia(media, clear, path.join(tmpDir, "visible"), { videoCodec });

    expect(await firstPixel(covered)).toEqual([0, 0, 255]);
    expect(await firstPixel(visible)).toEqual([255, 0, 0]);
  });

  it("appends the decoded format when the media's extension is wrong", async () => {
    const media = path.join(tmpDir, "mislabelled.jpg");
    const overlay = path.join(tmpDir, "o.png");
    await writeImage(media, 8, 8, "png");
    await writeImage(overlay, 8, 8, "png");

    const out = await combineMedia(media, overlay, path.join(tmpDir, "result"), {
      videoCodec: createFakeVideoCodec(),
    });
    expect(out).toBe(path.join(tmpDir, "result.png"));
  });

  // ── Argument checks ──

  it("rejects an output base that already has an extension", async () => {
    const media = path.join(tmpDir, "m.png");
    await writeImage(media, 4, 4, "png");

    await expect(
      combineMedia(media, media, path.join(tmpDir, "out.jpg"), { videoCodec: createFakeVideoCodec() }),
    ).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it("reports missing inputs", async () => {
    const present = path.join(tmpDir, "m.png");
    await writeImage(present, 4, 4, "png");
    const videoCodec = createFakeVideoCodec();

    await expect(
      combineMedia(path.join(tmpDir, "gone.png"), present, path.join(tmpDir, "out"), { videoCodec }),
    ).rejects.toThrow(new NotFoundError("Media file", path.join(tmpDir, "gone.png")).message);
    await expect(
      combineMedia(present, path.join(tmpDir, "gone.png"), path.join(tmpDir, "out"), { videoCodec }),
    ).rejects.toThrow(new NotFoundError("Overlay file", path.join(tmpDir, "gone.png")).message);
  });

  it("rejects media and overlays that do not decode", async () => {
    const text = path.join(tmpDir, "notes.txt");
    const image = path.join(tmpDir, "m.png");
    await fs.writeFile(text, "just words");
    await writeImage(image, 4, 4, "png");
    const videoCodec = createFakeVideoCodec();

    await expect(combineMedia(text, image, path.join(tmpDir, "a"), { videoCodec })).rejects.toBeInstanceOf(
      UnsupportedMediaError,
    );
    await expect(combineMedia(image, text, path.join(tmpDir, "b"), { videoCodec })).rejects.toBeInstanceOf(
      UnsupportedMediaError,
    );
  });

  // ── Video ──

  it("overlays a still on a video, sized to the video, keeping duration and audio", async () => {
    const media = path.join(tmpDir, "clip_main.mp4");
    const overlay = path.join(tmpDir, "clip_overlay.png");
    await writeFakeVideo(media, { width: 640, height: 480, duration: 2, has_audio: true });
    await writeImage(overlay, 320, 240, "png", { r: 255, g: 255, b: 255, alpha: 0.5 });
    const videoCodec = createFakeVideoCodec();

    const out = await combineMedia(media, overlay, path.join(tmpDir, "clip"), {
      videoCodec,
      scratchRoot,
    });

    expect(out).toBe(path.join(tmpDir, "clip.mp4"));
    expect(await readFakeVideo(out)).toEqual({
      width: 640,
      height: 480,
      duration: 2,
      has_audio: true,
      source: media,
      overlay_width: 640,
      overlay_height: 480,
    });
    expect(videoCodec.calls).toHaveLength(1);
    expect(videoCodec.calls[0].output).toBe(`${out}.partial`);
    expect(await fs.readdir(scratchRoot)).toEqual([]);
  });

  it("leaves nothing behind when the video encode fails", async () => {
    const media = path.join(tmpDir, "clip_main.mp4");
    const overlay = path.join(tmpDir, "clip_overlay.png");
    await writeFakeVideo(media, { width: 64, height: 48, duration: 1, has_audio: false });
    await writeImage(overlay, 64, 48, "png");
    const outDir = path.join(tmpDir, "out");

    const err = await combineMedia(media, overlay, path.join(outDir, "clip"), {
      videoCodec: createFakeVideoCodec({ failOverlay: true }),
      scratchRoot,
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CodecError);
    expect(err).toMatchObject({ code: "CODEC" });
    expect(await fs.readdir(outDir)).toEqual([]);
    expect(await fs.readdir(scratchRoot)).toEqual([]);
  });
});
