import fs from "node:fs/promises";
import sharp from "sharp";
import type { VideoProbe } from "./types.js";
import type { OverlayVideoOptions, VideoCodec } from "./video-codec.js";

const FAKE_VIDEO_MAGIC = "FAKEVIDEO\n";

export type FakeVideoOutput = VideoProbe & {
  source: string;
  overlay_width: number;
  overlay_height: number;
};

export type FakeVideoCodec = VideoCodec & {
  calls: OverlayVideoOptions[];
};

/** Write a stand-in video file that the fake codec probes as `probe`. */
export async function writeFakeVideo(filePath: string, probe: VideoProbe): Promise<void> {
  await fs.writeFile(filePath, FAKE_VIDEO_MAGIC + JSON.stringify(probe));
}

/** Parse a stand-in video (input or composite output) back into its fields. */
export async function readFakeVideo(filePath: string): Promise<FakeVideoOutput> {
  const raw = await fs.readFile(filePath, "utf-8");
  if (!raw.startsWith(FAKE_VIDEO_MAGIC)) {
    throw new Error(`not a fake video: ${filePath}`);
  }
  const parsed: FakeVideoOutput = JSON.parse(raw.slice(FAKE_VIDEO_MAGIC.length));
  return parsed;
}

/**
 * In-process VideoCodec for tests. Probes files written by writeFakeVideo and
 * "encodes" by writing a fake video that records the overlay it was given.
 */
export function createFakeVideoCodec(opts: { failOverlay?: boolean } = {}): FakeVideoCodec {
  const calls: OverlayVideoOptions[] = [];
  return {
    calls,
    async probe(filePath) {
      try {
        const parsed = await readFakeVideo(filePath);
        return {
          width: parsed.width,
          height: parsed.height,
          duration: parsed.duration,
          has_audio: parsed.has_audio,
        };
      } catch {
        return null;
      }
    },
    async overlay(options) {
      calls.push(options);
      if (opts.failOverlay) {
        throw new Error("encoder exploded");
      }
      const meta = await sharp(options.overlay).metadata();
      const output: FakeVideoOutput = {
        ...options.probe,
        source: options.media,
        overlay_width: meta.width ?? 0,
        overlay_height: meta.height ?? 0,
      };
      await fs.writeFile(options.output, FAKE_VIDEO_MAGIC + JSON.stringify(output));
    },
  };
}
