/**
 * Video capability used by the classifier and the compositor: probing a file
 * for frame size and duration, and burning a still overlay into a video.
 *
 * The default implementation drives ffmpeg through fluent-ffmpeg and probes
 * with the ffprobe binary shipped by ffprobe-static.
 */
import ffprobeStatic from "ffprobe-static";
import ffmpeg, { type FfprobeData } from "fluent-ffmpeg";
import type { VideoProbe } from "./types.js";
import { sniffFileType } from "./sniff.js";

export type OverlayVideoOptions = {
  media: string;
  overlay: string; // already sized to the video frame
  output: string;
  probe: VideoProbe;
};

export type VideoCodec = {
  /** Frame size, duration and audio presence, or null when the file is not a playable video. */
  probe(filePath: string): Promise<VideoProbe | null>;
  /** Encode `media` with `overlay` centred on every frame into an MP4 at `output`. */
  overlay(opts: OverlayVideoOptions): Promise<void>;
};

export type FfmpegVideoCodecOptions = {
  ffmpegPath?: string;
  ffprobePath?: string;
};

/**
 * Filter graph that loops the still overlay over the main video stream,
 * anchored at the frame centre.
 */
export function buildOverlayFilter(): string {
  return "[1:v]format=rgba[ov];[0:v][ov]overlay=x=(W-w)/2:y=(H-h)/2:format=auto[outv]";
}

/**
 * Output options for the composite encode. Audio is re-encoded when the
 * source has a track and dropped explicitly otherwise.
 */
export function buildOverlayOutputOptions(hasAudio: boolean): string[] {
  const opts = ["-map [outv]", "-c:v libx264", "-preset medium", "-crf 20", "-pix_fmt yuv420p"];
  if (hasAudio) {
    opts.push("-map 0:a:0", "-c:a aac", "-b:a 160k");
  } else {
    opts.push("-an");
  }
  opts.push("-movflags +faststart");
  return opts;
}

/**
 * Reduce ffprobe output to the fields the pipeline needs. Returns null when
 * there is no video stream with a usable size or the duration is not positive.
 */
export function toVideoProbe(data: FfprobeData): VideoProbe | null {
  const video = data.streams.find((s) => s.codec_type === "video");
  if (!video) {
    return null;
  }
  const width = video.width ?? 0;
  const height = video.height ?? 0;
  const duration = data.format.duration ?? Number.parseFloat(video.duration ?? "");
  if (width <= 0 || height <= 0 || !Number.isFinite(duration) || duration <= 0) {
    return null;
  }
  return {
    width,
    height,
    duration,
    has_audio: data.streams.some((s) => s.codec_type === "audio"),
  };
}

function runFfprobe(filePath: string, ffprobePath: string): Promise<FfprobeData> {
  return new Promise((resolve, reject) => {
    ffmpeg(filePath)
      .setFfprobePath(ffprobePath)
      .ffprobe((err: unknown, data: FfprobeData) => {
        if (err) {
          reject(err instanceof Error ? err : new Error(String(err)));
          return;
        }
        resolve(data);
      });
  });
}

export function createFfmpegVideoCodec(opts: FfmpegVideoCodecOptions = {}): VideoCodec {
  const ffprobePath = opts.ffprobePath ?? ffprobeStatic.path;

  return {
    async probe(filePath) {
      // Only hand containers that look like video to ffprobe; it also
      // accepts still images and would report them as one-frame streams.
      const detected = await sniffFileType(filePath);
      if (!detected || !detected.mime.startsWith("video/")) {
        return null;
      }
      try {
        return toVideoProbe(await runFfprobe(filePath, ffprobePath));
      } catch {
        return null;
      }
    },

    overlay({ media, overlay, output, probe }) {
      return new Promise<void>((resolve, reject) => {
        const command = ffmpeg()
          .input(media)
          .input(overlay)
          .inputOptions(["-loop 1", `-t ${probe.duration}`])
          .complexFilter(buildOverlayFilter())
          .outputOptions(buildOverlayOutputOptions(probe.has_audio))
          .format("mp4")
          .output(output)
          .on("end", () => resolve())
          .on("error", (err: Error, _stdout: string | null, stderr: string | null) => {
            const detail = stderr?.trim().split("\n").slice(-5).join("\n");
            reject(new Error(detail ? `${err.message}\n${detail}` : err.message));
          });
        if (opts.ffmpegPath) {
          command.setFfmpegPath(opts.ffmpegPath);
        }
        command.run();
      });
    },
  };
}
