import ffmpeg from "fluent-ffmpeg";
import type { FfprobeData } from "fluent-ffmpeg";
import { ProbeFailedError, ToolUnavailableError, TranscodeFailedError, errorMessage } from "./errors.js";
import { buildOutputOptions } from "./profile.js";
import type { ConversionProfile, MediaToolkit } from "./types.js";

export interface FfmpegToolkitOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
}

/**
 * Prober and transcoder backed by the ffmpeg/ffprobe binaries.
 *
 * Binaries are looked up through FFMPEG_PATH / FFPROBE_PATH, then PATH,
 * unless explicit paths are given.
 */
export class FfmpegToolkit implements MediaToolkit {
  constructor(options: FfmpegToolkitOptions = {}) {
    if (options.ffmpegPath) {
      ffmpeg.setFfmpegPath(options.ffmpegPath);
    }
    if (options.ffprobePath) {
      ffmpeg.setFfprobePath(options.ffprobePath);
    }
  }

  async checkAvailable(profile: ConversionProfile): Promise<void> {
    const encoders = await new Promise<Record<string, unknown>>((resolve, reject) => {
      ffmpeg.getAvailableEncoders((err, available) => {
        if (err) {
          reject(new ToolUnavailableError("ffmpeg", errorMessage(err)));
          return;
        }
        resolve(available);
      });
    });

    if (!(profile.encoder in encoders)) {
      throw new ToolUnavailableError("ffmpeg", `encoder ${profile.encoder} is not supported by this build`);
    }
  }

  async probe(filePath: string): Promise<string> {
    const data = await new Promise<FfprobeData>((resolve, reject) => {
      ffmpeg.ffprobe(filePath, ["-select_streams", "v:0"], (err: unknown, metadata: FfprobeData) => {
        if (err) {
          reject(new ProbeFailedError(filePath, errorMessage(err)));
          return;
        }
        resolve(metadata);
      });
    });

    const stream = data.streams.find((s) => s.codec_type === "video");
    if (!stream) {
      throw new ProbeFailedError(filePath, "no video stream found");
    }
    if (!stream.codec_name) {
      throw new ProbeFailedError(filePath, "video stream has no codec name");
    }
    return stream.codec_name;
  }

  transcode(inputPath: string, outputPath: string, profile: ConversionProfile): Promise<void> {
    return new Promise((resolve, reject) => {
      ffmpeg(inputPath)
        .videoCodec(profile.encoder)
        .outputOptions(buildOutputOptions(profile))
        .on("end", () => resolve())
        .on("error", (err: Error, _stdout: string | null, stderr: string | null) => {
          reject(new TranscodeFailedError(inputPath, err.message, stderr ?? ""));
        })
        .save(outputPath);
    });
  }
}
