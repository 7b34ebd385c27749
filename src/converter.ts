import fg from "fast-glob";
import path from "node:path";
import fs from "node:fs/promises";
import { FfmpegToolkit } from "./ffmpeg.js";
import { TranscodeFailedError, errorMessage } from "./errors.js";
import { resolveProfile } from "./profile.js";
import { formatBytes, formatDuration, getDiskSpace, tempSiblingPath } from "./utils.js";
import type { ConversionProfile, ConverterOptions, FailedFile, FileConversionResult, MediaToolkit, RunSummary } from "./types.js";

export class VideoConverter {
  readonly profile: Readonly<ConversionProfile>;
  readonly cwd: string;
  private readonly tools: MediaToolkit;

  constructor(options: ConverterOptions = {}, tools: MediaToolkit = new FfmpegToolkit()) {
    this.profile = resolveProfile(options.profile);
    this.cwd = path.resolve(options.cwd ?? ".");
    this.tools = tools;
  }

  async run(pattern: string): Promise<RunSummary> {
    return this.runAll([pattern]);
  }

  /**
   * Converts every file matching `patterns` that is not already in the
   * target codec. Only a missing encoder aborts the run; per-file errors are
   * recorded in the summary.
   */
  async runAll(patterns: string[]): Promise<RunSummary> {
    const startTime = Date.now();
    const files = await this.discover(patterns);

    if (files.length === 0) {
      console.log(`No files found matching ${patterns.join(", ")}`);
      return this.buildResult([], startTime);
    }

    console.log(`Found ${files.length} video file${files.length === 1 ? "" : "s"} to process\n`);

    await this.tools.checkAvailable(this.profile);

    const results: FileConversionResult[] = [];
    for (const file of files) {
      results.push(await this.convertVideo(file));
      console.log("");
    }

    return this.buildResult(results, startTime);
  }

  private async discover(patterns: string[]): Promise<string[]> {
    const matches = await fg(patterns, {
      cwd: this.cwd,
      absolute: true,
      onlyFiles: true,
      unique: true,
    });
    return matches.sort();
  }

  async convertVideo(inputPath: string): Promise<FileConversionResult> {
    const name = path.basename(inputPath);

    let codec: string;
    try {
      codec = await this.tools.probe(inputPath);
    } catch (err) {
      const message = errorMessage(err);
      console.error(`✗ ${message}`);
      return { file: inputPath, status: "failed", error: message };
    }

    if (codec === this.profile.targetCodec) {
      console.warn(`⊙ Skipping ${name} (already ${codec})`);
      return { file: inputPath, status: "skipped", codec };
    }

    console.log(`Current codec: ${codec}`);
    console.log(`Converting: ${name}`);

    const tempOutput = tempSiblingPath(inputPath);

    try {
      const inputSize = (await fs.stat(inputPath)).size;

      const { available } = await getDiskSpace(path.dirname(inputPath));
      if (available < inputSize) {
        throw new Error("Insufficient disk space");
      }

      await this.tools.transcode(inputPath, tempOutput, this.profile);

      const tempStats = await fs.stat(tempOutput);
      if (tempStats.size === 0) {
        throw new Error("Encoded file is empty");
      }

      await fs.rename(tempOutput, inputPath);

      console.log(`✓ Successfully converted: ${name}`);
      return {
        file: inputPath,
        status: "converted",
        codec,
        inputBytes: inputSize,
        outputBytes: tempStats.size,
      };
    } catch (err) {
      await this.removeTemp(tempOutput);

      const message = errorMessage(err);
      console.error(`✗ ${message}`);
      if (err instanceof TranscodeFailedError && err.stderr) {
        console.error(`stderr: ${err.stderr}`);
      }
      return { file: inputPath, status: "failed", error: message };
    }
  }

  private async removeTemp(tempOutput: string): Promise<void> {
    try {
      await fs.rm(tempOutput, { force: true });
    } catch (err) {
      console.warn(`Warning: could not remove ${tempOutput}: ${errorMessage(err)}`);
    }
  }

  private buildResult(results: FileConversionResult[], startTime: number): RunSummary {
    let converted = 0;
    let skipped = 0;
    let totalBytes = 0;
    let outputBytes = 0;
    const failures: FailedFile[] = [];

    for (const result of results) {
      switch (result.status) {
        case "converted":
          converted++;
          totalBytes += result.inputBytes;
          outputBytes += result.outputBytes;
          break;
        case "skipped":
          skipped++;
          break;
        case "failed":
          failures.push({ file: result.file, error: result.error });
          break;
      }
    }

    return {
      totalFiles: results.length,
      converted,
      skipped,
      failed: results.length - converted - skipped,
      failures,
      results,
      duration: formatDuration(Date.now() - startTime),
      totalSize: formatBytes(totalBytes),
      outputSize: formatBytes(outputBytes),
    };
  }
}
