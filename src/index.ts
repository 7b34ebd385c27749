#!/usr/bin/env node

import { createRequire } from "node:module";
import { VideoConverter } from "./converter.js";
import { DEFAULT_PROFILE, X264_PRESETS, isPreset, profileOverrides } from "./profile.js";
import type { ParsedArgs } from "./types.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const HELP = `
recodec v${VERSION} — Re-encode videos to H.264 in place

Usage:
  recodec <pattern...>                Convert matching files in the current directory
  recodec -d <dir> <pattern...>       Resolve patterns inside <dir>
  recodec -c 20 -p slow <pattern>     Custom quality and preset

Options:
  -d, --dir <dir>      Media directory (default: current directory)
  -c, --crf <n>        Quality factor 0-51, lower is better (default: ${DEFAULT_PROFILE.crf})
  -p, --preset <name>  Encoder speed/size tradeoff (default: ${DEFAULT_PROFILE.preset})
  -h, --help           Show this help message
  -v, --version        Show version number

Patterns are matched literally unless they contain glob wildcards.
Files already encoded as ${DEFAULT_PROFILE.targetCodec} are left untouched.

Environment:
  FFMPEG_PATH, FFPROBE_PATH   Paths to the ffmpeg and ffprobe binaries
`.trim();

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    patterns: [],
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      return result;
    }

    if (arg === "-v" || arg === "--version") {
      result.version = true;
      return result;
    }

    if (arg === "-c" || arg === "--crf") {
      const next = args[++i];
      if (next === undefined) {
        console.error("Error: --crf requires a numeric argument");
        process.exit(1);
      }
      const val = parseInt(next, 10);
      if (isNaN(val)) {
        console.error(`Error: invalid crf value: ${next}`);
        process.exit(1);
      }
      result.crf = val;
      continue;
    }

    if (arg === "-p" || arg === "--preset") {
      const next = args[++i];
      if (next === undefined || !isPreset(next)) {
        console.error(`Error: --preset must be one of: ${X264_PRESETS.join(", ")}`);
        process.exit(1);
      }
      result.preset = next;
      continue;
    }

    if (arg === "-d" || arg === "--dir") {
      const next = args[++i];
      if (next === undefined) {
        console.error("Error: --dir requires a directory argument");
        process.exit(1);
      }
      result.dir = next;
      continue;
    }

    if (arg.startsWith("-")) {
      console.error(`Error: unknown option: ${arg}`);
      console.error("Run recodec --help for usage");
      process.exit(1);
    }

    result.patterns.push(arg);
  }

  return result;
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  if (parsed.help) {
    console.log(HELP);
    return;
  }

  if (parsed.version) {
    console.log(VERSION);
    return;
  }

  if (parsed.patterns.length === 0) {
    console.error("Error: no file pattern specified");
    console.error("Run recodec --help for usage");
    process.exit(1);
  }

  const converter = new VideoConverter({ cwd: parsed.dir, profile: profileOverrides(parsed) });
  const results = await converter.runAll(parsed.patterns);

  if (results.totalFiles === 0) {
    return;
  }

  console.log("\n" + "=".repeat(50));
  console.log("Conversion complete!");
  console.log(`  Total files: ${results.totalFiles}`);
  console.log(`  Converted:   ${results.converted}`);
  console.log(`  Skipped:     ${results.skipped}`);
  console.log(`  Failed:      ${results.failed}`);
  console.log(`  Duration:    ${results.duration}`);
  console.log(`  Input size:  ${results.totalSize}`);
  console.log(`  Output size: ${results.outputSize}`);
  console.log("=".repeat(50));

  if (results.failures.length > 0) {
    console.log("\nFailed conversions:");
    results.failures.forEach((f) => console.log(`  - ${f.file}: ${f.error}`));
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
