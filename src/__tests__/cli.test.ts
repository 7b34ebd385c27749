import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

const exec = promisify(execFile);

// Use tsx to run the TypeScript source directly
const CLI = path.resolve("src/index.ts");
const TSX = path.resolve("node_modules/.bin/tsx");

function tmpDir(): string {
  return path.join(os.tmpdir(), `recodec-cli-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

async function cleanup(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // ignore
  }
}

async function expectFailure(args: string[]): Promise<{ code: number; stderr: string }> {
  try {
    await exec(TSX, [CLI, ...args]);
  } catch (err: unknown) {
    return err as { code: number; stderr: string };
  }
  throw new Error("should have thrown");
}

describe("CLI", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = tmpDir();
    await fs.mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    await cleanup(workDir);
  });

  it("prints help with --help", async () => {
    const { stdout } = await exec(TSX, [CLI, "--help"]);
    expect(stdout).toContain("recodec");
    expect(stdout).toContain("Usage:");
    expect(stdout).toContain("--crf");
    expect(stdout).toContain("--preset");
  });

  it("prints version with --version", async () => {
    const { stdout } = await exec(TSX, [CLI, "--version"]);
    expect(stdout.trim()).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it("exits with error on no arguments", async () => {
    const error = await expectFailure([]);
    expect(error.code).toBe(1);
    expect(error.stderr).toContain("no file pattern");
  });

  it("exits with error on unknown flag", async () => {
    const error = await expectFailure(["--badopt"]);
    expect(error.code).toBe(1);
    expect(error.stderr).toContain("unknown option: --badopt");
  });

  it("exits with error on an unknown preset", async () => {
    const error = await expectFailure(["--preset", "turbo", "*.mp4"]);
    expect(error.code).toBe(1);
    expect(error.stderr).toContain("--preset must be one of");
  });

  it("exits with error on a non-numeric crf", async () => {
    const error = await expectFailure(["--crf", "high", "*.mp4"]);
    expect(error.code).toBe(1);
    expect(error.stderr).toContain("invalid crf value: high");
  });

  it("reports when no files match", async () => {
    const { stdout } = await exec(TSX, [CLI, "-d", workDir, "video_0446.mp4"]);
    expect(stdout.trim()).toBe("No files found matching video_0446.mp4");
  });
});
