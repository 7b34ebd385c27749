import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let size = bytes;
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(2)} ${units[unit]}`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${seconds}s`;
}

/**
 * Hidden path next to `filePath` for the encoder to write into. Keeps the
 * extension so the muxer is picked the same way as for the original.
 */
export function tempSiblingPath(filePath: string): string {
  const { dir, name, ext } = path.parse(filePath);
  return path.join(dir, `.${name}.recodec-${crypto.randomBytes(8).toString("hex")}${ext}`);
}

export async function getDiskSpace(dir: string): Promise<{ available: number }> {
  const target = process.platform === "win32" ? path.parse(dir).root : dir;
  try {
    const stats = await fs.statfs(target);
    return { available: stats.bavail * stats.bsize };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`Warning: could not check disk space for ${dir}: ${message}`);
    return { available: Infinity };
  }
}
