import type { ConversionProfile, ParsedArgs } from "./types.js";

export const X264_PRESETS = [
  "ultrafast",
  "superfast",
  "veryfast",
  "faster",
  "fast",
  "medium",
  "slow",
  "slower",
  "veryslow",
  "placebo",
] as const;

// H.264 High, yuv420p, BT.709, streamable MP4
export const DEFAULT_PROFILE: Readonly<ConversionProfile> = Object.freeze({
  targetCodec: "h264",
  encoder: "libx264",
  profile: "high",
  pixelFormat: "yuv420p",
  colorSpace: "bt709",
  colorPrimaries: "bt709",
  colorTransfer: "bt709",
  crf: 23,
  preset: "medium",
  movflags: "+faststart",
});

export function isPreset(value: string): boolean {
  return X264_PRESETS.some((preset) => preset === value);
}

export function clampCrf(crf: number): number {
  return Math.max(0, Math.min(Math.round(crf), 51));
}

export function resolveProfile(overrides: Partial<ConversionProfile> = {}): Readonly<ConversionProfile> {
  const merged: ConversionProfile = { ...DEFAULT_PROFILE, ...overrides };

  if (!Number.isFinite(merged.crf)) {
    throw new Error(`Invalid CRF value: ${merged.crf}`);
  }

  if (merged.encoder === "libx264" && !isPreset(merged.preset)) {
    throw new Error(`Unknown preset: ${merged.preset}`);
  }

  return Object.freeze({ ...merged, crf: clampCrf(merged.crf) });
}

/** Profile fields set on the command line; unset flags keep the defaults. */
export function profileOverrides(args: Pick<ParsedArgs, "crf" | "preset">): Partial<ConversionProfile> {
  const overrides: Partial<ConversionProfile> = {};
  if (args.crf !== undefined) overrides.crf = args.crf;
  if (args.preset !== undefined) overrides.preset = args.preset;
  return overrides;
}

/** Encoder arguments for everything except the codec itself. */
export function buildOutputOptions(profile: ConversionProfile): string[] {
  return [
    "-profile:v", profile.profile,
    "-pix_fmt", profile.pixelFormat,
    "-colorspace", profile.colorSpace,
    "-color_primaries", profile.colorPrimaries,
    "-color_trc", profile.colorTransfer,
    "-crf", String(profile.crf),
    "-preset", profile.preset,
    "-movflags", profile.movflags,
  ];
}
