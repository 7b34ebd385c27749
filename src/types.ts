export interface ConversionProfile {
  /** Codec name the prober reports for files that need no conversion. */
  targetCodec: string;
  encoder: string;
  profile: string;
  pixelFormat: string;
  colorSpace: string;
  colorPrimaries: string;
  colorTransfer: string;
  crf: number;
  preset: string;
  movflags: string;
}

export interface ConverterOptions {
  profile?: Partial<ConversionProfile>;
  cwd?: string;
}

export interface FailedFile {
  file: string;
  error: string;
}

export type FileConversionResult =
  | { file: string; status: "skipped"; codec: string }
  | { file: string; status: "converted"; codec: string; inputBytes: number; outputBytes: number }
  | { file: string; status: "failed"; error: string };

export interface RunSummary {
  totalFiles: number;
  converted: number;
  skipped: number;
  failed: number;
  failures: FailedFile[];
  results: FileConversionResult[];
  duration: string;
  totalSize: string;
  outputSize: string;
}

export interface Prober {
  probe(filePath: string): Promise<string>;
}

export interface Transcoder {
  transcode(inputPath: string, outputPath: string, profile: ConversionProfile): Promise<void>;
}

export interface MediaToolkit extends Prober, Transcoder {
  checkAvailable(profile: ConversionProfile): Promise<void>;
}

export interface ParsedArgs {
  patterns: string[];
  dir?: string;
  crf?: number;
  preset?: string;
  help: boolean;
  version: boolean;
}
