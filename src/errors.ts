export class ToolUnavailableError extends Error {
  constructor(readonly tool: string, detail: string) {
    super(`${tool} is not available: ${detail}`);
    this.name = "ToolUnavailableError";
  }
}

export class ProbeFailedError extends Error {
  constructor(readonly file: string, detail: string) {
    super(`Could not read codec of ${file}: ${detail}`);
    this.name = "ProbeFailedError";
  }
}

export class TranscodeFailedError extends Error {
  /** Diagnostic output of the encoder, empty when it produced none. */
  readonly stderr: string;

  constructor(readonly file: string, detail: string, stderr = "") {
    super(`Error converting ${file}: ${detail}`);
    this.name = "TranscodeFailedError";
    this.stderr = stderr;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
