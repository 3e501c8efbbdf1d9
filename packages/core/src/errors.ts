/**
 * Raised when an image cannot be decoded into pixels. Dedupe passes catch
 * this per frame and leave the frame untouched.
 */
export class DecodeError extends Error {
  filePath: string;

  constructor(filePath: string, opts?: { cause?: unknown }) {
    const reason = opts?.cause instanceof Error ? `: ${opts.cause.message}` : "";
    super(`Cannot decode image ${filePath}${reason}`, { cause: opts?.cause });
    this.name = "DecodeError";
    this.filePath = filePath;
  }
}

export type FrameIOOperation = "delete" | "read" | "list" | "mkdir";

/** Filesystem failure while reading, listing or removing frames. */
export class FrameIOError extends Error {
  filePath: string;
  op: FrameIOOperation;
  code?: string;

  constructor(filePath: string, op: FrameIOOperation, opts?: { cause?: unknown }) {
    const code = errnoCode(opts?.cause);
    const reason = opts?.cause instanceof Error ? `: ${opts.cause.message}` : "";
    super(`Failed to ${op} ${filePath}${reason}`, { cause: opts?.cause });
    this.name = "FrameIOError";
    this.filePath = filePath;
    this.op = op;
    this.code = code;
  }
}

/** Every extraction tier produced zero frames for an input. */
export class ExtractionEmptyError extends Error {
  inputPath: string;
  attempts: number;

  constructor(inputPath: string, attempts: number) {
    super(`No frames extracted from ${inputPath} after ${attempts} attempt(s)`);
    this.name = "ExtractionEmptyError";
    this.inputPath = inputPath;
    this.attempts = attempts;
  }
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
