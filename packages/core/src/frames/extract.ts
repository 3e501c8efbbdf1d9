import { execFile } from "child_process";
import { promisify } from "util";
import fs from "fs/promises";
import path from "path";
import type { FrameFormat } from "@vframes/contracts";
import { getVframesDefault } from "../config/defaults";
import { errorMessage, FrameIOError } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";
import { LocalFrameStore } from "./storage";

const execFileAsync = promisify(execFile);

export interface FilterOptions {
  /** ffmpeg scene score threshold; takes precedence over `unique` */
  sceneThreshold?: number;
  /** Drop near-identical frames at extraction time (mpdecimate) */
  unique?: boolean;
  fps?: number;
  /** ffmpeg scale argument, e.g. 1280:-1 */
  scale?: string;
}

export interface ExtractionRequest {
  inputPath: string;
  outputDir: string;
  /** Full frame prefix, e.g. `clip_frame_` */
  prefix: string;
  format: FrameFormat;
  start?: string;
  duration?: string;
  filters: FilterOptions;
}

/**
 * Result of one extractor invocation. The frame count is authoritative: a
 * failed run that still left frames behind is reported as `frames`.
 */
export type ExtractionOutcome =
  | { status: "frames"; count: number }
  | { status: "empty" }
  | { status: "failed"; message: string };

export interface FrameExtractor {
  extract(request: ExtractionRequest): Promise<ExtractionOutcome>;
}

export function frameCount(outcome: ExtractionOutcome): number {
  return outcome.status === "frames" ? outcome.count : 0;
}

/**
 * Build the `-vf` graph: at most one of scene select / mpdecimate, then the
 * optional fps cap and scale. Undefined when there is nothing to filter.
 */
export function buildFilterGraph(filters: FilterOptions): string | undefined {
  const parts: string[] = [];
  if (filters.sceneThreshold !== undefined) {
    parts.push(`select='gt(scene,${filters.sceneThreshold})'`);
  } else if (filters.unique) {
    parts.push("mpdecimate=hi=768:lo=128:frac=0.33");
  }
  if (filters.fps !== undefined) parts.push(`fps=${filters.fps}`);
  if (filters.scale) parts.push(`scale=${filters.scale}:flags=lanczos`);
  return parts.length > 0 ? parts.join(",") : undefined;
}

export function outputPattern(request: Pick<ExtractionRequest, "outputDir" | "prefix" | "format">): string {
  return path.join(request.outputDir, `${request.prefix}%06d.${request.format}`);
}

export function buildFfmpegArgs(request: ExtractionRequest, opts?: { logLevel?: string }): string[] {
  const args = ["-hide_banner", "-loglevel", opts?.logLevel ?? "error", "-stats", "-y", "-hwaccel", "auto"];
  if (request.start) args.push("-ss", request.start);
  args.push("-i", request.inputPath);
  if (request.duration) args.push("-t", request.duration);

  const vf = buildFilterGraph(request.filters);
  if (vf) args.push("-vf", vf);

  args.push("-fps_mode", "vfr", "-f", "image2");
  if (request.format === "png") {
    args.push("-pix_fmt", "rgb24", "-compression_level", "9", "-pred", "mixed");
  } else {
    args.push("-pix_fmt", "rgb24", "-lossless", "1");
  }
  args.push(outputPattern(request));
  return args;
}

export interface FfmpegExtractorOpts {
  binary?: string;
  /** ffmpeg -loglevel (default FFMPEG_LOGLEVEL or "error") */
  logLevel?: string;
  /** Kill ffmpeg after this long; 0 (the default) waits for it to finish */
  timeoutMs?: number;
  log?: Logger;
}

function capturedOutput(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (Buffer.isBuffer(value)) return value.toString("utf8").trim();
  return "";
}

/** execFile rejects with the child's output attached. */
function outputOf(err: unknown): { stdout: string; stderr: string } {
  if (typeof err !== "object" || err === null) return { stdout: "", stderr: "" };
  return {
    stdout: "stdout" in err ? capturedOutput(err.stdout) : "",
    stderr: "stderr" in err ? capturedOutput(err.stderr) : "",
  };
}

function wasKilled(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  return ("killed" in err && err.killed === true) || ("signal" in err && typeof err.signal === "string");
}

/**
 * Extract frames with ffmpeg. The exit status is logged but the outcome is
 * decided by counting `{prefix}<digits>.{ext}` files afterwards, except for a
 * run that was killed: its partial frames are removed and it counts as failed.
 * ffmpeg's own output is logged at debug.
 */
export class FfmpegFrameExtractor implements FrameExtractor {
  private readonly binary: string;
  private readonly logLevel: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(opts: FfmpegExtractorOpts = {}) {
    this.binary = opts.binary ?? getVframesDefault("VFRAMES_FFMPEG_BIN");
    this.logLevel = opts.logLevel ?? getVframesDefault("FFMPEG_LOGLEVEL");
    this.timeoutMs = opts.timeoutMs ?? 0;
    this.log = opts.log ?? rootLogger;
  }

  async extract(request: ExtractionRequest): Promise<ExtractionOutcome> {
    try {
      await fs.mkdir(request.outputDir, { recursive: true });
    } catch (err) {
      throw new FrameIOError(request.outputDir, "mkdir", { cause: err });
    }

    const args = buildFfmpegArgs(request, { logLevel: this.logLevel });
    this.log.debug({ cmd: [this.binary, ...args].join(" ") }, "Running ffmpeg");

    const store = new LocalFrameStore(request.outputDir);
    let failure: string | null = null;
    let output: { stdout: string; stderr: string };
    try {
      const res = await execFileAsync(this.binary, args, { timeout: this.timeoutMs, maxBuffer: 50 * 1024 * 1024 });
      output = { stdout: capturedOutput(res.stdout), stderr: capturedOutput(res.stderr) };
    } catch (err) {
      failure = errorMessage(err);
      output = outputOf(err);
      if (wasKilled(err)) {
        const partial = await store.list(request.prefix, request.format);
        for (const frame of partial) await store.remove(frame);
        this.log.warn(
          { input: request.inputPath, removed: partial.length, timeoutMs: this.timeoutMs },
          "ffmpeg was killed; discarded its partial frames",
        );
        this.logOutput(output);
        return { status: "failed", message: `ffmpeg was killed before finishing: ${failure}` };
      }
    }
    this.logOutput(output);

    const count = (await store.list(request.prefix, request.format)).length;
    if (count > 0) {
      if (failure) {
        this.log.warn({ input: request.inputPath, count, error: failure }, "ffmpeg failed but left frames; counting them");
      }
      return { status: "frames", count };
    }
    if (failure) return { status: "failed", message: failure };
    return { status: "empty" };
  }

  private logOutput(output: { stdout: string; stderr: string }): void {
    if (!output.stdout && !output.stderr) return;
    this.log.debug({ stdout: output.stdout || undefined, stderr: output.stderr || undefined }, "ffmpeg output");
  }
}

/**
 * Check whether a binary can be executed.
 */
export async function isToolAvailable(binary: string, args: string[] = ["-version"]): Promise<boolean> {
  try {
    await execFileAsync(binary, args, { timeout: 10_000 });
    return true;
  } catch {
    return false;
  }
}
