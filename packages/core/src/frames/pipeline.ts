/**
 * Per-video pipeline: layout → extraction (scene search + fallbacks) →
 * optional PNG optimisation → optional dedupe → final count.
 *
 * Videos are processed one at a time, in input order. A failure inside one
 * video's pipeline is recorded and the batch moves on.
 */

import fs from "fs/promises";
import type { ExtractOptions } from "@vframes/contracts";
import { errnoCode, errorMessage, ExtractionEmptyError, FrameIOError } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";
import type { Metrics } from "../metrics/metrics";
import { dedupeFrames, type DedupeReport } from "./dedup";
import type { FrameExtractor } from "./extract";
import type { FingerprintFn } from "./hash";
import { resolveVideoOutput } from "./layout";
import type { OptimizeResult, PngOptimizer } from "./optimize";
import { extractWithFallback, type ExtractionTier } from "./search";
import { LocalFrameStore, type Frame } from "./storage";

export interface PipelineDeps {
  extractor: FrameExtractor;
  optimizer?: PngOptimizer;
  fingerprintOf?: FingerprintFn<Frame>;
  digestOf?: (frame: Frame) => Promise<string>;
  log?: Logger;
  metrics?: Metrics;
}

export type VideoStatus = "ok" | "empty" | "missing" | "failed";

export interface VideoReport {
  input: string;
  status: VideoStatus;
  outputDir?: string;
  framePrefix?: string;
  tier?: ExtractionTier;
  sceneThreshold?: number;
  attempts: number;
  extracted: number;
  finalCount: number;
  optimize?: OptimizeResult;
  dedupe?: DedupeReport;
  error?: string;
  durationMs: number;
}

export interface BatchReport {
  videos: VideoReport[];
  succeeded: number;
  failed: number;
  /** 0 when at least one video produced frames */
  exitCode: number;
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch (err) {
    if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") return false;
    throw new FrameIOError(p, "read", { cause: err });
  }
}

/**
 * Run the whole pipeline for one video. Filesystem failures propagate.
 */
export async function processVideo(inputPath: string, options: ExtractOptions, deps: PipelineDeps): Promise<VideoReport> {
  const startedAt = Date.now();
  const log = (deps.log ?? rootLogger).child({ input: inputPath });
  const base = { input: inputPath, attempts: 0, extracted: 0, finalCount: 0 };

  if (!(await isFile(inputPath))) {
    log.warn("Input not found; skipping");
    return { ...base, status: "missing", durationMs: Date.now() - startedAt };
  }

  const output = await resolveVideoOutput({
    inputPath,
    outDir: options.outDir,
    flat: options.flat,
    prefix: options.prefix,
  });
  try {
    await fs.mkdir(output.dir, { recursive: true });
  } catch (err) {
    throw new FrameIOError(output.dir, "mkdir", { cause: err });
  }
  log.info({ dir: output.dir, prefix: output.framePrefix, format: options.format }, "Processing video");

  const result = await extractWithFallback(
    deps.extractor,
    {
      request: {
        inputPath,
        outputDir: output.dir,
        prefix: output.framePrefix,
        format: options.format,
        start: options.start,
        duration: options.duration,
      },
      scene: options.scene,
      sceneStep: options.sceneStep,
      unique: options.unique,
      fps: options.fps,
      scale: options.scale,
    },
    {
      log,
      onAttempt: (a) => deps.metrics?.extractionAttemptsTotal.inc({ tier: a.tier, status: a.outcome.status }),
    },
  );

  const located = { outputDir: output.dir, framePrefix: output.framePrefix, attempts: result.attempts.length };
  if (result.kind === "empty") {
    const err = new ExtractionEmptyError(inputPath, result.attempts.length);
    log.warn({ err }, "All extraction tiers produced zero frames");
    return { ...base, ...located, status: "empty", error: err.message, durationMs: Date.now() - startedAt };
  }

  log.info({ count: result.count, tier: result.tier, sceneThreshold: result.sceneThreshold }, "Frames extracted");
  deps.metrics?.framesExtractedTotal.inc({ format: options.format }, result.count);

  const store = new LocalFrameStore(output.dir);
  let optimize: OptimizeResult | undefined;
  if (options.format === "png" && options.optimize && deps.optimizer) {
    const frames = await store.list(output.framePrefix, options.format);
    optimize = await deps.optimizer.optimize(frames.map((f) => f.filePath));
    log.info({ ...optimize }, "PNG optimisation done");
  }

  let dedupe: DedupeReport | undefined;
  if (options.dedupe) {
    dedupe = await dedupeFrames({
      store,
      prefix: output.framePrefix,
      ext: options.format,
      policy: options.dedupe,
      fingerprintOf: deps.fingerprintOf,
      digestOf: deps.digestOf,
      log,
    });
    deps.metrics?.framesRemovedTotal.inc({ policy: dedupe.policy }, dedupe.removed);
  }

  const finalCount = (await store.list(output.framePrefix, options.format)).length;
  log.info({ finalCount, dir: output.dir }, "Video done");

  return {
    ...base,
    ...located,
    status: "ok",
    tier: result.tier,
    sceneThreshold: result.sceneThreshold,
    extracted: result.count,
    finalCount,
    optimize,
    dedupe,
    durationMs: Date.now() - startedAt,
  };
}

/**
 * Process videos sequentially. Errors abort only the video they occur in.
 */
export async function runBatch(inputs: readonly string[], options: ExtractOptions, deps: PipelineDeps): Promise<BatchReport> {
  const log = deps.log ?? rootLogger;
  const videos: VideoReport[] = [];

  for (const input of inputs) {
    const startedAt = Date.now();
    let report: VideoReport;
    try {
      report = await processVideo(input, options, deps);
    } catch (err) {
      log.error({ input, err }, "Video pipeline failed");
      report = {
        input,
        status: "failed",
        attempts: 0,
        extracted: 0,
        finalCount: 0,
        error: errorMessage(err),
        durationMs: Date.now() - startedAt,
      };
    }
    deps.metrics?.videosTotal.inc({ status: report.status });
    deps.metrics?.videoDurationMs.observe({ status: report.status }, report.durationMs);
    videos.push(report);
  }

  const succeeded = videos.filter((v) => v.status === "ok").length;
  const failed = videos.length - succeeded;
  log.info({ total: videos.length, succeeded, failed }, "Batch complete");
  return { videos, succeeded, failed, exitCode: succeeded > 0 ? 0 : 1 };
}
