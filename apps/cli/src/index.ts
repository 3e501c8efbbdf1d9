#!/usr/bin/env tsx
import { writeFile } from "node:fs/promises";
import { Command } from "commander";
import { z } from "zod";
import {
  DedupeCommandOptionsSchema,
  ExtractOptionsSchema,
  HashOptionsSchema,
} from "@vframes/contracts";
import {
  computePerceptualHash,
  dedupeFrames,
  FfmpegFrameExtractor,
  fingerprintToHex,
  getVframesDefault,
  hammingDistance,
  initMetrics,
  isToolAvailable,
  LocalFrameStore,
  logger,
  OxipngOptimizer,
  runBatch,
  setLogLevel,
  type BatchReport,
  type DedupeReport,
  type Fingerprint,
} from "@vframes/core";
import { renderBatch } from "./format.js";
import { describeIssues, toExtractInput, type RawExtractOpts } from "./options.js";

class UsageError extends Error {
  constructor(readonly lines: string[]) {
    super(lines.join("; "));
    this.name = "UsageError";
  }
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw new UsageError(describeIssues(parsed.error));
  return parsed.data;
}

function handleErr(err: unknown): never {
  if (err instanceof UsageError) {
    for (const line of err.lines) console.error(`error: ${line}`);
    process.exit(2);
  }
  if (err instanceof Error) {
    console.error(`error: ${err.message}`);
    process.exit(1);
  }
  console.error(`error: ${String(err)}`);
  process.exit(1);
}

function printDedupe(report: DedupeReport): void {
  const threshold = report.effectiveThreshold === null ? "" : ` (threshold ${report.effectiveThreshold})`;
  console.log(
    `${report.policy}${threshold}: ${report.considered} considered, ${report.removed} removed, ${report.kept} kept` +
      (report.skipped > 0 ? `, ${report.skipped} unreadable` : ""),
  );
}

function printBatch(batch: BatchReport): void {
  for (const line of renderBatch(batch)) console.log(line);
}

const program = new Command();
program.name("vframes").description("Extract lossless frames from videos and drop redundant ones");

program
  .command("extract", { isDefault: true })
  .description("Extract frames from one or more videos")
  .argument("<videos...>", "Input video files")
  .option("-o, --out <dir>", "Output directory")
  .option("--fps <n>", "Cap the frame rate")
  .option("--scale <w:h>", "ffmpeg scale, e.g. 1280:-1")
  .option("--start <time>", "Start offset (seconds or [hh:]mm:ss)")
  .option("--duration <time>", "Duration to read")
  .option("--unique", "Drop near-identical frames while extracting (mpdecimate)", false)
  .option("--scene <t>", "Scene threshold T, or a range A~B searched from B down to A")
  .option("--scene-step <s>", "Step of the scene range search", "0.01")
  .option("--dedupe <mode>", "exact | phash[:N] | aggressive | diverse[:N]")
  .option("--webp", "Write lossless WebP instead of PNG", false)
  .option("--flat", "Write every video's frames into the output directory itself", false)
  .option("--prefix <p>", "File name prefix for this run's frames")
  .option("--no-opt", "Skip the oxipng pass")
  .option("--debug", "Verbose logging and ffmpeg output", false)
  .option("--json", "Machine-friendly JSON output", false)
  .option("--metrics-file <path>", "Write Prometheus metrics here after the batch")
  .action(async (videos: string[], raw: RawExtractOpts) => {
    try {
      const options = parseOrThrow(ExtractOptionsSchema, toExtractInput(raw));
      if (options.debug) setLogLevel("debug");

      const ffmpeg = getVframesDefault("VFRAMES_FFMPEG_BIN");
      if (!(await isToolAvailable(ffmpeg))) throw new Error(`${ffmpeg} not found (set VFRAMES_FFMPEG_BIN)`);

      const metrics = raw.metricsFile ? initMetrics() : undefined;
      const batch = await runBatch(videos, options, {
        extractor: new FfmpegFrameExtractor({ binary: ffmpeg, logLevel: options.debug ? "info" : undefined }),
        optimizer: new OxipngOptimizer(),
        log: logger,
        metrics,
      });

      if (metrics && raw.metricsFile) {
        await writeFile(raw.metricsFile, await metrics.register.metrics());
      }

      if (raw.json) console.log(JSON.stringify(batch, null, 2));
      else printBatch(batch);
      process.exitCode = batch.exitCode;
    } catch (err) {
      handleErr(err);
    }
  });

program
  .command("dedupe")
  .description("Remove redundant frames from an existing frame directory")
  .argument("<dir>", "Directory holding the frames")
  .requiredOption("--mode <mode>", "exact | phash[:N] | aggressive | diverse[:N]")
  .option("--prefix <p>", "Frame file prefix", "frame_")
  .option("--webp", "Frames are WebP", false)
  .option("--json", "Machine-friendly JSON output", false)
  .action(async (dir: string, raw: { mode: string; prefix: string; webp: boolean; json: boolean }) => {
    try {
      const options = parseOrThrow(DedupeCommandOptionsSchema, {
        dir,
        mode: raw.mode,
        prefix: raw.prefix,
        format: raw.webp ? "webp" : "png",
      });
      const report = await dedupeFrames({
        store: new LocalFrameStore(options.dir),
        prefix: options.prefix,
        ext: options.format,
        policy: options.mode,
        log: logger,
      });
      if (raw.json) console.log(JSON.stringify(report, null, 2));
      else printDedupe(report);
    } catch (err) {
      handleErr(err);
    }
  });

program
  .command("hash")
  .description("Print perceptual hashes (and their distance when given two images)")
  .argument("<images...>", "Image files")
  .option("--hash-size <n>", "Side of the low-frequency block; the hash has n*n bits", "8")
  .option("--json", "Machine-friendly JSON output", false)
  .action(async (images: string[], raw: { hashSize: string; json: boolean }) => {
    try {
      const { hashSize } = parseOrThrow(HashOptionsSchema, { hashSize: raw.hashSize });
      const hashes: Array<{ image: string; fingerprint: Fingerprint }> = [];
      for (const image of images) {
        hashes.push({ image, fingerprint: await computePerceptualHash(image, { hashSize }) });
      }
      const distance =
        hashes.length === 2 ? hammingDistance(hashes[0].fingerprint, hashes[1].fingerprint) : undefined;

      if (raw.json) {
        const out = hashes.map((h) => ({ image: h.image, hash: fingerprintToHex(h.fingerprint), bits: h.fingerprint.bits }));
        console.log(JSON.stringify(distance === undefined ? { hashes: out } : { hashes: out, distance }, null, 2));
        return;
      }
      for (const h of hashes) console.log(`${fingerprintToHex(h.fingerprint)}  ${h.image}`);
      if (distance !== undefined) console.log(`distance: ${distance}`);
    } catch (err) {
      handleErr(err);
    }
  });

program.parseAsync(process.argv).catch(handleErr);
