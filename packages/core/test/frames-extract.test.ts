import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import {
  buildFfmpegArgs,
  buildFilterGraph,
  FfmpegFrameExtractor,
  frameCount,
  isToolAvailable,
  outputPattern,
  type ExtractionRequest,
} from "../src/frames/extract";
import { countFrames } from "../src/frames/storage";

const silent = pino({ level: "silent" });

async function tmpDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "vframes-extract-"));
}

/** An executable that stands in for ffmpeg; `frame(n)` is the path of output frame n. */
async function fakeFfmpeg(dir: string, body: string): Promise<string> {
  const file = path.join(dir, "fake-ffmpeg.mjs");
  await fs.writeFile(
    file,
    [
      "#!/usr/bin/env node",
      'import fs from "node:fs";',
      "const pattern = process.argv[process.argv.length - 1];",
      'const frame = (n) => pattern.replace("%06d", String(n).padStart(6, "0"));',
      body,
    ].join("\n"),
  );
  await fs.chmod(file, 0o755);
  return file;
}

function request(overrides: Partial<ExtractionRequest> = {}): ExtractionRequest {
  return {
    inputPath: "/videos/clip.mp4",
    outputDir: "/out/clip",
    prefix: "frame_",
    format: "png",
    filters: {},
    ...overrides,
  };
}

// ─── filter graph ─────────────────────────────────────────────────────────────

test("buildFilterGraph is undefined without filters", () => {
  assert.equal(buildFilterGraph({}), undefined);
});

test("buildFilterGraph orders scene select, fps and scale", () => {
  assert.equal(
    buildFilterGraph({ sceneThreshold: 0.1, fps: 2, scale: "1280:-1" }),
    "select='gt(scene,0.1)',fps=2,scale=1280:-1:flags=lanczos",
  );
});

test("a scene threshold takes precedence over mpdecimate", () => {
  assert.equal(buildFilterGraph({ sceneThreshold: 0.05, unique: true }), "select='gt(scene,0.05)'");
});

test("unique without a scene threshold uses mpdecimate", () => {
  assert.equal(buildFilterGraph({ unique: true, fps: 1 }), "mpdecimate=hi=768:lo=128:frac=0.33,fps=1");
});

// ─── ffmpeg arguments ─────────────────────────────────────────────────────────

test("outputPattern joins directory, prefix and a six-digit counter", () => {
  assert.equal(outputPattern({ outputDir: "/out", prefix: "clip_frame_", format: "webp" }), "/out/clip_frame_%06d.webp");
});

test("buildFfmpegArgs for PNG output with a time window", () => {
  const args = buildFfmpegArgs(
    request({ start: "00:01:00", duration: "30", filters: { fps: 1 } }),
    { logLevel: "warning" },
  );
  assert.deepEqual(args, [
    "-hide_banner",
    "-loglevel",
    "warning",
    "-stats",
    "-y",
    "-hwaccel",
    "auto",
    "-ss",
    "00:01:00",
    "-i",
    "/videos/clip.mp4",
    "-t",
    "30",
    "-vf",
    "fps=1",
    "-fps_mode",
    "vfr",
    "-f",
    "image2",
    "-pix_fmt",
    "rgb24",
    "-compression_level",
    "9",
    "-pred",
    "mixed",
    "/out/clip/frame_%06d.png",
  ]);
});

test("buildFfmpegArgs for lossless WebP output without filters", () => {
  const args = buildFfmpegArgs(request({ format: "webp" }));
  assert.equal(args.includes("-vf"), false);
  assert.deepEqual(args.slice(-9), [
    "-fps_mode",
    "vfr",
    "-f",
    "image2",
    "-pix_fmt",
    "rgb24",
    "-lossless",
    "1",
    "/out/clip/frame_%06d.webp",
  ]);
  assert.deepEqual(args.slice(1, 3), ["-loglevel", "error"]);
});

test("frameCount is zero for anything but frames", () => {
  assert.equal(frameCount({ status: "frames", count: 7 }), 7);
  assert.equal(frameCount({ status: "empty" }), 0);
  assert.equal(frameCount({ status: "failed", message: "x" }), 0);
});

// ─── counting ─────────────────────────────────────────────────────────────────

test("countFrames only counts files of the exact prefix and extension", async () => {
  const dir = await tmpDir();
  for (const name of [
    "clip_frame_000001.png",
    "clip_frame_000002.png",
    "clip-2_frame_000001.png",
    "clip_frame_000003.webp",
    "clip_frame_x.png",
    "xclip_frame_000001.png",
  ]) {
    await fs.writeFile(path.join(dir, name), "");
  }
  assert.equal(await countFrames(dir, "clip_frame_", "png"), 2);
  assert.equal(await countFrames(dir, "clip_frame_", "webp"), 1);
  assert.equal(await countFrames(path.join(dir, "nope"), "clip_frame_", "png"), 0);
});

// ─── FfmpegFrameExtractor ─────────────────────────────────────────────────────

test("a binary that cannot run yields a failed outcome", async () => {
  const dir = await tmpDir();
  const extractor = new FfmpegFrameExtractor({ binary: path.join(dir, "no-ffmpeg"), logLevel: "error", log: silent });
  const outcome = await extractor.extract(request({ outputDir: path.join(dir, "out") }));
  assert.equal(outcome.status, "failed");
  // the output directory is created before ffmpeg runs
  assert.ok((await fs.stat(path.join(dir, "out"))).isDirectory());
});

test("frames left in place count even when the run fails", async () => {
  const dir = await tmpDir();
  await fs.writeFile(path.join(dir, "frame_000001.png"), "");
  const extractor = new FfmpegFrameExtractor({ binary: path.join(dir, "no-ffmpeg"), logLevel: "error", log: silent });
  const outcome = await extractor.extract(request({ outputDir: dir }));
  assert.deepEqual(outcome, { status: "frames", count: 1 });
});

test("a slow run is waited for when no timeout is set", async () => {
  const dir = await tmpDir();
  const binary = await fakeFfmpeg(
    dir,
    'fs.writeFileSync(frame(1), "x"); setTimeout(() => fs.writeFileSync(frame(2), "x"), 300);',
  );
  const extractor = new FfmpegFrameExtractor({ binary, logLevel: "error", log: silent });
  const outcome = await extractor.extract(request({ outputDir: path.join(dir, "out") }));
  assert.deepEqual(outcome, { status: "frames", count: 2 });
});

test("a run killed by its timeout is a failure and leaves no partial frames", async () => {
  const dir = await tmpDir();
  const out = path.join(dir, "out");
  const binary = await fakeFfmpeg(
    dir,
    'fs.writeFileSync(frame(1), "x"); setTimeout(() => fs.writeFileSync(frame(2), "x"), 30_000);',
  );
  const extractor = new FfmpegFrameExtractor({ binary, logLevel: "error", timeoutMs: 1_000, log: silent });
  const outcome = await extractor.extract(request({ outputDir: out }));
  assert.equal(outcome.status, "failed");
  if (outcome.status === "failed") assert.match(outcome.message, /^ffmpeg was killed before finishing/);
  assert.equal(await countFrames(out, "frame_", "png"), 0);
});

test("ffmpeg's stderr is logged at debug", async () => {
  const dir = await tmpDir();
  const binary = await fakeFfmpeg(
    dir,
    'process.stderr.write("frame=1 DIAGNOSTIC\\n"); fs.writeFileSync(frame(1), "x");',
  );
  const lines: string[] = [];
  const log = pino({ level: "debug" }, { write: (line: string) => void lines.push(line) });
  const extractor = new FfmpegFrameExtractor({ binary, logLevel: "info", log });

  const outcome = await extractor.extract(request({ outputDir: path.join(dir, "out") }));
  assert.deepEqual(outcome, { status: "frames", count: 1 });
  const entries: Array<{ msg?: string; stderr?: string }> = lines.map((line) => JSON.parse(line));
  const output = entries.find((e) => e.msg === "ffmpeg output");
  assert.equal(output?.stderr, "frame=1 DIAGNOSTIC");
});

test("ffmpeg output stays out of the log above debug", async () => {
  const dir = await tmpDir();
  const binary = await fakeFfmpeg(dir, 'process.stderr.write("noise\\n"); fs.writeFileSync(frame(1), "x");');
  const lines: string[] = [];
  const log = pino({ level: "info" }, { write: (line: string) => void lines.push(line) });
  await new FfmpegFrameExtractor({ binary, logLevel: "error", log }).extract(request({ outputDir: path.join(dir, "out") }));
  assert.deepEqual(lines, []);
});

test("isToolAvailable is false for a missing binary and true for node", async () => {
  assert.equal(await isToolAvailable("/definitely/not/here/ffmpeg"), false);
  assert.equal(await isToolAvailable(process.execPath, ["--version"]), true);
});
