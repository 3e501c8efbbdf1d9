import test from "node:test";
import assert from "node:assert/strict";
import type { BatchReport, VideoReport } from "@vframes/core";
import { formatMs, renderBatch } from "../src/format";

const talk: VideoReport = {
  input: "/videos/talk.mp4",
  status: "ok",
  outputDir: "/out/talk",
  framePrefix: "frame_",
  tier: "scene-range",
  sceneThreshold: 0.07,
  attempts: 4,
  extracted: 12,
  finalCount: 9,
  dedupe: { policy: "phash", considered: 12, kept: 9, removed: 3, skipped: 0, effectiveThreshold: 10 },
  durationMs: 65_400,
};

const dark: VideoReport = {
  input: "/videos/dark.mp4",
  status: "empty",
  outputDir: "/out/dark",
  attempts: 3,
  extracted: 0,
  finalCount: 0,
  error: "No frames extracted from /videos/dark.mp4 after 3 attempt(s)",
  durationMs: 2_000,
};

function batch(videos: VideoReport[]): BatchReport {
  const succeeded = videos.filter((v) => v.status === "ok").length;
  return { videos, succeeded, failed: videos.length - succeeded, exitCode: succeeded > 0 ? 0 : 1 };
}

test("formatMs renders m:ss below an hour and h:mm:ss above", () => {
  assert.equal(formatMs(0), "0:00");
  assert.equal(formatMs(65_400), "1:05");
  assert.equal(formatMs(3_725_000), "1:02:05");
  assert.equal(formatMs(-5), "0:00");
});

test("a batch renders one aligned row per video, its errors and the success count", () => {
  assert.deepEqual(renderBatch(batch([talk, dark])), [
    "video     status  frames  extracted  tier         scene  removed    time  output",
    "--------  ------  ------  ---------  -----------  -----  ---------  ----  ---------",
    "talk.mp4  ok      9       12         scene-range  0.07   3 (phash)  1:05  /out/talk",
    "dark.mp4  empty   0       0          -            -      -          0:02  /out/dark",
    "dark.mp4: No frames extracted from /videos/dark.mp4 after 3 attempt(s)",
    "",
    "1/2 videos produced frames",
  ]);
});

test("long video names are cut to forty characters", () => {
  const long = { ...talk, input: `/videos/${"a".repeat(45)}.mp4` };
  const [, , row] = renderBatch(batch([long]));
  assert.equal(row.slice(0, 42), `${"a".repeat(37)}...  `);
});

test("an empty batch renders only the count", () => {
  assert.deepEqual(renderBatch(batch([])), ["0/0 videos produced frames"]);
});
