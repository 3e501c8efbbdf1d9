import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  autoFlatPrefix,
  makeUniqueDir,
  normalizeUserPrefix,
  resolveVideoOutput,
  sanitizeName,
  videoBaseName,
} from "../src/frames/layout";

async function tmpDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "vframes-layout-"));
}

test("videoBaseName drops directories and the last extension", () => {
  assert.equal(videoBaseName("/videos/talk.final.mp4"), "talk.final");
  assert.equal(videoBaseName("clip"), "clip");
});

test("sanitizeName replaces everything outside [A-Za-z0-9._-]", () => {
  assert.equal(sanitizeName("my clip (1)"), "my_clip__1_");
  assert.equal(sanitizeName("a.b-c_d"), "a.b-c_d");
});

test("normalizeUserPrefix appends one trailing underscore", () => {
  assert.equal(normalizeUserPrefix("talk"), "talk_");
  assert.equal(normalizeUserPrefix("talk_"), "talk_");
  assert.equal(normalizeUserPrefix(""), "");
});

test("makeUniqueDir picks the first free numbered sibling", async () => {
  const parent = await tmpDir();
  assert.equal(await makeUniqueDir(parent, "clip"), path.join(parent, "clip"));
  await fs.mkdir(path.join(parent, "clip"));
  await fs.mkdir(path.join(parent, "clip-2"));
  assert.equal(await makeUniqueDir(parent, "clip"), path.join(parent, "clip-3"));
});

test("autoFlatPrefix avoids prefixes already used in the directory", async () => {
  const dir = await tmpDir();
  assert.equal(await autoFlatPrefix("my clip", dir), "my_clip_");
  await fs.writeFile(path.join(dir, "my_clip_frame_000001.png"), "");
  assert.equal(await autoFlatPrefix("my clip", dir), "my_clip-2_");
  await fs.writeFile(path.join(dir, "my_clip-2_frame_000001.png"), "");
  assert.equal(await autoFlatPrefix("my clip", dir), "my_clip-3_");
});

test("autoFlatPrefix on a directory that does not exist yet uses the plain name", async () => {
  const dir = path.join(await tmpDir(), "later");
  assert.equal(await autoFlatPrefix("clip", dir), "clip_");
});

test("non-flat output gets its own directory and the bare frame prefix", async () => {
  const out = await tmpDir();
  const res = await resolveVideoOutput({ inputPath: "/videos/clip.mp4", outDir: out, flat: false });
  assert.deepEqual(res, {
    name: "clip",
    dir: path.join(out, "clip"),
    videoPrefix: "",
    framePrefix: "frame_",
  });
  // nothing is created
  await assert.rejects(() => fs.stat(path.join(out, "clip")));
});

test("flat output shares the directory and derives a prefix from the name", async () => {
  const out = await tmpDir();
  const res = await resolveVideoOutput({ inputPath: "/videos/clip.mp4", outDir: out, flat: true });
  assert.equal(res.dir, out);
  assert.equal(res.videoPrefix, "clip_");
  assert.equal(res.framePrefix, "clip_frame_");
});

test("a user prefix wins in both layouts", async () => {
  const out = await tmpDir();
  const flat = await resolveVideoOutput({ inputPath: "/v/clip.mp4", outDir: out, flat: true, prefix: "talk" });
  assert.equal(flat.framePrefix, "talk_frame_");
  const nested = await resolveVideoOutput({ inputPath: "/v/clip.mp4", outDir: out, flat: false, prefix: "talk_" });
  assert.equal(nested.dir, path.join(out, "clip"));
  assert.equal(nested.framePrefix, "talk_frame_");
});
