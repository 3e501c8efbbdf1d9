import fs from "fs/promises";
import path from "path";
import { errnoCode, FrameIOError } from "../errors";

export const FRAME_SUFFIX = "frame_";

export interface VideoOutput {
  /** Video file name without extension */
  name: string;
  dir: string;
  /** Per-video prefix ("" when none) */
  videoPrefix: string;
  /** Prefix of every frame file: `{videoPrefix}frame_` */
  framePrefix: string;
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return false;
    throw new FrameIOError(p, "list", { cause: err });
  }
}

async function listNames(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return [];
    throw new FrameIOError(dir, "list", { cause: err });
  }
}

export function videoBaseName(inputPath: string): string {
  return path.parse(inputPath).name;
}

export function sanitizeName(name: string): string {
  return name.replace(/[^a-zA-Z0-9._-]/g, "_");
}

/** `{parent}/{base}`, or the first free `{base}-2`, `{base}-3`, ... */
export async function makeUniqueDir(parent: string, base: string): Promise<string> {
  let dir = path.join(parent, base);
  for (let n = 2; await exists(dir); n++) {
    dir = path.join(parent, `${base}-${n}`);
  }
  return dir;
}

/**
 * Prefix for flat output: the sanitised video name, suffixed -2, -3, ...
 * while any file in `outDir` already starts with `{candidate}_`.
 */
export async function autoFlatPrefix(name: string, outDir: string): Promise<string> {
  const names = await listNames(outDir);
  const base = sanitizeName(name);
  let candidate = base;
  for (let n = 2; names.some((f) => f.startsWith(`${candidate}_`)); n++) {
    candidate = `${base}-${n}`;
  }
  return `${candidate}_`;
}

export function normalizeUserPrefix(prefix: string): string {
  if (!prefix) return "";
  return prefix.endsWith("_") ? prefix : `${prefix}_`;
}

/**
 * Decide where a video's frames go and how they are named. Only computes
 * names; nothing is created.
 */
export async function resolveVideoOutput(opts: {
  inputPath: string;
  outDir: string;
  flat: boolean;
  prefix?: string;
}): Promise<VideoOutput> {
  const name = videoBaseName(opts.inputPath);
  const dir = opts.flat ? opts.outDir : await makeUniqueDir(opts.outDir, name);

  let videoPrefix = "";
  if (opts.prefix) videoPrefix = normalizeUserPrefix(opts.prefix);
  else if (opts.flat) videoPrefix = await autoFlatPrefix(name, opts.outDir);

  return { name, dir, videoPrefix, framePrefix: `${videoPrefix}${FRAME_SUFFIX}` };
}
