import type { z } from "zod";

/** Options as commander hands them over for `extract`. */
export type RawExtractOpts = {
  out?: string;
  fps?: string;
  scale?: string;
  start?: string;
  duration?: string;
  unique: boolean;
  scene?: string;
  sceneStep?: string;
  dedupe?: string;
  webp: boolean;
  flat: boolean;
  prefix?: string;
  opt: boolean;
  debug: boolean;
  json: boolean;
  metricsFile?: string;
};

/** Maps flags onto ExtractOptionsSchema fields; numbers stay strings for zod to coerce. */
export function toExtractInput(raw: RawExtractOpts): Record<string, unknown> {
  return {
    outDir: raw.out ?? "",
    fps: raw.fps,
    scale: raw.scale,
    start: raw.start,
    duration: raw.duration,
    unique: raw.unique,
    scene: raw.scene,
    sceneStep: raw.sceneStep,
    dedupe: raw.dedupe,
    format: raw.webp ? "webp" : "png",
    flat: raw.flat,
    prefix: raw.prefix,
    optimize: raw.opt,
    debug: raw.debug,
  };
}

function optionName(path: ReadonlyArray<string | number>): string {
  const key = path.map(String).join(".");
  if (!key) return "";
  const flag = key === "outDir" ? "out" : key === "format" ? "webp" : key === "optimize" ? "no-opt" : key;
  return `--${flag.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}: `;
}

/** One line per issue, prefixed with the CLI flag it came from. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${optionName(issue.path)}${issue.message}`);
}
