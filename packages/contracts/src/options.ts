import { z } from "zod";

export const FrameFormatSchema = z.enum(["png", "webp"]);
export type FrameFormat = z.infer<typeof FrameFormatSchema>;

// Safe range 3-5, aggressive 6-8, very aggressive 9-10.
export const DEFAULT_PHASH_THRESHOLD = 5;
export const AGGRESSIVE_PHASH_THRESHOLD = 12;
export const DEFAULT_DIVERSE_MIN_DISTANCE = 12;
export const DEFAULT_SCENE_STEP = 0.01;
// Candidates are rounded to 6 decimals, so a finer step only repeats thresholds.
export const MIN_SCENE_STEP = 0.000001;
export const MAX_SCENE_CANDIDATES = 10_000;

/** Number of thresholds a `lo~hi` sweep with `step` tries. */
export function sceneCandidateCount(lo: number, hi: number, step: number): number {
  return Math.floor(Math.abs(hi - lo) / step + 1e-9) + 1;
}

const DistanceSchema = z.number().int().nonnegative();

export const DedupePolicySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("exact") }),
  z.object({ kind: z.literal("phash"), threshold: DistanceSchema }),
  z.object({ kind: z.literal("aggressive"), threshold: DistanceSchema }),
  z.object({ kind: z.literal("diverse"), minDistance: DistanceSchema }),
]);
export type DedupePolicy = z.infer<typeof DedupePolicySchema>;
export type DedupePolicyKind = DedupePolicy["kind"];

function parseDistanceSuffix(raw: string | undefined, fallback: number): number | null {
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) return null;
  return Number(raw);
}

/**
 * `--dedupe` values: `exact`, `phash[:N]`, `aggressive`, `diverse[:N]`.
 */
export const DedupeModeSchema = z
  .string()
  .trim()
  .transform((value, ctx): DedupePolicy => {
    const parts = value.toLowerCase().split(":");
    const mode = parts[0];
    const suffix: string | undefined = parts[1];
    if (parts.length > 2) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid dedupe mode: ${value}` });
      return z.NEVER;
    }

    if (mode === "exact" && suffix === undefined) return { kind: "exact" };
    if (mode === "aggressive" && suffix === undefined) {
      return { kind: "aggressive", threshold: AGGRESSIVE_PHASH_THRESHOLD };
    }
    if (mode === "phash") {
      const threshold = parseDistanceSuffix(suffix, DEFAULT_PHASH_THRESHOLD);
      if (threshold !== null) return { kind: "phash", threshold };
    }
    if (mode === "diverse") {
      const minDistance = parseDistanceSuffix(suffix, DEFAULT_DIVERSE_MIN_DISTANCE);
      if (minDistance !== null) return { kind: "diverse", minDistance };
    }

    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid dedupe mode: ${value} (expected exact | phash[:N] | aggressive | diverse[:N])`,
    });
    return z.NEVER;
  });

export const SceneThresholdSchema = z.number().min(0).max(1);

export const SceneSpecSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("fixed"), threshold: SceneThresholdSchema }),
  z.object({ kind: z.literal("range"), lo: SceneThresholdSchema, hi: SceneThresholdSchema }),
]);
export type SceneSpec = z.infer<typeof SceneSpecSchema>;

const NUMBER_RE = /^\d*\.?\d+$/;

/**
 * `--scene` values: a single threshold `T` or a range `A~B` (tried from the
 * larger bound down to the smaller one).
 */
export const SceneOptionSchema = z
  .string()
  .trim()
  .transform((value, ctx): SceneSpec => {
    const parts = value.split("~").map((p) => p.trim());
    if (parts.length > 2 || parts.some((p) => !NUMBER_RE.test(p))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid scene threshold: ${value}` });
      return z.NEVER;
    }
    const nums = parts.map(Number);
    if (nums.some((n) => n > 1)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Scene threshold must be within 0..1: ${value}` });
      return z.NEVER;
    }
    if (nums.length === 1) return { kind: "fixed", threshold: nums[0] };
    const [a, b] = nums;
    return { kind: "range", lo: Math.min(a, b), hi: Math.max(a, b) };
  });

// ffmpeg scale arguments such as 1280:-1, -1:720 or iw/2:ih/2
export const ScaleSchema = z
  .string()
  .trim()
  .regex(/^[\w.+\-*/()]+:[\w.+\-*/()]+$/, "Expected WxH as W:H (e.g. 1280:-1)");

// 10, 12.5, 00:05, 00:00:05.5
export const TimeSchema = z
  .string()
  .trim()
  .regex(/^(\d+:){0,2}\d+(\.\d+)?$/, "Expected seconds or [HH:]MM:SS[.ms]");

export const PrefixSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9._-]+$/, "Prefix may only contain letters, digits, '.', '_' and '-'");

export const ExtractOptionsSchema = z.object({
  outDir: z.string().min(1),
  fps: z.coerce.number().positive().optional(),
  scale: ScaleSchema.optional(),
  start: TimeSchema.optional(),
  duration: TimeSchema.optional(),
  unique: z.boolean().default(false),
  scene: SceneOptionSchema.optional(),
  sceneStep: z.coerce
    .number()
    .min(MIN_SCENE_STEP, `Scene step must be at least ${MIN_SCENE_STEP}`)
    .default(DEFAULT_SCENE_STEP),
  dedupe: DedupeModeSchema.optional(),
  format: FrameFormatSchema.default("png"),
  flat: z.boolean().default(false),
  prefix: PrefixSchema.optional(),
  optimize: z.boolean().default(true),
  debug: z.boolean().default(false),
}).superRefine((opts, ctx) => {
  if (opts.scene?.kind !== "range" || !(opts.sceneStep > 0)) return;
  const count = sceneCandidateCount(opts.scene.lo, opts.scene.hi, opts.sceneStep);
  if (count > MAX_SCENE_CANDIDATES) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["sceneStep"],
      message: `Scene range ${opts.scene.lo}~${opts.scene.hi} with step ${opts.sceneStep} gives ${count} thresholds (max ${MAX_SCENE_CANDIDATES})`,
    });
  }
});
export type ExtractOptions = z.infer<typeof ExtractOptionsSchema>;
export type ExtractOptionsInput = z.input<typeof ExtractOptionsSchema>;

export const DedupeCommandOptionsSchema = z.object({
  dir: z.string().min(1),
  mode: DedupeModeSchema,
  prefix: PrefixSchema.default("frame_"),
  format: FrameFormatSchema.default("png"),
});
export type DedupeCommandOptions = z.infer<typeof DedupeCommandOptionsSchema>;

export const HashOptionsSchema = z.object({
  hashSize: z.coerce.number().int().min(2).max(32).default(8),
});
export type HashOptions = z.infer<typeof HashOptionsSchema>;
