/**
 * Scene-threshold search and the empty-extraction fallback chain.
 *
 * With a scene range, thresholds are tried from the upper bound down to the
 * lower bound and the first one that yields frames wins. This assumes a
 * stricter threshold never yields more frames; it is not verified.
 *
 * When nothing is produced the chain continues with:
 *   no-filters  scene/mpdecimate dropped, fps and scale kept
 *   minimal     fps=1, scale=-1:720
 */

import { MAX_SCENE_CANDIDATES, sceneCandidateCount, type SceneSpec } from "@vframes/contracts";
import { logger as rootLogger, type Logger } from "../logger";
import {
  buildFilterGraph,
  frameCount,
  type ExtractionOutcome,
  type ExtractionRequest,
  type FilterOptions,
  type FrameExtractor,
} from "./extract";

export type ExtractionTier = "scene-range" | "primary" | "no-filters" | "minimal";

export const MINIMAL_FALLBACK_FILTERS: FilterOptions = { fps: 1, scale: "-1:720" };

const RANGE_EPSILON = 1e-9;

export interface ExtractionAttempt {
  tier: ExtractionTier;
  filters: FilterOptions;
  outcome: ExtractionOutcome;
}

export type SearchResult =
  | {
      kind: "extracted";
      tier: ExtractionTier;
      /** Threshold that produced the frames, when a scene filter was active */
      sceneThreshold?: number;
      count: number;
      attempts: ExtractionAttempt[];
    }
  | { kind: "empty"; attempts: ExtractionAttempt[] };

export interface ExtractionPlan {
  /** Everything but the filters */
  request: Omit<ExtractionRequest, "filters">;
  scene?: SceneSpec;
  sceneStep: number;
  unique: boolean;
  fps?: number;
  scale?: string;
}

/**
 * Thresholds from `hi` down to `lo` (inclusive) in steps of `step`,
 * rounded to 6 decimals and strictly descending: a step finer than the
 * rounding does not repeat a threshold. A reversed range is swapped.
 */
export function sceneCandidatesDesc(lo: number, hi: number, step: number): number[] {
  if (!Number.isFinite(step) || step <= 0) {
    throw new RangeError(`Scene step must be a positive number, got ${step}`);
  }
  if (!Number.isFinite(lo) || !Number.isFinite(hi)) {
    throw new RangeError(`Scene range bounds must be finite, got ${lo}~${hi}`);
  }
  const low = Math.min(lo, hi);
  const high = Math.max(lo, hi);
  if (sceneCandidateCount(low, high, step) > MAX_SCENE_CANDIDATES) {
    throw new RangeError(`Scene range ${low}~${high} with step ${step} yields too many candidates`);
  }

  const out: number[] = [];
  for (let k = 0; ; k++) {
    const x = high - k * step;
    if (x < low - RANGE_EPSILON) break;
    const rounded = Number(x.toFixed(6));
    if (out.length === 0 || rounded < out[out.length - 1]) out.push(rounded);
  }
  return out;
}

interface RunOpts {
  log: Logger;
  onAttempt?: (attempt: ExtractionAttempt) => void;
}

async function attempt(
  extractor: FrameExtractor,
  request: Omit<ExtractionRequest, "filters">,
  tier: ExtractionTier,
  filters: FilterOptions,
  attempts: ExtractionAttempt[],
  opts: RunOpts,
): Promise<number> {
  opts.log.info({ tier, vf: buildFilterGraph(filters) ?? null }, "Extracting frames");
  const outcome = await extractor.extract({ ...request, filters });
  const entry: ExtractionAttempt = { tier, filters, outcome };
  attempts.push(entry);
  opts.onAttempt?.(entry);
  if (outcome.status === "failed") {
    opts.log.warn({ tier, error: outcome.message }, "Extractor failed without producing frames");
  }
  return frameCount(outcome);
}

export type SceneSearchResult =
  | { found: true; threshold: number; count: number; attempts: ExtractionAttempt[] }
  | { found: false; attempts: ExtractionAttempt[] };

/** Drop unset keys so attempts compare and log cleanly. */
export function compactFilters(filters: FilterOptions): FilterOptions {
  const out: FilterOptions = {};
  if (filters.sceneThreshold !== undefined) out.sceneThreshold = filters.sceneThreshold;
  if (filters.unique) out.unique = true;
  if (filters.fps !== undefined) out.fps = filters.fps;
  if (filters.scale) out.scale = filters.scale;
  return out;
}

/**
 * Try each candidate threshold in order; stop at the first that yields frames.
 */
export async function searchSceneThreshold(
  extractor: FrameExtractor,
  request: Omit<ExtractionRequest, "filters">,
  candidates: readonly number[],
  sizing: Pick<FilterOptions, "fps" | "scale">,
  opts?: Partial<RunOpts>,
): Promise<SceneSearchResult> {
  const run: RunOpts = { log: opts?.log ?? rootLogger, onAttempt: opts?.onAttempt };
  const attempts: ExtractionAttempt[] = [];
  for (const threshold of candidates) {
    const filters = compactFilters({ ...sizing, sceneThreshold: threshold });
    const count = await attempt(extractor, request, "scene-range", filters, attempts, run);
    if (count > 0) return { found: true, threshold, count, attempts };
  }
  return { found: false, attempts };
}

/**
 * Extract with the configured filters, falling back through the tiers until
 * a non-empty frame set exists. Never throws for empty output.
 */
export async function extractWithFallback(
  extractor: FrameExtractor,
  plan: ExtractionPlan,
  opts?: Partial<RunOpts>,
): Promise<SearchResult> {
  const run: RunOpts = { log: opts?.log ?? rootLogger, onAttempt: opts?.onAttempt };
  const attempts: ExtractionAttempt[] = [];
  const sizing = compactFilters({ fps: plan.fps, scale: plan.scale });

  if (plan.scene?.kind === "range") {
    const candidates = sceneCandidatesDesc(plan.scene.lo, plan.scene.hi, plan.sceneStep);
    run.log.info({ candidates }, "Searching scene thresholds (descending)");
    const search = await searchSceneThreshold(extractor, plan.request, candidates, sizing, run);
    attempts.push(...search.attempts);
    if (search.found) {
      return { kind: "extracted", tier: "scene-range", sceneThreshold: search.threshold, count: search.count, attempts };
    }
  } else {
    const sceneThreshold = plan.scene?.kind === "fixed" ? plan.scene.threshold : undefined;
    const filters = compactFilters({ ...sizing, sceneThreshold, unique: plan.unique });
    const count = await attempt(extractor, plan.request, "primary", filters, attempts, run);
    if (count > 0) {
      return sceneThreshold === undefined
        ? { kind: "extracted", tier: "primary", count, attempts }
        : { kind: "extracted", tier: "primary", sceneThreshold, count, attempts };
    }
  }

  run.log.warn("No frames extracted; retrying without scene/unique filters");
  const plainCount = await attempt(extractor, plan.request, "no-filters", sizing, attempts, run);
  if (plainCount > 0) return { kind: "extracted", tier: "no-filters", count: plainCount, attempts };

  run.log.warn("Still no frames; retrying with minimal settings (fps=1, scale=-1:720)");
  const minimalCount = await attempt(extractor, plan.request, "minimal", MINIMAL_FALLBACK_FILTERS, attempts, run);
  if (minimalCount > 0) return { kind: "extracted", tier: "minimal", count: minimalCount, attempts };

  return { kind: "empty", attempts };
}
