/**
 * Frame deduplication policies.
 *
 * Each policy has a pure selection step over an ordered frame list and a
 * caller-supplied fingerprint/digest function, returning what to keep and what
 * to remove. `dedupeFrames` lists a video's frames from a FrameStore, runs the
 * selected policy and deletes the removed frames.
 *
 * - exact: one survivor per SHA-256 digest
 * - phash / aggressive: sequential, a frame is dropped at the first kept frame
 *   (insertion order) within `threshold` bits
 * - diverse: a frame is kept only if its minimum distance to every kept frame
 *   is at least `minDistance` bits
 */

import type { DedupePolicy, DedupePolicyKind, FrameFormat } from "@vframes/contracts";
import { DecodeError } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";
import { digestFile } from "./digest";
import { computePerceptualHash, hammingDistance, type Fingerprint, type FingerprintFn } from "./hash";
import type { Frame, FrameStore } from "./storage";

export interface KeptEntry<T> {
  frame: T;
  fingerprint: Fingerprint;
}

export interface DistanceHit<T> {
  entry: KeptEntry<T>;
  distance: number;
}

export interface NearDuplicateRemoval<T> {
  frame: T;
  /** First kept frame found within the threshold (not necessarily the closest) */
  matchedWith: T;
  distance: number;
}

export interface DiversityRemoval<T> {
  frame: T;
  nearest: T;
  minDistance: number;
}

export interface ExactRemoval<T> {
  frame: T;
  duplicateOf: T;
  digest: string;
}

export interface Selection<T, R> {
  kept: T[];
  removed: R[];
  /** Frames whose fingerprint could not be computed; left in place */
  skipped: T[];
}

/**
 * First kept entry, in insertion order, within `threshold` of `fp`.
 */
export function findFirstWithin<T>(
  kept: readonly KeptEntry<T>[],
  fp: Fingerprint,
  threshold: number,
): DistanceHit<T> | null {
  for (const entry of kept) {
    const distance = hammingDistance(fp, entry.fingerprint);
    if (distance <= threshold) return { entry, distance };
  }
  return null;
}

/** Nearest kept entry; ties go to the earliest. Null when nothing is kept. */
export function findNearest<T>(kept: readonly KeptEntry<T>[], fp: Fingerprint): DistanceHit<T> | null {
  let best: DistanceHit<T> | null = null;
  for (const entry of kept) {
    const distance = hammingDistance(fp, entry.fingerprint);
    if (!best || distance < best.distance) best = { entry, distance };
  }
  return best;
}

async function tryFingerprint<T>(fingerprintOf: FingerprintFn<T>, frame: T): Promise<Fingerprint | null> {
  try {
    return await fingerprintOf(frame);
  } catch (err) {
    if (err instanceof DecodeError) return null;
    throw err;
  }
}

/**
 * Sequential near-duplicate pass. Frames must be in chronological order.
 */
export async function selectNearDuplicates<T>(
  frames: readonly T[],
  fingerprintOf: FingerprintFn<T>,
  threshold: number,
): Promise<Selection<T, NearDuplicateRemoval<T>>> {
  const kept: KeptEntry<T>[] = [];
  const removed: NearDuplicateRemoval<T>[] = [];
  const skipped: T[] = [];

  for (const frame of frames) {
    const fingerprint = await tryFingerprint(fingerprintOf, frame);
    if (!fingerprint) {
      skipped.push(frame);
      continue;
    }

    const hit = findFirstWithin(kept, fingerprint, threshold);
    if (hit) {
      removed.push({ frame, matchedWith: hit.entry.frame, distance: hit.distance });
    } else {
      kept.push({ frame, fingerprint });
    }
  }

  return { kept: kept.map((e) => e.frame), removed, skipped };
}

/**
 * Diversity pass: keep a frame only when it is at least `minDistance` away
 * from every frame kept so far. The first hashable frame is always kept.
 */
export async function selectDiverse<T>(
  frames: readonly T[],
  fingerprintOf: FingerprintFn<T>,
  minDistance: number,
): Promise<Selection<T, DiversityRemoval<T>>> {
  const kept: KeptEntry<T>[] = [];
  const removed: DiversityRemoval<T>[] = [];
  const skipped: T[] = [];

  for (const frame of frames) {
    const fingerprint = await tryFingerprint(fingerprintOf, frame);
    if (!fingerprint) {
      skipped.push(frame);
      continue;
    }

    const nearest = findNearest(kept, fingerprint);
    if (!nearest || nearest.distance >= minDistance) {
      kept.push({ frame, fingerprint });
    } else {
      removed.push({ frame, nearest: nearest.entry.frame, minDistance: nearest.distance });
    }
  }

  return { kept: kept.map((e) => e.frame), removed, skipped };
}

/**
 * Exact pass: group by digest, keep the earliest frame of each group.
 * Digest failures propagate.
 */
export async function selectExactDuplicates<T>(
  frames: readonly T[],
  digestOf: (frame: T) => Promise<string>,
): Promise<Selection<T, ExactRemoval<T>>> {
  const entries: Array<{ frame: T; digest: string; order: number }> = [];
  for (let i = 0; i < frames.length; i++) {
    entries.push({ frame: frames[i], digest: await digestOf(frames[i]), order: i });
  }

  // Sorting by digest puts duplicates next to each other.
  const sorted = [...entries].sort((a, b) =>
    a.digest < b.digest ? -1 : a.digest > b.digest ? 1 : a.order - b.order,
  );

  const keptOrders = new Set<number>();
  const removed: ExactRemoval<T>[] = [];
  let groupHead: (typeof entries)[number] | null = null;
  for (const entry of sorted) {
    if (groupHead && groupHead.digest === entry.digest) {
      removed.push({ frame: entry.frame, duplicateOf: groupHead.frame, digest: entry.digest });
      continue;
    }
    groupHead = entry;
    keptOrders.add(entry.order);
  }

  return {
    kept: entries.filter((e) => keptOrders.has(e.order)).map((e) => e.frame),
    removed,
    skipped: [],
  };
}

export interface DedupeReport {
  policy: DedupePolicyKind;
  considered: number;
  kept: number;
  removed: number;
  skipped: number;
  /** Threshold (phash/aggressive) or minimum distance (diverse); null for exact */
  effectiveThreshold: number | null;
}

export interface DedupeFramesOpts {
  store: FrameStore;
  prefix: string;
  ext: FrameFormat;
  policy: DedupePolicy;
  fingerprintOf?: FingerprintFn<Frame>;
  digestOf?: (frame: Frame) => Promise<string>;
  log?: Logger;
}

interface PlannedRemoval {
  frame: Frame;
  fields: Record<string, unknown>;
  message: string;
}

async function planRemovals(
  frames: readonly Frame[],
  policy: DedupePolicy,
  fingerprintOf: FingerprintFn<Frame>,
  digestOf: (frame: Frame) => Promise<string>,
): Promise<{ kept: number; skipped: number; removals: PlannedRemoval[] }> {
  switch (policy.kind) {
    case "exact": {
      const sel = await selectExactDuplicates(frames, digestOf);
      return {
        kept: sel.kept.length,
        skipped: 0,
        removals: sel.removed.map((r) => ({
          frame: r.frame,
          fields: { duplicateOf: r.duplicateOf.fileName, digest: r.digest },
          message: "Removing exact duplicate",
        })),
      };
    }
    case "phash":
    case "aggressive": {
      const sel = await selectNearDuplicates(frames, fingerprintOf, policy.threshold);
      return {
        kept: sel.kept.length,
        skipped: sel.skipped.length,
        removals: sel.removed.map((r) => ({
          frame: r.frame,
          fields: { matchedWith: r.matchedWith.fileName, distance: r.distance },
          message: "Removing near-duplicate",
        })),
      };
    }
    case "diverse": {
      const sel = await selectDiverse(frames, fingerprintOf, policy.minDistance);
      return {
        kept: sel.kept.length,
        skipped: sel.skipped.length,
        removals: sel.removed.map((r) => ({
          frame: r.frame,
          fields: { nearest: r.nearest.fileName, minDistance: r.minDistance },
          message: "Removing low-diversity frame",
        })),
      };
    }
    default: {
      const unknownPolicy: never = policy;
      throw new Error(`Unknown dedupe policy: ${JSON.stringify(unknownPolicy)}`);
    }
  }
}

function effectiveThreshold(policy: DedupePolicy): number | null {
  switch (policy.kind) {
    case "exact":
      return null;
    case "phash":
    case "aggressive":
      return policy.threshold;
    case "diverse":
      return policy.minDistance;
  }
}

/**
 * Run one dedupe pass over a video's frames and delete the redundant ones.
 * A delete failure aborts the pass with FrameIOError; frames already deleted
 * stay deleted.
 */
export async function dedupeFrames(opts: DedupeFramesOpts): Promise<DedupeReport> {
  const log = opts.log ?? rootLogger;
  const fingerprintOf = opts.fingerprintOf ?? ((frame: Frame) => computePerceptualHash(frame.filePath));
  const digestOf = opts.digestOf ?? ((frame: Frame) => digestFile(frame.filePath));

  const frames = await opts.store.list(opts.prefix, opts.ext);
  const plan = await planRemovals(frames, opts.policy, fingerprintOf, digestOf);

  for (const removal of plan.removals) {
    log.debug({ frame: removal.frame.fileName, ...removal.fields }, removal.message);
    await opts.store.remove(removal.frame);
  }

  const report: DedupeReport = {
    policy: opts.policy.kind,
    considered: frames.length,
    kept: plan.kept,
    removed: plan.removals.length,
    skipped: plan.skipped,
    effectiveThreshold: effectiveThreshold(opts.policy),
  };
  log.info({ dir: opts.store.dir, prefix: opts.prefix, ...report }, "Dedupe pass complete");
  return report;
}
