import client from "prom-client";

export type Metrics = {
  register: client.Registry;
  framesExtractedTotal: client.Counter<"format">;
  framesRemovedTotal: client.Counter<"policy">;
  extractionAttemptsTotal: client.Counter<"tier" | "status">;
  videosTotal: client.Counter<"status">;
  videoDurationMs: client.Histogram<"status">;
};

declare global {
  var __vframes_metrics__: Metrics | undefined;
}

/** Build a fresh registry. Tests use this to avoid the shared instance. */
export function createMetrics(): Metrics {
  const register = new client.Registry();

  const framesExtractedTotal = new client.Counter({
    name: "vframes_frames_extracted_total",
    help: "Frames written by the extractor",
    labelNames: ["format"] as const,
    registers: [register],
  });

  const framesRemovedTotal = new client.Counter({
    name: "vframes_frames_removed_total",
    help: "Frames deleted by a dedupe pass",
    labelNames: ["policy"] as const,
    registers: [register],
  });

  const extractionAttemptsTotal = new client.Counter({
    name: "vframes_extraction_attempts_total",
    help: "Extractor invocations by fallback tier and outcome",
    labelNames: ["tier", "status"] as const,
    registers: [register],
  });

  const videosTotal = new client.Counter({
    name: "vframes_videos_total",
    help: "Videos processed",
    labelNames: ["status"] as const,
    registers: [register],
  });

  const videoDurationMs = new client.Histogram({
    name: "vframes_video_duration_ms",
    help: "Wall time per video in ms",
    labelNames: ["status"] as const,
    buckets: [250, 500, 1_000, 2_500, 5_000, 10_000, 30_000, 60_000, 120_000, 300_000, 600_000],
    registers: [register],
  });

  return { register, framesExtractedTotal, framesRemovedTotal, extractionAttemptsTotal, videosTotal, videoDurationMs };
}

export function initMetrics(): Metrics {
  if (globalThis.__vframes_metrics__) return globalThis.__vframes_metrics__;
  const m = createMetrics();
  client.collectDefaultMetrics({ register: m.register });
  globalThis.__vframes_metrics__ = m;
  return m;
}
