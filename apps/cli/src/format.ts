import path from "node:path";
import type { BatchReport, VideoReport } from "@vframes/core";

const VIDEO_NAME_WIDTH = 40;

export function formatMs(ms: number): string {
  const total = Math.max(0, Math.floor(ms));
  const s = Math.floor(total / 1000);
  const h = Math.floor(s / 3600);
  const m = Math.floor((s % 3600) / 60);
  const ss = s % 60;
  if (h > 0) return `${h}:${String(m).padStart(2, "0")}:${String(ss).padStart(2, "0")}`;
  return `${m}:${String(ss).padStart(2, "0")}`;
}

function videoName(input: string): string {
  const name = path.basename(input);
  if (name.length <= VIDEO_NAME_WIDTH) return name;
  return name.slice(0, VIDEO_NAME_WIDTH - 3) + "...";
}

type Column = { title: string; cell: (v: VideoReport) => string };

const COLUMNS: readonly Column[] = [
  { title: "video", cell: (v) => videoName(v.input) },
  { title: "status", cell: (v) => v.status },
  { title: "frames", cell: (v) => String(v.finalCount) },
  { title: "extracted", cell: (v) => String(v.extracted) },
  { title: "tier", cell: (v) => v.tier ?? "-" },
  { title: "scene", cell: (v) => (v.sceneThreshold === undefined ? "-" : String(v.sceneThreshold)) },
  { title: "removed", cell: (v) => (v.dedupe ? `${v.dedupe.removed} (${v.dedupe.policy})` : "-") },
  { title: "time", cell: (v) => formatMs(v.durationMs) },
  { title: "output", cell: (v) => v.outputDir ?? "-" },
];

/**
 * Batch summary for the terminal: one aligned row per video, then the
 * error of every video that has one, then the success count.
 */
export function renderBatch(batch: BatchReport): string[] {
  const rows = batch.videos.map((v) => COLUMNS.map((c) => c.cell(v)));
  const widths = COLUMNS.map((c, i) => rows.reduce((w, row) => Math.max(w, row[i].length), c.title.length));
  const line = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i])).join("  ").trimEnd();

  const lines: string[] = [];
  if (rows.length > 0) {
    lines.push(line(COLUMNS.map((c) => c.title)));
    lines.push(line(widths.map((w) => "-".repeat(w))));
    for (const row of rows) lines.push(line(row));
  }
  for (const v of batch.videos) {
    if (v.error) lines.push(`${videoName(v.input)}: ${v.error}`);
  }
  if (lines.length > 0) lines.push("");
  lines.push(`${batch.succeeded}/${batch.videos.length} videos produced frames`);
  return lines;
}
