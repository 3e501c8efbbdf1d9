import { execFile } from "child_process";
import os from "os";
import { promisify } from "util";
import { getVframesDefault } from "../config/defaults";
import { errorMessage } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";
import { isToolAvailable } from "./extract";

const execFileAsync = promisify(execFile);

export interface OptimizeResult {
  attempted: number;
  optimized: number;
  failed: number;
  /** Set when the pass did not run at all */
  skippedReason?: string;
}

/** Lossless in-place PNG recompression. Never throws for per-file failures. */
export interface PngOptimizer {
  optimize(files: readonly string[]): Promise<OptimizeResult>;
}

export interface OxipngOptimizerOpts {
  binary?: string;
  /** Parallel oxipng processes (default: available CPU cores) */
  concurrency?: number;
  timeoutMs?: number;
  log?: Logger;
}

/**
 * Runs `oxipng -o 3 --strip safe --quiet <file>` per frame, in batches of
 * `concurrency` child processes. Each process owns a distinct file.
 */
export class OxipngOptimizer implements PngOptimizer {
  private readonly binary: string;
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private available: boolean | null = null;

  constructor(opts: OxipngOptimizerOpts = {}) {
    this.binary = opts.binary ?? getVframesDefault("VFRAMES_OXIPNG_BIN");
    this.concurrency = Math.max(1, Math.floor(opts.concurrency ?? os.availableParallelism()));
    this.timeoutMs = opts.timeoutMs ?? 120_000;
    this.log = opts.log ?? rootLogger;
  }

  async optimize(files: readonly string[]): Promise<OptimizeResult> {
    if (files.length === 0) return { attempted: 0, optimized: 0, failed: 0 };

    if (this.available === null) this.available = await isToolAvailable(this.binary, ["--version"]);
    if (!this.available) {
      this.log.warn({ binary: this.binary }, "oxipng not found; skipping PNG optimisation");
      return { attempted: 0, optimized: 0, failed: 0, skippedReason: `${this.binary} not found` };
    }

    let optimized = 0;
    let failed = 0;
    for (let i = 0; i < files.length; i += this.concurrency) {
      const batch = files.slice(i, i + this.concurrency);
      const results = await Promise.allSettled(
        batch.map((file) =>
          execFileAsync(this.binary, ["-o", "3", "--strip", "safe", "--quiet", file], { timeout: this.timeoutMs }),
        ),
      );
      results.forEach((r, j) => {
        if (r.status === "fulfilled") {
          optimized++;
          return;
        }
        failed++;
        this.log.warn({ file: batch[j], error: errorMessage(r.reason) }, "oxipng failed; keeping original");
      });
    }

    return { attempted: files.length, optimized, failed };
  }
}
