import fs from "fs/promises";
import path from "path";
import type { FrameFormat } from "@vframes/contracts";
import { errnoCode, FrameIOError } from "../errors";

export interface Frame {
  filePath: string;
  fileName: string;
  /** Sequence number from the file name (1-based, as written by the extractor) */
  index: number;
}

export interface FrameStore {
  readonly dir: string;
  /** Frames matching `{prefix}<digits>.{ext}`, in file-name order */
  list(prefix: string, ext: FrameFormat): Promise<Frame[]>;
  /** Returns false when the frame was already gone */
  remove(frame: Frame): Promise<boolean>;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Matches only `{prefix}<digits>.{ext}`, so a prefix never captures another
 * video's frames in a shared (flat) directory.
 */
export function framePattern(prefix: string, ext: FrameFormat): RegExp {
  return new RegExp(`^${escapeRegExp(prefix)}(\\d+)\\.${escapeRegExp(ext)}$`);
}

export function frameFileName(prefix: string, index: number, ext: FrameFormat): string {
  return `${prefix}${String(index).padStart(6, "0")}.${ext}`;
}

function byFileName(a: Frame, b: Frame): number {
  if (a.fileName < b.fileName) return -1;
  if (a.fileName > b.fileName) return 1;
  return 0;
}

export class LocalFrameStore implements FrameStore {
  constructor(readonly dir: string) {}

  async list(prefix: string, ext: FrameFormat): Promise<Frame[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return [];
      throw new FrameIOError(this.dir, "list", { cause: err });
    }

    const re = framePattern(prefix, ext);
    const frames: Frame[] = [];
    for (const fileName of names) {
      const m = re.exec(fileName);
      if (!m) continue;
      frames.push({ filePath: path.join(this.dir, fileName), fileName, index: Number(m[1]) });
    }
    return frames.sort(byFileName);
  }

  async remove(frame: Frame): Promise<boolean> {
    try {
      await fs.unlink(frame.filePath);
      return true;
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return false;
      throw new FrameIOError(frame.filePath, "delete", { cause: err });
    }
  }
}

export async function countFrames(dir: string, prefix: string, ext: FrameFormat): Promise<number> {
  const frames = await new LocalFrameStore(dir).list(prefix, ext);
  return frames.length;
}
