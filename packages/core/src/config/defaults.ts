import fs from "node:fs";
import path from "node:path";

const BASE_DEFAULTS = {
  VFRAMES_FFMPEG_BIN: "ffmpeg",
  VFRAMES_OXIPNG_BIN: "oxipng",
  FFMPEG_LOGLEVEL: "error",
  VFRAMES_LOG_LEVEL: "info",
} as const;

export type VframesDefaultKey = keyof typeof BASE_DEFAULTS;

type ResolvedDefaults = Record<VframesDefaultKey, string>;

function clean(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function parseDotEnv(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    const m = line.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let value = m[2] ?? "";
    if (
      (value.startsWith('"') && value.endsWith('"') && value.length >= 2) ||
      (value.startsWith("'") && value.endsWith("'") && value.length >= 2)
    ) {
      value = value.slice(1, -1);
    }
    out[key] = value;
  }
  return out;
}

// Directories searched from the start dir upward, the start dir included.
const FIND_UP_DEPTH = 8;

function findUp(startDir: string, fileName: string): string | null {
  let dir = startDir;
  for (let i = 0; i < FIND_UP_DEPTH; i++) {
    const candidate = path.join(dir, fileName);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

function readDotEnvFile(startDir: string, fileName: string): Record<string, string> {
  const file = findUp(startDir, fileName);
  if (!file) return {};
  try {
    return parseDotEnv(fs.readFileSync(file, "utf8"));
  } catch {
    // An unreadable .env behaves like a missing one.
    return {};
  }
}

/**
 * Resolve defaults in order: process env, `.env`, `.env.example`, built-ins.
 * Both files are looked up from `cwd` towards the filesystem root.
 */
export function resolveVframesDefaults(opts?: {
  cwd?: string;
  env?: Record<string, string | undefined>;
}): ResolvedDefaults {
  const cwd = opts?.cwd ?? process.cwd();
  const env = opts?.env ?? process.env;
  const envExample = readDotEnvFile(cwd, ".env.example");
  const envLocal = readDotEnvFile(cwd, ".env");

  const pick = (key: VframesDefaultKey): string =>
    clean(env[key]) || clean(envLocal[key]) || clean(envExample[key]) || BASE_DEFAULTS[key];

  return {
    VFRAMES_FFMPEG_BIN: pick("VFRAMES_FFMPEG_BIN"),
    VFRAMES_OXIPNG_BIN: pick("VFRAMES_OXIPNG_BIN"),
    FFMPEG_LOGLEVEL: pick("FFMPEG_LOGLEVEL"),
    VFRAMES_LOG_LEVEL: pick("VFRAMES_LOG_LEVEL"),
  };
}

let cachedDefaults: ResolvedDefaults | null = null;

export function getVframesDefault(key: VframesDefaultKey): string {
  if (!cachedDefaults) cachedDefaults = resolveVframesDefaults();
  return cachedDefaults[key];
}
