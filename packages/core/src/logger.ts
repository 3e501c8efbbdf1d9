import pino from "pino";
import { getVframesDefault } from "./config/defaults";

export type Logger = pino.Logger;

const LEVELS: readonly pino.LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function resolveLevel(raw: string): pino.LevelWithSilent {
  const wanted = raw.trim().toLowerCase();
  return LEVELS.find((l) => l === wanted) ?? "info";
}

// stdout carries command output; logs go to stderr.
export const logger: Logger = pino(
  {
    name: "vframes",
    level: resolveLevel(getVframesDefault("VFRAMES_LOG_LEVEL")),
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination({ fd: 2, sync: true }),
);

export function setLogLevel(level: string): void {
  logger.level = resolveLevel(level);
}
