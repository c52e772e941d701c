// Shared pino setup. Controllers derive child loggers tagged with their component.

import pino, { type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export const LOG_LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export const isLogLevel = (value: string): value is LevelWithSilent => {
  return LOG_LEVELS.some((level) => level === value);
};

export const createLogger = (level: LevelWithSilent = "info"): Logger => {
  return pino({ level, base: { service: "pack-catalog" } });
};
