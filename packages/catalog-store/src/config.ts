// Environment-driven configuration for a catalog.

import type { LevelWithSilent } from "pino";
import { ValidationError } from "./errors.js";
import { isLogLevel } from "./logger.js";

export type StoreBackend = "memory" | "sqlite";

export interface CatalogConfig {
  logLevel: LevelWithSilent;
  store: StoreBackend;
  /** Only used by the sqlite backend. */
  dbPath: string;
  /** Default drain timeout of AsyncCatalogController.close(), in ms. */
  closeTimeoutMs: number;
}

export const DEFAULT_DB_PATH = "./data/catalog.db";
export const DEFAULT_CLOSE_TIMEOUT_MS = 5_000;

type Environment = Record<string, string | undefined>;

export function loadConfig(env: Environment = process.env): CatalogConfig {
  const logLevel = env.CATALOG_LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ValidationError(`Unknown CATALOG_LOG_LEVEL value: "${logLevel}".`);
  }

  const store = env.CATALOG_STORE ?? "memory";
  if (store !== "memory" && store !== "sqlite") {
    throw new ValidationError(`Unknown CATALOG_STORE value: "${store}". Supported: memory, sqlite.`);
  }

  const rawTimeout = env.CATALOG_CLOSE_TIMEOUT;
  const parsedTimeout = rawTimeout ? Number.parseInt(rawTimeout, 10) : Number.NaN;
  const closeTimeoutMs = Number.isFinite(parsedTimeout) && parsedTimeout >= 0 ? parsedTimeout : DEFAULT_CLOSE_TIMEOUT_MS;

  return {
    logLevel,
    store,
    dbPath: env.CATALOG_DB_PATH ?? DEFAULT_DB_PATH,
    closeTimeoutMs
  };
}
