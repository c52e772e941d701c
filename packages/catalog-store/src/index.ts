export { Catalog, type CatalogOptions } from "./catalog.js";
export { CatalogController, type CatalogControllerOptions } from "./catalog-controller.js";
export { AsyncCatalogController, type AsyncCatalogControllerOptions, type CloseOptions } from "./async-catalog-controller.js";
export { QueuedOperation, type OperationStatus } from "./queued-operation.js";
export { ServerEntity, ChannelEntity, BotEntity, PackEntity } from "./entities.js";
export {
  IgnoringObserver,
  type CatalogObserver,
  type CatalogEvent,
  type CatalogEventType,
  type Change,
  type IdentityDetails,
  type ServerDetails
} from "./observer.js";
export * from "./errors.js";
export * from "./validation.js";
export { loadConfig, DEFAULT_CLOSE_TIMEOUT_MS, DEFAULT_DB_PATH, type CatalogConfig, type StoreBackend } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export { MemoryStore, MemoryTables } from "./memory-store.js";
export { SqliteStore } from "./sqlite-store.js";
export type * from "./store.js";
export type { Authentication, CatalogServer, CatalogChannel, CatalogBot, CatalogPack } from "@pack-catalog/shared";
