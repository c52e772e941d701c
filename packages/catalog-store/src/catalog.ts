// Entry point: builds the configured storage backend and hands out controllers.

import { AsyncCatalogController } from "./async-catalog-controller.js";
import { CatalogController } from "./catalog-controller.js";
import type { CatalogConfig } from "./config.js";
import { CatalogClosedError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { MemoryStore, MemoryTables } from "./memory-store.js";
import { SqliteStore } from "./sqlite-store.js";
import type { CatalogStore } from "./store.js";

export interface CatalogOptions {
  /** Overrides the logger built from `config.logLevel`. */
  logger?: Logger;
}

/**
 * One catalog per database. Each controller gets its own store: a fresh
 * connection for sqlite, a view on the shared tables for memory. Closing the
 * catalog closes every controller it handed out.
 */
export class Catalog {
  public readonly config: CatalogConfig;
  private readonly logger: Logger;
  private readonly memoryTables: MemoryTables | null;
  private readonly controllers: CatalogController[] = [];
  private open = true;

  private constructor(config: CatalogConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
    this.memoryTables = config.store === "memory" ? new MemoryTables() : null;
  }

  public static open(config: CatalogConfig, options: CatalogOptions = {}): Catalog {
    const logger = options.logger ?? createLogger(config.logLevel);
    const catalog = new Catalog(config, logger);

    logger.info({
      event: "catalog.opened",
      store: config.store,
      dbPath: config.store === "sqlite" ? config.dbPath : undefined,
      logLevel: config.logLevel
    });
    return catalog;
  }

  public createController(): CatalogController {
    this.assertOpen();
    const controller = new CatalogController(this.createStore(), { logger: this.logger });
    this.controllers.push(controller);
    this.logger.debug({ event: "catalog.controller-created", store: this.config.store, controllers: this.controllers.length });
    return controller;
  }

  public createAsyncController(): AsyncCatalogController {
    return new AsyncCatalogController(this.createController(), {
      logger: this.logger,
      closeTimeoutMs: this.config.closeTimeoutMs
    });
  }

  public isOpen(): boolean {
    return this.open;
  }

  /**
   * Closes every controller still open, releasing its store. Later calls on
   * those controllers, or on the entities they returned, throw
   * CatalogClosedError. When a controller's observers fail on the closing
   * notification, the remaining controllers are still closed and the first
   * failure is rethrown.
   */
  public close(): void {
    this.assertOpen();
    this.open = false;

    const active = this.controllers.splice(0).filter((controller) => !controller.isClosed());
    const failures: unknown[] = [];
    for (const controller of active) {
      try {
        controller.close();
      } catch (error) {
        this.logger.error({ event: "catalog.controller-close-failed", err: error });
        failures.push(error);
      }
    }

    this.logger.info({ event: "catalog.closed", store: this.config.store, closedControllers: active.length });
    if (failures.length > 0) {
      throw failures[0];
    }
  }

  private createStore(): CatalogStore {
    if (this.memoryTables) {
      return new MemoryStore(this.memoryTables);
    }
    return new SqliteStore(this.config.dbPath);
  }

  private assertOpen(): void {
    if (!this.open) {
      throw new CatalogClosedError("Catalog has been closed");
    }
  }
}
