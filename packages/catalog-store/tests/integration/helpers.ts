// Test helpers: store fixtures for both backends and an observer that records every call.

import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import pino from "pino";
import { MemoryStore, MemoryTables } from "../../src/memory-store.js";
import { SqliteStore } from "../../src/sqlite-store.js";
import type { CatalogStore } from "../../src/store.js";
import type { CatalogObserver, Change, IdentityDetails, ServerDetails } from "../../src/observer.js";

export const silentLogger = pino({ level: "silent" });

export type StoreKind = "memory" | "sqlite";

export interface StoreFixture {
  /** Every store created by one fixture sees the same data. */
  createStore: () => CatalogStore;
  cleanup: () => void;
}

export function createStoreFixture(kind: StoreKind): StoreFixture {
  if (kind === "memory") {
    const tables = new MemoryTables();
    return {
      createStore: () => new MemoryStore(tables),
      cleanup: () => undefined
    };
  }

  const tmpDir = mkdtempSync(join(tmpdir(), "catalog-test-"));
  const dbPath = join(tmpDir, "catalog.db");
  return {
    createStore: () => new SqliteStore(dbPath),
    cleanup: () => rmSync(tmpDir, { recursive: true, force: true })
  };
}

export interface ObserverCall {
  method: keyof CatalogObserver;
  args: unknown[];
}

export class RecordingObserver implements CatalogObserver {
  public readonly calls: ObserverCall[] = [];

  public get methods(): string[] {
    return this.calls.map((call) => call.method);
  }

  public serverAdded(server: ServerDetails): void {
    this.record("serverAdded", server);
  }

  public channelAdded(host: string, channel: string, password: string | null): void {
    this.record("channelAdded", host, channel, password);
  }

  public botAdded(host: string, channel: string, bot: string, listEnabled: boolean): void {
    this.record("botAdded", host, channel, bot, listEnabled);
  }

  public packAdded(host: string, channel: string, bot: string, number: number, fileName: string, fileSize: string): void {
    this.record("packAdded", host, channel, bot, number, fileName, fileSize);
  }

  public packUpdated(
    host: string,
    channel: string,
    bot: string,
    number: number,
    fileName: Change<string>,
    fileSize: Change<string>
  ): void {
    this.record("packUpdated", host, channel, bot, number, fileName, fileSize);
  }

  public serverIdentityChanged(host: string, identity: Change<IdentityDetails>): void {
    this.record("serverIdentityChanged", host, identity);
  }

  public serverPortChanged(host: string, port: Change<number>): void {
    this.record("serverPortChanged", host, port);
  }

  public serverPasswordChanged(host: string, password: Change<string | null>): void {
    this.record("serverPasswordChanged", host, password);
  }

  public channelPasswordChanged(host: string, channel: string, password: Change<string | null>): void {
    this.record("channelPasswordChanged", host, channel, password);
  }

  public botListFlagChanged(host: string, channel: string, bot: string, listEnabled: Change<boolean>): void {
    this.record("botListFlagChanged", host, channel, bot, listEnabled);
  }

  public botMoved(host: string, oldChannel: string, newChannel: string, bot: string): void {
    this.record("botMoved", host, oldChannel, newChannel, bot);
  }

  public serverDeleted(server: ServerDetails): void {
    this.record("serverDeleted", server);
  }

  public channelDeleted(host: string, channel: string, password: string | null): void {
    this.record("channelDeleted", host, channel, password);
  }

  public botDeleted(host: string, channel: string, bot: string, listEnabled: boolean): void {
    this.record("botDeleted", host, channel, bot, listEnabled);
  }

  public packDeleted(host: string, channel: string, bot: string, number: number, fileName: string, fileSize: string): void {
    this.record("packDeleted", host, channel, bot, number, fileName, fileSize);
  }

  public flushed(): void {
    this.record("flushed");
  }

  public closed(): void {
    this.record("closed");
  }

  private record(method: keyof CatalogObserver, ...args: unknown[]): void {
    this.calls.push({ method, args });
  }
}

/** Blocks the thread; stands in for a slow observer or a slow disk. */
export function busyWait(ms: number): void {
  const until = Date.now() + ms;
  while (Date.now() < until) {
    // spin
  }
}
