// CatalogStore abstraction layer for persistence.
// Implementations: MemoryStore (default), SqliteStore.
//
// Records live in four tables addressed by opaque numeric ids. Parents are
// referenced by id only; the controller resolves relations through the
// lookups below and performs cascading deletes itself.

import type { Authentication } from "@pack-catalog/shared";

export type RecordId = number;

export interface ServerRecord {
  id: RecordId;
  host: string;
  port: number;
  nickName: string;
  userName: string;
  realName: string;
  authentication: Authentication;
  userPassword: string | null;
  password: string | null;
}

export interface ChannelRecord {
  id: RecordId;
  serverId: RecordId;
  name: string;
  password: string | null;
}

export interface BotRecord {
  id: RecordId;
  channelId: RecordId;
  name: string;
  listEnabled: boolean;
}

export interface PackRecord {
  id: RecordId;
  botId: RecordId;
  number: number;
  fileName: string;
  fileSize: string;
}

export type NewServerRecord = Omit<ServerRecord, "id">;
export type NewChannelRecord = Omit<ChannelRecord, "id">;
export type NewBotRecord = Omit<BotRecord, "id">;
export type NewPackRecord = Omit<PackRecord, "id">;

/** Restricts a pack search to the descendants of one server, channel or bot. */
export type PackSearchScope =
  | { kind: "all" }
  | { kind: "server"; serverId: RecordId }
  | { kind: "channel"; channelId: RecordId }
  | { kind: "bot"; botId: RecordId };

export interface CatalogStore {
  insertServer(server: NewServerRecord): ServerRecord;
  getServer(id: RecordId): ServerRecord | null;
  findServerByHost(host: string): ServerRecord | null;
  listServers(): ServerRecord[];
  updateServer(id: RecordId, patch: Partial<NewServerRecord>): void;
  deleteServer(id: RecordId): void;

  insertChannel(channel: NewChannelRecord): ChannelRecord;
  getChannel(id: RecordId): ChannelRecord | null;
  findChannel(serverId: RecordId, name: string): ChannelRecord | null;
  listChannels(serverId: RecordId): ChannelRecord[];
  updateChannel(id: RecordId, patch: Partial<NewChannelRecord>): void;
  deleteChannel(id: RecordId): void;

  insertBot(bot: NewBotRecord): BotRecord;
  getBot(id: RecordId): BotRecord | null;
  findBot(channelId: RecordId, name: string): BotRecord | null;
  listBots(channelId: RecordId): BotRecord[];
  updateBot(id: RecordId, patch: Partial<NewBotRecord>): void;
  deleteBot(id: RecordId): void;

  insertPack(pack: NewPackRecord): PackRecord;
  getPack(id: RecordId): PackRecord | null;
  findPack(botId: RecordId, number: number): PackRecord | null;
  /** Ordered by pack number. */
  listPacks(botId: RecordId): PackRecord[];
  updatePack(id: RecordId, patch: Partial<NewPackRecord>): void;
  deletePack(id: RecordId): void;

  /** Case-sensitive substring match on file names. */
  searchPacks(term: string, scope: PackSearchScope): PackRecord[];

  /**
   * Runs `work` atomically. Nested calls join the outermost transaction; a
   * throw rolls everything back and is rethrown.
   */
  transaction<T>(work: () => T): T;

  close(): void;
}
