// In-memory CatalogStore implementation. Data is lost when the process exits.

import { StoreError } from "./errors.js";
import type {
  BotRecord,
  CatalogStore,
  ChannelRecord,
  NewBotRecord,
  NewChannelRecord,
  NewPackRecord,
  NewServerRecord,
  PackRecord,
  PackSearchScope,
  RecordId,
  ServerRecord
} from "./store.js";

interface TableSnapshot {
  nextId: number;
  servers: Map<RecordId, ServerRecord>;
  channels: Map<RecordId, ChannelRecord>;
  bots: Map<RecordId, BotRecord>;
  packs: Map<RecordId, PackRecord>;
}

const copyTable = <T extends { id: RecordId }>(table: Map<RecordId, T>): Map<RecordId, T> => {
  return new Map(Array.from(table.values(), (record) => [record.id, { ...record }]));
};

/**
 * Backing tables of a MemoryStore. Several stores may share one instance so
 * that every controller of an in-memory catalog sees the same data.
 */
export class MemoryTables {
  public nextId = 1;
  public servers = new Map<RecordId, ServerRecord>();
  public channels = new Map<RecordId, ChannelRecord>();
  public bots = new Map<RecordId, BotRecord>();
  public packs = new Map<RecordId, PackRecord>();

  public snapshot(): TableSnapshot {
    return {
      nextId: this.nextId,
      servers: copyTable(this.servers),
      channels: copyTable(this.channels),
      bots: copyTable(this.bots),
      packs: copyTable(this.packs)
    };
  }

  public restore(snapshot: TableSnapshot): void {
    this.nextId = snapshot.nextId;
    this.servers = snapshot.servers;
    this.channels = snapshot.channels;
    this.bots = snapshot.bots;
    this.packs = snapshot.packs;
  }

  public allocateId(): RecordId {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }
}

export class MemoryStore implements CatalogStore {
  private readonly tables: MemoryTables;
  private transactionDepth = 0;
  private closed = false;

  public constructor(tables: MemoryTables = new MemoryTables()) {
    this.tables = tables;
  }

  // ── Servers ──

  public insertServer(server: NewServerRecord): ServerRecord {
    this.assertOpen();
    if (this.findServerByHost(server.host)) {
      throw new StoreError(`Duplicate server host: ${server.host}`);
    }

    const record: ServerRecord = { ...server, id: this.tables.allocateId() };
    this.tables.servers.set(record.id, record);
    return { ...record };
  }

  public getServer(id: RecordId): ServerRecord | null {
    this.assertOpen();
    const record = this.tables.servers.get(id);
    return record ? { ...record } : null;
  }

  public findServerByHost(host: string): ServerRecord | null {
    this.assertOpen();
    const record = this.values(this.tables.servers).find((server) => server.host === host);
    return record ? { ...record } : null;
  }

  public listServers(): ServerRecord[] {
    this.assertOpen();
    return this.values(this.tables.servers).map((server) => ({ ...server }));
  }

  public updateServer(id: RecordId, patch: Partial<NewServerRecord>): void {
    this.assertOpen();
    const existing = this.tables.servers.get(id);
    if (!existing) {
      return;
    }

    if (patch.host !== undefined && patch.host !== existing.host && this.findServerByHost(patch.host)) {
      throw new StoreError(`Duplicate server host: ${patch.host}`);
    }
    this.tables.servers.set(id, { ...existing, ...patch, id });
  }

  public deleteServer(id: RecordId): void {
    this.assertOpen();
    if (this.values(this.tables.channels).some((channel) => channel.serverId === id)) {
      throw new StoreError(`Server ${id} still has channels`);
    }
    this.tables.servers.delete(id);
  }

  // ── Channels ──

  public insertChannel(channel: NewChannelRecord): ChannelRecord {
    this.assertOpen();
    this.assertChannelSlot(channel.serverId, channel.name);

    const record: ChannelRecord = { ...channel, id: this.tables.allocateId() };
    this.tables.channels.set(record.id, record);
    return { ...record };
  }

  public getChannel(id: RecordId): ChannelRecord | null {
    this.assertOpen();
    const record = this.tables.channels.get(id);
    return record ? { ...record } : null;
  }

  public findChannel(serverId: RecordId, name: string): ChannelRecord | null {
    this.assertOpen();
    const record = this.values(this.tables.channels).find(
      (channel) => channel.serverId === serverId && channel.name === name
    );
    return record ? { ...record } : null;
  }

  public listChannels(serverId: RecordId): ChannelRecord[] {
    this.assertOpen();
    return this.values(this.tables.channels)
      .filter((channel) => channel.serverId === serverId)
      .map((channel) => ({ ...channel }));
  }

  public updateChannel(id: RecordId, patch: Partial<NewChannelRecord>): void {
    this.assertOpen();
    const existing = this.tables.channels.get(id);
    if (!existing) {
      return;
    }

    const next: ChannelRecord = { ...existing, ...patch, id };
    if (next.serverId !== existing.serverId || next.name !== existing.name) {
      this.assertChannelSlot(next.serverId, next.name);
    }
    this.tables.channels.set(id, next);
  }

  public deleteChannel(id: RecordId): void {
    this.assertOpen();
    if (this.values(this.tables.bots).some((bot) => bot.channelId === id)) {
      throw new StoreError(`Channel ${id} still has bots`);
    }
    this.tables.channels.delete(id);
  }

  // ── Bots ──

  public insertBot(bot: NewBotRecord): BotRecord {
    this.assertOpen();
    this.assertBotSlot(bot.channelId, bot.name);

    const record: BotRecord = { ...bot, id: this.tables.allocateId() };
    this.tables.bots.set(record.id, record);
    return { ...record };
  }

  public getBot(id: RecordId): BotRecord | null {
    this.assertOpen();
    const record = this.tables.bots.get(id);
    return record ? { ...record } : null;
  }

  public findBot(channelId: RecordId, name: string): BotRecord | null {
    this.assertOpen();
    const record = this.values(this.tables.bots).find((bot) => bot.channelId === channelId && bot.name === name);
    return record ? { ...record } : null;
  }

  public listBots(channelId: RecordId): BotRecord[] {
    this.assertOpen();
    return this.values(this.tables.bots)
      .filter((bot) => bot.channelId === channelId)
      .map((bot) => ({ ...bot }));
  }

  public updateBot(id: RecordId, patch: Partial<NewBotRecord>): void {
    this.assertOpen();
    const existing = this.tables.bots.get(id);
    if (!existing) {
      return;
    }

    const next: BotRecord = { ...existing, ...patch, id };
    if (next.channelId !== existing.channelId || next.name !== existing.name) {
      this.assertBotSlot(next.channelId, next.name);
    }
    this.tables.bots.set(id, next);
  }

  public deleteBot(id: RecordId): void {
    this.assertOpen();
    if (this.values(this.tables.packs).some((pack) => pack.botId === id)) {
      throw new StoreError(`Bot ${id} still has packs`);
    }
    this.tables.bots.delete(id);
  }

  // ── Packs ──

  public insertPack(pack: NewPackRecord): PackRecord {
    this.assertOpen();
    if (!this.tables.bots.has(pack.botId)) {
      throw new StoreError(`Unknown bot: ${pack.botId}`);
    }
    if (this.findPack(pack.botId, pack.number)) {
      throw new StoreError(`Duplicate pack #${pack.number} for bot ${pack.botId}`);
    }

    const record: PackRecord = { ...pack, id: this.tables.allocateId() };
    this.tables.packs.set(record.id, record);
    return { ...record };
  }

  public getPack(id: RecordId): PackRecord | null {
    this.assertOpen();
    const record = this.tables.packs.get(id);
    return record ? { ...record } : null;
  }

  public findPack(botId: RecordId, number: number): PackRecord | null {
    this.assertOpen();
    const record = this.values(this.tables.packs).find((pack) => pack.botId === botId && pack.number === number);
    return record ? { ...record } : null;
  }

  public listPacks(botId: RecordId): PackRecord[] {
    this.assertOpen();
    return this.values(this.tables.packs)
      .filter((pack) => pack.botId === botId)
      .sort((a, b) => a.number - b.number)
      .map((pack) => ({ ...pack }));
  }

  public updatePack(id: RecordId, patch: Partial<NewPackRecord>): void {
    this.assertOpen();
    const existing = this.tables.packs.get(id);
    if (!existing) {
      return;
    }
    this.tables.packs.set(id, { ...existing, ...patch, id });
  }

  public deletePack(id: RecordId): void {
    this.assertOpen();
    this.tables.packs.delete(id);
  }

  public searchPacks(term: string, scope: PackSearchScope): PackRecord[] {
    this.assertOpen();
    const botIds = this.botIdsInScope(scope);

    return this.values(this.tables.packs)
      .filter((pack) => (botIds === null || botIds.has(pack.botId)) && pack.fileName.includes(term))
      .map((pack) => ({ ...pack }));
  }

  // ── Lifecycle ──

  public transaction<T>(work: () => T): T {
    this.assertOpen();
    if (this.transactionDepth > 0) {
      return work();
    }

    const snapshot = this.tables.snapshot();
    this.transactionDepth += 1;
    try {
      return work();
    } catch (error) {
      this.tables.restore(snapshot);
      throw error;
    } finally {
      this.transactionDepth -= 1;
    }
  }

  public close(): void {
    this.assertOpen();
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreError("Memory store has been closed");
    }
  }

  private assertChannelSlot(serverId: RecordId, name: string): void {
    if (!this.tables.servers.has(serverId)) {
      throw new StoreError(`Unknown server: ${serverId}`);
    }
    if (this.findChannel(serverId, name)) {
      throw new StoreError(`Duplicate channel ${name} on server ${serverId}`);
    }
  }

  private assertBotSlot(channelId: RecordId, name: string): void {
    if (!this.tables.channels.has(channelId)) {
      throw new StoreError(`Unknown channel: ${channelId}`);
    }
    if (this.findBot(channelId, name)) {
      throw new StoreError(`Duplicate bot ${name} in channel ${channelId}`);
    }
  }

  private botIdsInScope(scope: PackSearchScope): Set<RecordId> | null {
    if (scope.kind === "all") {
      return null;
    }
    if (scope.kind === "bot") {
      return new Set([scope.botId]);
    }

    let channelIds: Set<RecordId>;
    if (scope.kind === "channel") {
      channelIds = new Set([scope.channelId]);
    } else {
      const { serverId } = scope;
      channelIds = new Set(
        this.values(this.tables.channels)
          .filter((channel) => channel.serverId === serverId)
          .map((channel) => channel.id)
      );
    }

    return new Set(
      this.values(this.tables.bots)
        .filter((bot) => channelIds.has(bot.channelId))
        .map((bot) => bot.id)
    );
  }

  private values<T>(table: Map<RecordId, T>): T[] {
    return Array.from(table.values());
  }
}
