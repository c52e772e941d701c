// Synchronous, transactional access to the server > channel > bot > pack catalog.

import {
  CatalogClosedError,
  CatalogReentrancyError,
  ObserverError,
  ObserverRegistrationError,
  PreconditionError
} from "./errors.js";
import { BotEntity, ChannelEntity, PackEntity, ServerEntity, type EntitySource } from "./entities.js";
import { createLogger, type Logger } from "./logger.js";
import { dispatchEvent, type CatalogEvent, type CatalogObserver, type ServerDetails } from "./observer.js";
import type {
  BotRecord,
  CatalogStore,
  ChannelRecord,
  PackRecord,
  PackSearchScope,
  ServerRecord
} from "./store.js";
import {
  checkChannelName,
  checkFileName,
  checkHost,
  checkIdentity,
  checkNickname,
  checkPackNumber,
  checkPort,
  checkSearchTerm,
  checkServerSpec,
  type ServerIdentity,
  type ServerSpec
} from "./validation.js";

export interface CatalogControllerOptions {
  logger?: Logger;
}

const toServerDetails = (record: ServerRecord): ServerDetails => ({
  host: record.host,
  port: record.port,
  nickName: record.nickName,
  userName: record.userName,
  realName: record.realName,
  authentication: record.authentication,
  userPassword: record.userPassword,
  password: record.password
});

/**
 * Owns a store and its transaction boundary. Every public operation is
 * mutually exclusive with every other one on the same instance, including the
 * observer notifications it fires after committing. A call made from inside an
 * observer callback fails with CatalogReentrancyError.
 *
 * Entities returned by the controller read through it and stop working once
 * it has been closed.
 */
export class CatalogController {
  private readonly store: CatalogStore;
  private readonly logger: Logger;
  private readonly observers = new Set<CatalogObserver>();
  private readonly entities: EntitySource;
  private activeOperation: string | null = null;
  private closed = false;

  public constructor(store: CatalogStore, options: CatalogControllerOptions = {}) {
    this.store = store;
    this.logger = (options.logger ?? createLogger()).child({ component: "catalog" });
    this.entities = {
      read: (work) => {
        this.assertOpen();
        return work(this.store);
      }
    };
    this.logger.debug({ event: "controller.created" });
  }

  // ── Observers ──

  public addObserver(observer: CatalogObserver): void {
    this.exclusive("addObserver", () => {
      if (this.observers.has(observer)) {
        throw new ObserverRegistrationError("Cannot add the same observer twice");
      }
      this.observers.add(observer);
      this.logger.debug({ event: "observer.added", observers: this.observers.size });
    });
  }

  public removeObserver(observer: CatalogObserver): void {
    this.exclusive("removeObserver", () => {
      if (!this.observers.delete(observer)) {
        throw new ObserverRegistrationError("Cannot remove an observer that is not registered");
      }
      this.logger.debug({ event: "observer.removed", observers: this.observers.size });
    });
  }

  // ── Create ──

  /** `userName` and `realName` default to the nickname. */
  public addServer(spec: ServerSpec): void {
    this.exclusive("addServer", () => {
      const server = checkServerSpec(spec);

      this.commit((events) => {
        if (this.store.findServerByHost(server.host)) {
          throw new PreconditionError(`The server ${server.host} is already known`);
        }

        const record = this.store.insertServer(server);
        events.push({ type: "server-added", server: toServerDetails(record) });
      });

      this.logger.info({ event: "server.added", host: server.host, port: server.port });
    });
  }

  public addChannel(host: string, name: string, password: string | null = null): void {
    this.exclusive("addChannel", () => {
      const normalizedHost = checkHost(host);
      checkChannelName(name);

      this.commit((events) => {
        const server = this.store.findServerByHost(normalizedHost);
        if (!server) {
          throw new PreconditionError(`The server ${normalizedHost} must be added before the channel ${name}`);
        }
        if (this.store.findChannel(server.id, name)) {
          throw new PreconditionError(`The channel ${name} already exists on ${normalizedHost}`);
        }

        this.store.insertChannel({ serverId: server.id, name, password });
        events.push({ type: "channel-added", host: normalizedHost, channel: name, password });
      });

      this.logger.info({ event: "channel.added", host: normalizedHost, channel: name });
    });
  }

  public addBot(host: string, channel: string, name: string, listEnabled: boolean): void {
    this.exclusive("addBot", () => {
      const normalizedHost = checkHost(host);
      checkChannelName(channel);
      checkNickname(name);

      this.commit((events) => {
        const channelRecord = this.locateChannel(normalizedHost, channel);
        if (!channelRecord) {
          throw new PreconditionError(
            `The server ${normalizedHost} and the channel ${channel} must be added before the bot ${name}`
          );
        }

        this.insertBot(events, normalizedHost, channelRecord, name, listEnabled);
      });

      this.logger.info({ event: "bot.added", host: normalizedHost, channel, bot: name, listEnabled });
    });
  }

  /**
   * Overwrites file name and size of an existing pack, or creates the pack.
   * A missing bot is created (list-disabled) when `introduceBot` is set.
   */
  public updateOrAddPack(
    host: string,
    channel: string,
    bot: string,
    number: number,
    fileName: string,
    fileSize: string,
    introduceBot: boolean
  ): void {
    this.exclusive("updateOrAddPack", () => {
      const normalizedHost = checkHost(host);
      checkChannelName(channel);
      checkNickname(bot);
      checkPackNumber(number);
      checkFileName(fileName);

      const outcome = this.commit((events) => {
        let botRecord = this.locateBot(normalizedHost, channel, bot);
        const existing = botRecord ? this.store.findPack(botRecord.id, number) : null;

        if (existing) {
          this.store.updatePack(existing.id, { fileName, fileSize });
          events.push({
            type: "pack-updated",
            host: normalizedHost,
            channel,
            bot,
            number,
            fileName: { oldValue: existing.fileName, newValue: fileName },
            fileSize: { oldValue: existing.fileSize, newValue: fileSize }
          });
          return "updated";
        }

        if (!botRecord) {
          if (!introduceBot) {
            throw new PreconditionError(`Cannot add a pack to a bot that does not exist: ${bot}`);
          }

          const channelRecord = this.locateChannel(normalizedHost, channel);
          if (!channelRecord) {
            throw new PreconditionError(
              `The server ${normalizedHost} and the channel ${channel} must be added before the bot ${bot}`
            );
          }
          botRecord = this.insertBot(events, normalizedHost, channelRecord, bot, false);
        }

        this.store.insertPack({ botId: botRecord.id, number, fileName, fileSize });
        events.push({ type: "pack-added", host: normalizedHost, channel, bot, number, fileName, fileSize });
        return "added";
      });

      this.logger.info({ event: `pack.${outcome}`, host: normalizedHost, channel, bot, number, fileName, fileSize });
    });
  }

  // ── Read ──

  public getServer(host: string): ServerEntity | null {
    return this.exclusive("getServer", () => {
      const record = this.store.findServerByHost(checkHost(host));
      return record ? new ServerEntity(this.entities, record) : null;
    });
  }

  public getChannel(host: string, channel: string): ChannelEntity | null {
    return this.exclusive("getChannel", () => {
      const normalizedHost = checkHost(host);
      checkChannelName(channel);

      const record = this.locateChannel(normalizedHost, channel);
      return record ? new ChannelEntity(this.entities, record) : null;
    });
  }

  public getBot(host: string, channel: string, bot: string): BotEntity | null {
    return this.exclusive("getBot", () => {
      const normalizedHost = checkHost(host);
      checkChannelName(channel);
      checkNickname(bot);

      const record = this.locateBot(normalizedHost, channel, bot);
      return record ? new BotEntity(this.entities, record) : null;
    });
  }

  public getPack(host: string, channel: string, bot: string, number: number): PackEntity | null {
    return this.exclusive("getPack", () => {
      const normalizedHost = checkHost(host);
      checkChannelName(channel);
      checkNickname(bot);
      checkPackNumber(number);

      const botRecord = this.locateBot(normalizedHost, channel, bot);
      const record = botRecord ? this.store.findPack(botRecord.id, number) : null;
      return record ? new PackEntity(this.entities, record) : null;
    });
  }

  public getServerList(): ServerEntity[] {
    return this.exclusive("getServerList", () => {
      const servers = this.store.listServers().map((record) => new ServerEntity(this.entities, record));
      this.logger.debug({ event: "servers.listed", count: servers.length });
      return servers;
    });
  }

  // ── Search ──

  /** Packs whose file name contains `term` (case-sensitive). */
  public findPack(term: string): PackEntity[] {
    return this.exclusive("findPack", () => {
      checkSearchTerm(term);
      return this.searchPacks(term, { kind: "all" });
    });
  }

  public findPackOnServer(host: string, term: string): PackEntity[] {
    return this.exclusive("findPackOnServer", () => {
      const normalizedHost = checkHost(host);
      checkSearchTerm(term);

      const server = this.store.findServerByHost(normalizedHost);
      return server ? this.searchPacks(term, { kind: "server", serverId: server.id }) : [];
    });
  }

  public findPackInChannel(host: string, channel: string, term: string): PackEntity[] {
    return this.exclusive("findPackInChannel", () => {
      const normalizedHost = checkHost(host);
      checkChannelName(channel);
      checkSearchTerm(term);

      const channelRecord = this.locateChannel(normalizedHost, channel);
      return channelRecord ? this.searchPacks(term, { kind: "channel", channelId: channelRecord.id }) : [];
    });
  }

  public findPackByBot(host: string, channel: string, bot: string, term: string): PackEntity[] {
    return this.exclusive("findPackByBot", () => {
      const normalizedHost = checkHost(host);
      checkChannelName(channel);
      checkNickname(bot);
      checkSearchTerm(term);

      const botRecord = this.locateBot(normalizedHost, channel, bot);
      return botRecord ? this.searchPacks(term, { kind: "bot", botId: botRecord.id }) : [];
    });
  }

  // ── Update ──

  /** Returns false when the server is unknown. */
  public setServerIdentity(host: string, identity: ServerIdentity): boolean {
    return this.exclusive("setServerIdentity", () => {
      const normalizedHost = checkHost(host);
      const next = checkIdentity(identity);

      return this.commit((events) => {
        const server = this.store.findServerByHost(normalizedHost);
        if (!server) {
          this.logger.info({ event: "server.identity-unchanged", host: normalizedHost, reason: "not-found" });
          return false;
        }

        this.store.updateServer(server.id, next);
        events.push({
          type: "server-identity-changed",
          host: normalizedHost,
          identity: {
            oldValue: {
              nickName: server.nickName,
              userName: server.userName,
              realName: server.realName,
              authentication: server.authentication,
              userPassword: server.userPassword
            },
            newValue: next
          }
        });
        this.logger.info({
          event: "server.identity-changed",
          host: normalizedHost,
          nickName: next.nickName,
          authentication: next.authentication
        });
        return true;
      });
    });
  }

  public setServerPort(host: string, port: number): boolean {
    return this.exclusive("setServerPort", () => {
      const normalizedHost = checkHost(host);
      checkPort(port);

      return this.commit((events) => {
        const server = this.store.findServerByHost(normalizedHost);
        if (!server) {
          return false;
        }

        this.store.updateServer(server.id, { port });
        events.push({ type: "server-port-changed", host: normalizedHost, port: { oldValue: server.port, newValue: port } });
        this.logger.info({ event: "server.port-changed", host: normalizedHost, oldPort: server.port, port });
        return true;
      });
    });
  }

  public setServerPassword(host: string, password: string | null): boolean {
    return this.exclusive("setServerPassword", () => {
      const normalizedHost = checkHost(host);

      return this.commit((events) => {
        const server = this.store.findServerByHost(normalizedHost);
        if (!server) {
          return false;
        }

        this.store.updateServer(server.id, { password });
        events.push({
          type: "server-password-changed",
          host: normalizedHost,
          password: { oldValue: server.password, newValue: password }
        });
        this.logger.info({ event: "server.password-changed", host: normalizedHost });
        return true;
      });
    });
  }

  public setChannelPassword(host: string, channel: string, password: string | null): boolean {
    return this.exclusive("setChannelPassword", () => {
      const normalizedHost = checkHost(host);
      checkChannelName(channel);

      return this.commit((events) => {
        const channelRecord = this.locateChannel(normalizedHost, channel);
        if (!channelRecord) {
          return false;
        }

        this.store.updateChannel(channelRecord.id, { password });
        events.push({
          type: "channel-password-changed",
          host: normalizedHost,
          channel,
          password: { oldValue: channelRecord.password, newValue: password }
        });
        this.logger.info({ event: "channel.password-changed", host: normalizedHost, channel });
        return true;
      });
    });
  }

  public setBotListEnabled(host: string, channel: string, bot: string, listEnabled: boolean): boolean {
    return this.exclusive("setBotListEnabled", () => {
      const normalizedHost = checkHost(host);
      checkChannelName(channel);
      checkNickname(bot);

      return this.commit((events) => {
        const botRecord = this.locateBot(normalizedHost, channel, bot);
        if (!botRecord) {
          return false;
        }

        this.store.updateBot(botRecord.id, { listEnabled });
        events.push({
          type: "bot-list-flag-changed",
          host: normalizedHost,
          channel,
          bot,
          listEnabled: { oldValue: botRecord.listEnabled, newValue: listEnabled }
        });
        this.logger.info({ event: "bot.list-flag-changed", host: normalizedHost, channel, bot, listEnabled });
        return true;
      });
    });
  }

  /**
   * Moves a bot, with its packs, to another channel of the same server.
   * Returns false when the bot or the target channel does not exist.
   */
  public setBotChannel(host: string, oldChannel: string, newChannel: string, bot: string): boolean {
    return this.exclusive("setBotChannel", () => {
      const normalizedHost = checkHost(host);
      checkChannelName(oldChannel);
      checkChannelName(newChannel);
      checkNickname(bot);

      if (oldChannel === newChannel) {
        throw new PreconditionError(`Cannot move the bot ${bot} into the channel it is already in`);
      }

      return this.commit((events) => {
        const botRecord = this.locateBot(normalizedHost, oldChannel, bot);
        if (!botRecord) {
          this.logger.info({ event: "bot.move-skipped", host: normalizedHost, channel: oldChannel, bot, reason: "bot-not-found" });
          return false;
        }

        const target = this.locateChannel(normalizedHost, newChannel);
        if (!target) {
          this.logger.info({ event: "bot.move-skipped", host: normalizedHost, channel: newChannel, bot, reason: "channel-not-found" });
          return false;
        }

        if (this.store.findBot(target.id, bot)) {
          throw new PreconditionError(`The channel ${newChannel} already has a bot named ${bot}`);
        }

        this.store.updateBot(botRecord.id, { channelId: target.id });
        events.push({ type: "bot-moved", host: normalizedHost, oldChannel, newChannel, bot });
        this.logger.info({ event: "bot.moved", host: normalizedHost, oldChannel, newChannel, bot });
        return true;
      });
    });
  }

  // ── Delete ──

  /** Removes the server with all its channels, bots and packs. */
  public deleteServer(host: string): boolean {
    return this.exclusive("deleteServer", () => {
      const normalizedHost = checkHost(host);

      return this.commit((events) => {
        const server = this.store.findServerByHost(normalizedHost);
        if (!server) {
          this.logger.info({ event: "server.delete-skipped", host: normalizedHost, reason: "not-found" });
          return false;
        }

        this.removeServer(events, server);
        this.logger.info({ event: "server.deleted", host: normalizedHost, removed: events.length });
        return true;
      });
    });
  }

  public deleteChannel(host: string, channel: string): boolean {
    return this.exclusive("deleteChannel", () => {
      const normalizedHost = checkHost(host);
      checkChannelName(channel);

      return this.commit((events) => {
        const channelRecord = this.locateChannel(normalizedHost, channel);
        if (!channelRecord) {
          this.logger.info({ event: "channel.delete-skipped", host: normalizedHost, channel, reason: "not-found" });
          return false;
        }

        this.removeChannel(events, normalizedHost, channelRecord);
        this.logger.info({ event: "channel.deleted", host: normalizedHost, channel, removed: events.length });
        return true;
      });
    });
  }

  public deleteBot(host: string, channel: string, bot: string): boolean {
    return this.exclusive("deleteBot", () => {
      const normalizedHost = checkHost(host);
      checkChannelName(channel);
      checkNickname(bot);

      return this.commit((events) => {
        const botRecord = this.locateBot(normalizedHost, channel, bot);
        if (!botRecord) {
          this.logger.info({ event: "bot.delete-skipped", host: normalizedHost, channel, bot, reason: "not-found" });
          return false;
        }

        this.removeBot(events, normalizedHost, channel, botRecord);
        this.logger.info({ event: "bot.deleted", host: normalizedHost, channel, bot, removed: events.length });
        return true;
      });
    });
  }

  public deletePack(host: string, channel: string, bot: string, number: number): boolean {
    return this.exclusive("deletePack", () => {
      const normalizedHost = checkHost(host);
      checkChannelName(channel);
      checkNickname(bot);
      checkPackNumber(number);

      return this.commit((events) => {
        const botRecord = this.locateBot(normalizedHost, channel, bot);
        const pack = botRecord ? this.store.findPack(botRecord.id, number) : null;
        if (!pack) {
          this.logger.info({ event: "pack.delete-skipped", host: normalizedHost, channel, bot, number, reason: "not-found" });
          return false;
        }

        this.removePack(events, normalizedHost, channel, bot, pack);
        this.logger.info({ event: "pack.deleted", host: normalizedHost, channel, bot, number });
        return true;
      });
    });
  }

  // ── Lifecycle ──

  /**
   * Releases the store and notifies observers. Every later call, on the
   * controller or on an entity it returned, throws CatalogClosedError.
   */
  public close(): void {
    this.exclusive("close", () => {
      this.store.close();
      this.closed = true;
      this.logger.info({ event: "controller.closed" });
      this.publish([{ type: "closed" }]);
    });
  }

  public isClosed(): boolean {
    return this.closed;
  }

  // ── Internals ──

  private exclusive<T>(operation: string, work: () => T): T {
    if (this.activeOperation !== null) {
      throw new CatalogReentrancyError(operation, this.activeOperation);
    }

    this.activeOperation = operation;
    try {
      this.assertOpen();
      return work();
    } finally {
      this.activeOperation = null;
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new CatalogClosedError();
    }
  }

  /**
   * Runs `work` in one store transaction. Events it records are published
   * after the commit, followed by a single "flushed" event.
   */
  private commit<T>(work: (events: CatalogEvent[]) => T): T {
    const events: CatalogEvent[] = [];
    const result = this.store.transaction(() => work(events));

    if (events.length > 0) {
      this.logger.debug({ event: "transaction.committed", changes: events.length });
      this.publish([...events, { type: "flushed" }]);
    }
    return result;
  }

  private publish(events: CatalogEvent[]): void {
    const observers = Array.from(this.observers);
    const failures: unknown[] = [];

    for (const event of events) {
      for (const observer of observers) {
        try {
          dispatchEvent(observer, event);
        } catch (error) {
          this.logger.error({ event: "observer.failed", notification: event.type, err: error });
          failures.push(error);
        }
      }
    }

    if (failures.length > 0) {
      throw new ObserverError(events.map((event) => event.type).join(", "), failures);
    }
  }

  private locateChannel(host: string, channel: string): ChannelRecord | null {
    const server = this.store.findServerByHost(host);
    return server ? this.store.findChannel(server.id, channel) : null;
  }

  private locateBot(host: string, channel: string, bot: string): BotRecord | null {
    const channelRecord = this.locateChannel(host, channel);
    return channelRecord ? this.store.findBot(channelRecord.id, bot) : null;
  }

  private insertBot(
    events: CatalogEvent[],
    host: string,
    channel: ChannelRecord,
    name: string,
    listEnabled: boolean
  ): BotRecord {
    if (this.store.findBot(channel.id, name)) {
      throw new PreconditionError(`The bot ${name} already exists in the channel ${channel.name}`);
    }

    const record = this.store.insertBot({ channelId: channel.id, name, listEnabled });
    events.push({ type: "bot-added", host, channel: channel.name, bot: name, listEnabled });
    return record;
  }

  private searchPacks(term: string, scope: PackSearchScope): PackEntity[] {
    const packs = this.store.searchPacks(term, scope).map((record) => new PackEntity(this.entities, record));
    this.logger.debug({ event: "packs.searched", scope: scope.kind, term, count: packs.length });
    return packs;
  }

  // Cascading removal, descendants first. One "deleted" event per record.

  private removeServer(events: CatalogEvent[], server: ServerRecord): void {
    for (const channel of this.store.listChannels(server.id)) {
      this.removeChannel(events, server.host, channel);
    }
    this.store.deleteServer(server.id);
    events.push({ type: "server-deleted", server: toServerDetails(server) });
  }

  private removeChannel(events: CatalogEvent[], host: string, channel: ChannelRecord): void {
    for (const bot of this.store.listBots(channel.id)) {
      this.removeBot(events, host, channel.name, bot);
    }
    this.store.deleteChannel(channel.id);
    events.push({ type: "channel-deleted", host, channel: channel.name, password: channel.password });
  }

  private removeBot(events: CatalogEvent[], host: string, channel: string, bot: BotRecord): void {
    for (const pack of this.store.listPacks(bot.id)) {
      this.removePack(events, host, channel, bot.name, pack);
    }
    this.store.deleteBot(bot.id);
    events.push({ type: "bot-deleted", host, channel, bot: bot.name, listEnabled: bot.listEnabled });
  }

  private removePack(events: CatalogEvent[], host: string, channel: string, bot: string, pack: PackRecord): void {
    this.store.deletePack(pack.id);
    events.push({
      type: "pack-deleted",
      host,
      channel,
      bot,
      number: pack.number,
      fileName: pack.fileName,
      fileSize: pack.fileSize
    });
  }
}
