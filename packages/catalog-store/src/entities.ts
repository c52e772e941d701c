// Entity views handed out by a CatalogController.
//
// An entity only holds the id of its record and the values it saw last.
// Attributes are re-read from the store on access, relations are resolved
// through id lookups on every access, and everything fails once the owning
// controller has been closed.

import type { CatalogBot, CatalogChannel, CatalogPack, CatalogServer, Authentication } from "@pack-catalog/shared";
import { StoreError } from "./errors.js";
import type { BotRecord, CatalogStore, ChannelRecord, PackRecord, RecordId, ServerRecord } from "./store.js";

export interface EntitySource {
  /** Runs `work` against the controller's store; throws once the controller is closed. */
  read<T>(work: (store: CatalogStore) => T): T;
}

abstract class CatalogEntity<R extends { id: RecordId }> {
  protected readonly source: EntitySource;
  protected readonly recordId: RecordId;
  private lastSeen: R;

  protected constructor(source: EntitySource, record: R) {
    this.source = source;
    this.recordId = record.id;
    this.lastSeen = record;
  }

  public get id(): RecordId {
    return this.current().id;
  }

  /** Whether the record still exists. */
  public get exists(): boolean {
    return this.source.read((store) => this.load(store) !== null);
  }

  protected abstract load(store: CatalogStore): R | null;

  protected current(): R {
    return this.source.read((store) => {
      const latest = this.load(store);
      if (latest) {
        this.lastSeen = latest;
      }
      return this.lastSeen;
    });
  }
}

const missingParent = (kind: string, id: RecordId): StoreError => {
  return new StoreError(`The ${kind} ${id} no longer exists`);
};

export class ServerEntity extends CatalogEntity<ServerRecord> implements CatalogServer {
  public constructor(source: EntitySource, record: ServerRecord) {
    super(source, record);
  }

  public get host(): string {
    return this.current().host;
  }

  public get port(): number {
    return this.current().port;
  }

  public get nickName(): string {
    return this.current().nickName;
  }

  public get userName(): string {
    return this.current().userName;
  }

  public get realName(): string {
    return this.current().realName;
  }

  public get authentication(): Authentication {
    return this.current().authentication;
  }

  public get userPassword(): string | null {
    return this.current().userPassword;
  }

  public get password(): string | null {
    return this.current().password;
  }

  public get channels(): ChannelEntity[] {
    return this.source.read((store) =>
      store.listChannels(this.recordId).map((record) => new ChannelEntity(this.source, record))
    );
  }

  protected load(store: CatalogStore): ServerRecord | null {
    return store.getServer(this.recordId);
  }
}

export class ChannelEntity extends CatalogEntity<ChannelRecord> implements CatalogChannel {
  public constructor(source: EntitySource, record: ChannelRecord) {
    super(source, record);
  }

  public get name(): string {
    return this.current().name;
  }

  public get password(): string | null {
    return this.current().password;
  }

  public get server(): ServerEntity {
    const { serverId } = this.current();
    return this.source.read((store) => {
      const record = store.getServer(serverId);
      if (!record) {
        throw missingParent("server", serverId);
      }
      return new ServerEntity(this.source, record);
    });
  }

  public get bots(): BotEntity[] {
    return this.source.read((store) =>
      store.listBots(this.recordId).map((record) => new BotEntity(this.source, record))
    );
  }

  protected load(store: CatalogStore): ChannelRecord | null {
    return store.getChannel(this.recordId);
  }
}

export class BotEntity extends CatalogEntity<BotRecord> implements CatalogBot {
  public constructor(source: EntitySource, record: BotRecord) {
    super(source, record);
  }

  public get name(): string {
    return this.current().name;
  }

  public get listEnabled(): boolean {
    return this.current().listEnabled;
  }

  public get channel(): ChannelEntity {
    const { channelId } = this.current();
    return this.source.read((store) => {
      const record = store.getChannel(channelId);
      if (!record) {
        throw missingParent("channel", channelId);
      }
      return new ChannelEntity(this.source, record);
    });
  }

  public get packs(): PackEntity[] {
    return this.source.read((store) =>
      store.listPacks(this.recordId).map((record) => new PackEntity(this.source, record))
    );
  }

  protected load(store: CatalogStore): BotRecord | null {
    return store.getBot(this.recordId);
  }
}

export class PackEntity extends CatalogEntity<PackRecord> implements CatalogPack {
  public constructor(source: EntitySource, record: PackRecord) {
    super(source, record);
  }

  public get number(): number {
    return this.current().number;
  }

  public get fileName(): string {
    return this.current().fileName;
  }

  public get fileSize(): string {
    return this.current().fileSize;
  }

  public get bot(): BotEntity {
    const { botId } = this.current();
    return this.source.read((store) => {
      const record = store.getBot(botId);
      if (!record) {
        throw missingParent("bot", botId);
      }
      return new BotEntity(this.source, record);
    });
  }

  protected load(store: CatalogStore): PackRecord | null {
    return store.getPack(this.recordId);
  }
}
