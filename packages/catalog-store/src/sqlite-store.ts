// SQLite-backed CatalogStore implementation.
// Data survives restarts. Uses better-sqlite3 (synchronous).

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
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
import { isAuthentication } from "./validation.js";

// Foreign keys carry no ON DELETE action: descendants are removed by the
// controller before their parent.
const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS servers (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  host TEXT NOT NULL UNIQUE,
  port INTEGER NOT NULL,
  nick_name TEXT NOT NULL,
  user_name TEXT NOT NULL,
  real_name TEXT NOT NULL,
  authentication TEXT NOT NULL,
  user_password TEXT,
  password TEXT
);

CREATE TABLE IF NOT EXISTS channels (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  server_id INTEGER NOT NULL REFERENCES servers(id),
  name TEXT NOT NULL,
  password TEXT,
  UNIQUE (server_id, name)
);

CREATE TABLE IF NOT EXISTS bots (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  channel_id INTEGER NOT NULL REFERENCES channels(id),
  name TEXT NOT NULL,
  list_enabled INTEGER NOT NULL DEFAULT 0,
  UNIQUE (channel_id, name)
);

CREATE TABLE IF NOT EXISTS packs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  bot_id INTEGER NOT NULL REFERENCES bots(id),
  number INTEGER NOT NULL,
  file_name TEXT NOT NULL,
  file_size TEXT NOT NULL,
  UNIQUE (bot_id, number)
);
`;

const SERVER_COLUMNS = "id, host, port, nick_name, user_name, real_name, authentication, user_password, password";
const CHANNEL_COLUMNS = "id, server_id, name, password";
const BOT_COLUMNS = "id, channel_id, name, list_enabled";
const PACK_COLUMNS = "id, bot_id, number, file_name, file_size";

type SqlValue = string | number | null;

// Record field -> column, for partial updates.
const SERVER_FIELDS = {
  host: "host",
  port: "port",
  nickName: "nick_name",
  userName: "user_name",
  realName: "real_name",
  authentication: "authentication",
  userPassword: "user_password",
  password: "password"
} satisfies Record<keyof NewServerRecord, string>;

const CHANNEL_FIELDS = {
  serverId: "server_id",
  name: "name",
  password: "password"
} satisfies Record<keyof NewChannelRecord, string>;

const BOT_FIELDS = {
  channelId: "channel_id",
  name: "name",
  listEnabled: "list_enabled"
} satisfies Record<keyof NewBotRecord, string>;

const PACK_FIELDS = {
  botId: "bot_id",
  number: "number",
  fileName: "file_name",
  fileSize: "file_size"
} satisfies Record<keyof NewPackRecord, string>;

export class SqliteStore implements CatalogStore {
  private readonly db: Database.Database;

  public constructor(dbPath: string) {
    mkdirSync(dirname(dbPath), { recursive: true });

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);
  }

  // ── Servers ──

  public insertServer(server: NewServerRecord): ServerRecord {
    const result = this.db
      .prepare(
        `INSERT INTO servers (host, port, nick_name, user_name, real_name, authentication, user_password, password)
         VALUES (@host, @port, @nickName, @userName, @realName, @authentication, @userPassword, @password)`
      )
      .run(server);

    return { ...server, id: Number(result.lastInsertRowid) };
  }

  public getServer(id: RecordId): ServerRecord | null {
    const row = this.db
      .prepare(`SELECT ${SERVER_COLUMNS} FROM servers WHERE id = ?`)
      .get(id) as RawServerRow | undefined;

    return row ? toServerRecord(row) : null;
  }

  public findServerByHost(host: string): ServerRecord | null {
    const row = this.db
      .prepare(`SELECT ${SERVER_COLUMNS} FROM servers WHERE host = ?`)
      .get(host) as RawServerRow | undefined;

    return row ? toServerRecord(row) : null;
  }

  public listServers(): ServerRecord[] {
    const rows = this.db
      .prepare(`SELECT ${SERVER_COLUMNS} FROM servers ORDER BY id`)
      .all() as RawServerRow[];

    return rows.map(toServerRecord);
  }

  public updateServer(id: RecordId, patch: Partial<NewServerRecord>): void {
    this.update("servers", SERVER_FIELDS, id, patch);
  }

  public deleteServer(id: RecordId): void {
    this.db.prepare("DELETE FROM servers WHERE id = ?").run(id);
  }

  // ── Channels ──

  public insertChannel(channel: NewChannelRecord): ChannelRecord {
    const result = this.db
      .prepare("INSERT INTO channels (server_id, name, password) VALUES (@serverId, @name, @password)")
      .run(channel);

    return { ...channel, id: Number(result.lastInsertRowid) };
  }

  public getChannel(id: RecordId): ChannelRecord | null {
    const row = this.db
      .prepare(`SELECT ${CHANNEL_COLUMNS} FROM channels WHERE id = ?`)
      .get(id) as RawChannelRow | undefined;

    return row ? toChannelRecord(row) : null;
  }

  public findChannel(serverId: RecordId, name: string): ChannelRecord | null {
    const row = this.db
      .prepare(`SELECT ${CHANNEL_COLUMNS} FROM channels WHERE server_id = ? AND name = ?`)
      .get(serverId, name) as RawChannelRow | undefined;

    return row ? toChannelRecord(row) : null;
  }

  public listChannels(serverId: RecordId): ChannelRecord[] {
    const rows = this.db
      .prepare(`SELECT ${CHANNEL_COLUMNS} FROM channels WHERE server_id = ? ORDER BY id`)
      .all(serverId) as RawChannelRow[];

    return rows.map(toChannelRecord);
  }

  public updateChannel(id: RecordId, patch: Partial<NewChannelRecord>): void {
    this.update("channels", CHANNEL_FIELDS, id, patch);
  }

  public deleteChannel(id: RecordId): void {
    this.db.prepare("DELETE FROM channels WHERE id = ?").run(id);
  }

  // ── Bots ──

  public insertBot(bot: NewBotRecord): BotRecord {
    const result = this.db
      .prepare("INSERT INTO bots (channel_id, name, list_enabled) VALUES (@channelId, @name, @listEnabled)")
      .run({ channelId: bot.channelId, name: bot.name, listEnabled: bot.listEnabled ? 1 : 0 });

    return { ...bot, id: Number(result.lastInsertRowid) };
  }

  public getBot(id: RecordId): BotRecord | null {
    const row = this.db
      .prepare(`SELECT ${BOT_COLUMNS} FROM bots WHERE id = ?`)
      .get(id) as RawBotRow | undefined;

    return row ? toBotRecord(row) : null;
  }

  public findBot(channelId: RecordId, name: string): BotRecord | null {
    const row = this.db
      .prepare(`SELECT ${BOT_COLUMNS} FROM bots WHERE channel_id = ? AND name = ?`)
      .get(channelId, name) as RawBotRow | undefined;

    return row ? toBotRecord(row) : null;
  }

  public listBots(channelId: RecordId): BotRecord[] {
    const rows = this.db
      .prepare(`SELECT ${BOT_COLUMNS} FROM bots WHERE channel_id = ? ORDER BY id`)
      .all(channelId) as RawBotRow[];

    return rows.map(toBotRecord);
  }

  public updateBot(id: RecordId, patch: Partial<NewBotRecord>): void {
    this.update("bots", BOT_FIELDS, id, {
      channelId: patch.channelId,
      name: patch.name,
      listEnabled: patch.listEnabled === undefined ? undefined : Number(patch.listEnabled)
    });
  }

  public deleteBot(id: RecordId): void {
    this.db.prepare("DELETE FROM bots WHERE id = ?").run(id);
  }

  // ── Packs ──

  public insertPack(pack: NewPackRecord): PackRecord {
    const result = this.db
      .prepare(
        `INSERT INTO packs (bot_id, number, file_name, file_size)
         VALUES (@botId, @number, @fileName, @fileSize)`
      )
      .run(pack);

    return { ...pack, id: Number(result.lastInsertRowid) };
  }

  public getPack(id: RecordId): PackRecord | null {
    const row = this.db
      .prepare(`SELECT ${PACK_COLUMNS} FROM packs WHERE id = ?`)
      .get(id) as RawPackRow | undefined;

    return row ? toPackRecord(row) : null;
  }

  public findPack(botId: RecordId, number: number): PackRecord | null {
    const row = this.db
      .prepare(`SELECT ${PACK_COLUMNS} FROM packs WHERE bot_id = ? AND number = ?`)
      .get(botId, number) as RawPackRow | undefined;

    return row ? toPackRecord(row) : null;
  }

  public listPacks(botId: RecordId): PackRecord[] {
    const rows = this.db
      .prepare(`SELECT ${PACK_COLUMNS} FROM packs WHERE bot_id = ? ORDER BY number`)
      .all(botId) as RawPackRow[];

    return rows.map(toPackRecord);
  }

  public updatePack(id: RecordId, patch: Partial<NewPackRecord>): void {
    this.update("packs", PACK_FIELDS, id, patch);
  }

  public deletePack(id: RecordId): void {
    this.db.prepare("DELETE FROM packs WHERE id = ?").run(id);
  }

  // instr() rather than LIKE: LIKE ignores ASCII case and treats '_' as a wildcard.
  public searchPacks(term: string, scope: PackSearchScope): PackRecord[] {
    const columns = "p.id, p.bot_id, p.number, p.file_name, p.file_size";
    const match = "instr(p.file_name, @term) > 0";
    let sql: string;
    let params: Record<string, SqlValue>;

    switch (scope.kind) {
      case "all":
        sql = `SELECT ${columns} FROM packs p WHERE ${match}`;
        params = { term };
        break;
      case "bot":
        sql = `SELECT ${columns} FROM packs p WHERE p.bot_id = @botId AND ${match}`;
        params = { term, botId: scope.botId };
        break;
      case "channel":
        sql = `SELECT ${columns} FROM packs p
               JOIN bots b ON b.id = p.bot_id
               WHERE b.channel_id = @channelId AND ${match}`;
        params = { term, channelId: scope.channelId };
        break;
      case "server":
        sql = `SELECT ${columns} FROM packs p
               JOIN bots b ON b.id = p.bot_id
               JOIN channels c ON c.id = b.channel_id
               WHERE c.server_id = @serverId AND ${match}`;
        params = { term, serverId: scope.serverId };
        break;
    }

    const rows = this.db.prepare(`${sql} ORDER BY p.id`).all(params) as RawPackRow[];
    return rows.map(toPackRecord);
  }

  // ── Lifecycle ──

  public transaction<T>(work: () => T): T {
    return this.db.transaction(work)();
  }

  public close(): void {
    this.db.close();
  }

  private update(
    table: string,
    fields: Readonly<Record<string, string>>,
    id: RecordId,
    patch: Readonly<Record<string, SqlValue | undefined>>
  ): void {
    const assignments: string[] = [];
    const values: Record<string, SqlValue> = { id };

    for (const [field, column] of Object.entries(fields)) {
      const value = patch[field];
      if (value === undefined) {
        continue;
      }
      assignments.push(`${column} = @${field}`);
      values[field] = value;
    }

    if (assignments.length === 0) {
      return;
    }

    this.db.prepare(`UPDATE ${table} SET ${assignments.join(", ")} WHERE id = @id`).run(values);
  }
}

// Raw row shapes returned by better-sqlite3 (snake_case column names).

interface RawServerRow {
  id: number;
  host: string;
  port: number;
  nick_name: string;
  user_name: string;
  real_name: string;
  authentication: string;
  user_password: string | null;
  password: string | null;
}

interface RawChannelRow {
  id: number;
  server_id: number;
  name: string;
  password: string | null;
}

interface RawBotRow {
  id: number;
  channel_id: number;
  name: string;
  list_enabled: number;
}

interface RawPackRow {
  id: number;
  bot_id: number;
  number: number;
  file_name: string;
  file_size: string;
}

const toServerRecord = (row: RawServerRow): ServerRecord => {
  if (!isAuthentication(row.authentication)) {
    throw new StoreError(`Server ${row.host} has an unknown authentication mode: ${row.authentication}`);
  }

  return {
    id: row.id,
    host: row.host,
    port: row.port,
    nickName: row.nick_name,
    userName: row.user_name,
    realName: row.real_name,
    authentication: row.authentication,
    userPassword: row.user_password,
    password: row.password
  };
};

const toChannelRecord = (row: RawChannelRow): ChannelRecord => ({
  id: row.id,
  serverId: row.server_id,
  name: row.name,
  password: row.password
});

const toBotRecord = (row: RawBotRow): BotRecord => ({
  id: row.id,
  channelId: row.channel_id,
  name: row.name,
  listEnabled: row.list_enabled !== 0
});

const toPackRecord = (row: RawPackRow): PackRecord => ({
  id: row.id,
  botId: row.bot_id,
  number: row.number,
  fileName: row.file_name,
  fileSize: row.file_size
});
