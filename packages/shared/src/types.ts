// Read-only views of the catalog hierarchy: server > channel > bot > pack.

/**
 * How the client identifies itself once connected. `nickserv` needs a user
 * password, `none` does not.
 */
export type Authentication = "none" | "nickserv";

export interface CatalogServer {
  /** Trimmed, lower-case host name. Unique across the catalog. */
  readonly host: string;
  readonly port: number;
  readonly nickName: string;
  readonly userName: string;
  readonly realName: string;
  readonly authentication: Authentication;
  readonly userPassword: string | null;
  /** Password sent when connecting to the server itself. */
  readonly password: string | null;
  readonly channels: CatalogChannel[];
}

export interface CatalogChannel {
  readonly server: CatalogServer;
  readonly name: string;
  readonly password: string | null;
  readonly bots: CatalogBot[];
}

export interface CatalogBot {
  readonly channel: CatalogChannel;
  readonly name: string;
  /** Whether the bot answers pack listing requests. */
  readonly listEnabled: boolean;
  /** Ordered by pack number. */
  readonly packs: CatalogPack[];
}

export interface CatalogPack {
  readonly bot: CatalogBot;
  readonly number: number;
  readonly fileName: string;
  /** Size as announced by the bot, e.g. "1.4G". Not a byte count. */
  readonly fileSize: string;
}
