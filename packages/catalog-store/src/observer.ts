// Change notifications fired by a CatalogController after each commit.

import type { Authentication } from "@pack-catalog/shared";

export interface ServerDetails {
  host: string;
  port: number;
  nickName: string;
  userName: string;
  realName: string;
  authentication: Authentication;
  userPassword: string | null;
  password: string | null;
}

export interface IdentityDetails {
  nickName: string;
  userName: string;
  realName: string;
  authentication: Authentication;
  userPassword: string | null;
}

export interface Change<T> {
  oldValue: T;
  newValue: T;
}

/**
 * Receives every committed change of a controller. Callbacks run inside the
 * controller's exclusion domain, before the mutating call returns: they may
 * read entities obtained earlier but must not call back into the controller.
 */
export interface CatalogObserver {
  serverAdded(server: ServerDetails): void;
  channelAdded(host: string, channel: string, password: string | null): void;
  botAdded(host: string, channel: string, bot: string, listEnabled: boolean): void;
  packAdded(host: string, channel: string, bot: string, number: number, fileName: string, fileSize: string): void;
  packUpdated(
    host: string,
    channel: string,
    bot: string,
    number: number,
    fileName: Change<string>,
    fileSize: Change<string>
  ): void;

  serverIdentityChanged(host: string, identity: Change<IdentityDetails>): void;
  serverPortChanged(host: string, port: Change<number>): void;
  serverPasswordChanged(host: string, password: Change<string | null>): void;
  channelPasswordChanged(host: string, channel: string, password: Change<string | null>): void;
  botListFlagChanged(host: string, channel: string, bot: string, listEnabled: Change<boolean>): void;
  botMoved(host: string, oldChannel: string, newChannel: string, bot: string): void;

  serverDeleted(server: ServerDetails): void;
  channelDeleted(host: string, channel: string, password: string | null): void;
  botDeleted(host: string, channel: string, bot: string, listEnabled: boolean): void;
  packDeleted(host: string, channel: string, bot: string, number: number, fileName: string, fileSize: string): void;

  /** A transaction was committed. Follows the change events of that transaction. */
  flushed(): void;
  closed(): void;
}

/** No-op base for observers that only care about a few events. */
export class IgnoringObserver implements CatalogObserver {
  public serverAdded(_server: ServerDetails): void {}
  public channelAdded(_host: string, _channel: string, _password: string | null): void {}
  public botAdded(_host: string, _channel: string, _bot: string, _listEnabled: boolean): void {}
  public packAdded(_host: string, _channel: string, _bot: string, _number: number, _fileName: string, _fileSize: string): void {}
  public packUpdated(
    _host: string,
    _channel: string,
    _bot: string,
    _number: number,
    _fileName: Change<string>,
    _fileSize: Change<string>
  ): void {}
  public serverIdentityChanged(_host: string, _identity: Change<IdentityDetails>): void {}
  public serverPortChanged(_host: string, _port: Change<number>): void {}
  public serverPasswordChanged(_host: string, _password: Change<string | null>): void {}
  public channelPasswordChanged(_host: string, _channel: string, _password: Change<string | null>): void {}
  public botListFlagChanged(_host: string, _channel: string, _bot: string, _listEnabled: Change<boolean>): void {}
  public botMoved(_host: string, _oldChannel: string, _newChannel: string, _bot: string): void {}
  public serverDeleted(_server: ServerDetails): void {}
  public channelDeleted(_host: string, _channel: string, _password: string | null): void {}
  public botDeleted(_host: string, _channel: string, _bot: string, _listEnabled: boolean): void {}
  public packDeleted(_host: string, _channel: string, _bot: string, _number: number, _fileName: string, _fileSize: string): void {}
  public flushed(): void {}
  public closed(): void {}
}

// ── Events queued by a controller during a transaction ──

interface PackDetails {
  host: string;
  channel: string;
  bot: string;
  number: number;
  fileName: string;
  fileSize: string;
}

export type CatalogEvent =
  | { type: "server-added"; server: ServerDetails }
  | { type: "channel-added"; host: string; channel: string; password: string | null }
  | { type: "bot-added"; host: string; channel: string; bot: string; listEnabled: boolean }
  | ({ type: "pack-added" } & PackDetails)
  | {
      type: "pack-updated";
      host: string;
      channel: string;
      bot: string;
      number: number;
      fileName: Change<string>;
      fileSize: Change<string>;
    }
  | { type: "server-identity-changed"; host: string; identity: Change<IdentityDetails> }
  | { type: "server-port-changed"; host: string; port: Change<number> }
  | { type: "server-password-changed"; host: string; password: Change<string | null> }
  | { type: "channel-password-changed"; host: string; channel: string; password: Change<string | null> }
  | { type: "bot-list-flag-changed"; host: string; channel: string; bot: string; listEnabled: Change<boolean> }
  | { type: "bot-moved"; host: string; oldChannel: string; newChannel: string; bot: string }
  | { type: "server-deleted"; server: ServerDetails }
  | { type: "channel-deleted"; host: string; channel: string; password: string | null }
  | { type: "bot-deleted"; host: string; channel: string; bot: string; listEnabled: boolean }
  | ({ type: "pack-deleted" } & PackDetails)
  | { type: "flushed" }
  | { type: "closed" };

export type CatalogEventType = CatalogEvent["type"];

export function dispatchEvent(observer: CatalogObserver, event: CatalogEvent): void {
  switch (event.type) {
    case "server-added":
      observer.serverAdded(event.server);
      return;
    case "channel-added":
      observer.channelAdded(event.host, event.channel, event.password);
      return;
    case "bot-added":
      observer.botAdded(event.host, event.channel, event.bot, event.listEnabled);
      return;
    case "pack-added":
      observer.packAdded(event.host, event.channel, event.bot, event.number, event.fileName, event.fileSize);
      return;
    case "pack-updated":
      observer.packUpdated(event.host, event.channel, event.bot, event.number, event.fileName, event.fileSize);
      return;
    case "server-identity-changed":
      observer.serverIdentityChanged(event.host, event.identity);
      return;
    case "server-port-changed":
      observer.serverPortChanged(event.host, event.port);
      return;
    case "server-password-changed":
      observer.serverPasswordChanged(event.host, event.password);
      return;
    case "channel-password-changed":
      observer.channelPasswordChanged(event.host, event.channel, event.password);
      return;
    case "bot-list-flag-changed":
      observer.botListFlagChanged(event.host, event.channel, event.bot, event.listEnabled);
      return;
    case "bot-moved":
      observer.botMoved(event.host, event.oldChannel, event.newChannel, event.bot);
      return;
    case "server-deleted":
      observer.serverDeleted(event.server);
      return;
    case "channel-deleted":
      observer.channelDeleted(event.host, event.channel, event.password);
      return;
    case "bot-deleted":
      observer.botDeleted(event.host, event.channel, event.bot, event.listEnabled);
      return;
    case "pack-deleted":
      observer.packDeleted(event.host, event.channel, event.bot, event.number, event.fileName, event.fileSize);
      return;
    case "flushed":
      observer.flushed();
      return;
    case "closed":
      observer.closed();
      return;
  }
}
