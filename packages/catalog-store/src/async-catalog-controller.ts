// Non-blocking front door to a CatalogController.
//
// Every call is validated on the caller's stack, then queued. A single worker
// drains the queue one task per event-loop turn, strictly in submission order.

import type { CatalogController } from "./catalog-controller.js";
import type { BotEntity, ChannelEntity, PackEntity, ServerEntity } from "./entities.js";
import { DEFAULT_CLOSE_TIMEOUT_MS } from "./config.js";
import { CatalogClosedError, InterruptedError, PreconditionError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { CatalogObserver } from "./observer.js";
import { QueuedOperation, type QueuedTask } from "./queued-operation.js";
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

export interface AsyncCatalogControllerOptions {
  logger?: Logger;
  /** Used by close() when no timeout is given. */
  closeTimeoutMs?: number;
}

export interface CloseOptions {
  /** Aborting interrupts the wait for the queue to drain. */
  signal?: AbortSignal;
}

export class AsyncCatalogController {
  private readonly controller: CatalogController;
  private readonly logger: Logger;
  private readonly closeTimeoutMs: number;
  private readonly queue: QueuedTask[] = [];
  private idleWaiters: Array<() => void> = [];
  private workerScheduled = false;
  private accepting = true;
  private closing: Promise<void> | null = null;

  public constructor(controller: CatalogController, options: AsyncCatalogControllerOptions = {}) {
    this.controller = controller;
    this.logger = (options.logger ?? createLogger()).child({ component: "catalog-async" });
    this.closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
    this.logger.debug({ event: "async.created" });
  }

  /** Number of operations waiting to run. */
  public get pending(): number {
    return this.queue.length;
  }

  // ── Observers ──

  /** Observes changes scheduled after this call. */
  public addObserver(observer: CatalogObserver): QueuedOperation<void> {
    return this.submit("addObserver", () => this.controller.addObserver(observer));
  }

  /** Keeps observing changes scheduled before this call. */
  public removeObserver(observer: CatalogObserver): QueuedOperation<void> {
    return this.submit("removeObserver", () => this.controller.removeObserver(observer));
  }

  // ── Create ──

  /** The spec is copied on submission; later changes to it have no effect. */
  public addServer(spec: ServerSpec): QueuedOperation<void> {
    const submitted: ServerSpec = { ...spec };
    checkServerSpec(submitted);
    return this.submit("addServer", () => this.controller.addServer(submitted));
  }

  public addChannel(host: string, name: string, password: string | null = null): QueuedOperation<void> {
    checkHost(host);
    checkChannelName(name);
    return this.submit("addChannel", () => this.controller.addChannel(host, name, password));
  }

  public addBot(host: string, channel: string, name: string, listEnabled: boolean): QueuedOperation<void> {
    checkHost(host);
    checkChannelName(channel);
    checkNickname(name);
    return this.submit("addBot", () => this.controller.addBot(host, channel, name, listEnabled));
  }

  public updateOrAddPack(
    host: string,
    channel: string,
    bot: string,
    number: number,
    fileName: string,
    fileSize: string,
    introduceBot: boolean
  ): QueuedOperation<void> {
    checkHost(host);
    checkChannelName(channel);
    checkNickname(bot);
    checkPackNumber(number);
    checkFileName(fileName);
    return this.submit("updateOrAddPack", () =>
      this.controller.updateOrAddPack(host, channel, bot, number, fileName, fileSize, introduceBot)
    );
  }

  // ── Read ──

  public getServer(host: string): QueuedOperation<ServerEntity | null> {
    checkHost(host);
    return this.submit("getServer", () => this.controller.getServer(host));
  }

  public getChannel(host: string, channel: string): QueuedOperation<ChannelEntity | null> {
    checkHost(host);
    checkChannelName(channel);
    return this.submit("getChannel", () => this.controller.getChannel(host, channel));
  }

  public getBot(host: string, channel: string, bot: string): QueuedOperation<BotEntity | null> {
    checkHost(host);
    checkChannelName(channel);
    checkNickname(bot);
    return this.submit("getBot", () => this.controller.getBot(host, channel, bot));
  }

  public getPack(host: string, channel: string, bot: string, number: number): QueuedOperation<PackEntity | null> {
    checkHost(host);
    checkChannelName(channel);
    checkNickname(bot);
    checkPackNumber(number);
    return this.submit("getPack", () => this.controller.getPack(host, channel, bot, number));
  }

  public getServerList(): QueuedOperation<ServerEntity[]> {
    return this.submit("getServerList", () => this.controller.getServerList());
  }

  // ── Search ──

  public findPack(term: string): QueuedOperation<PackEntity[]> {
    checkSearchTerm(term);
    return this.submit("findPack", () => this.controller.findPack(term));
  }

  public findPackOnServer(host: string, term: string): QueuedOperation<PackEntity[]> {
    checkHost(host);
    checkSearchTerm(term);
    return this.submit("findPackOnServer", () => this.controller.findPackOnServer(host, term));
  }

  public findPackInChannel(host: string, channel: string, term: string): QueuedOperation<PackEntity[]> {
    checkHost(host);
    checkChannelName(channel);
    checkSearchTerm(term);
    return this.submit("findPackInChannel", () => this.controller.findPackInChannel(host, channel, term));
  }

  public findPackByBot(host: string, channel: string, bot: string, term: string): QueuedOperation<PackEntity[]> {
    checkHost(host);
    checkChannelName(channel);
    checkNickname(bot);
    checkSearchTerm(term);
    return this.submit("findPackByBot", () => this.controller.findPackByBot(host, channel, bot, term));
  }

  // ── Update ──

  /** The identity is copied on submission, like the spec of addServer. */
  public setServerIdentity(host: string, identity: ServerIdentity): QueuedOperation<boolean> {
    const submitted: ServerIdentity = { ...identity };
    checkHost(host);
    checkIdentity(submitted);
    return this.submit("setServerIdentity", () => this.controller.setServerIdentity(host, submitted));
  }

  public setServerPort(host: string, port: number): QueuedOperation<boolean> {
    checkHost(host);
    checkPort(port);
    return this.submit("setServerPort", () => this.controller.setServerPort(host, port));
  }

  public setServerPassword(host: string, password: string | null): QueuedOperation<boolean> {
    checkHost(host);
    return this.submit("setServerPassword", () => this.controller.setServerPassword(host, password));
  }

  public setChannelPassword(host: string, channel: string, password: string | null): QueuedOperation<boolean> {
    checkHost(host);
    checkChannelName(channel);
    return this.submit("setChannelPassword", () => this.controller.setChannelPassword(host, channel, password));
  }

  public setBotListEnabled(host: string, channel: string, bot: string, listEnabled: boolean): QueuedOperation<boolean> {
    checkHost(host);
    checkChannelName(channel);
    checkNickname(bot);
    return this.submit("setBotListEnabled", () => this.controller.setBotListEnabled(host, channel, bot, listEnabled));
  }

  public setBotChannel(host: string, oldChannel: string, newChannel: string, bot: string): QueuedOperation<boolean> {
    checkHost(host);
    checkChannelName(oldChannel);
    checkChannelName(newChannel);
    checkNickname(bot);
    if (oldChannel === newChannel) {
      throw new PreconditionError(`Cannot move the bot ${bot} into the channel it is already in`);
    }
    return this.submit("setBotChannel", () => this.controller.setBotChannel(host, oldChannel, newChannel, bot));
  }

  // ── Delete ──

  public deleteServer(host: string): QueuedOperation<boolean> {
    checkHost(host);
    return this.submit("deleteServer", () => this.controller.deleteServer(host));
  }

  public deleteChannel(host: string, channel: string): QueuedOperation<boolean> {
    checkHost(host);
    checkChannelName(channel);
    return this.submit("deleteChannel", () => this.controller.deleteChannel(host, channel));
  }

  public deleteBot(host: string, channel: string, bot: string): QueuedOperation<boolean> {
    checkHost(host);
    checkChannelName(channel);
    checkNickname(bot);
    return this.submit("deleteBot", () => this.controller.deleteBot(host, channel, bot));
  }

  public deletePack(host: string, channel: string, bot: string, number: number): QueuedOperation<boolean> {
    checkHost(host);
    checkChannelName(channel);
    checkNickname(bot);
    checkPackNumber(number);
    return this.submit("deletePack", () => this.controller.deletePack(host, channel, bot, number));
  }

  // ── Lifecycle ──

  /**
   * Stops accepting operations, waits up to `timeoutMs` for the queue to
   * drain and closes the underlying controller. Operations still queued when
   * the timeout expires are rejected with CatalogClosedError.
   *
   * Aborting `options.signal` during the wait rejects with InterruptedError
   * and leaves the controller open; `close` may then be called again. Once
   * the controller is closed, `close` rejects with CatalogClosedError.
   */
  public close(timeoutMs: number = this.closeTimeoutMs, options: CloseOptions = {}): Promise<void> {
    if (this.controller.isClosed()) {
      return Promise.reject(new CatalogClosedError());
    }
    if (this.closing) {
      return this.closing;
    }

    this.accepting = false;
    this.logger.info({ event: "async.closing", pending: this.queue.length, timeoutMs });

    this.closing = this.drainAndClose(timeoutMs, options.signal);
    return this.closing;
  }

  public isClosed(): boolean {
    return this.controller.isClosed();
  }

  // ── Worker ──

  private submit<T>(label: string, work: () => T): QueuedOperation<T> {
    if (!this.accepting) {
      throw new CatalogClosedError(`Cannot submit ${label}: the asynchronous controller is closing`);
    }

    const operation = new QueuedOperation(label, work, (cancelled) => this.withdraw(cancelled));
    this.queue.push(operation);
    this.logger.debug({ event: "async.submitted", operation: label, pending: this.queue.length });
    this.scheduleWorker();
    return operation;
  }

  private withdraw(task: QueuedTask): void {
    const index = this.queue.indexOf(task);
    if (index >= 0) {
      this.queue.splice(index, 1);
      this.logger.debug({ event: "async.cancelled", operation: task.label });
    }
    if (this.queue.length === 0) {
      this.notifyIdle();
    }
  }

  private scheduleWorker(): void {
    if (this.workerScheduled || this.queue.length === 0) {
      return;
    }

    this.workerScheduled = true;
    setImmediate(() => this.runNext());
  }

  private runNext(): void {
    this.workerScheduled = false;

    const task = this.queue.shift();
    if (task) {
      task.run();
    }

    if (this.queue.length === 0) {
      this.notifyIdle();
    } else {
      this.scheduleWorker();
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }

  /** Resolves true once the queue is empty, false when `timeoutMs` passes first. */
  private waitForIdle(timeoutMs: number, signal: AbortSignal | undefined): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.reject(new InterruptedError("Interrupted before the queue drained", { cause: signal.reason }));
    }
    if (this.queue.length === 0) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve, reject) => {
      const onIdle = (): void => {
        cleanup();
        resolve(true);
      };
      const onAbort = (): void => {
        cleanup();
        reject(new InterruptedError("Interrupted while waiting for the queue to drain", { cause: signal?.reason }));
      };
      const timer = setTimeout(() => {
        cleanup();
        resolve(false);
      }, timeoutMs);
      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.idleWaiters = this.idleWaiters.filter((waiter) => waiter !== onIdle);
      };

      this.idleWaiters.push(onIdle);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private async drainAndClose(timeoutMs: number, signal: AbortSignal | undefined): Promise<void> {
    let drained: boolean;
    try {
      drained = await this.waitForIdle(timeoutMs, signal);
    } catch (error) {
      this.logger.debug({ event: "async.close-interrupted", pending: this.queue.length });
      this.closing = null;
      throw error;
    }

    if (!drained) {
      const abandoned = this.queue.splice(0);
      this.logger.warn({ event: "async.close-timeout", abandoned: abandoned.length, timeoutMs });
      for (const task of abandoned) {
        task.discard(new CatalogClosedError(`${task.label} did not run before the controller closed`));
      }
    }

    this.controller.close();
    this.logger.info({ event: "async.closed" });
  }
}
