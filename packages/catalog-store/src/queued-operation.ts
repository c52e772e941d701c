// Deferred handle for work submitted to an AsyncCatalogController.

import { OperationCancelledError } from "./errors.js";

export type OperationStatus = "queued" | "running" | "fulfilled" | "rejected" | "cancelled";

type Outcome<T> = { ok: true; value: T } | { ok: false; reason: unknown };

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

/** What the single worker of an AsyncCatalogController pulls off its queue. */
export interface QueuedTask {
  readonly label: string;
  run(): void;
  /** Settles a task that will never run. */
  discard(reason: Error): void;
}

/**
 * Awaitable result of one queued operation.
 *
 * The outcome is kept until someone asks for it, so a failure is only ever
 * reported to the callers that subscribe through `then`.
 */
export class QueuedOperation<T> implements PromiseLike<T>, QueuedTask {
  public readonly label: string;
  private readonly work: () => T;
  private readonly onCancel: (operation: QueuedOperation<T>) => void;
  private state: OperationStatus = "queued";
  private outcome: Outcome<T> | null = null;
  private waiters: Waiter<T>[] = [];

  public constructor(label: string, work: () => T, onCancel: (operation: QueuedOperation<T>) => void) {
    this.label = label;
    this.work = work;
    this.onCancel = onCancel;
  }

  public get status(): OperationStatus {
    return this.state;
  }

  public isDone(): boolean {
    return this.outcome !== null;
  }

  /**
   * Cancels the operation if it has not started yet. Returns false once it is
   * running or finished.
   */
  public cancel(): boolean {
    if (this.state !== "queued") {
      return false;
    }

    this.onCancel(this);
    this.settle("cancelled", { ok: false, reason: new OperationCancelledError(this.label) });
    return true;
  }

  public then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.asPromise().then(onfulfilled, onrejected);
  }

  public run(): void {
    if (this.state !== "queued") {
      return;
    }

    this.state = "running";
    try {
      const value = this.work();
      this.settle("fulfilled", { ok: true, value });
    } catch (error) {
      this.settle("rejected", { ok: false, reason: error });
    }
  }

  public discard(reason: Error): void {
    if (this.state !== "queued") {
      return;
    }
    this.settle("rejected", { ok: false, reason });
  }

  /** A fresh promise for the outcome. */
  public asPromise(): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const outcome = this.outcome;
      if (outcome === null) {
        this.waiters.push({ resolve, reject });
      } else if (outcome.ok) {
        resolve(outcome.value);
      } else {
        reject(outcome.reason);
      }
    });
  }

  private settle(state: OperationStatus, outcome: Outcome<T>): void {
    this.state = state;
    this.outcome = outcome;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (outcome.ok) {
        waiter.resolve(outcome.value);
      } else {
        waiter.reject(outcome.reason);
      }
    }
  }
}
