// Error types raised by the catalog controllers and stores.

export class CatalogError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or missing input. Raised before anything is written. */
export class ValidationError extends CatalogError {}

/**
 * The operation needs a parent that does not exist, would create a duplicate,
 * or would move a bot into the channel it already is in.
 */
export class PreconditionError extends CatalogError {}

export class CatalogClosedError extends CatalogError {
  public constructor(message = "Catalog controller has been closed") {
    super(message);
  }
}

/** An operation was called while another one of the same controller was running. */
export class CatalogReentrancyError extends CatalogError {
  public readonly activeOperation: string;

  public constructor(requested: string, activeOperation: string) {
    super(`Cannot run ${requested} while ${activeOperation} is in progress`);
    this.activeOperation = activeOperation;
  }
}

export class ObserverRegistrationError extends CatalogError {}

/** One or more observers threw while being notified of a committed change. */
export class ObserverError extends CatalogError {
  public readonly failures: unknown[];

  public constructor(event: string, failures: unknown[]) {
    super(`${failures.length} observer(s) failed while handling ${event}`, { cause: failures[0] });
    this.failures = failures;
  }
}

export class OperationCancelledError extends CatalogError {
  public constructor(operation: string) {
    super(`${operation} was cancelled before it started`);
  }
}

export class InterruptedError extends CatalogError {}

/** Raised by a store when a write would break the shape of the hierarchy. */
export class StoreError extends CatalogError {}
