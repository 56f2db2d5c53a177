/**
 * Error types for topic index operations
 *
 * Invariants:
 * - Store errors include the absolute index path in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all topicsearch errors
 */
export abstract class TopicSearchError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a document is malformed (e.g. empty url) before it reaches the store
 */
export class InvalidDocumentError extends TopicSearchError {
  readonly code = "E_INVALID_DOCUMENT";

  constructor(
    public readonly url: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid document "${url}": ${reason}`, options);
  }
}

/**
 * Thrown when an option passed to the engine is out of range
 */
export class InvalidArgumentError extends TopicSearchError {
  readonly code = "E_INVALID_ARGUMENT";

  constructor(name: string, reason: string, options?: ErrorOptions) {
    super(`Invalid argument ${name}: ${reason}`, options);
  }
}

/**
 * Thrown when the index path cannot be created, read for writing or committed to
 */
export class StoreUnavailableError extends TopicSearchError {
  readonly code = "E_STORE_UNAVAILABLE";

  constructor(indexPath: string, options?: ErrorOptions) {
    super(`Index store unavailable: ${indexPath}`, options);
  }
}

/**
 * Thrown when an operation is attempted on a closed handle
 */
export class StoreClosedError extends TopicSearchError {
  readonly code = "E_STORE_CLOSED";

  constructor(indexPath: string, options?: ErrorOptions) {
    super(`Index handle is closed: ${indexPath}`, options);
  }
}

/**
 * Thrown when another live writer holds the index lock
 */
export class StoreLockedError extends TopicSearchError {
  readonly code = "E_STORE_LOCKED";

  constructor(
    indexPath: string,
    public readonly holderPid?: number,
    options?: ErrorOptions
  ) {
    const holder = holderPid === undefined ? "another writer" : `process ${holderPid}`;
    super(`Index is locked by ${holder}: ${indexPath}`, options);
  }
}

/**
 * Thrown when the committed index is missing or corrupt
 */
export class IndexUnavailableError extends TopicSearchError {
  readonly code = "E_INDEX_UNAVAILABLE";

  constructor(
    indexPath: string,
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`Index unavailable (${reason}): ${indexPath}`, options);
  }
}
