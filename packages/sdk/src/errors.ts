/**
 * Error types for timekv operations
 *
 * Invariants:
 * - Backend failures are wrapped with the name of the failing operation
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all timekv errors
 */
export abstract class TimeKVError extends Error {
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
 * Thrown when a backend command or transaction fails
 */
export class StoreOperationError extends TimeKVError {
  readonly code = "STORE_ERROR";

  constructor(
    public readonly operation: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(withCause(message, options), options);
  }
}

/**
 * Thrown when the range script cannot be registered with the backend
 */
export class ScriptLoadError extends TimeKVError {
  readonly code = "SCRIPT_LOAD_ERROR";

  constructor(options?: ErrorOptions) {
    super(withCause("failed to load range script", options), options);
  }
}

/**
 * Thrown when the range script replies with something other than
 * a `[total, values]` pair. Usually means the server-side script and
 * this client disagree about the protocol.
 */
export class UnexpectedScriptResultError extends TimeKVError {
  readonly code = "E_SCRIPT_RESULT";

  constructor(
    public readonly reply: unknown,
    options?: ErrorOptions
  ) {
    super("unexpected result from range script", options);
  }
}

/**
 * Thrown (or yielded) by the page combinator when a page fetch fails
 */
export class PageFetchError extends TimeKVError {
  readonly code = "PAGE_FETCH_ERROR";

  constructor(
    message: "fetching first page failed" | "fetching next page failed",
    public readonly offset: number,
    options?: ErrorOptions
  ) {
    super(withCause(message, options), options);
  }
}

/**
 * Thrown when store options or call arguments fail validation
 */
export class InvalidOptionsError extends TimeKVError {
  readonly code = "INVALID_OPTIONS";

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid options: ${issues.join("; ")}`, options);
  }
}

/**
 * Thrown when the caller's abort signal fires before a backend call
 */
export class OperationAbortedError extends TimeKVError {
  readonly code = "ABORTED";

  constructor(
    public readonly operation: string,
    options?: ErrorOptions
  ) {
    super(`${operation} aborted`, options);
  }
}

/**
 * Appends the cause's message so wrapped errors read as one chain,
 * e.g. "failed to set entity: connection refused"
 */
function withCause(message: string, options?: ErrorOptions): string {
  const cause = options?.cause;
  if (cause instanceof Error && cause.message) {
    return `${message}: ${cause.message}`;
  }
  if (typeof cause === "string" && cause) {
    return `${message}: ${cause}`;
  }
  return message;
}
