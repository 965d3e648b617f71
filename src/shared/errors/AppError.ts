/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * The resolver distinguishes two kinds of failure:
 *
 *   1. Operational errors: the store is down, the external provider timed
 *      out, the queue insert failed. These are expected at runtime. The
 *      component that produced them converts them into a tier miss plus a
 *      statistics counter; they never abort a batch.
 *
 *   2. Configuration errors: a malformed override file or strategy. These are
 *      raised at startup and are meant to stop the process, because running
 *      with corrupt static configuration yields systematically wrong IDs.
 *
 * `code` is a stable machine-readable identifier for logs and tests.
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses whatever the compilation target.
 */
export type ErrorCode =
  | 'INTERNAL'
  | 'STORE_UNAVAILABLE'
  | 'EXTERNAL_LOOKUP_FAILED'
  | 'EXTERNAL_LOOKUP_TIMEOUT'
  | 'EXTERNAL_MATCH_INVALID'
  | 'QUEUE_ENQUEUE_FAILED'
  | 'CONFIGURATION_ERROR';

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;

  constructor(message: string, code: ErrorCode = 'INTERNAL', isOperational = true, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Persistent mapping cache or queue table could not be reached. */
export class StoreUnavailableError extends AppError {
  constructor(operation: string, options?: ErrorOptions) {
    super(`Store unavailable during ${operation}`, 'STORE_UNAVAILABLE', true, options);
  }
}

/** Timeout, error response or malformed answer from the external lookup provider. */
export class ExternalLookupError extends AppError {
  constructor(reason: string, options?: ErrorOptions) {
    super(`External lookup failed: ${reason}`, 'EXTERNAL_LOOKUP_FAILED', true, options);
  }
}

export class ExternalLookupTimeoutError extends AppError {
  constructor(timeoutMs: number, options?: ErrorOptions) {
    super(`External lookup timed out after ${timeoutMs} ms`, 'EXTERNAL_LOOKUP_TIMEOUT', true, options);
  }
}

/** The provider answered, but not with a usable company ID. */
export class InvalidExternalMatchError extends AppError {
  constructor(reason: string, options?: ErrorOptions) {
    super(`External match rejected: ${reason}`, 'EXTERNAL_MATCH_INVALID', true, options);
  }
}

export class QueueEnqueueError extends AppError {
  constructor(requestCount: number, options?: ErrorOptions) {
    super(`Backfill enqueue failed for ${requestCount} request(s)`, 'QUEUE_ENQUEUE_FAILED', true, options);
  }
}

/** Missing/invalid static configuration. Not recovered; surfaces at startup. */
export class ConfigurationError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIGURATION_ERROR', false, options);
  }
}

/**
 * Stable label for a caught value: the AppError code, else the error class.
 * Never carries message text, which may quote the name being looked up.
 */
export function errorLabel(err: unknown): string {
  if (err instanceof AppError) return err.code;
  if (err instanceof Error) return err.name;
  return 'UNKNOWN';
}

/** Human-readable reason for a caught value, without its stack. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
