/**
 * @fileoverview Error taxonomy for the tapecache engine.
 *
 * Every error carries a machine-readable code, a structured data payload and
 * the ISO timestamp of its creation, so the CLI can log it as one record.
 *
 * @module @tapecache/contracts/errors
 */

/**
 * Base error class for all tapecache errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new TapeCacheError('INVALID_INTERVAL', 'start must be before end', { start: 5, end: 5 });
 * ```
 */
export class TapeCacheError extends Error {
  /** Machine-readable error code (e.g., 'QUERY_PARSE'). */
  readonly code: string;

  /** Structured context for logs. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created. */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'TapeCacheError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Field of a query line that failed validation.
 */
export type QueryField = 'line' | 'metric' | 'start' | 'end';

/**
 * Thrown when a query line is malformed.
 *
 * Recoverable: the offending line is reported and the next one is read.
 *
 * @example
 * ```typescript
 * throw new QueryParseError('invalid start timestamp: abc', {
 *   field: 'start',
 *   value: 'abc',
 *   line: 'C abc 10',
 * });
 * ```
 */
export class QueryParseError extends TapeCacheError {
  declare readonly data: {
    field: QueryField;
    value: string;
    line: string;
  };

  constructor(message: string, data: { field: QueryField; value: string; line: string }) {
    super('QUERY_PARSE', message, data);
    this.name = 'QueryParseError';
  }

  /** The field that failed validation. */
  get field(): QueryField {
    return this.data.field;
  }
}

/**
 * Thrown when the backing trade source fails to return a range.
 *
 * The query is abandoned before any cache mutation.
 */
export class TradeFetchError extends TapeCacheError {
  constructor(message: string, data: { start: number; end: number; [key: string]: unknown }) {
    super('TRADE_FETCH', message, data);
    this.name = 'TradeFetchError';
  }
}

/**
 * Thrown when cache state breaks an invariant (overlapping entries, negative
 * residual metrics). Never caused by user input; callers treat it as fatal.
 */
export class CacheInvariantError extends TapeCacheError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('CACHE_INVARIANT', message, data);
    this.name = 'CacheInvariantError';
  }
}

/**
 * Thrown when the trade log cannot be loaded at startup.
 *
 * @example
 * ```typescript
 * throw new TradeLogLoadError('invalid price "x"', { path: './trades.csv', row: 12 });
 * ```
 */
export class TradeLogLoadError extends TapeCacheError {
  constructor(message: string, data: { path: string; row?: number; [key: string]: unknown }) {
    super('TRADE_LOG_LOAD', message, data);
    this.name = 'TradeLogLoadError';
  }
}

/**
 * Type guard for any tapecache error.
 */
export function isTapeCacheError(error: unknown): error is TapeCacheError {
  return error instanceof TapeCacheError;
}

/**
 * Type guard for query parse failures.
 */
export function isQueryParseError(error: unknown): error is QueryParseError {
  return error instanceof QueryParseError;
}

/**
 * Type guard for fetch failures.
 */
export function isTradeFetchError(error: unknown): error is TradeFetchError {
  return error instanceof TradeFetchError;
}

/**
 * Type guard for invariant violations.
 *
 * @example
 * ```typescript
 * catch (err) {
 *   if (isCacheInvariantError(err)) {
 *     logger.error('Cache corrupted', err.toJSON());
 *     process.exit(2);
 *   }
 * }
 * ```
 */
export function isCacheInvariantError(error: unknown): error is CacheInvariantError {
  return error instanceof CacheInvariantError;
}
