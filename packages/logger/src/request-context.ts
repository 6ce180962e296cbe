/**
 * @fileoverview Query context management using AsyncLocalStorage
 * Carries the active query's ID through every await of its processing.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Request context structure
 */
export interface RequestContext {
  /** Query identifier, e.g. `q-12` */
  request_id: string;

  [key: string]: unknown;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

let requestCounter = 0;

/**
 * Generate the next sequential query ID (`q-1`, `q-2`, ...).
 */
export function generateRequestId(): string {
  requestCounter += 1;
  return `q-${requestCounter}`;
}

/**
 * Get the current request context, or undefined outside one.
 */
export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

/**
 * Get the current request ID from the active context
 *
 * @example
 * ```typescript
 * logger.info('Processing', { request_id: getRequestId() });
 * ```
 */
export function getRequestId(): string | undefined {
  return requestContextStorage.getStore()?.request_id;
}

/**
 * Execute a function within a new request context
 *
 * @param fn - Function to execute within the context
 * @param requestId - ID to use; a sequential one is generated when omitted
 * @param additionalContext - Extra fields stored beside the ID
 *
 * @example
 * ```typescript
 * const answer = await withRequestContext(() => processor.processQuery(line), undefined, {
 *   line,
 * });
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RequestContext = {
    ...additionalContext,
    request_id: requestId ?? generateRequestId(),
  };

  return requestContextStorage.run(context, fn);
}

/**
 * Merge fields into the current request context.
 *
 * @returns true if context was updated, false if not in a request context
 */
export function setRequestContext(fields: Record<string, unknown>): boolean {
  const context = requestContextStorage.getStore();
  if (!context) {
    return false;
  }

  Object.assign(context, fields);
  return true;
}
