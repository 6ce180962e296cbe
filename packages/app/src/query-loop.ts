/**
 * Line-oriented query loop: queries in, answers out.
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { isCacheInvariantError, isTapeCacheError } from '@tapecache/contracts';
import type { Logger } from '@tapecache/logger';
import type { QueryProcessor } from './processor.js';

export interface QueryLoopOptions {
  input: Readable;

  /** Receives one answer line per successful query */
  output: Writable;

  /** Receives `error processing query: <message>` lines */
  errorOutput: Writable;

  logger: Logger;
}

/**
 * Exit code of the loop: 0 once input ends, 2 after a cache invariant
 * violation.
 */
export type QueryLoopExitCode = 0 | 2;

/**
 * Read queries until the input ends, answering each in order.
 *
 * Blank lines are skipped. A failed query is reported and the loop moves
 * on; a cache invariant violation stops reading.
 */
export async function runQueryLoop(
  processor: QueryProcessor,
  options: QueryLoopOptions
): Promise<QueryLoopExitCode> {
  const { input, output, errorOutput, logger } = options;
  const lines = createInterface({ input, crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      if (line.trim() === '') {
        continue;
      }

      try {
        const answer = await processor.processLine(line);
        output.write(`${answer}\n`);
      } catch (error) {
        if (isCacheInvariantError(error)) {
          logger.error('Cache invariant violated, stopping', {
            operation: 'query_loop',
            error: error.toJSON(),
            fatal: true,
          });
          return 2;
        }

        const message = error instanceof Error ? error.message : String(error);
        errorOutput.write(`error processing query: ${message}\n`);
        logger.debug('Query failed', {
          operation: 'query_loop',
          code: isTapeCacheError(error) ? error.code : 'UNKNOWN',
          error: message,
        });
      }
    }
  } finally {
    lines.close();
  }

  return 0;
}
