/**
 * Query processor: resolves a query against the range cache, fetches and
 * aggregates the gaps, folds them back into the cache and answers.
 *
 * Per query: Parsed -> Resolved -> Fetching -> Aggregated -> CacheUpdated -> Answered.
 */

import {
  TradeFetchError,
  emptyMetrics,
  formatInterval,
  formatMetric,
  intervalLength,
  isTapeCacheError,
  makeInterval,
  serializeMetrics,
  sumMetrics,
} from '@tapecache/contracts';
import type { Interval, Metrics, QueryRequest, TradeEvent } from '@tapecache/contracts';
import {
  createChildLogger,
  createSilentLogger,
  measureAsync,
  startTimer,
  withRequestContext,
} from '@tapecache/logger';
import type { Logger } from '@tapecache/logger';
import { IntervalCache, applyPlan, resolveRange } from '@tapecache/range-cache';
import type { GapResult, RangeGap } from '@tapecache/range-cache';
import type { TradeSource } from '@tapecache/trade-source';
import { aggregateTrades } from './aggregator.js';
import { parseQuery } from './parser.js';

export interface QueryProcessorOptions {
  source: TradeSource;

  /** Cache to read and update; a fresh one when omitted */
  cache?: IntervalCache;

  logger?: Logger;

  /**
   * Check cache disjointness after every update.
   * @default true
   */
  verifyInvariants?: boolean;
}

/**
 * Counters since the processor was created.
 */
export interface ProcessorStats {
  /** Queries answered */
  queries: number;

  /** Cached ranges reused as full hits */
  hitRanges: number;

  /** Gap fetches issued to the trade source */
  fetchCalls: number;

  /** Total seconds of range fetched */
  secondsFetched: number;

  /** Stale entries dropped because a repeated sequence number made the split inexact */
  staleDropped: number;

  /** Entries currently cached */
  cacheEntries: number;
}

/**
 * Answers metric queries through an interval cache in front of a slow
 * trade source.
 *
 * Queries are serialized: a query starts only after the previous one has
 * answered or failed, so no query observes a half-applied split.
 *
 * @example
 * ```typescript
 * const processor = new QueryProcessor({ source, logger });
 * await processor.processLine('C 0 10'); // '1'
 * ```
 */
export class QueryProcessor {
  private readonly source: TradeSource;
  private readonly cache: IntervalCache;
  private readonly logger: Logger;
  private readonly verifyInvariants: boolean;
  private tail: Promise<void> = Promise.resolve();
  private stats = { queries: 0, hitRanges: 0, fetchCalls: 0, secondsFetched: 0, staleDropped: 0 };

  constructor(options: QueryProcessorOptions) {
    this.source = options.source;
    this.cache = options.cache ?? new IntervalCache();
    this.logger = createChildLogger(options.logger ?? createSilentLogger(), {
      component: 'query-processor',
    });
    this.verifyInvariants = options.verifyInvariants ?? true;
  }

  /**
   * Parse and answer one query line inside its own request context.
   *
   * @throws QueryParseError for a malformed line; the cache is untouched
   * @throws TradeFetchError when a gap cannot be fetched; the cache is untouched
   * @throws CacheInvariantError when the cache is corrupt
   */
  processLine(line: string): Promise<string> {
    return withRequestContext(() => this.process(parseQuery(line)), undefined, { line });
  }

  /**
   * Answer a parsed query with the requested metric's text.
   */
  async process(request: QueryRequest): Promise<string> {
    const metrics = await this.computeMetrics(request.range);
    return formatMetric(metrics, request.metric);
  }

  /**
   * All four metrics over `[range.start, range.end)`. An empty range
   * answers zero without touching the cache or the source.
   */
  computeMetrics(range: { start: number; end: number }): Promise<Metrics> {
    return this.serialize(async () => {
      if (range.start >= range.end) {
        this.stats.queries++;
        return emptyMetrics();
      }
      return this.resolveAndUpdate(makeInterval(range.start, range.end));
    });
  }

  getStats(): ProcessorStats {
    return { ...this.stats, cacheEntries: this.cache.size() };
  }

  private async resolveAndUpdate(query: Interval): Promise<Metrics> {
    const timer = startTimer();
    const plan = resolveRange(this.cache, query);

    this.logger.debug('Resolved query range', {
      operation: 'resolve_range',
      range: formatInterval(query),
      hits: plan.hits.length,
      gaps: plan.gaps.length,
      discarded: plan.discarded.length,
      cache: plan.gaps.length === 0 ? 'hit' : 'miss',
    });

    // Every gap is fetched before the cache changes
    const results: GapResult[] = [];
    for (const gap of plan.gaps) {
      results.push({ gap, metrics: aggregateTrades(await this.fetchGap(gap)) });
    }

    const applied = applyPlan(this.cache, plan, results, { verifyInvariants: this.verifyInvariants });

    const total = sumMetrics([
      ...plan.hits.map((entry) => entry.metrics),
      ...results.map((result) => result.metrics),
    ]);

    this.stats.queries++;
    this.stats.hitRanges += plan.hits.length;
    this.stats.staleDropped += applied.staleDropped;

    this.logger.info('Query answered', {
      operation: 'answer_query',
      range: formatInterval(query),
      metrics: serializeMetrics(total),
      cache_entries: this.cache.size(),
      stale_dropped: applied.staleDropped,
      duration_ms: timer.stop(),
    });

    return total;
  }

  private async fetchGap(gap: RangeGap): Promise<TradeEvent[]> {
    this.stats.fetchCalls++;
    this.stats.secondsFetched += intervalLength(gap.range);

    try {
      const { result, duration_ms } = await measureAsync(() => this.source.fetchTrades(gap.range));
      this.logger.debug('Fetched gap', {
        operation: 'fetch_gap',
        range: formatInterval(gap.range),
        stale: gap.stale?.kind,
        trades: result.length,
        duration_ms,
      });
      return result;
    } catch (error) {
      if (isTapeCacheError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TradeFetchError(`failed to fetch ${formatInterval(gap.range)}: ${message}`, {
        start: gap.range.start,
        end: gap.range.end,
      });
    }
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
