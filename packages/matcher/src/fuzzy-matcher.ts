/**
 * Cached fuzzy subsequence matcher.
 *
 * Wraps the pure pipeline in `engine.ts` with a per-instance memo and the two
 * multi-candidate strategies: index-aligned batch matching and top-K selection.
 *
 * Multi-candidate calls above the parallel threshold use compute-then-merge.
 * Cache misses are split into one chunk per pool worker and computed off the
 * calling thread; workers never see the cache. A single merge step on the
 * calling thread then writes the cache and assembles the output by index.
 *
 * @module matcher/fuzzy-matcher
 */
import { MatcherOptionsSchema } from '@subseq/shared/config-schema';
import type { MatcherOptions, MatcherOptionsInput } from '@subseq/shared/config-schema';
import type { MatchResult, TopKEntry } from '@subseq/shared/types';
import { logger } from '@subseq/shared/logger';
import { computeMatch, type EngineConfig } from './engine.js';
import { MatchCache } from './match-cache.js';
import { BoundedMinHeap } from './bounded-heap.js';
import { noMatch } from './reducer.js';
import { MatchWorkerPool, defaultPoolSize, type MatchChunkTask } from './worker-pool.js';

interface IndexedResult {
  index: number;
  result: MatchResult;
}

interface PendingCandidate {
  index: number;
  candidate: string;
}

/** A positive top-K hit and whether it still has to be written to the cache. */
interface TopKHit {
  entry: TopKEntry;
  candidate: string;
  fresh: boolean;
}

/** Lower score ranks lower; on equal scores the later candidate ranks lower. */
function rankEntries(a: TopKEntry, b: TopKEntry): number {
  return a.score - b.score || b.index - a.index;
}

/** Descending by score, ascending by candidate index on ties. */
function byScoreDescending(a: TopKEntry, b: TopKEntry): number {
  return b.score - a.score || a.index - b.index;
}

/**
 * Fuzzy matcher with fixed case sensitivity and scoring mode.
 *
 * @example
 * ```typescript
 * const matcher = new FuzzyMatcher({ pathMode: true });
 * matcher.match('ab', 'src/ab.rs'); // { score: 6, positions: [4, 5] }
 * await matcher.matchTopK('idx', paths, 10);
 * await matcher.close();
 * ```
 */
export class FuzzyMatcher {
  readonly options: MatcherOptions;
  private readonly config: EngineConfig;
  private readonly cache = new MatchCache();
  private pool: MatchWorkerPool | null = null;

  /**
   * @param options - Validated with `MatcherOptionsSchema`; throws a `ZodError` when invalid
   */
  constructor(options: MatcherOptionsInput = {}) {
    this.options = MatcherOptionsSchema.parse(options);
    this.config = {
      caseSensitive: this.options.caseSensitive,
      mode: this.options.pathMode ? 'path' : 'default',
    };
  }

  /**
   * Match one query against one candidate, consulting the cache first.
   *
   * @returns The best alignment, or `{ score: 0, positions: [] }` for no match
   */
  match(query: string, candidate: string): MatchResult {
    const cached = this.cache.lookup(query, candidate);
    if (cached) return cached;

    const result = computeMatch(query, candidate, this.config);
    this.cache.insert(query, candidate, result);
    return result;
  }

  /**
   * Match one query against many candidates.
   *
   * @returns One result per candidate, in input order
   */
  async matchBatch(query: string, candidates: readonly string[]): Promise<MatchResult[]> {
    if (candidates.length < this.options.parallelThreshold) {
      return candidates.map((candidate) => this.match(query, candidate));
    }

    const assembled: IndexedResult[] = [];
    const misses: PendingCandidate[] = [];
    candidates.forEach((candidate, index) => {
      const cached = this.cache.lookup(query, candidate);
      if (cached) assembled.push({ index, result: cached });
      else misses.push({ index, candidate });
    });

    logger.debug(
      `[matcher] batch of ${candidates.length}: ${assembled.length} cached, ${misses.length} to compute`,
    );

    const computed = await this.computeInPool(query, misses, false);

    misses.forEach(({ index, candidate }, slot) => {
      const result = computed[slot] ?? noMatch();
      this.cache.insert(query, candidate, result);
      assembled.push({ index, result });
    });

    assembled.sort((a, b) => a.index - b.index);
    return assembled.map(({ result }) => result);
  }

  /**
   * Return the `k` best positive matches, best first.
   *
   * Small inputs, and `k` of at least half the candidate count, go through
   * {@link FuzzyMatcher.matchBatch}. Larger inputs are pre-filtered and reduced
   * through a bounded min-heap without materializing every result. Both paths
   * order equal scores by ascending candidate index.
   *
   * Rejects with a `RangeError` when `k` is not a non-negative integer.
   */
  async matchTopK(query: string, candidates: readonly string[], k: number): Promise<TopKEntry[]> {
    if (!Number.isInteger(k) || k < 0) {
      throw new RangeError(`k must be a non-negative integer, got ${k}`);
    }
    if (candidates.length === 0 || k === 0) return [];

    if (
      candidates.length < this.options.parallelThreshold ||
      k >= Math.floor(candidates.length / 2)
    ) {
      const results = await this.matchBatch(query, candidates);
      return results
        .map(({ score, positions }, index) => ({ index, score, positions }))
        .filter((entry) => entry.score > 0)
        .sort(byScoreDescending)
        .slice(0, k);
    }

    return this.streamTopK(query, candidates, k);
  }

  /** Drop every cached result. */
  clearCache(): void {
    logger.debug(`[matcher] clearing ${this.cache.size} cached results`);
    this.cache.clear();
  }

  /** Number of cached `(query, candidate)` pairs. */
  cacheSize(): number {
    return this.cache.size;
  }

  /** Terminate the worker pool, if one was started. The cache is kept. */
  async close(): Promise<void> {
    await this.pool?.close();
  }

  private workerPool(): MatchWorkerPool {
    this.pool ??= new MatchWorkerPool(this.options.poolSize ?? defaultPoolSize());
    return this.pool;
  }

  /**
   * Compute `pending` in one chunk per pool worker.
   *
   * @returns One entry per pending candidate, in order; `null` where the
   *   pre-filter rejected the candidate
   */
  private async computeInPool(
    query: string,
    pending: readonly PendingCandidate[],
    prefilter: boolean,
  ): Promise<Array<MatchResult | null>> {
    if (pending.length === 0) return [];

    const pool = this.workerPool();
    const chunkSize = Math.ceil(pending.length / pool.size);
    const tasks: MatchChunkTask[] = [];
    for (let start = 0; start < pending.length; start += chunkSize) {
      tasks.push({
        query,
        candidates: pending.slice(start, start + chunkSize).map(({ candidate }) => candidate),
        config: this.config,
        prefilter,
      });
    }

    const responses = await pool.map(tasks);
    return responses.flatMap(({ results }) => results);
  }

  private async streamTopK(
    query: string,
    candidates: readonly string[],
    k: number,
  ): Promise<TopKEntry[]> {
    const hits: TopKHit[] = [];
    const misses: PendingCandidate[] = [];
    candidates.forEach((candidate, index) => {
      const cached = this.cache.lookup(query, candidate);
      if (!cached) misses.push({ index, candidate });
      else if (cached.score > 0) hits.push({ entry: { index, ...cached }, candidate, fresh: false });
    });

    const computed = await this.computeInPool(query, misses, true);
    misses.forEach(({ index, candidate }, slot) => {
      const result = computed[slot];
      if (result && result.score > 0) {
        hits.push({ entry: { index, ...result }, candidate, fresh: true });
      }
    });

    logger.debug(
      `[matcher] top-${k} over ${candidates.length} candidates: ${hits.length} positive`,
    );

    const heap = new BoundedMinHeap<TopKEntry>(k, rankEntries);
    for (const { entry, candidate, fresh } of hits) {
      if (fresh) this.cache.insert(query, candidate, entry);
      heap.offer(entry);
    }

    return heap.drain().sort(byScoreDescending);
  }
}
