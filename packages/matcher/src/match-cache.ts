import type { MatchResult } from '@subseq/shared/types';
import { cloneResult } from './reducer.js';

/**
 * Memo of best results keyed by the exact `(query, candidate)` pair.
 *
 * Case sensitivity and scoring mode belong to the owning matcher, not the key.
 * Entries live until {@link MatchCache.clear}; there is no eviction, so callers
 * that need bounded memory clear it themselves. Stored and returned results are
 * copies.
 */
export class MatchCache {
  private readonly entries = new Map<string, Map<string, MatchResult>>();
  private count = 0;

  lookup(query: string, candidate: string): MatchResult | undefined {
    const hit = this.entries.get(query)?.get(candidate);
    return hit ? cloneResult(hit) : undefined;
  }

  insert(query: string, candidate: string, result: MatchResult): void {
    let byCandidate = this.entries.get(query);
    if (!byCandidate) {
      byCandidate = new Map();
      this.entries.set(query, byCandidate);
    }
    if (!byCandidate.has(candidate)) this.count++;
    byCandidate.set(candidate, cloneResult(result));
  }

  clear(): void {
    this.entries.clear();
    this.count = 0;
  }

  /** Number of cached pairs. */
  get size(): number {
    return this.count;
  }
}
