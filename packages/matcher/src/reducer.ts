import type { MatchResult } from '@subseq/shared/types';

/** A fresh "no match" result. */
export function noMatch(): MatchResult {
  return { score: 0, positions: [] };
}

/** Deep copy, so cached results never alias caller-owned arrays. */
export function cloneResult(result: MatchResult): MatchResult {
  return { score: result.score, positions: [...result.positions] };
}

/**
 * Pick the highest-scoring result. Ties keep the earliest one.
 *
 * @returns The winner, or {@link noMatch} when `results` is empty
 */
export function pickBest(results: Iterable<MatchResult>): MatchResult {
  let best: MatchResult | undefined;
  for (const result of results) {
    if (!best || result.score > best.score) best = result;
  }
  return best ?? noMatch();
}
