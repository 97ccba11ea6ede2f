/**
 * Single-pair matching pipeline.
 *
 * normalize → (one-character fast path | membership pre-check → position finder
 * → alignment enumerator → scorer) → best-alignment reducer.
 *
 * Everything here is a pure function of its arguments, which is what lets the
 * batch matcher compute many pairs before touching the cache.
 *
 * @module matcher/engine
 */
import type { MatchResult, ScoringMode } from '@subseq/shared/types';
import { getFirstLetters } from './first-letters.js';
import { containsAllChars, findLetterPositions } from './position-finder.js';
import { enumerateAlignments } from './alignment.js';
import { scorePositions } from './scorer.js';
import { matchSingleChar } from './single-char.js';
import { noMatch, pickBest } from './reducer.js';

/** Case and scoring settings applied to every pair. */
export interface EngineConfig {
  caseSensitive: boolean;
  mode: ScoringMode;
}

/**
 * Split text into code points, lower-cased unless matching is case-sensitive.
 *
 * Every position the engine reports indexes into this array.
 */
export function toCodePoints(text: string, caseSensitive: boolean): string[] {
  return Array.from(caseSensitive ? text : text.toLowerCase());
}

/**
 * Build the cheap top-K pre-filter for one query.
 *
 * A candidate is rejected when it is shorter than the query, lacks the query's
 * first character, or lacks any query character. Rejected candidates cannot
 * score above 0.
 */
export function createPrefilter(query: string, caseSensitive: boolean): (candidate: string) => boolean {
  const queryChars = toCodePoints(query, caseSensitive);
  const queryCharSet = new Set(queryChars);
  const firstChar = queryChars[0];

  return (candidate) => {
    const candidateChars = toCodePoints(candidate, caseSensitive);
    if (candidateChars.length < queryChars.length) return false;
    if (firstChar !== undefined && !candidateChars.includes(firstChar)) return false;
    const available = new Set(candidateChars);
    for (const char of queryCharSet) {
      if (!available.has(char)) return false;
    }
    return true;
  };
}

/**
 * Compute the best alignment of `query` inside `candidate`.
 *
 * An empty query, or any query character missing from the candidate, yields a
 * zero score with no positions.
 */
export function computeMatch(query: string, candidate: string, config: EngineConfig): MatchResult {
  if (query.length === 0) return noMatch();

  const queryChars = toCodePoints(query, config.caseSensitive);
  const candidateChars = toCodePoints(candidate, config.caseSensitive);

  if (queryChars.length === 1) {
    const firstLetters = getFirstLetters(candidateChars, config.mode);
    return pickBest(matchSingleChar(queryChars[0], candidateChars, firstLetters));
  }

  if (!containsAllChars(queryChars, candidateChars)) return noMatch();

  const letterPositions = findLetterPositions(queryChars, candidateChars);
  if (!letterPositions) return noMatch();

  const firstLetters = getFirstLetters(candidateChars, config.mode);
  return pickBest(
    enumerateAlignments(letterPositions).map((positions) => ({
      score: scorePositions(positions, firstLetters),
      positions,
    })),
  );
}
