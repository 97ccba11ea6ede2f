import type { MatchResult } from '@subseq/shared/types';

/** Score of a one-character match on a first letter. */
export const FIRST_LETTER_SCORE = 4;
/** Score of a one-character match anywhere else. */
export const PLAIN_LETTER_SCORE = 1;

/**
 * Fast path for one-character queries.
 *
 * Skips position finding, enumeration and the general formula. Every occurrence
 * scores {@link FIRST_LETTER_SCORE} or {@link PLAIN_LETTER_SCORE}, a scale the
 * general formula does not reproduce for `m = 1`.
 *
 * @returns One result per occurrence, in candidate order (empty when absent)
 */
export function matchSingleChar(
  char: string,
  candidateChars: readonly string[],
  firstLetters: ReadonlySet<number>,
): MatchResult[] {
  const results: MatchResult[] = [];
  candidateChars.forEach((candidateChar, index) => {
    if (candidateChar !== char) return;
    results.push({
      score: firstLetters.has(index) ? FIRST_LETTER_SCORE : PLAIN_LETTER_SCORE,
      positions: [index],
    });
  });
  return results;
}
