import type { LetterPositions } from './position-finder.js';

/**
 * Enumerate every strictly increasing choice of one index per query character.
 *
 * Plain backtracking: each partial alignment is extended with every index of the
 * next list that lies after its last index. Alignments come out with the
 * earliest indices of the leading characters first, which is the order the
 * reducer relies on for ties.
 *
 * The number of alignments grows combinatorially with letter repetition in the
 * candidate. There is no cap.
 */
export function enumerateAlignments(letterPositions: LetterPositions): number[][] {
  const alignments: number[][] = [];
  const queryLength = letterPositions.length;
  if (queryLength === 0) return alignments;

  const extend = (partial: number[], positionsIndex: number): void => {
    const last = partial.length > 0 ? partial[partial.length - 1] : -1;
    for (const offset of letterPositions[positionsIndex]) {
      if (offset <= last) continue;
      const next = [...partial, offset];
      if (next.length === queryLength) {
        alignments.push(next);
      } else {
        extend(next, positionsIndex + 1);
      }
    }
  };

  extend([], 0);
  return alignments;
}
