/**
 * Alignment scoring heuristic.
 *
 * `score = (m + f) * (1 + g²)` where `m` is the number of matched characters,
 * `f` how many of them sit on first letters, and `g = (m - (groups - 1)) / m`
 * rewards alignments made of few contiguous runs (1 when fully contiguous).
 *
 * @module matcher/scorer
 */

/** Count maximal runs of consecutive indices. */
export function countGroups(positions: readonly number[]): number {
  let groups = 1;
  for (let i = 1; i < positions.length; i++) {
    if (positions[i] !== positions[i - 1] + 1) groups++;
  }
  return groups;
}

/**
 * Score one alignment.
 *
 * @param positions - Strictly increasing candidate indices
 * @param firstLetters - First-letter indices of the same candidate
 * @returns The score, or 0 for an empty alignment
 */
export function scorePositions(
  positions: readonly number[],
  firstLetters: ReadonlySet<number>,
): number {
  const matched = positions.length;
  if (matched === 0) return 0;

  const firstLetterMatches = positions.filter((pos) => firstLetters.has(pos)).length;
  const normalizedGroups = (matched - (countGroups(positions) - 1)) / matched;

  return (matched + firstLetterMatches) * (1 + normalizedGroups * normalizedGroups);
}
