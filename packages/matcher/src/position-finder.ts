/**
 * Letter position discovery.
 *
 * For each query character, records every viable candidate index at which it
 * occurs. The lists feed the alignment enumerator.
 *
 * @module matcher/position-finder
 */

/** Per-query-character candidate indices, in query order. */
export type LetterPositions = number[][];

/**
 * Cheap membership pre-check: does the candidate contain every query character?
 *
 * Runs in O(query + candidate) and rejects most non-matches before the
 * position search.
 */
export function containsAllChars(
  queryChars: readonly string[],
  candidateChars: readonly string[],
): boolean {
  const available = new Set(candidateChars);
  return queryChars.every((char) => available.has(char));
}

/**
 * Find the occurrence lists for every query character.
 *
 * The search for character `i` starts one past the first occurrence recorded for
 * character `i - 1`, and stops after an occurrence that leaves fewer than
 * `query.length - i` candidate characters behind it, since no later occurrence
 * could still fit the rest of the query.
 *
 * @returns One list per query character, or `null` as soon as a character has
 *   no occurrence at all
 */
export function findLetterPositions(
  queryChars: readonly string[],
  candidateChars: readonly string[],
): LetterPositions | null {
  const candidateLength = candidateChars.length;
  const letterPositions: LetterPositions = [];
  let cursor = 0;

  for (let offset = 0; offset < queryChars.length; offset++) {
    const letter = queryChars[offset];
    const remainingQuery = queryChars.length - offset;
    const positions: number[] = [];

    for (let index = cursor; index < candidateLength; index++) {
      if (candidateChars[index] !== letter) continue;
      positions.push(index);
      if (candidateLength - index - 1 < remainingQuery) break;
    }

    if (positions.length === 0) return null;

    letterPositions.push(positions);
    cursor = positions[0] + 1;
  }

  return letterPositions;
}
