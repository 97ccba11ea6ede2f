/**
 * First-letter detection for the scoring boost.
 *
 * A first letter is a candidate index that starts a "word": in `default` mode
 * the first character of each maximal alphanumeric run, in `path` mode index 0
 * and every index directly after a `/`.
 *
 * @module matcher/first-letters
 */
import type { ScoringMode } from '@subseq/shared/types';

const ALPHANUMERIC = /^[\p{Alphabetic}\p{N}]$/u;

/** Whether a single code point is a letter or a number. `_` is neither. */
export function isAlphanumeric(char: string): boolean {
  return ALPHANUMERIC.test(char);
}

function wordStarts(chars: readonly string[]): Set<number> {
  const starts = new Set<number>();
  let inWord = false;
  chars.forEach((char, index) => {
    if (isAlphanumeric(char)) {
      if (!inWord) starts.add(index);
      inWord = true;
    } else {
      inWord = false;
    }
  });
  return starts;
}

function segmentStarts(chars: readonly string[]): Set<number> {
  const starts = new Set<number>();
  if (chars.length > 0) starts.add(0);
  for (let index = 1; index < chars.length; index++) {
    if (chars[index - 1] === '/') starts.add(index);
  }
  return starts;
}

/**
 * Collect the first-letter indices of a candidate.
 *
 * @param chars - Candidate split into code points
 * @param mode - Which boundary definition to apply
 */
export function getFirstLetters(chars: readonly string[], mode: ScoringMode): Set<number> {
  return mode === 'path' ? segmentStarts(chars) : wordStarts(chars);
}
