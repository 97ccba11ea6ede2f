/**
 * @subseq/matcher -- Fuzzy subsequence matching with boundary-aware scoring.
 *
 * Provides the cached `FuzzyMatcher` (single pair, batch and top-K) and the
 * pure pipeline stages it is built from.
 *
 * @module matcher
 */

// Main entry point
export { FuzzyMatcher } from './fuzzy-matcher.js';

// Pipeline
export { computeMatch, createPrefilter, toCodePoints } from './engine.js';
export type { EngineConfig } from './engine.js';
export { getFirstLetters, isAlphanumeric } from './first-letters.js';
export { containsAllChars, findLetterPositions } from './position-finder.js';
export type { LetterPositions } from './position-finder.js';
export { enumerateAlignments } from './alignment.js';
export { scorePositions, countGroups } from './scorer.js';
export { matchSingleChar, FIRST_LETTER_SCORE, PLAIN_LETTER_SCORE } from './single-char.js';
export { pickBest, noMatch, cloneResult } from './reducer.js';

// Supporting structures
export { MatchCache } from './match-cache.js';
export { BoundedMinHeap } from './bounded-heap.js';
export type { RankComparator } from './bounded-heap.js';
export { MatchWorkerPool, defaultPoolSize } from './worker-pool.js';
export type { MatchChunkTask } from './worker-pool.js';
export { runMatchChunk } from './match-chunk.js';
export type { MatchChunkRequest, MatchChunkResponse } from './match-chunk.js';

export { DEFAULT_PARALLEL_THRESHOLD as PARALLEL_THRESHOLD } from '@subseq/shared/constants';
