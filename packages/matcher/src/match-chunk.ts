/**
 * One unit of pool work: a slice of candidates matched against one query.
 *
 * Runs inside a match worker, or in process when the pool is unavailable.
 * Pure apart from reporting the thread it ran on.
 *
 * @module matcher/match-chunk
 */
import { threadId } from 'worker_threads';
import type { MatchResult } from '@subseq/shared/types';
import { computeMatch, createPrefilter, type EngineConfig } from './engine.js';

export interface MatchChunkRequest {
  id: number;
  query: string;
  candidates: string[];
  config: EngineConfig;
  /** Answer `null` for candidates rejected by the top-K pre-filters instead of matching them. */
  prefilter: boolean;
}

export interface MatchChunkResponse {
  id: number;
  /** Thread that computed the chunk. */
  threadId: number;
  /** One entry per request candidate, in request order. */
  results: Array<MatchResult | null>;
  error?: string;
}

export function runMatchChunk(request: MatchChunkRequest): MatchChunkResponse {
  const { query, candidates, config } = request;
  const passes = request.prefilter ? createPrefilter(query, config.caseSensitive) : () => true;

  return {
    id: request.id,
    threadId,
    results: candidates.map((candidate) =>
      passes(candidate) ? computeMatch(query, candidate, config) : null,
    ),
  };
}
