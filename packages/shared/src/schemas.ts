/**
 * Zod schemas for the values exchanged between the matcher, the candidate
 * source and their callers.
 *
 * Types are inferred from these schemas and re-exported from `types.ts`.
 *
 * @module shared/schemas
 */
import { z } from 'zod';

// === Matching ===

/** First-letter semantics: word starts (`default`) or path-segment starts (`path`). */
export const ScoringModeSchema = z.enum(['default', 'path']);

/**
 * Best alignment of a query inside one candidate.
 *
 * `score` is 0 and `positions` is empty when the query does not match.
 * Positions are code-point indices into the case-normalized candidate.
 */
export const MatchResultSchema = z.object({
  score: z.number().nonnegative(),
  positions: z.array(z.number().int().nonnegative()),
});

/** One row of a top-K selection, pointing back into the candidate list. */
export const TopKEntrySchema = MatchResultSchema.extend({
  index: z.number().int().nonnegative(),
});

// === Candidate listing ===

export const ListingStrategySchema = z.enum(['git', 'readdir']);

export const CandidateListingSchema = z.object({
  paths: z.array(z.string()),
  truncated: z.boolean(),
  timedOut: z.boolean(),
  strategy: ListingStrategySchema,
});
