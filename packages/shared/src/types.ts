/**
 * Type re-exports derived from the Zod schemas in `schemas.ts` and
 * `config-schema.ts`.
 *
 * @module shared/types
 */
import type { z } from 'zod';
import type {
  ScoringModeSchema,
  MatchResultSchema,
  TopKEntrySchema,
  ListingStrategySchema,
  CandidateListingSchema,
} from './schemas.js';

export type ScoringMode = z.infer<typeof ScoringModeSchema>;
export type MatchResult = z.infer<typeof MatchResultSchema>;
export type TopKEntry = z.infer<typeof TopKEntrySchema>;
export type ListingStrategy = z.infer<typeof ListingStrategySchema>;
export type CandidateListing = z.infer<typeof CandidateListingSchema>;

export type {
  MatcherOptions,
  MatcherOptionsInput,
  LogLevel,
  SearchConfig,
  SearchConfigInput,
} from './config-schema.js';
