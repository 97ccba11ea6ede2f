import { z } from 'zod';
import { DEFAULT_PARALLEL_THRESHOLD, DEFAULT_TOP_K, DEFAULT_MAX_FILES } from './constants.js';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/** Maps log level names to numeric values for consola compatibility */
export const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

/**
 * Construction options for a matcher. Fixed for the lifetime of the instance.
 */
export const MatcherOptionsSchema = z.object({
  caseSensitive: z.boolean().default(false),
  /** Score first letters at path-segment starts instead of word starts. */
  pathMode: z.boolean().default(false),
  /** Batches of at least this many candidates use the fan-out path. */
  parallelThreshold: z.number().int().positive().default(DEFAULT_PARALLEL_THRESHOLD),
  /** Worker threads used above the threshold. Defaults to one per available core, less one. */
  poolSize: z.number().int().positive().optional(),
});

export type MatcherOptions = z.infer<typeof MatcherOptionsSchema>;
export type MatcherOptionsInput = z.input<typeof MatcherOptionsSchema>;

/**
 * Effective settings for one CLI search, assembled from flags and env vars.
 */
export const SearchConfigSchema = z.object({
  query: z.string().min(1),
  root: z.string().min(1),
  top: z.number().int().positive().default(DEFAULT_TOP_K),
  includeDirectories: z.boolean().default(false),
  timeoutMs: z.number().int().positive().nullable().default(null),
  maxFiles: z.number().int().positive().default(DEFAULT_MAX_FILES),
  matcher: MatcherOptionsSchema.default(() => ({
    caseSensitive: false,
    pathMode: true,
    parallelThreshold: DEFAULT_PARALLEL_THRESHOLD,
  })),
  logging: z
    .object({ level: LogLevelSchema.default('info') })
    .default(() => ({ level: 'info' as const })),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type SearchConfigInput = z.input<typeof SearchConfigSchema>;
