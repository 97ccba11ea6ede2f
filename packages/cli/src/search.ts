import { FuzzyMatcher } from '@subseq/matcher';
import { listCandidates } from '@subseq/source';
import { logger } from '@subseq/shared/logger';
import type { SearchConfig } from '@subseq/shared/config-schema';
import type { CandidateListing } from '@subseq/shared/types';

export interface SearchOutcome {
  /** Output lines, best match first. */
  lines: string[];
  listing: CandidateListing;
}

/** One output line: the score with two decimals, a tab, the path. */
export function formatResult(score: number, candidate: string): string {
  return `${score.toFixed(2)}\t${candidate}`;
}

/**
 * List the candidates under `config.root` and keep the best `config.top`.
 *
 * @throws CandidateSourceError when the root cannot be read
 */
export async function runSearch(config: SearchConfig): Promise<SearchOutcome> {
  const listing = await listCandidates(config.root, {
    includeDirectories: config.includeDirectories,
    maxDurationMs: config.timeoutMs ?? undefined,
    maxFiles: config.maxFiles,
  });
  if (listing.timedOut) {
    logger.warn(`[cli] listing stopped after ${config.timeoutMs}ms, results are partial`);
  }
  if (listing.truncated) {
    logger.warn(`[cli] listing truncated to ${config.maxFiles} paths`);
  }

  const matcher = new FuzzyMatcher(config.matcher);
  const top = await matcher
    .matchTopK(config.query, listing.paths, config.top)
    .finally(() => matcher.close());
  logger.debug(
    `[cli] ${top.length} of ${listing.paths.length} candidates matched "${config.query}"`,
  );

  return {
    lines: top.map((entry) => formatResult(entry.score, listing.paths[entry.index])),
    listing,
  };
}
