import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../scorer.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../scorer.js')>();
  return { ...actual, scorePositions: vi.fn(actual.scorePositions) };
});

import { scorePositions } from '../scorer.js';
import { FuzzyMatcher } from '../fuzzy-matcher.js';

describe('cache reuse', () => {
  beforeEach(() => {
    vi.mocked(scorePositions).mockClear();
  });

  it('scores a pair once and serves repeats from the cache', () => {
    const matcher = new FuzzyMatcher();

    matcher.match('fb', 'foo_bar');
    expect(scorePositions).toHaveBeenCalledTimes(1);

    matcher.match('fb', 'foo_bar');
    expect(scorePositions).toHaveBeenCalledTimes(1);
  });

  it('recomputes after clearCache()', () => {
    const matcher = new FuzzyMatcher();
    matcher.match('fb', 'foo_bar');
    matcher.clearCache();

    matcher.match('fb', 'foo_bar');
    expect(scorePositions).toHaveBeenCalledTimes(2);
  });

  it('does not share entries between matcher instances', () => {
    new FuzzyMatcher().match('fb', 'foo_bar');
    new FuzzyMatcher().match('fb', 'foo_bar');
    expect(scorePositions).toHaveBeenCalledTimes(2);
  });

  it('skips scoring for batch candidates already cached', async () => {
    const matcher = new FuzzyMatcher();
    matcher.match('fb', 'foo_bar');

    await matcher.matchBatch('fb', ['foo_bar', 'f_b', 'xyz']);
    // foo_bar from the first call, f_b computed in the batch, xyz rejected before scoring
    expect(scorePositions).toHaveBeenCalledTimes(2);
  });
});
