import { describe, it, expect, afterEach } from 'vitest';
import { FuzzyMatcher } from '../fuzzy-matcher.js';
import type { TopKEntry } from '@subseq/shared/types';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const openMatchers: FuzzyMatcher[] = [];

afterEach(async () => {
  await Promise.all(openMatchers.splice(0).map((matcher) => matcher.close()));
});

/** Matcher with a two-worker pool, closed after each test. */
function createMatcher(options: ConstructorParameters<typeof FuzzyMatcher>[0] = {}): FuzzyMatcher {
  const matcher = new FuzzyMatcher({ poolSize: 2, ...options });
  openMatchers.push(matcher);
  return matcher;
}

/** Distinct path-like candidates; 1200 of them cross the default parallel threshold. */
function makePaths(count: number): string[] {
  const dirs = ['src', 'lib', 'test', 'docs'];
  return Array.from(
    { length: count },
    (_, i) => `${dirs[i % dirs.length]}/module_${i}/file-${i % 37}.ts`,
  );
}

/** Reference top-K derived from matchBatch on a fresh matcher. */
async function referenceTopK(
  options: ConstructorParameters<typeof FuzzyMatcher>[0],
  query: string,
  candidates: string[],
  k: number,
): Promise<TopKEntry[]> {
  const results = await createMatcher(options).matchBatch(query, candidates);
  return results
    .map(({ score, positions }, index) => ({ index, score, positions }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, k);
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

describe('constructor', () => {
  it('defaults to case-insensitive default-mode matching', () => {
    expect(new FuzzyMatcher().options).toEqual({
      caseSensitive: false,
      pathMode: false,
      parallelThreshold: 1000,
    });
  });

  it('rejects invalid options', () => {
    expect(() => new FuzzyMatcher({ parallelThreshold: -1 })).toThrow(/parallelThreshold/);
  });
});

// ---------------------------------------------------------------------------
// match
// ---------------------------------------------------------------------------

describe('match', () => {
  it('matches "fb" against "foo_bar" on word starts', () => {
    const matcher = new FuzzyMatcher();
    expect(matcher.match('fb', 'foo_bar')).toEqual({ score: 5, positions: [0, 4] });
  });

  it('applies path-mode first letters', () => {
    const matcher = new FuzzyMatcher({ pathMode: true });
    expect(matcher.match('ab', 'src/ab.rs')).toEqual({ score: 6, positions: [4, 5] });
  });

  it('applies case sensitivity fixed at construction', () => {
    expect(new FuzzyMatcher({ caseSensitive: true }).match('A', 'apple')).toEqual({
      score: 0,
      positions: [],
    });
    expect(new FuzzyMatcher().match('A', 'apple')).toEqual({ score: 4, positions: [0] });
  });

  it('returns no match for an empty query', () => {
    expect(new FuzzyMatcher().match('', 'apple')).toEqual({ score: 0, positions: [] });
  });

  it('is idempotent and does not grow the cache on a repeat call', () => {
    const matcher = new FuzzyMatcher();
    const first = matcher.match('fb', 'foo_bar');
    expect(matcher.cacheSize()).toBe(1);

    const second = matcher.match('fb', 'foo_bar');
    expect(second).toEqual(first);
    expect(matcher.cacheSize()).toBe(1);
  });

  it('caches no-match results too', () => {
    const matcher = new FuzzyMatcher();
    matcher.match('zz', 'apple');
    expect(matcher.cacheSize()).toBe(1);
  });

  it('hands out copies that cannot corrupt the cache', () => {
    const matcher = new FuzzyMatcher();
    matcher.match('fb', 'foo_bar').positions.push(99);
    matcher.match('fb', 'foo_bar').positions.push(98);
    expect(matcher.match('fb', 'foo_bar')).toEqual({ score: 5, positions: [0, 4] });
  });

  it('clearCache() resets the size to 0', () => {
    const matcher = new FuzzyMatcher();
    matcher.match('a', 'apple');
    matcher.match('p', 'apple');
    expect(matcher.cacheSize()).toBe(2);

    matcher.clearCache();
    expect(matcher.cacheSize()).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// matchBatch
// ---------------------------------------------------------------------------

describe('matchBatch', () => {
  it('returns index-aligned results below the threshold', async () => {
    const matcher = createMatcher();
    const candidates = ['xyz', 'foo_bar', 'apple', 'fb'];
    expect(await matcher.matchBatch('fb', candidates)).toEqual([
      { score: 0, positions: [] },
      { score: 5, positions: [0, 4] },
      { score: 0, positions: [] },
      // m=2, f=1, contiguous -> 3 * 2
      { score: 6, positions: [0, 1] },
    ]);
    expect(matcher.cacheSize()).toBe(4);
  });

  it('returns an empty list for no candidates', async () => {
    expect(await createMatcher().matchBatch('fb', [])).toEqual([]);
  });

  it('returns index-aligned results above the threshold', async () => {
    const candidates = makePaths(1200);
    const matcher = createMatcher({ pathMode: true });
    const reference = createMatcher({ pathMode: true });

    const results = await matcher.matchBatch('mft', candidates);

    expect(results).toHaveLength(candidates.length);
    candidates.forEach((candidate, index) => {
      expect(results[index]).toEqual(reference.match('mft', candidate));
    });
    expect(matcher.cacheSize()).toBe(candidates.length);
  });

  it('mixes cached and freshly computed results in input order', async () => {
    const candidates = makePaths(1200);
    const matcher = createMatcher();
    const warm = [candidates[5], candidates[600], candidates[1199]];
    for (const candidate of warm) matcher.match('lib', candidate);
    expect(matcher.cacheSize()).toBe(3);

    const results = await matcher.matchBatch('lib', candidates);
    const reference = await createMatcher().matchBatch('lib', candidates);

    expect(results).toEqual(reference);
    expect(matcher.cacheSize()).toBe(candidates.length);
  });

  it('honors a custom parallel threshold', async () => {
    const candidates = ['foo_bar', 'fab', 'xyz', 'f_b', 'bf'];
    const fanOut = await createMatcher({ parallelThreshold: 2 }).matchBatch('fb', candidates);
    const serial = candidates.map((c) => createMatcher().match('fb', c));
    expect(fanOut).toEqual(serial);
  });

  it('keeps duplicate candidates aligned', async () => {
    const candidates = ['apple', 'apple', 'grape'];
    const matcher = createMatcher({ parallelThreshold: 1 });
    expect(await matcher.matchBatch('a', candidates)).toEqual([
      { score: 4, positions: [0] },
      { score: 4, positions: [0] },
      { score: 1, positions: [2] },
    ]);
    expect(matcher.cacheSize()).toBe(2);
  });
});

// ---------------------------------------------------------------------------
// matchTopK
// ---------------------------------------------------------------------------

describe('matchTopK', () => {
  it('rejects a negative or fractional k', async () => {
    const matcher = createMatcher();
    await expect(matcher.matchTopK('a', ['apple'], -1)).rejects.toThrow(RangeError);
    await expect(matcher.matchTopK('a', ['apple'], 1.5)).rejects.toThrow(RangeError);
  });

  it('returns nothing for k = 0 or no candidates', async () => {
    const matcher = createMatcher();
    expect(await matcher.matchTopK('a', ['apple'], 0)).toEqual([]);
    expect(await matcher.matchTopK('a', [], 5)).toEqual([]);
  });

  it('sorts the batch fallback by score and keeps input order on ties', async () => {
    const matcher = createMatcher();
    const candidates = ['xyz', 'apple', 'banana', 'grape'];
    expect(await matcher.matchTopK('a', candidates, 2)).toEqual([
      { index: 1, score: 4, positions: [0] },
      { index: 2, score: 1, positions: [1] },
    ]);
  });

  it('excludes zero scores even when k exceeds the matches', async () => {
    const matcher = createMatcher();
    expect(await matcher.matchTopK('a', ['xyz', 'apple'], 10)).toEqual([
      { index: 1, score: 4, positions: [0] },
    ]);
  });

  describe('streaming path', () => {
    // 40 candidates with parallelThreshold 10 and k well below n/2
    function makeCandidates(): string[] {
      const candidates = Array.from({ length: 40 }, (_, i) => `file${i}.txt`);
      candidates[5] = 'ab'; // 6
      candidates[12] = 'a_b'; // 5
      candidates[20] = 'xab'; // 4
      candidates[30] = 'ab'; // 6
      candidates[33] = 'b_a'; // 0: out of order
      candidates[35] = 'ba'; // 0: out of order
      return candidates;
    }

    it('returns the best k, ties by ascending index', async () => {
      const matcher = createMatcher({ parallelThreshold: 10 });
      expect(await matcher.matchTopK('ab', makeCandidates(), 3)).toEqual([
        { index: 5, score: 6, positions: [0, 1] },
        { index: 30, score: 6, positions: [0, 1] },
        { index: 12, score: 5, positions: [0, 2] },
      ]);
    });

    it('keeps the earlier of two equal scores when only one fits', async () => {
      const matcher = createMatcher({ parallelThreshold: 10 });
      expect(await matcher.matchTopK('ab', makeCandidates(), 1)).toEqual([
        { index: 5, score: 6, positions: [0, 1] },
      ]);
    });

    it('caches only positive results and reuses them', async () => {
      const matcher = createMatcher({ parallelThreshold: 10 });
      const candidates = makeCandidates();
      const first = await matcher.matchTopK('ab', candidates, 3);
      // 'ab' (twice), 'a_b', 'xab' -> three distinct pairs
      expect(matcher.cacheSize()).toBe(3);

      const second = await matcher.matchTopK('ab', candidates, 3);
      expect(second).toEqual(first);
      expect(matcher.cacheSize()).toBe(3);
    });

    it('agrees with the batch fallback at the default threshold', async () => {
      const candidates = makePaths(1200);
      const matcher = createMatcher({ pathMode: true });
      const top = await matcher.matchTopK('mf', candidates, 10);

      expect(top).toEqual(await referenceTopK({ pathMode: true }, 'mf', candidates, 10));
    });

    it('returns scores identical to matchBatch for the same candidates', async () => {
      const candidates = makePaths(1200);
      const top = await createMatcher().matchTopK('tf3', candidates, 25);
      const batch = await createMatcher().matchBatch('tf3', candidates);

      expect(top.length).toBeLessThanOrEqual(25);
      for (let i = 0; i < top.length; i++) {
        expect(top[i].score).toBeGreaterThan(0);
        expect(top[i].score).toBe(batch[top[i].index].score);
        expect(top[i].positions).toEqual(batch[top[i].index].positions);
        if (i > 0) expect(top[i].score).toBeLessThanOrEqual(top[i - 1].score);
      }
    });

    it('serves previously cached zero scores without recomputing them into results', async () => {
      const matcher = createMatcher({ parallelThreshold: 10 });
      const candidates = makeCandidates();
      matcher.match('ab', candidates[33]);
      expect((await matcher.matchTopK('ab', candidates, 3)).map((e) => e.index)).toEqual([5, 30, 12]);
    });
  });
});
