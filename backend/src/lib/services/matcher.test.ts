import { describe, it, expect } from 'vitest';
import type { CanonicalStory, MatchCandidate, StoredStory } from '@skien/shared';
import { config } from '../config.js';
import { MemoryStoryIndex } from '../stores/memory.js';
import { compareCandidates, daysBetween, findMatches } from './matcher.js';

function candidateFixture(overrides: Partial<CanonicalStory> = {}): CanonicalStory {
  return {
    canonicalUrl: 'https://example.com/incoming',
    normalizedTitle: 'storm hits the coast',
    sourceDomain: 'example.com',
    publishedDate: '2024-03-05',
    title: 'Storm hits the coast',
    url: 'https://example.com/incoming',
    sourceName: 'example.com',
    author: null,
    summary: null,
    tags: [],
    ...overrides,
  };
}

function storyFixture(storyId: string, overrides: Partial<StoredStory> = {}): StoredStory {
  return {
    ...candidateFixture({
      canonicalUrl: `https://example.com/${storyId}`,
      url: `https://example.com/${storyId}`,
      normalizedTitle: 'mayor resigns after audit',
      title: 'Mayor resigns after audit',
      publishedDate: null,
    }),
    storyId,
    capturedAt: '2024-03-01T00:00:00.000Z',
    updatedAt: '2024-03-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('daysBetween', () => {
  it('counts whole days regardless of order', () => {
    expect(daysBetween('2024-03-05', '2024-03-08')).toBe(3);
    expect(daysBetween('2024-03-08', '2024-03-05')).toBe(3);
    expect(daysBetween('2024-02-28', '2024-03-01')).toBe(2);
  });
});

describe('findMatches: ranking', () => {
  it('ranks the exact URL match first when a newer story has the same title', async () => {
    const index = new MemoryStoryIndex([
      storyFixture('A', {
        canonicalUrl: 'https://example.com/incoming',
        normalizedTitle: 'storm hits the coast',
        capturedAt: '2024-01-10T00:00:00.000Z',
      }),
      storyFixture('B', {
        canonicalUrl: 'https://other.org/b',
        sourceDomain: 'other.org',
        normalizedTitle: 'storm hits the coast',
        capturedAt: '2024-02-10T00:00:00.000Z',
      }),
    ]);

    const matches = await findMatches(candidateFixture(), index, config.dedup);

    expect(matches).toEqual([
      { storyId: 'A', basis: 'exact_url', confidence: 1, capturedAt: '2024-01-10T00:00:00.000Z' },
      { storyId: 'B', basis: 'title_similarity', confidence: 1, capturedAt: '2024-02-10T00:00:00.000Z' },
    ]);
  });
});

describe('compareCandidates', () => {
  const base: MatchCandidate = {
    storyId: 'B',
    basis: 'source_date_proximity',
    confidence: 0.75,
    capturedAt: '2024-03-01T00:00:00.000Z',
  };

  it('orders by confidence, then newest capture, then lowest id', () => {
    const higher = { ...base, storyId: 'Z', confidence: 0.95, basis: 'title_similarity' as const };
    const newer = { ...base, storyId: 'Y', capturedAt: '2024-03-02T00:00:00.000Z' };
    const lowerId = { ...base, storyId: 'A' };

    expect([base, lowerId, newer, higher].sort(compareCandidates).map((c) => c.storyId))
      .toEqual(['Z', 'Y', 'A', 'B']);
  });

  it('puts an exact URL match ahead of an equally confident title match', () => {
    const exact: MatchCandidate = { ...base, storyId: 'A', basis: 'exact_url', confidence: 1 };
    const title: MatchCandidate = {
      ...base,
      storyId: 'B',
      basis: 'title_similarity',
      confidence: 1,
      capturedAt: '2024-03-09T00:00:00.000Z',
    };

    expect([title, exact].sort(compareCandidates).map((c) => c.storyId)).toEqual(['A', 'B']);
  });
});

describe('findMatches', () => {
  it('returns nothing against an empty index', async () => {
    expect(await findMatches(candidateFixture(), new MemoryStoryIndex())).toEqual([]);
  });

  it('reports an exact URL match at 1.0 whatever the title or date', async () => {
    const index = new MemoryStoryIndex([
      storyFixture('S1', {
        canonicalUrl: 'https://example.com/incoming',
        normalizedTitle: 'completely different headline',
        publishedDate: '2020-01-01',
      }),
    ]);

    expect(await findMatches(candidateFixture(), index)).toEqual([
      {
        storyId: 'S1',
        basis: 'exact_url',
        confidence: 1.0,
        capturedAt: '2024-03-01T00:00:00.000Z',
      },
    ]);
  });

  it('keeps the exact URL basis when the title also matches', async () => {
    const index = new MemoryStoryIndex([
      storyFixture('S1', {
        canonicalUrl: 'https://example.com/incoming',
        normalizedTitle: 'storm hits the coast',
        publishedDate: '2024-03-05',
      }),
    ]);

    const matches = await findMatches(candidateFixture(), index);
    expect(matches).toHaveLength(1);
    expect(matches[0].basis).toBe('exact_url');
  });

  it('reports identical normalized titles on other URLs as title similarity 1.0', async () => {
    const index = new MemoryStoryIndex([
      storyFixture('S1', { normalizedTitle: 'storm hits the coast', sourceDomain: 'other.org' }),
    ]);

    expect(await findMatches(candidateFixture(), index)).toEqual([
      {
        storyId: 'S1',
        basis: 'title_similarity',
        confidence: 1,
        capturedAt: '2024-03-01T00:00:00.000Z',
      },
    ]);
  });

  it('ignores titles below the threshold', async () => {
    const index = new MemoryStoryIndex([
      storyFixture('S1', { normalizedTitle: 'city council approves budget', sourceDomain: 'other.org' }),
    ]);

    expect(await findMatches(candidateFixture(), index)).toEqual([]);
  });

  it('honours a stricter configured threshold', async () => {
    const index = new MemoryStoryIndex([
      storyFixture('S1', { normalizedTitle: 'storm hits the coasts', sourceDomain: 'other.org' }),
    ]);
    const candidate = candidateFixture();

    expect(await findMatches(candidate, index)).toHaveLength(1);
    expect(await findMatches(candidate, index, { ...config.dedup, titleSimilarityThreshold: 1 })).toEqual([]);
  });

  it('matches the same source within the date window at 0.75', async () => {
    const index = new MemoryStoryIndex([
      storyFixture('S1', { publishedDate: '2024-03-07' }),
      storyFixture('S2', { publishedDate: '2024-03-02' }),
    ]);

    const matches = await findMatches(candidateFixture(), index);
    expect(matches.map((m) => [m.storyId, m.basis, m.confidence])).toEqual([
      ['S1', 'source_date_proximity', 0.75],
      ['S2', 'source_date_proximity', 0.75],
    ]);
  });

  it('ignores the same source outside the window or without a date', async () => {
    const index = new MemoryStoryIndex([
      storyFixture('S1', { publishedDate: '2024-03-09' }),
      storyFixture('S2', { publishedDate: '2024-02-24' }),
      storyFixture('S3', { publishedDate: null }),
    ]);

    expect(await findMatches(candidateFixture(), index)).toEqual([]);
    expect(await findMatches(candidateFixture({ publishedDate: null }), index)).toEqual([]);
  });

  it('ignores other sources within the window', async () => {
    const index = new MemoryStoryIndex([
      storyFixture('S1', { publishedDate: '2024-03-05', sourceDomain: 'other.org' }),
    ]);

    expect(await findMatches(candidateFixture(), index)).toEqual([]);
  });

  it('keeps the strongest criterion per story', async () => {
    const index = new MemoryStoryIndex([
      storyFixture('S1', { normalizedTitle: 'storm hits the coast', publishedDate: '2024-03-06' }),
    ]);

    const matches = await findMatches(candidateFixture(), index);
    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({ storyId: 'S1', basis: 'title_similarity', confidence: 1 });
  });

  it('breaks confidence ties by the most recent capture', async () => {
    const index = new MemoryStoryIndex([
      storyFixture('S1', { publishedDate: '2024-03-05', capturedAt: '2024-03-05T08:00:00.000Z' }),
      storyFixture('S2', { publishedDate: '2024-03-05', capturedAt: '2024-03-05T09:00:00.000Z' }),
    ]);

    const matches = await findMatches(candidateFixture(), index);
    expect(matches.map((m) => m.storyId)).toEqual(['S2', 'S1']);
  });

  it('only reports confidences of 1.0, at least 0.92, or exactly 0.75', async () => {
    const words = ['storm', 'coast', 'senate', 'budget', 'bill', 'vote', 'fire', 'city'];
    let seed = 7;
    const next = () => {
      seed = (Math.imul(seed, 1103515245) + 12345) >>> 0;
      return seed / 4294967296;
    };
    const pick = <T>(items: readonly T[]): T => items[Math.floor(next() * items.length)];
    const title = () => Array.from({ length: 1 + Math.floor(next() * 4) }, () => pick(words)).join(' ');
    const date = () => `2024-03-${String(1 + Math.floor(next() * 14)).padStart(2, '0')}`;

    for (let round = 0; round < 50; round++) {
      const stories = Array.from({ length: 8 }, (_, i) =>
        storyFixture(`S${i}`, {
          canonicalUrl: `https://example.com/${pick(['a', 'b', 'c', 'd', `${round}-${i}`])}`,
          normalizedTitle: title(),
          sourceDomain: pick(['example.com', 'other.org']),
          publishedDate: pick([null, date()]),
        })
      );
      // Canonical URLs are unique in a real index
      const unique = stories.filter(
        (story, i) => stories.findIndex((s) => s.canonicalUrl === story.canonicalUrl) === i
      );
      const candidate = candidateFixture({
        canonicalUrl: `https://example.com/${pick(['a', 'b', 'incoming'])}`,
        normalizedTitle: title(),
        publishedDate: pick([null, date()]),
      });

      const matches = await findMatches(candidate, new MemoryStoryIndex(unique));
      for (const match of matches) {
        const allowed =
          match.confidence === 1 ||
          match.confidence === 0.75 ||
          (match.confidence >= 0.92 && match.confidence <= 1);
        expect(allowed).toBe(true);
        if (match.basis === 'exact_url') expect(match.confidence).toBe(1);
        if (match.basis === 'source_date_proximity') expect(match.confidence).toBe(0.75);
      }
    }
  });
});
