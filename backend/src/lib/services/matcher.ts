import { MatchBasis, type CanonicalStory, type MatchCandidate } from '@skien/shared';
import { config, type DedupSettings } from '../config.js';
import type { StoryIndex } from '../stores/types.js';
import { jaroWinkler } from './similarity.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function shiftDate(isoDate: string, days: number): string {
  const shifted = new Date(Date.parse(`${isoDate}T00:00:00Z`) + days * DAY_MS);
  return shifted.toISOString().slice(0, 10);
}

export function daysBetween(a: string, b: string): number {
  return Math.round(Math.abs(Date.parse(`${a}T00:00:00Z`) - Date.parse(`${b}T00:00:00Z`)) / DAY_MS);
}

/**
 * Deterministic ordering: an exact URL match first, then confidence
 * descending, then the most recently captured story, then the lowest story id.
 */
export function compareCandidates(a: MatchCandidate, b: MatchCandidate): number {
  const aExact = a.basis === MatchBasis.EXACT_URL;
  const bExact = b.basis === MatchBasis.EXACT_URL;
  if (aExact !== bExact) return aExact ? -1 : 1;
  if (a.confidence !== b.confidence) return b.confidence - a.confidence;
  if (a.capturedAt !== b.capturedAt) return a.capturedAt < b.capturedAt ? 1 : -1;
  return a.storyId < b.storyId ? -1 : a.storyId > b.storyId ? 1 : 0;
}

/**
 * Find existing stories the candidate may duplicate.
 *
 * Each criterion is evaluated independently and the strongest one wins per
 * story; an exact URL match ends the search for that story. Title matches
 * below the threshold are never reported.
 */
export async function findMatches(
  candidate: CanonicalStory,
  index: StoryIndex,
  settings: DedupSettings = config.dedup
): Promise<MatchCandidate[]> {
  const best = new Map<string, MatchCandidate>();

  const offer = (match: MatchCandidate) => {
    const current = best.get(match.storyId);
    if (!current || match.confidence > current.confidence) {
      best.set(match.storyId, match);
    }
  };

  // 1. Exact URL
  const exact = await index.findByCanonicalUrl(candidate.canonicalUrl);
  if (exact) {
    best.set(exact.storyId, {
      storyId: exact.storyId,
      basis: MatchBasis.EXACT_URL,
      confidence: 1.0,
      capturedAt: exact.capturedAt,
    });
  }

  // 2. Title similarity
  for (const entry of await index.listTitleCandidates()) {
    if (entry.storyId === exact?.storyId) continue;
    const score = jaroWinkler(candidate.normalizedTitle, entry.normalizedTitle);
    if (score >= settings.titleSimilarityThreshold) {
      offer({
        storyId: entry.storyId,
        basis: MatchBasis.TITLE_SIMILARITY,
        confidence: score,
        capturedAt: entry.capturedAt,
      });
    }
  }

  // 3. Same source within the date window; needs a date on both sides
  if (candidate.publishedDate) {
    const nearby = await index.findBySourceInDateRange(
      candidate.sourceDomain,
      shiftDate(candidate.publishedDate, -settings.dateWindowDays),
      shiftDate(candidate.publishedDate, settings.dateWindowDays)
    );
    for (const story of nearby) {
      if (story.storyId === exact?.storyId || story.publishedDate === null) continue;
      if (daysBetween(candidate.publishedDate, story.publishedDate) > settings.dateWindowDays) continue;
      offer({
        storyId: story.storyId,
        basis: MatchBasis.SOURCE_DATE_PROXIMITY,
        confidence: settings.sourceDateConfidence,
        capturedAt: story.capturedAt,
      });
    }
  }

  return [...best.values()].sort(compareCandidates);
}
