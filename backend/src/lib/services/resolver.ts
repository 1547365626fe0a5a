import { ulid } from 'ulid';
import {
  MatchBasis,
  RejectionCode,
  ReviewStatus,
  type CanonicalStory,
  type ImportRecord,
  type MatchCandidate,
  type ResolutionOutcome,
  type ReviewComparison,
  type ReviewItem,
  type StoredStory,
  type StoryDisplayFields,
  type StoryFieldOverrides,
} from '@skien/shared';
import type { DedupContext } from '../context.js';
import { ConflictError, IndexConsistencyError } from '../errors.js';
import { findMatches } from './matcher.js';
import { normalizeTitle } from './canonicalizer.js';

export interface RowContext {
  batchId: string;
  rowNumber: number;
  record: ImportRecord;
}

// ============================================================
// Field handling
// ============================================================

export function newStory(candidate: CanonicalStory, now: Date): StoredStory {
  const timestamp = now.toISOString();
  return {
    storyId: ulid(),
    canonicalUrl: candidate.canonicalUrl,
    normalizedTitle: candidate.normalizedTitle,
    sourceDomain: candidate.sourceDomain,
    publishedDate: candidate.publishedDate,
    title: candidate.title,
    url: candidate.url,
    sourceName: candidate.sourceName,
    author: candidate.author,
    summary: candidate.summary,
    tags: [...candidate.tags],
    capturedAt: timestamp,
    updatedAt: timestamp,
  };
}

/**
 * Fill the existing story's empty fields from the incoming one and union the
 * tags. Populated fields are never overwritten, and nothing is set to null.
 */
export function mergeStoryFields(
  existing: StoredStory,
  incoming: CanonicalStory,
  now: Date
): StoredStory {
  const tags = [...existing.tags];
  for (const tag of incoming.tags) {
    if (!tags.includes(tag)) tags.push(tag);
  }

  return {
    ...existing,
    author: existing.author ?? incoming.author,
    summary: existing.summary ?? incoming.summary,
    publishedDate: existing.publishedDate ?? incoming.publishedDate,
    tags,
    updatedAt: now.toISOString(),
  };
}

// Operator-pinned values win over whatever the merge produced
export function applyFieldOverrides(
  story: StoredStory,
  overrides: StoryFieldOverrides | undefined
): StoredStory {
  if (!overrides) return story;
  const title = overrides.title?.trim() || story.title;
  const normalizedTitle = normalizeTitle(title) || story.normalizedTitle;

  return {
    ...story,
    title,
    normalizedTitle,
    author: overrides.author ?? story.author,
    summary: overrides.summary ?? story.summary,
    sourceName: overrides.sourceName ?? story.sourceName,
    publishedDate: overrides.publishedDate ?? story.publishedDate,
  };
}

export function displayFields(story: CanonicalStory): StoryDisplayFields {
  return {
    title: story.title,
    url: story.url,
    sourceName: story.sourceName,
    author: story.author,
    publishedDate: story.publishedDate,
    summary: story.summary,
    tags: [...story.tags],
  };
}

// ============================================================
// Policy
// ============================================================

async function insert(
  candidate: CanonicalStory,
  ctx: DedupContext,
  row: RowContext
): Promise<ResolutionOutcome> {
  const story = newStory(candidate, ctx.now());
  try {
    await ctx.stories.insertStory(story);
  } catch (error) {
    if (!(error instanceof ConflictError)) throw error;

    // Another writer took the canonical URL after we matched; match again
    ctx.logger.info(
      { rowNumber: row.rowNumber, canonicalUrl: candidate.canonicalUrl },
      'Canonical URL inserted concurrently, re-matching'
    );
    const retry = await findMatches(candidate, ctx.stories, ctx.settings);
    if (retry[0]?.basis !== MatchBasis.EXACT_URL) throw error;
    return merge(candidate, retry[0].storyId, ctx);
  }

  return { kind: 'inserted', storyId: story.storyId };
}

async function merge(
  candidate: CanonicalStory,
  storyId: string,
  ctx: DedupContext
): Promise<ResolutionOutcome> {
  const existing = await ctx.stories.getStory(storyId);
  if (!existing) {
    throw new IndexConsistencyError(storyId);
  }
  await ctx.stories.updateStory(mergeStoryFields(existing, candidate, ctx.now()));
  return { kind: 'merged', storyId };
}

async function queue(
  candidate: CanonicalStory,
  match: MatchCandidate,
  ctx: DedupContext,
  row: RowContext
): Promise<ResolutionOutcome> {
  const existing = await ctx.stories.getStory(match.storyId);
  if (!existing) {
    throw new IndexConsistencyError(match.storyId);
  }

  const item: ReviewItem = {
    reviewId: ulid(),
    status: ReviewStatus.PENDING,
    record: row.record,
    candidate,
    batchId: row.batchId,
    rowNumber: row.rowNumber,
    candidateStoryId: match.storyId,
    confidence: match.confidence,
    basis: match.basis,
    createdAt: ctx.now().toISOString(),
  };
  await ctx.reviews.createReviewItem(item);

  const comparison: ReviewComparison = {
    reviewId: item.reviewId,
    basis: match.basis,
    confidence: match.confidence,
    incoming: displayFields(candidate),
    existing: { storyId: existing.storyId, ...displayFields(existing) },
  };

  return { kind: 'queued', reviewId: item.reviewId, comparison };
}

/**
 * Decide what happens to one canonicalized row given its ordered matches.
 *
 * - no match: insert a new story
 * - exact URL: merge into the existing story
 * - anything fuzzier: queue for review, never merge automatically
 *
 * A merge or queue target that has disappeared rejects the row.
 */
export async function resolve(
  candidate: CanonicalStory,
  matches: MatchCandidate[],
  ctx: DedupContext,
  row: RowContext
): Promise<ResolutionOutcome> {
  const top = matches[0];

  try {
    if (!top) {
      return await insert(candidate, ctx, row);
    }
    if (top.basis === MatchBasis.EXACT_URL) {
      return await merge(candidate, top.storyId, ctx);
    }
    return await queue(candidate, top, ctx, row);
  } catch (error) {
    if (error instanceof IndexConsistencyError) {
      ctx.logger.warn({ rowNumber: row.rowNumber, error: error.message }, 'Match target vanished');
      return { kind: 'rejected', code: RejectionCode.INDEX_CONSISTENCY, reason: error.message };
    }
    throw error;
  }
}
