import {
  ReviewDecision,
  ReviewStatus,
  type PaginatedResponse,
  type ReviewComparison,
  type ReviewItem,
  type ReviewResolution,
  type StoryFieldOverrides,
} from '@skien/shared';
import type { DedupContext } from '../context.js';
import {
  ConflictError,
  IndexConsistencyError,
  InvalidStateTransitionError,
  NotFoundError,
} from '../errors.js';
import {
  applyFieldOverrides,
  displayFields,
  mergeStoryFields,
  newStory,
} from './resolver.js';

const STATUS_FOR_DECISION: Record<ReviewDecision, ReviewStatus> = {
  [ReviewDecision.MERGE]: ReviewStatus.MERGED,
  [ReviewDecision.DISMISS]: ReviewStatus.DISMISSED,
};

// ============================================================
// Queries
// ============================================================

export async function listReviewItems(
  query: { status: ReviewStatus; limit: number; cursor?: string },
  ctx: Pick<DedupContext, 'reviews'>
): Promise<PaginatedResponse<ReviewItem>> {
  return ctx.reviews.listReviewItems(query.status, query.limit, query.cursor);
}

export async function getReviewItem(
  reviewId: string,
  ctx: Pick<DedupContext, 'reviews'>
): Promise<ReviewItem> {
  const item = await ctx.reviews.getReviewItem(reviewId);
  if (!item) {
    throw new NotFoundError('Review item', reviewId);
  }
  return item;
}

/**
 * Review item plus the side-by-side view an operator decides from.
 * The comparison is null once the candidate story has been deleted.
 */
export async function getReviewDetail(
  reviewId: string,
  ctx: Pick<DedupContext, 'reviews' | 'stories'>
): Promise<{ item: ReviewItem; comparison: ReviewComparison | null }> {
  const item = await getReviewItem(reviewId, ctx);
  const existing = await ctx.stories.getStory(item.candidateStoryId);

  return {
    item,
    comparison: existing
      ? {
          reviewId: item.reviewId,
          basis: item.basis,
          confidence: item.confidence,
          incoming: displayFields(item.candidate),
          existing: { storyId: existing.storyId, ...displayFields(existing) },
        }
      : null,
  };
}

// ============================================================
// Resolution
// ============================================================

async function mergeIntoCandidate(
  item: ReviewItem,
  keepFields: StoryFieldOverrides | undefined,
  ctx: DedupContext
): Promise<string> {
  const existing = await ctx.stories.getStory(item.candidateStoryId);
  if (!existing) {
    throw new IndexConsistencyError(item.candidateStoryId);
  }
  const merged = applyFieldOverrides(mergeStoryFields(existing, item.candidate, ctx.now()), keepFields);
  await ctx.stories.updateStory(merged);
  return merged.storyId;
}

// Keep the queued record as its own story, unless its URL has been taken since
async function insertSeparately(item: ReviewItem, ctx: DedupContext): Promise<string> {
  const mergeIntoUrlOwner = async (): Promise<string | null> => {
    const owner = await ctx.stories.findByCanonicalUrl(item.candidate.canonicalUrl);
    if (!owner) return null;
    await ctx.stories.updateStory(mergeStoryFields(owner, item.candidate, ctx.now()));
    return owner.storyId;
  };

  const merged = await mergeIntoUrlOwner();
  if (merged) return merged;

  const story = newStory(item.candidate, ctx.now());
  try {
    await ctx.stories.insertStory(story);
    return story.storyId;
  } catch (error) {
    if (!(error instanceof ConflictError)) throw error;
    const owner = await mergeIntoUrlOwner();
    if (!owner) throw error;
    return owner;
  }
}

/**
 * Apply an operator decision to a pending review item.
 *
 * Resolving twice with the same decision is a no-op that returns the recorded
 * outcome; switching decisions after the fact is refused.
 */
export async function resolveReviewItem(
  reviewId: string,
  decision: ReviewDecision,
  ctx: DedupContext,
  options: { keepFields?: StoryFieldOverrides; actor: string }
): Promise<ReviewResolution> {
  return ctx.locks.run(`review:${reviewId}`, async () => {
    const item = await getReviewItem(reviewId, ctx);
    const target = STATUS_FOR_DECISION[decision];

    if (item.status !== ReviewStatus.PENDING) {
      if (item.status !== target) {
        throw new InvalidStateTransitionError(item.status, target);
      }
      return {
        reviewId,
        status: item.status,
        storyId: item.resolvedStoryId ?? item.candidateStoryId,
        changed: false,
      };
    }

    const storyId = await ctx.locks.run(item.candidate.canonicalUrl, () =>
      decision === ReviewDecision.MERGE
        ? mergeIntoCandidate(item, options.keepFields, ctx)
        : insertSeparately(item, ctx)
    );

    const resolved: ReviewItem = {
      ...item,
      status: target,
      resolvedAt: ctx.now().toISOString(),
      resolvedBy: options.actor,
      resolvedStoryId: storyId,
    };
    await ctx.reviews.updateReviewItem(resolved, ReviewStatus.PENDING);

    ctx.logger.info({ reviewId, decision, storyId, actor: options.actor }, 'Resolved review item');

    return { reviewId, status: target, storyId, changed: true };
  });
}
