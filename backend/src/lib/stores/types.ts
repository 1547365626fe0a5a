import type {
  PaginatedResponse,
  ReviewItem,
  ReviewStatus,
  StoredStory,
} from '@skien/shared';

// Minimal projection needed to score title similarity
export type TitleEntry = Pick<StoredStory, 'storyId' | 'normalizedTitle' | 'capturedAt'>;

/**
 * Story population the matcher and resolver work against.
 *
 * Implementations throw StorageFailureError when the backend is unreachable,
 * ConflictError from insertStory when the canonical URL is already taken, and
 * IndexConsistencyError from updateStory when the story no longer exists.
 */
export interface StoryIndex {
  getStory(storyId: string): Promise<StoredStory | null>;
  findByCanonicalUrl(canonicalUrl: string): Promise<StoredStory | null>;
  // Inclusive YYYY-MM-DD bounds; stories without a date are never returned
  findBySourceInDateRange(sourceDomain: string, fromDate: string, toDate: string): Promise<StoredStory[]>;
  listTitleCandidates(): Promise<TitleEntry[]>;
  insertStory(story: StoredStory): Promise<void>;
  updateStory(story: StoredStory): Promise<void>;
}

export interface ReviewStore {
  createReviewItem(item: ReviewItem): Promise<void>;
  getReviewItem(reviewId: string): Promise<ReviewItem | null>;
  // ConflictError when the stored status is no longer expectedStatus
  updateReviewItem(item: ReviewItem, expectedStatus: ReviewStatus): Promise<void>;
  listReviewItems(
    status: ReviewStatus,
    limit: number,
    cursor?: string
  ): Promise<PaginatedResponse<ReviewItem>>;
}
