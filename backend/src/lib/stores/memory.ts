import type {
  PaginatedResponse,
  ReviewItem,
  ReviewStatus,
  StoredStory,
} from '@skien/shared';
import { ConflictError, IndexConsistencyError } from '../errors.js';
import type { ReviewStore, StoryIndex, TitleEntry } from './types.js';

// In-process implementations, used by tests and local runs.
// Values are cloned on the way in and out so callers never share state.

export class MemoryStoryIndex implements StoryIndex {
  private readonly stories = new Map<string, StoredStory>();
  private readonly byUrl = new Map<string, string>();

  constructor(seed: StoredStory[] = []) {
    for (const story of seed) {
      this.stories.set(story.storyId, structuredClone(story));
      this.byUrl.set(story.canonicalUrl, story.storyId);
    }
  }

  get size(): number {
    return this.stories.size;
  }

  all(): StoredStory[] {
    return [...this.stories.values()].map((story) => structuredClone(story));
  }

  async getStory(storyId: string): Promise<StoredStory | null> {
    const story = this.stories.get(storyId);
    return story ? structuredClone(story) : null;
  }

  async findByCanonicalUrl(canonicalUrl: string): Promise<StoredStory | null> {
    const storyId = this.byUrl.get(canonicalUrl);
    return storyId ? this.getStory(storyId) : null;
  }

  async findBySourceInDateRange(
    sourceDomain: string,
    fromDate: string,
    toDate: string
  ): Promise<StoredStory[]> {
    return this.all().filter(
      (story) =>
        story.sourceDomain === sourceDomain &&
        story.publishedDate !== null &&
        story.publishedDate >= fromDate &&
        story.publishedDate <= toDate
    );
  }

  async listTitleCandidates(): Promise<TitleEntry[]> {
    return [...this.stories.values()].map(({ storyId, normalizedTitle, capturedAt }) => ({
      storyId,
      normalizedTitle,
      capturedAt,
    }));
  }

  async insertStory(story: StoredStory): Promise<void> {
    if (this.byUrl.has(story.canonicalUrl)) {
      throw new ConflictError(`Story already exists for URL: ${story.canonicalUrl}`, {
        canonicalUrl: story.canonicalUrl,
      });
    }
    this.stories.set(story.storyId, structuredClone(story));
    this.byUrl.set(story.canonicalUrl, story.storyId);
  }

  async updateStory(story: StoredStory): Promise<void> {
    if (!this.stories.has(story.storyId)) {
      throw new IndexConsistencyError(story.storyId);
    }
    this.stories.set(story.storyId, structuredClone(story));
  }

  async deleteStory(storyId: string): Promise<void> {
    const story = this.stories.get(storyId);
    if (!story) return;
    this.stories.delete(storyId);
    this.byUrl.delete(story.canonicalUrl);
  }
}

export class MemoryReviewStore implements ReviewStore {
  private readonly items = new Map<string, ReviewItem>();

  all(): ReviewItem[] {
    return [...this.items.values()].map((item) => structuredClone(item));
  }

  async createReviewItem(item: ReviewItem): Promise<void> {
    if (this.items.has(item.reviewId)) {
      throw new ConflictError(`Review item already exists: ${item.reviewId}`);
    }
    this.items.set(item.reviewId, structuredClone(item));
  }

  async getReviewItem(reviewId: string): Promise<ReviewItem | null> {
    const item = this.items.get(reviewId);
    return item ? structuredClone(item) : null;
  }

  async updateReviewItem(item: ReviewItem, expectedStatus: ReviewStatus): Promise<void> {
    const current = this.items.get(item.reviewId);
    if (!current || current.status !== expectedStatus) {
      throw new ConflictError(`Review item changed concurrently: ${item.reviewId}`);
    }
    this.items.set(item.reviewId, structuredClone(item));
  }

  async listReviewItems(
    status: ReviewStatus,
    limit: number,
    cursor?: string
  ): Promise<PaginatedResponse<ReviewItem>> {
    // Newest first, same order as the DynamoDB status index
    const matching = [...this.items.values()]
      .filter((item) => item.status === status)
      .sort((a, b) => (a.createdAt === b.createdAt
        ? b.reviewId.localeCompare(a.reviewId)
        : b.createdAt.localeCompare(a.createdAt)));

    const start = cursor ? matching.findIndex((item) => item.reviewId === cursor) + 1 : 0;
    const page = matching.slice(start, start + limit);
    const hasMore = start + limit < matching.length;

    return {
      items: page.map((item) => structuredClone(item)),
      cursor: hasMore && page.length > 0 ? page[page.length - 1].reviewId : undefined,
      hasMore,
    };
  }
}
