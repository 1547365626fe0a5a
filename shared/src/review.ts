import type { MatchBasis, ReviewStatus } from './enums.js';
import type { CanonicalStory, ImportRecord, StoredStory } from './stories.js';

// An ambiguous pair awaiting an operator decision
export interface ReviewItem {
  reviewId: string;
  status: ReviewStatus;

  // Incoming side
  record: ImportRecord;
  candidate: CanonicalStory;
  batchId: string;
  rowNumber: number;

  // Existing side
  candidateStoryId: string;
  confidence: number;
  basis: MatchBasis;

  createdAt: string;
  resolvedAt?: string;
  resolvedBy?: string;
  resolvedStoryId?: string;
}

// Side-by-side data for a review UI
export interface ReviewComparison {
  reviewId: string;
  basis: MatchBasis;
  confidence: number;
  incoming: StoryDisplayFields;
  existing: StoryDisplayFields & { storyId: string };
}

export type StoryDisplayFields = Pick<
  StoredStory,
  'title' | 'url' | 'sourceName' | 'author' | 'publishedDate' | 'summary' | 'tags'
>;

export interface ReviewResolution {
  reviewId: string;
  status: ReviewStatus;
  storyId: string;
  // false when the item had already been resolved the same way
  changed: boolean;
}
