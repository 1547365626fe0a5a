import { createHash } from 'crypto';
import type {
  PaginatedResponse,
  ReviewItem,
  ReviewStatus,
  StoredStory,
} from '@skien/shared';
import { config } from '../config.js';
import {
  getItem,
  putItem,
  queryItems,
  scanItems,
  transactWrite,
  isConditionFailure,
  encodeCursor,
  decodeCursor,
  stripKeys,
} from '../dynamodb.js';
import {
  AppError,
  ConflictError,
  IndexConsistencyError,
  StorageFailureError,
} from '../errors.js';
import type { ReviewStore, StoryIndex, TitleEntry } from './types.js';

type Keyed<T> = T & { PK: string; SK: string };

// Anything that is not already one of our errors means the table is unusable
async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw new StorageFailureError(operation, error);
  }
}

/**
 * Hash a canonical URL into a fixed-size key.
 * Canonical URLs can run to 2048 characters, past the partition key limit.
 */
export function urlKey(canonicalUrl: string): string {
  return createHash('sha256').update(canonicalUrl).digest('hex');
}

// ============================================================
// Stories
// ============================================================
//
//   STORY#<id> / META            the story itself
//     GSI1: SOURCE#<domain> / DATE#<yyyy-mm-dd>#<id>   (only when dated)
//   URL#<sha256> / URL           uniqueness marker for the canonical URL

function storyItem(story: StoredStory): Record<string, unknown> {
  return {
    PK: `STORY#${story.storyId}`,
    SK: 'META',
    ...(story.publishedDate && {
      GSI1PK: `SOURCE#${story.sourceDomain}`,
      GSI1SK: `DATE#${story.publishedDate}#${story.storyId}`,
    }),
    ...story,
  };
}

export class DynamoStoryIndex implements StoryIndex {
  constructor(private readonly table: string = config.tables.stories) {}

  async getStory(storyId: string): Promise<StoredStory | null> {
    return guarded('getStory', async () => {
      const item = await getItem<Keyed<StoredStory>>({
        TableName: this.table,
        Key: { PK: `STORY#${storyId}`, SK: 'META' },
      });
      return item ? stripKeys(item) : null;
    });
  }

  async findByCanonicalUrl(canonicalUrl: string): Promise<StoredStory | null> {
    const marker = await guarded('findByCanonicalUrl', () =>
      getItem<Keyed<{ storyId: string }>>({
        TableName: this.table,
        Key: { PK: `URL#${urlKey(canonicalUrl)}`, SK: 'URL' },
      })
    );
    return marker ? this.getStory(marker.storyId) : null;
  }

  async findBySourceInDateRange(
    sourceDomain: string,
    fromDate: string,
    toDate: string
  ): Promise<StoredStory[]> {
    return guarded('findBySourceInDateRange', async () => {
      const stories: StoredStory[] = [];
      let exclusiveStartKey: Record<string, unknown> | undefined;

      do {
        const { items, lastEvaluatedKey } = await queryItems<Keyed<StoredStory>>({
          TableName: this.table,
          IndexName: 'GSI1',
          KeyConditionExpression: 'GSI1PK = :pk AND GSI1SK BETWEEN :from AND :to',
          ExpressionAttributeValues: {
            ':pk': `SOURCE#${sourceDomain}`,
            ':from': `DATE#${fromDate}`,
            // '~' sorts after every ULID character
            ':to': `DATE#${toDate}#~`,
          },
          ExclusiveStartKey: exclusiveStartKey,
        });
        stories.push(...items.map((item) => stripKeys(item)));
        exclusiveStartKey = lastEvaluatedKey;
      } while (exclusiveStartKey);

      return stories;
    });
  }

  // Full scan of the title projection; fine at newsroom scale
  async listTitleCandidates(): Promise<TitleEntry[]> {
    return guarded('listTitleCandidates', async () => {
      const entries: TitleEntry[] = [];
      let exclusiveStartKey: Record<string, unknown> | undefined;

      do {
        const { items, lastEvaluatedKey } = await scanItems<TitleEntry>({
          TableName: this.table,
          FilterExpression: 'SK = :meta',
          ProjectionExpression: 'storyId, normalizedTitle, capturedAt',
          ExpressionAttributeValues: { ':meta': 'META' },
          ExclusiveStartKey: exclusiveStartKey,
        });
        entries.push(...items);
        exclusiveStartKey = lastEvaluatedKey;
      } while (exclusiveStartKey);

      return entries;
    });
  }

  async insertStory(story: StoredStory): Promise<void> {
    return guarded('insertStory', async () => {
      try {
        await transactWrite({
          TransactItems: [
            {
              Put: {
                TableName: this.table,
                Item: {
                  PK: `URL#${urlKey(story.canonicalUrl)}`,
                  SK: 'URL',
                  storyId: story.storyId,
                  canonicalUrl: story.canonicalUrl,
                },
                ConditionExpression: 'attribute_not_exists(PK)',
              },
            },
            {
              Put: {
                TableName: this.table,
                Item: storyItem(story),
                ConditionExpression: 'attribute_not_exists(PK)',
              },
            },
          ],
        });
      } catch (error) {
        if (isConditionFailure(error)) {
          throw new ConflictError(`Story already exists for URL: ${story.canonicalUrl}`, {
            canonicalUrl: story.canonicalUrl,
          });
        }
        throw error;
      }
    });
  }

  async updateStory(story: StoredStory): Promise<void> {
    return guarded('updateStory', async () => {
      try {
        await putItem({
          TableName: this.table,
          Item: storyItem(story),
          ConditionExpression: 'attribute_exists(PK)',
        });
      } catch (error) {
        if (isConditionFailure(error)) {
          throw new IndexConsistencyError(story.storyId);
        }
        throw error;
      }
    });
  }
}

// ============================================================
// Review queue
// ============================================================
//
//   REVIEW#<id> / META
//     GSI1: STATUS#<status> / TS#<createdAt>#<id>

function reviewItemKeys(item: ReviewItem): Record<string, unknown> {
  return {
    PK: `REVIEW#${item.reviewId}`,
    SK: 'META',
    GSI1PK: `STATUS#${item.status}`,
    GSI1SK: `TS#${item.createdAt}#${item.reviewId}`,
    ...item,
  };
}

export class DynamoReviewStore implements ReviewStore {
  constructor(private readonly table: string = config.tables.reviews) {}

  async createReviewItem(item: ReviewItem): Promise<void> {
    return guarded('createReviewItem', async () => {
      try {
        await putItem({
          TableName: this.table,
          Item: reviewItemKeys(item),
          ConditionExpression: 'attribute_not_exists(PK)',
        });
      } catch (error) {
        if (isConditionFailure(error)) {
          throw new ConflictError(`Review item already exists: ${item.reviewId}`);
        }
        throw error;
      }
    });
  }

  async getReviewItem(reviewId: string): Promise<ReviewItem | null> {
    return guarded('getReviewItem', async () => {
      const item = await getItem<Keyed<ReviewItem>>({
        TableName: this.table,
        Key: { PK: `REVIEW#${reviewId}`, SK: 'META' },
      });
      return item ? stripKeys(item) : null;
    });
  }

  async updateReviewItem(item: ReviewItem, expectedStatus: ReviewStatus): Promise<void> {
    return guarded('updateReviewItem', async () => {
      try {
        await putItem({
          TableName: this.table,
          Item: reviewItemKeys(item),
          ConditionExpression: '#status = :expected',
          ExpressionAttributeNames: { '#status': 'status' },
          ExpressionAttributeValues: { ':expected': expectedStatus },
        });
      } catch (error) {
        if (isConditionFailure(error)) {
          throw new ConflictError(`Review item changed concurrently: ${item.reviewId}`);
        }
        throw error;
      }
    });
  }

  async listReviewItems(
    status: ReviewStatus,
    limit: number,
    cursor?: string
  ): Promise<PaginatedResponse<ReviewItem>> {
    return guarded('listReviewItems', async () => {
      const { items, lastEvaluatedKey } = await queryItems<Keyed<ReviewItem>>({
        TableName: this.table,
        IndexName: 'GSI1',
        KeyConditionExpression: 'GSI1PK = :pk',
        ExpressionAttributeValues: { ':pk': `STATUS#${status}` },
        ScanIndexForward: false, // Newest first
        Limit: limit,
        ExclusiveStartKey: cursor ? decodeCursor(cursor) : undefined,
      });

      return {
        items: items.map((item) => stripKeys(item)),
        cursor: lastEvaluatedKey ? encodeCursor(lastEvaluatedKey) : undefined,
        hasMore: !!lastEvaluatedKey,
      };
    });
  }
}
