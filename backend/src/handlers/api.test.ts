import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { APIGatewayProxyEventV2WithJWTAuthorizer } from 'aws-lambda';
import type {
  ApiError,
  ImportPreview,
  ImportSummary,
  PaginatedResponse,
  ReviewItem,
  ReviewResolution,
  StoredStory,
} from '@skien/shared';
import { config } from '../lib/config.js';
import { createDedupContext, type DedupContext } from '../lib/context.js';
import { KeyedLock } from '../lib/locks.js';
import { logger } from '../lib/logger.js';
import { MemoryReviewStore, MemoryStoryIndex } from '../lib/stores/memory.js';
import { handler } from './api.js';

vi.mock('../lib/context.js');

interface RequestOptions {
  query?: Record<string, string>;
  body?: unknown;
  sub?: string;
}

function apiEvent(method: string, path: string, options: RequestOptions = {}): APIGatewayProxyEventV2WithJWTAuthorizer {
  return {
    version: '2.0',
    routeKey: '$default',
    rawPath: path,
    rawQueryString: '',
    headers: { 'content-type': 'application/json' },
    queryStringParameters: options.query,
    body: options.body === undefined ? undefined : JSON.stringify(options.body),
    isBase64Encoded: false,
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api',
      domainName: 'api.example.com',
      domainPrefix: 'api',
      http: {
        method,
        path,
        protocol: 'HTTP/1.1',
        sourceIp: '127.0.0.1',
        userAgent: 'vitest',
      },
      requestId: 'req-1',
      routeKey: '$default',
      stage: '$default',
      time: '01/Jun/2024:12:00:00 +0000',
      timeEpoch: 1717243200000,
      authorizer: {
        principalId: '',
        integrationLatency: 0,
        jwt: {
          claims: options.sub === undefined ? {} : { sub: options.sub },
          scopes: [],
        },
      },
    },
  };
}

const editor = { sub: 'editor-1' };

describe('api handler', () => {
  let stories: MemoryStoryIndex;
  let reviews: MemoryReviewStore;

  beforeEach(() => {
    stories = new MemoryStoryIndex();
    reviews = new MemoryReviewStore();
    const ctx: DedupContext = {
      stories,
      reviews,
      locks: new KeyedLock(),
      settings: config.dedup,
      logger,
      now: () => new Date('2024-06-01T12:00:00.000Z'),
    };
    vi.mocked(createDedupContext).mockReturnValue(ctx);
  });

  it('reports health without authentication', async () => {
    const response = await handler(apiEvent('GET', '/health'));

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body ?? '')).toMatchObject({ status: 'healthy', version: config.version });
  });

  it('returns 404 for unknown routes', async () => {
    const response = await handler(apiEvent('DELETE', '/admin/stories', editor));

    expect(response.statusCode).toBe(404);
    const body: ApiError = JSON.parse(response.body ?? '');
    expect(body.error).toEqual({
      code: 'NOT_FOUND',
      message: 'Route not found: DELETE /admin/stories',
      requestId: 'req-1',
    });
  });

  it('requires a signed-in editor for admin routes', async () => {
    const response = await handler(apiEvent('GET', '/admin/reviews'));

    expect(response.statusCode).toBe(401);
    const body: ApiError = JSON.parse(response.body ?? '');
    expect(body.error.code).toBe('UNAUTHORIZED');
  });

  it('previews a mapped upload without writing', async () => {
    const response = await handler(apiEvent('POST', '/admin/imports/preview', {
      ...editor,
      body: {
        rows: [
          { Headline: 'Storm hits coast', Link: 'https://example.com/a' },
          { Headline: '', Link: 'https://example.com/b' },
        ],
        columnMapping: { title: 'Headline', url: 'Link' },
      },
    }));

    expect(response.statusCode).toBe(200);
    const preview: ImportPreview = JSON.parse(response.body ?? '');
    expect(preview).toMatchObject({ totalRows: 2, valid: 1, invalid: 1 });
    expect(stories.size).toBe(0);
  });

  it('imports, queues and resolves a near-duplicate', async () => {
    const importResponse = await handler(apiEvent('POST', '/admin/imports', {
      ...editor,
      body: {
        rows: [
          { title: 'Senate Passes Budget Bill', url: 'https://example.com/politics/senate-budget', publishedAt: '2024-03-05' },
          { title: 'senate passes budget bill!!', url: 'https://example.com/politics/budget-vote', publishedAt: '2024-03-07' },
        ],
      },
    }));

    expect(importResponse.statusCode).toBe(200);
    const summary: ImportSummary = JSON.parse(importResponse.body ?? '');
    expect(summary.counts).toEqual({ inserted: 1, merged: 0, queued: 1, rejected: 0 });

    const listResponse = await handler(apiEvent('GET', '/admin/reviews', { ...editor, query: { limit: '5' } }));
    const page: PaginatedResponse<ReviewItem> = JSON.parse(listResponse.body ?? '');
    expect(page.items).toHaveLength(1);
    const [item] = page.items;

    const detailResponse = await handler(apiEvent('GET', `/admin/reviews/${item.reviewId}`, editor));
    expect(detailResponse.statusCode).toBe(200);

    const resolveResponse = await handler(apiEvent('POST', `/admin/reviews/${item.reviewId}/resolve`, {
      ...editor,
      body: { decision: 'merge' },
    }));

    expect(resolveResponse.statusCode).toBe(200);
    const resolution: ReviewResolution = JSON.parse(resolveResponse.body ?? '');
    expect(resolution).toEqual({
      reviewId: item.reviewId,
      status: 'merged',
      storyId: item.candidateStoryId,
      changed: true,
    });
    expect((await reviews.getReviewItem(item.reviewId))?.resolvedBy).toBe('editor-1');
    expect(stories.size).toBe(1);
  });

  it('rejects a row with an unreadable cell without failing the upload', async () => {
    const response = await handler(apiEvent('POST', '/admin/imports', {
      ...editor,
      body: {
        rows: [
          { title: 'Storm hits coast', url: 'https://example.com/a' },
          { title: { text: 'Storm' }, url: 'https://example.com/b' },
        ],
      },
    }));

    expect(response.statusCode).toBe(200);
    const summary: ImportSummary = JSON.parse(response.body ?? '');
    expect(summary.status).toBe('completed');
    expect(summary.rows[1].outcome).toEqual({
      kind: 'rejected',
      code: 'validation',
      reason: 'title is not a text value',
    });
  });

  it('returns a stored story', async () => {
    const importResponse = await handler(apiEvent('POST', '/admin/imports', {
      ...editor,
      body: { rows: [{ title: 'Storm hits coast', url: 'https://example.com/a' }] },
    }));
    const summary: ImportSummary = JSON.parse(importResponse.body ?? '');
    const outcome = summary.rows[0].outcome;
    if (outcome.kind !== 'inserted') throw new Error(`expected inserted, got ${outcome.kind}`);

    const response = await handler(apiEvent('GET', `/admin/stories/${outcome.storyId}`, editor));

    expect(response.statusCode).toBe(200);
    const story: StoredStory = JSON.parse(response.body ?? '');
    expect(story).toMatchObject({ storyId: outcome.storyId, canonicalUrl: 'https://example.com/a' });
  });

  it('returns 404 for a missing story', async () => {
    const response = await handler(apiEvent('GET', '/admin/stories/01HQ0000000000000000000001', editor));

    expect(response.statusCode).toBe(404);
    const body: ApiError = JSON.parse(response.body ?? '');
    expect(body.error.message).toBe('Story not found: 01HQ0000000000000000000001');
  });

  it('rejects malformed ids', async () => {
    const response = await handler(apiEvent('GET', '/admin/reviews/not-an-id', editor));

    expect(response.statusCode).toBe(400);
    const body: ApiError = JSON.parse(response.body ?? '');
    expect(body.error.message).toBe('Invalid reviewId');
  });

  it('returns 400 with issues for an invalid body', async () => {
    const response = await handler(apiEvent('POST', '/admin/imports', { ...editor, body: { rows: [] } }));

    expect(response.statusCode).toBe(400);
    const body: ApiError = JSON.parse(response.body ?? '');
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.details).toHaveProperty('issues');
  });

  it('returns 400 when the body is missing', async () => {
    const response = await handler(apiEvent('POST', '/admin/reviews/01HQ0000000000000000000001/resolve', editor));

    expect(response.statusCode).toBe(400);
    const body: ApiError = JSON.parse(response.body ?? '');
    expect(body.error.message).toBe('Request body is required');
  });
});
