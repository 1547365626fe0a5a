import type {
  APIGatewayProxyEventV2WithJWTAuthorizer,
  APIGatewayProxyStructuredResultV2,
  Context,
} from 'aws-lambda';
import { ZodError } from 'zod';
import type { ApiError, HealthResponse } from '@skien/shared';
import { config } from '../lib/config.js';
import { createDedupContext, type DedupContext } from '../lib/context.js';
import { createRequestLogger, type Logger } from '../lib/logger.js';
import { AppError, NotFoundError, ReadOnlyModeError, ValidationError } from '../lib/errors.js';

// Services
import * as importService from '../lib/services/importer.js';
import * as reviewService from '../lib/services/review.js';

// Validation schemas
import {
  importRequestSchema,
  previewRequestSchema,
  resolveReviewSchema,
  reviewQuerySchema,
  ulidSchema,
} from '../lib/validation.js';

type ApiEvent = APIGatewayProxyEventV2WithJWTAuthorizer;

// Route handler type
type RouteHandler = (
  event: ApiEvent,
  context: HandlerContext
) => Promise<APIGatewayProxyStructuredResultV2>;

interface HandlerContext {
  requestId: string;
  logger: Logger;
  userId?: string;
  dedup: DedupContext;
}

// Parse path parameters
function getPathParam(event: ApiEvent, name: string): string {
  return event.pathParameters?.[name] || '';
}

// Parse query parameters
function getQueryParams(event: ApiEvent): Record<string, string> {
  const params = event.queryStringParameters || {};
  // Filter out undefined values
  return Object.fromEntries(
    Object.entries(params).filter((entry): entry is [string, string] => entry[1] !== undefined)
  );
}

// Parse JSON body; the route's schema does the typing
function parseBody(event: ApiEvent): unknown {
  if (!event.body) {
    throw new ValidationError('Request body is required');
  }
  try {
    return JSON.parse(event.isBase64Encoded
      ? Buffer.from(event.body, 'base64').toString('utf-8')
      : event.body);
  } catch {
    throw new ValidationError('Invalid JSON in request body');
  }
}

// Create JSON response
function jsonResponse(
  statusCode: number,
  body: unknown,
  headers?: Record<string, string>
): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
    body: JSON.stringify(body),
  };
}

// Check if route requires admin
function requiresAdmin(path: string): boolean {
  return path.startsWith('/admin/');
}

// Check read-only mode
function checkReadOnly(method: string): void {
  if (config.features.readOnly && method !== 'GET' && method !== 'OPTIONS') {
    throw new ReadOnlyModeError();
  }
}

// Extract user ID from JWT claims; public routes arrive without an authorizer
function getUserIdFromEvent(event: ApiEvent): string | undefined {
  const sub = event.requestContext.authorizer?.jwt?.claims?.sub;
  return typeof sub === 'string' && sub !== '' ? sub : undefined;
}

function getIdParam(event: ApiEvent, name: string): string {
  const parsed = ulidSchema.safeParse(getPathParam(event, name));
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${name}`);
  }
  return parsed.data;
}

// Route definitions
const routes: Record<string, { handler: RouteHandler }> = {
  // Public routes
  'GET /health': {
    handler: async () => {
      const response: HealthResponse = {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: config.version,
      };
      return jsonResponse(200, response);
    },
  },

  // Admin: Imports
  'POST /admin/imports/preview': {
    handler: async (event, ctx) => {
      const input = previewRequestSchema.parse(parseBody(event));
      const records = importService.applyColumnMapping(input.rows, input.columnMapping);
      const preview = importService.previewImport(records, ctx.dedup);
      return jsonResponse(200, preview);
    },
  },
  'POST /admin/imports': {
    handler: async (event, ctx) => {
      const input = importRequestSchema.parse(parseBody(event));
      const records = importService.applyColumnMapping(input.rows, input.columnMapping);
      // An aborted batch still reports every row it got through
      const summary = await importService.runImport(records, ctx.dedup);
      return jsonResponse(200, summary);
    },
  },

  // Admin: Review queue
  'GET /admin/reviews': {
    handler: async (event, ctx) => {
      const query = reviewQuerySchema.parse(getQueryParams(event));
      const result = await reviewService.listReviewItems(query, ctx.dedup);
      return jsonResponse(200, result);
    },
  },
  'GET /admin/reviews/{reviewId}': {
    handler: async (event, ctx) => {
      const reviewId = getIdParam(event, 'reviewId');
      const detail = await reviewService.getReviewDetail(reviewId, ctx.dedup);
      return jsonResponse(200, detail);
    },
  },
  'POST /admin/reviews/{reviewId}/resolve': {
    handler: async (event, ctx) => {
      const reviewId = getIdParam(event, 'reviewId');
      const input = resolveReviewSchema.parse(parseBody(event));
      const resolution = await reviewService.resolveReviewItem(reviewId, input.decision, ctx.dedup, {
        keepFields: input.keepFields,
        actor: ctx.userId ?? 'unknown',
      });
      return jsonResponse(200, resolution);
    },
  },

  // Admin: Stories
  'GET /admin/stories/{storyId}': {
    handler: async (event, ctx) => {
      const storyId = getIdParam(event, 'storyId');
      const story = await ctx.dedup.stories.getStory(storyId);
      if (!story) {
        throw new NotFoundError('Story', storyId);
      }
      return jsonResponse(200, story);
    },
  },
};

// Match route to handler
function matchRoute(
  method: string,
  path: string
): { handler: RouteHandler; params: Record<string, string> } | null {
  const routeKey = `${method} ${path}`;

  // Direct match
  if (routes[routeKey]) {
    return { handler: routes[routeKey].handler, params: {} };
  }

  // Pattern matching with path parameters
  for (const [pattern, route] of Object.entries(routes)) {
    const [patternMethod, patternPath] = pattern.split(' ');
    if (patternMethod !== method) continue;

    const patternParts = patternPath.split('/');
    const pathParts = path.split('/');

    if (patternParts.length !== pathParts.length) continue;

    const params: Record<string, string> = {};
    let matches = true;

    for (let i = 0; i < patternParts.length; i++) {
      if (patternParts[i].startsWith('{') && patternParts[i].endsWith('}')) {
        params[patternParts[i].slice(1, -1)] = pathParts[i];
      } else if (patternParts[i] !== pathParts[i]) {
        matches = false;
        break;
      }
    }

    if (matches) {
      return { handler: route.handler, params };
    }
  }

  return null;
}

// Main handler
export async function handler(
  event: ApiEvent,
  _context?: Context
): Promise<APIGatewayProxyStructuredResultV2> {
  const requestId = event.requestContext.requestId;
  const userId = getUserIdFromEvent(event);
  const logger = createRequestLogger(requestId, userId);
  const method = event.requestContext.http.method;
  const path = event.rawPath;

  logger.info({ method, path }, 'Request received');

  try {
    // Check read-only mode for writes
    checkReadOnly(method);

    // Match route
    const match = matchRoute(method, path);

    if (!match) {
      return jsonResponse(404, {
        error: {
          code: 'NOT_FOUND',
          message: `Route not found: ${method} ${path}`,
          requestId,
        },
      });
    }

    // Inject path parameters
    event.pathParameters = { ...event.pathParameters, ...match.params };

    if (requiresAdmin(path) && !userId) {
      return jsonResponse(401, {
        error: {
          code: 'UNAUTHORIZED',
          message: 'Authentication required',
          requestId,
        },
      });
    }

    const response = await match.handler(event, {
      requestId,
      logger,
      userId,
      dedup: createDedupContext({ logger }),
    });

    logger.info({ statusCode: response.statusCode }, 'Request completed');

    return response;
  } catch (error) {
    // Handle known errors
    if (error instanceof AppError) {
      logger.warn({ error: error.message, code: error.code }, 'Application error');
      return jsonResponse(error.statusCode, error.toApiError(requestId));
    }

    // Handle Zod validation errors
    if (error instanceof ZodError) {
      logger.warn({ issues: error.issues }, 'Validation error');
      const body: ApiError = {
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          requestId,
          details: { issues: error.issues },
        },
      };
      return jsonResponse(400, body);
    }

    // Unknown errors
    logger.error({ error }, 'Unexpected error');
    return jsonResponse(500, {
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        requestId,
      },
    });
  }
}
