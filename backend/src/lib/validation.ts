import { z } from 'zod';
import { ReviewDecision, ReviewStatus } from '@skien/shared';
import { config } from './config.js';

// Common validators
export const ulidSchema = z.string().regex(/^[0-9A-HJKMNP-TV-Z]{26}$/);
export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(config.api.maxPageSize).optional().default(config.api.defaultPageSize),
  cursor: z.string().optional(),
});

// CSV cells arrive as strings, numbers or blanks; keep strings, blank -> null
const cellSchema = z.preprocess(
  (val) => {
    if (val === undefined || val === null) return null;
    if (typeof val === 'number' || typeof val === 'boolean') return String(val);
    return val;
  },
  z.string().nullable()
);

// Import record (after column mapping)
export const importRecordSchema = z.object({
  title: cellSchema.optional(),
  url: cellSchema.optional(),
  source: cellSchema.optional(),
  author: cellSchema.optional(),
  publishedAt: cellSchema.optional(),
  tags: cellSchema.optional(),
  summary: cellSchema.optional(),
});

const importFieldValues = ['title', 'url', 'source', 'author', 'publishedAt', 'tags', 'summary'] as const;

export const columnMappingSchema = z.partialRecord(z.enum(importFieldValues), z.string().min(1).max(200));

// Header-keyed rows straight from the CSV splitter
const rawRowSchema = z.record(z.string(), z.unknown());

export const importRequestSchema = z.object({
  rows: z.array(rawRowSchema).min(1).max(config.api.maxImportRows),
  columnMapping: columnMappingSchema.optional(),
});

export const previewRequestSchema = z.object({
  rows: z.array(rawRowSchema).min(1).max(config.api.maxImportRows),
  columnMapping: columnMappingSchema,
});

// Review queue schemas
export const reviewQuerySchema = paginationSchema.extend({
  status: z.enum(ReviewStatus).optional().default(ReviewStatus.PENDING),
});

export const storyFieldOverridesSchema = z.object({
  title: z.string().min(1).max(500).optional(),
  author: z.string().max(200).optional(),
  summary: z.string().max(10000).optional(),
  sourceName: z.string().min(1).max(200).optional(),
  publishedDate: isoDateSchema.optional(),
});

export const resolveReviewSchema = z.object({
  decision: z.enum(ReviewDecision),
  keepFields: storyFieldOverridesSchema.optional(),
});

// Static domain -> outlet name table
export const sourceDomainTableSchema = z.object({
  version: z.number().int(),
  secondLevelSuffixes: z.array(z.string().min(1)),
  domains: z.record(z.string().min(1), z.string().min(1)),
});

// Type exports
export type ImportRecordInput = z.infer<typeof importRecordSchema>;
export type ImportRequestInput = z.infer<typeof importRequestSchema>;
export type PreviewRequestInput = z.infer<typeof previewRequestSchema>;
export type ReviewQueryInput = z.infer<typeof reviewQuerySchema>;
export type ResolveReviewInput = z.infer<typeof resolveReviewSchema>;
export type SourceDomainTable = z.infer<typeof sourceDomainTableSchema>;
