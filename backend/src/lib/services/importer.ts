import { ulid } from 'ulid';
import {
  ImportStatus,
  RejectionCode,
  type CanonicalStory,
  type ColumnMapping,
  type ImportCounts,
  type ImportPreview,
  type ImportSummary,
  type MappedRow,
  type ResolutionOutcome,
  type RowResult,
} from '@skien/shared';
import type { DedupContext } from '../context.js';
import { AppError, ValidationError } from '../errors.js';
import { createBatchLogger } from '../logger.js';
import { importRecordSchema } from '../validation.js';
import { canonicalize } from './canonicalizer.js';
import { findMatches } from './matcher.js';
import { resolve } from './resolver.js';

const PREVIEW_SAMPLE_SIZE = 10;

// Columns already named after the record fields
export const DEFAULT_COLUMN_MAPPING: Required<ColumnMapping> = {
  title: 'title',
  url: 'url',
  source: 'source',
  author: 'author',
  publishedAt: 'publishedAt',
  tags: 'tags',
  summary: 'summary',
};

// ============================================================
// Column mapping
// ============================================================

/**
 * Turn header-keyed rows into import records. Fields whose column is missing
 * from a row come out as null. A row holding a cell that is not text, a number
 * or a boolean comes out as an unreadable row, which the import rejects on its
 * own.
 */
export function applyColumnMapping(
  rows: Array<Record<string, unknown>>,
  mapping: ColumnMapping = DEFAULT_COLUMN_MAPPING
): MappedRow[] {
  return rows.map((row) => {
    const mapped: Record<string, unknown> = {};
    for (const [field, column] of Object.entries(mapping)) {
      if (column === undefined) continue;
      mapped[field] = Object.hasOwn(row, column) ? row[column] : null;
    }

    const parsed = importRecordSchema.safeParse(mapped);
    if (parsed.success) return parsed.data;

    const field = parsed.error.issues[0]?.path[0];
    return { unreadable: `${String(field ?? 'row')} is not a text value` };
  });
}

/**
 * Validate mapped rows without touching storage.
 */
export function previewImport(
  records: MappedRow[],
  ctx: Pick<DedupContext, 'settings' | 'now'>
): ImportPreview {
  const preview: ImportPreview = {
    totalRows: records.length,
    valid: 0,
    invalid: 0,
    errors: [],
    sample: records.slice(0, PREVIEW_SAMPLE_SIZE),
  };

  const now = ctx.now();
  records.forEach((record, i) => {
    if ('unreadable' in record) {
      preview.invalid++;
      preview.errors.push({ rowNumber: i + 1, error: record.unreadable });
      return;
    }
    try {
      canonicalize(record, ctx.settings, now);
      preview.valid++;
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      preview.invalid++;
      preview.errors.push({ rowNumber: i + 1, error: error.message });
    }
  });

  return preview;
}

// ============================================================
// Batch import
// ============================================================

/**
 * Canonicalize, match and resolve a single row. The match-decide-write
 * sequence runs under the canonical URL lock.
 */
export async function resolveRow(
  record: MappedRow,
  rowNumber: number,
  batchId: string,
  ctx: DedupContext
): Promise<ResolutionOutcome> {
  if ('unreadable' in record) {
    return { kind: 'rejected', code: RejectionCode.VALIDATION, reason: record.unreadable };
  }

  let candidate: CanonicalStory;
  try {
    candidate = canonicalize(record, ctx.settings, ctx.now());
  } catch (error) {
    if (error instanceof ValidationError) {
      return { kind: 'rejected', code: RejectionCode.VALIDATION, reason: error.message };
    }
    throw error;
  }

  return ctx.locks.run(candidate.canonicalUrl, async () => {
    const matches = await findMatches(candidate, ctx.stories, ctx.settings);
    return resolve(candidate, matches, ctx, { batchId, rowNumber, record });
  });
}

function displayValue(value: string | null | undefined): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

/**
 * Import rows in file order. Each row sees every story written by the rows
 * before it. A storage failure stops the batch; the summary still lists every
 * row handled up to that point.
 */
export async function runImport(
  records: MappedRow[],
  ctx: DedupContext,
  options: { batchId?: string } = {}
): Promise<ImportSummary> {
  const batchId = options.batchId ?? ulid();
  const log = createBatchLogger(batchId, ctx.logger);
  const startedAt = ctx.now().toISOString();
  const counts: ImportCounts = { inserted: 0, merged: 0, queued: 0, rejected: 0 };
  const rows: RowResult[] = [];
  let failure: ImportSummary['error'];

  log.info({ totalRows: records.length }, 'Starting import batch');

  for (const [i, record] of records.entries()) {
    const rowNumber = i + 1;

    try {
      const outcome = await resolveRow(record, rowNumber, batchId, ctx);
      counts[outcome.kind]++;
      rows.push({
        rowNumber,
        title: 'unreadable' in record ? null : displayValue(record.title),
        url: 'unreadable' in record ? null : displayValue(record.url),
        outcome,
      });

      if (outcome.kind === 'rejected') {
        log.warn({ rowNumber, code: outcome.code, reason: outcome.reason }, 'Row rejected');
      } else {
        log.debug({ rowNumber, outcome: outcome.kind }, 'Row resolved');
      }
    } catch (error) {
      failure = {
        code: error instanceof AppError ? error.code : 'INTERNAL_ERROR',
        message: error instanceof Error ? error.message : 'Unknown error',
        rowNumber,
      };
      log.error({ error, rowNumber }, 'Import batch aborted');
      break;
    }
  }

  const summary: ImportSummary = {
    batchId,
    status: failure ? ImportStatus.ABORTED : ImportStatus.COMPLETED,
    startedAt,
    completedAt: ctx.now().toISOString(),
    totalRows: records.length,
    counts,
    rows,
    ...(failure && { error: failure }),
  };

  log.info({ status: summary.status, ...counts }, 'Completed import batch');
  return summary;
}
