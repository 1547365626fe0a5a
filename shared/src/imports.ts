// Import batch types
import type { ImportStatus, RejectionCode } from './enums.js';
import type { ReviewComparison } from './review.js';
import type { ImportField, ImportRecord } from './stories.js';

export type ResolutionOutcome =
  | { kind: 'inserted'; storyId: string }
  | { kind: 'merged'; storyId: string }
  | { kind: 'queued'; reviewId: string; comparison: ReviewComparison }
  | { kind: 'rejected'; code: RejectionCode; reason: string };

export interface RowResult {
  rowNumber: number; // 1-based, file order
  title: string | null;
  url: string | null;
  outcome: ResolutionOutcome;
}

export interface ImportCounts {
  inserted: number;
  merged: number;
  queued: number;
  rejected: number;
}

export interface ImportSummary {
  batchId: string;
  status: ImportStatus;
  startedAt: string;
  completedAt: string;
  totalRows: number;
  counts: ImportCounts;
  rows: RowResult[];
  // Set when the batch stopped early
  error?: {
    code: string;
    message: string;
    rowNumber: number;
  };
}

// Target field -> source column header
export type ColumnMapping = Partial<Record<ImportField, string>>;

// A row with a cell that could not be read as text
export interface UnreadableRow {
  unreadable: string;
}

export type MappedRow = ImportRecord | UnreadableRow;

export interface ImportPreview {
  totalRows: number;
  valid: number;
  invalid: number;
  errors: Array<{ rowNumber: number; error: string }>;
  sample: MappedRow[];
}
