// Criterion that produced a match between an incoming row and a stored story
export const MatchBasis = {
  EXACT_URL: 'exact_url',
  TITLE_SIMILARITY: 'title_similarity',
  SOURCE_DATE_PROXIMITY: 'source_date_proximity',
} as const;
export type MatchBasis = (typeof MatchBasis)[keyof typeof MatchBasis];

// Review queue lifecycle: pending is the only non-terminal state
export const ReviewStatus = {
  PENDING: 'pending',
  MERGED: 'merged',
  DISMISSED: 'dismissed',
} as const;
export type ReviewStatus = (typeof ReviewStatus)[keyof typeof ReviewStatus];

// Operator decision on a queued pair
export const ReviewDecision = {
  MERGE: 'merge',
  DISMISS: 'dismiss',
} as const;
export type ReviewDecision = (typeof ReviewDecision)[keyof typeof ReviewDecision];

// Per-row import outcome
export const OutcomeKind = {
  INSERTED: 'inserted',
  MERGED: 'merged',
  QUEUED: 'queued',
  REJECTED: 'rejected',
} as const;
export type OutcomeKind = (typeof OutcomeKind)[keyof typeof OutcomeKind];

// Why a row was rejected
export const RejectionCode = {
  VALIDATION: 'validation',
  INDEX_CONSISTENCY: 'index_consistency',
} as const;
export type RejectionCode = (typeof RejectionCode)[keyof typeof RejectionCode];

// Import batch state
export const ImportStatus = {
  COMPLETED: 'completed',
  ABORTED: 'aborted',
} as const;
export type ImportStatus = (typeof ImportStatus)[keyof typeof ImportStatus];
