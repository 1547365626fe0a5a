import type { MatchBasis } from './enums.js';

// Raw row after column mapping; every field may be missing or blank
export interface ImportRecord {
  title?: string | null;
  url?: string | null;
  source?: string | null;
  author?: string | null;
  publishedAt?: string | null;  // free-form date string from the file
  tags?: string | null;         // comma/semicolon/pipe separated
  summary?: string | null;
}

export type ImportField = keyof ImportRecord;

// Normalized, comparable form of an ImportRecord
export interface CanonicalStory {
  canonicalUrl: string;
  normalizedTitle: string;
  sourceDomain: string;
  publishedDate: string | null; // YYYY-MM-DD

  // Display fields carried through to storage
  title: string;
  url: string;
  sourceName: string;
  author: string | null;
  summary: string | null;
  tags: string[];
}

// Persisted story, one per canonical URL
export interface StoredStory extends CanonicalStory {
  storyId: string;    // ULID
  capturedAt: string; // ISO timestamp
  updatedAt: string;
}

// Display fields an operator may pin when merging a reviewed pair
export interface StoryFieldOverrides {
  title?: string;
  author?: string;
  summary?: string;
  sourceName?: string;
  publishedDate?: string;
}

export interface MatchCandidate {
  storyId: string;
  basis: MatchBasis;
  confidence: number; // 0.0 - 1.0
  capturedAt: string; // used for tie-breaking
}
