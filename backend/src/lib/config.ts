export interface DedupSettings {
  titleSimilarityThreshold: number;
  sourceDateConfidence: number;
  dateWindowDays: number;
  dateFormats: readonly string[];
  stripQueryParams: readonly string[];
  stripQueryPrefixes: readonly string[];
}

// Environment configuration
export const config = {
  // AWS Region
  region: process.env.AWS_REGION || 'us-east-1',

  // DynamoDB Tables
  tables: {
    stories: process.env.STORIES_TABLE || 'SkienStories',
    reviews: process.env.REVIEWS_TABLE || 'SkienReviewQueue',
  },

  // Duplicate detection
  dedup: {
    titleSimilarityThreshold: 0.92,
    sourceDateConfidence: 0.75,
    dateWindowDays: 3,
    // Tried in order; the first that parses wins
    dateFormats: [
      'YYYY-MM-DD',
      'YYYY/MM/DD',
      'MM/DD/YYYY',
      'DD.MM.YYYY',
      'MMMM D, YYYY',
      'MMM D, YYYY',
      'D MMMM YYYY',
      'D MMM YYYY',
      'ISO8601',
      'RFC2822',
    ],
    stripQueryParams: ['fbclid', 'gclid', 'dclid', 'msclkid', 'mc_cid', 'mc_eid', 'igshid', '_ga'],
    stripQueryPrefixes: ['utm_'],
  } satisfies DedupSettings,

  // API settings
  api: {
    defaultPageSize: 20,
    maxPageSize: 100,
    maxImportRows: 5000,
  },

  // Feature flags
  features: {
    readOnly: process.env.SKIEN_READONLY === 'true',
  },

  // App version (set during build)
  version: process.env.APP_VERSION || '0.1.0',
} as const;

function positiveNumberFromEnv(name: string, max?: number): number | undefined {
  const raw = process.env[name];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) return undefined;
  if (max !== undefined && value > max) return undefined;
  return value;
}

/**
 * Apply DEDUP_* environment overrides on top of a base settings object.
 * Invalid values are ignored; the base object is never mutated.
 */
export function getDedupSettingsWithEnvOverrides(base: DedupSettings = config.dedup): DedupSettings {
  const titleSimilarityThreshold = positiveNumberFromEnv('DEDUP_TITLE_THRESHOLD', 1);
  const dateWindowDays = positiveNumberFromEnv('DEDUP_DATE_WINDOW_DAYS');
  const sourceDateConfidence = positiveNumberFromEnv('DEDUP_SOURCE_DATE_CONFIDENCE', 1);

  return {
    ...base,
    ...(titleSimilarityThreshold !== undefined && { titleSimilarityThreshold }),
    ...(dateWindowDays !== undefined && { dateWindowDays: Math.floor(dateWindowDays) }),
    ...(sourceDateConfidence !== undefined && { sourceDateConfidence }),
  };
}
