import type { CanonicalStory, ImportRecord } from '@skien/shared';
import { config, type DedupSettings } from '../config.js';
import { ValidationError } from '../errors.js';
import { sourceDomainTableSchema } from '../validation.js';
import rawDomainTable from '../../config/source-domains.json' with { type: 'json' };

// Loaded once; lookups never touch the filesystem
const domainTable = sourceDomainTableSchema.parse(rawDomainTable);

const SOURCE_NAMES: ReadonlyMap<string, string> = new Map(
  Object.entries(domainTable.domains).map(([domain, name]) => [domain.toLowerCase(), name])
);
const SECOND_LEVEL_SUFFIXES: ReadonlySet<string> = new Set(domainTable.secondLevelSuffixes);

export const MAX_TITLE_LENGTH = 500;
export const MAX_URL_LENGTH = 2048;
export const MAX_NAME_LENGTH = 200;

// ============================================================
// URL Canonicalization
// ============================================================

function isTrackingParam(
  name: string,
  stripParams: readonly string[],
  stripPrefixes: readonly string[]
): boolean {
  const lower = name.toLowerCase();
  return stripParams.includes(lower) || stripPrefixes.some((prefix) => lower.startsWith(prefix));
}

function trimTrailingSlashes(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  return trimmed === '' ? '/' : trimmed;
}

// Looks like "example.com/path" typed without a scheme
const SCHEMELESS_HOST = /^[a-z0-9-]+(\.[a-z0-9-]+)+(:\d+)?(\/|\?|$)/i;

function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    if (SCHEMELESS_HOST.test(url)) {
      try {
        return new URL(`https://${url}`);
      } catch {
        return null;
      }
    }
    return null;
  }
}

/**
 * Canonicalize a URL: lowercase scheme and host, drop tracking parameters,
 * sort what remains, drop the fragment and any trailing slash.
 * Unparseable input is returned trimmed, without fragment or trailing slash.
 */
export function canonicalizeUrl(
  url: string,
  stripParams: readonly string[],
  stripPrefixes: readonly string[] = []
): string {
  const trimmed = url.trim();
  const parsed = parseUrl(trimmed);

  if (!parsed) {
    const withoutFragment = trimmed.split('#')[0];
    return trimTrailingSlashes(withoutFragment);
  }

  // WHATWG URL already lowercases scheme + host and drops default ports
  for (const name of [...new Set(parsed.searchParams.keys())]) {
    if (isTrackingParam(name, stripParams, stripPrefixes)) {
      parsed.searchParams.delete(name);
    }
  }

  // Sort remaining query params for consistent comparison
  parsed.searchParams.sort();
  if ([...parsed.searchParams.keys()].length === 0) {
    parsed.search = '';
  }
  parsed.hash = '';

  if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
    parsed.pathname = trimTrailingSlashes(parsed.pathname);
  }

  return parsed.toString();
}

// ============================================================
// Title Normalization
// ============================================================

const EDGE_PUNCTUATION = /^[\p{P}\p{S}\s]+|[\p{P}\p{S}\s]+$/gu;

export function normalizeTitle(title: string): string {
  return title
    .normalize('NFKC')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(EDGE_PUNCTUATION, '');
}

// ============================================================
// Date Parsing
// ============================================================

const MONTHS: Record<string, number> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
};

type DateField = 'year' | 'month' | 'day' | 'monthName';

interface CompiledFormat {
  regex: RegExp;
  fields: DateField[];
}

const TOKEN_PATTERNS: Record<string, { pattern: string; field: DateField }> = {
  YYYY: { pattern: '(\\d{4})', field: 'year' },
  MMMM: { pattern: '([a-z]+)', field: 'monthName' },
  MMM: { pattern: '([a-z]{3,4})\\.?', field: 'monthName' },
  MM: { pattern: '(\\d{2})', field: 'month' },
  M: { pattern: '(\\d{1,2})', field: 'month' },
  DD: { pattern: '(\\d{2})', field: 'day' },
  D: { pattern: '(\\d{1,2})', field: 'day' },
};

const ISO_8601 = /^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/i;
const RFC_2822 =
  /^(?:[a-z]{3},\s*)?(\d{1,2})\s+([a-z]{3})\s+(\d{4})(?:\s+\d{2}:\d{2}(?::\d{2})?(?:\s+(?:[a-z]{1,5}|[+-]\d{4}))?)?$/i;

const compiledFormats = new Map<string, CompiledFormat>();

function compileFormat(format: string): CompiledFormat {
  const cached = compiledFormats.get(format);
  if (cached) return cached;

  const fields: DateField[] = [];
  let pattern = '';
  const tokenRegex = /YYYY|MMMM|MMM|MM|M|DD|D/g;
  let lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = tokenRegex.exec(format)) !== null) {
    pattern += escapeLiteral(format.slice(lastIndex, match.index));
    const token = TOKEN_PATTERNS[match[0]];
    pattern += token.pattern;
    fields.push(token.field);
    lastIndex = tokenRegex.lastIndex;
  }
  pattern += escapeLiteral(format.slice(lastIndex));

  const compiled = { regex: new RegExp(`^${pattern}$`, 'i'), fields };
  compiledFormats.set(format, compiled);
  return compiled;
}

function escapeLiteral(text: string): string {
  return text
    .replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    .replace(/\s+/g, '\\s+');
}

function toIsoDate(year: number, month: number, day: number): string | null {
  if (year < 1000 || month < 1 || month > 12 || day < 1) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  // Rejects Feb 30 and friends, which Date.UTC silently rolls over
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date.toISOString().slice(0, 10);
}

function monthFromName(name: string): number | undefined {
  return MONTHS[name.toLowerCase()];
}

function parseWithFormat(value: string, format: string): string | null {
  if (format === 'ISO8601') {
    const m = ISO_8601.exec(value);
    return m ? toIsoDate(Number(m[1]), Number(m[2]), Number(m[3])) : null;
  }

  if (format === 'RFC2822') {
    const m = RFC_2822.exec(value);
    if (!m) return null;
    const month = monthFromName(m[2]);
    return month ? toIsoDate(Number(m[3]), month, Number(m[1])) : null;
  }

  const { regex, fields } = compileFormat(format);
  const m = regex.exec(value);
  if (!m) return null;

  let year = NaN;
  let month = NaN;
  let day = NaN;

  fields.forEach((field, i) => {
    const raw = m[i + 1];
    switch (field) {
      case 'year':
        year = Number(raw);
        break;
      case 'month':
        month = Number(raw);
        break;
      case 'monthName':
        month = monthFromName(raw) ?? NaN;
        break;
      case 'day':
        day = Number(raw);
        break;
    }
  });

  if (Number.isNaN(year) || Number.isNaN(month) || Number.isNaN(day)) return null;
  return toIsoDate(year, month, day);
}

/**
 * Parse a published date using the first matching format.
 * Returns YYYY-MM-DD, or null when nothing matches.
 */
export function parsePublishedDate(value: string, formats: readonly string[]): string | null {
  const trimmed = value.trim();
  if (!trimmed) return null;

  for (const format of formats) {
    const parsed = parseWithFormat(trimmed, format);
    if (parsed) return parsed;
  }
  return null;
}

// ============================================================
// Source Extraction
// ============================================================

export function hostnameOf(url: string): string | null {
  const parsed = parseUrl(url);
  if (!parsed || !parsed.hostname) return null;
  return parsed.hostname.toLowerCase().replace(/\.$/, '');
}

const IPV4 = /^\d{1,3}(\.\d{1,3}){3}$/;

/**
 * Reduce a hostname to the domain that identifies its outlet: the longest
 * suffix known to the domain table, else the registrable domain.
 */
export function registrableDomain(hostname: string): string {
  const host = hostname.toLowerCase().replace(/^www\./, '');
  if (IPV4.test(host) || host.includes(':')) return host;

  const labels = host.split('.');
  for (let i = 0; i < labels.length - 1; i++) {
    const suffix = labels.slice(i).join('.');
    if (SOURCE_NAMES.has(suffix)) return suffix;
  }

  if (labels.length <= 2) return host;
  const lastTwo = labels.slice(-2).join('.');
  return SECOND_LEVEL_SUFFIXES.has(lastTwo) ? labels.slice(-3).join('.') : lastTwo;
}

export function sourceNameForDomain(domain: string): string {
  return SOURCE_NAMES.get(domain) ?? domain;
}

export function resolveSource(
  url: string,
  explicitSource: string | null
): { sourceDomain: string; sourceName: string } {
  const host = hostnameOf(url);

  if (!host) {
    return {
      sourceDomain: explicitSource ? explicitSource.toLowerCase() : 'unknown',
      sourceName: explicitSource ?? 'Unknown Source',
    };
  }

  const sourceDomain = registrableDomain(host);
  return {
    sourceDomain,
    sourceName: explicitSource ?? sourceNameForDomain(sourceDomain),
  };
}

// ============================================================
// Tags
// ============================================================

export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase().replace(/\s+/g, '_');
}

export function parseTags(raw: string | null | undefined): string[] {
  if (!raw) return [];
  const tags: string[] = [];
  for (const part of raw.split(/[,;|]/)) {
    const tag = normalizeTag(part);
    if (tag && !tags.includes(tag)) tags.push(tag);
  }
  return tags;
}

// ============================================================
// Record Canonicalization
// ============================================================

function clean(value: string | null | undefined): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function checkLength(field: string, value: string | null, max: number): void {
  if (value !== null && value.length > max) {
    throw new ValidationError(`${field} is too long (max ${max} characters)`, {
      field,
      length: value.length,
    });
  }
}

/**
 * Normalize a raw import record into its comparable form.
 * Throws ValidationError when the row cannot become a story.
 */
export function canonicalize(
  record: ImportRecord,
  settings: DedupSettings = config.dedup,
  now: Date = new Date()
): CanonicalStory {
  const title = clean(record.title);
  if (!title) {
    throw new ValidationError('title is required', { field: 'title' });
  }
  checkLength('title', title, MAX_TITLE_LENGTH);

  const normalizedTitle = normalizeTitle(title);
  if (!normalizedTitle) {
    throw new ValidationError('title is empty after normalization', { field: 'title', value: title });
  }

  const url = clean(record.url);
  if (!url) {
    throw new ValidationError('url is required', { field: 'url' });
  }
  checkLength('url', url, MAX_URL_LENGTH);

  const source = clean(record.source);
  const author = clean(record.author);
  checkLength('source', source, MAX_NAME_LENGTH);
  checkLength('author', author, MAX_NAME_LENGTH);

  const rawDate = clean(record.publishedAt);
  const publishedDate = rawDate ? parsePublishedDate(rawDate, settings.dateFormats) : null;
  const today = now.toISOString().slice(0, 10);
  if (publishedDate && publishedDate > today) {
    throw new ValidationError('published date cannot be in the future', {
      field: 'publishedAt',
      value: publishedDate,
    });
  }

  const canonicalUrl = canonicalizeUrl(url, settings.stripQueryParams, settings.stripQueryPrefixes);
  const { sourceDomain, sourceName } = resolveSource(canonicalUrl, source);

  return Object.freeze({
    canonicalUrl,
    normalizedTitle,
    sourceDomain,
    publishedDate,
    title,
    url,
    sourceName,
    author,
    summary: clean(record.summary),
    tags: parseTags(record.tags),
  });
}
