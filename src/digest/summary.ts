/**
 * Listing Summary
 *
 * Date ordering and per-run statistics for the notification body
 */

import { firstMatchingTerm } from '../filter/index.js';
import { compareCalendarDates, formatCalendarDate, parseListingDate } from '../utils/date-parser.js';
import type { ListingRecord } from '../types/index.js';

export const UNKNOWN_DATE = 'unknown date';

export interface SummaryBucket {
  key: string;
  count: number;
}

export interface ListingSummary {
  total: number;
  byDate: SummaryBucket[];
  /** Empty when no search terms were given */
  byKeyword: SummaryBucket[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Sorting
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Newest first. Records with an unparseable date keep their relative order
 * and go after all dated records.
 */
export function sortByDateDescending<T extends Pick<ListingRecord, 'date'>>(records: readonly T[]): T[] {
  const dated = records.flatMap((record) => {
    const parsed = parseListingDate(record.date);
    return parsed ? [{ record, parsed }] : [];
  });
  const undated = records.filter((record) => parseListingDate(record.date) === null);

  dated.sort((a, b) => compareCalendarDates(b.parsed, a.parsed));

  return [...dated.map(({ record }) => record), ...undated];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Statistics
// ═══════════════════════════════════════════════════════════════════════════════

function dateBucketKey(raw: string): string {
  const parsed = parseListingDate(raw);
  if (parsed) {
    return formatCalendarDate(parsed);
  }
  const text = raw.trim();
  return text || UNKNOWN_DATE;
}

function countInto(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function toBuckets(counts: Map<string, number>): SummaryBucket[] {
  return [...counts].map(([key, count]) => ({ key, count }));
}

export function summarizeListings(
  records: readonly ListingRecord[],
  searchTerms: readonly string[] = []
): ListingSummary {
  const dateCounts = new Map<string, number>();
  const keywordCounts = new Map<string, number>();

  for (const record of records) {
    countInto(dateCounts, dateBucketKey(record.date));

    if (searchTerms.length > 0) {
      const term = firstMatchingTerm(record.title, searchTerms, { ignoreCase: true });
      if (term !== undefined) {
        countInto(keywordCounts, term);
      }
    }
  }

  const byDate = toBuckets(dateCounts).sort((a, b) => {
    if (a.key === UNKNOWN_DATE || b.key === UNKNOWN_DATE) {
      return Number(a.key === UNKNOWN_DATE) - Number(b.key === UNKNOWN_DATE);
    }
    return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
  });

  // Array.prototype.sort is stable, so ties stay in first-seen order
  const byKeyword = toBuckets(keywordCounts).sort((a, b) => b.count - a.count);

  return { total: records.length, byDate, byKeyword };
}

/**
 * Render the summary as plain text. `noun` names what was found,
 * e.g. "nail salon listings".
 */
export function formatSummary(summary: ListingSummary, noun: string): string {
  const lines = [`📊 Found ${summary.total} new ${noun}`];

  if (summary.byDate.length > 0) {
    lines.push('', '📅 By date:');
    for (const { key, count } of summary.byDate) {
      lines.push(`  - ${key}: ${count}`);
    }
  }

  if (summary.byKeyword.length > 0) {
    lines.push('', '🔍 By keyword:');
    for (const { key, count } of summary.byKeyword) {
      lines.push(`  - ${key}: ${count}`);
    }
  }

  return lines.join('\n');
}
