/**
 * Notification message formatting
 */

import { formatSummary, summarizeListings } from './summary.js';
import type { ListingRecord, NotificationMessage } from '../types/index.js';

const SUBJECT_TERM_LIMIT = 3;
const SEPARATOR = '─'.repeat(50);

export interface NotificationContext {
  /** Bracketed subject prefix, e.g. "美甲招聘" */
  subjectPrefix: string;
  /** What a record is, e.g. "美甲 listings" */
  noun: string;
  searchTerms: readonly string[];
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYY-MM-DD HH:mm:ss
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatSubject(subjectPrefix: string, searchTerms: readonly string[]): string {
  const terms = searchTerms.slice(0, SUBJECT_TERM_LIMIT).join('、');
  return `【${subjectPrefix}】New listings: ${terms}`;
}

function formatRecord(record: ListingRecord, position: number): string {
  const lines = [
    `${position}. 📅 Date: ${record.date}`,
    `   📝 Title: ${record.title}`,
    `   👤 Author: ${record.author}`,
    `   🔗 Link: ${record.link}`,
  ];
  if (record.description) {
    lines.push(`   📄 Details: ${record.description}`);
  }
  lines.push(`   ${SEPARATOR}`);
  return lines.join('\n');
}

/**
 * Build the subject and plain-text body for a batch of new records.
 * Records are rendered in the order given.
 */
export function formatNotification(
  records: readonly ListingRecord[],
  context: NotificationContext,
  now: Date = new Date()
): NotificationMessage {
  const summary = formatSummary(summarizeListings(records, context.searchTerms), context.noun);

  const body = [
    'Hello!',
    '',
    `The following new ${context.noun} were found (keywords: ${context.searchTerms.join(', ')}):`,
    '',
    summary,
    '',
    ...records.map((record, index) => formatRecord(record, index + 1)),
    '',
    'Please check soon!',
    '',
    `Sent at: ${formatTimestamp(now)}`,
  ].join('\n');

  return { subject: formatSubject(context.subjectPrefix, context.searchTerms), body };
}
