/**
 * Loose date parsing for forum timestamps
 *
 * Forum rows carry dates like "3/5/2024 10:22" or "2024-03-05". Parsing only
 * needs a calendar day for sorting and grouping, so times are ignored.
 */

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/**
 * Tried in order; the first pattern found anywhere in the string wins
 */
const DATE_PATTERNS: ReadonlyArray<{ regex: RegExp; order: 'ymd' | 'mdy' }> = [
  { regex: /(\d{4})-(\d{1,2})-(\d{1,2})/, order: 'ymd' },
  { regex: /(\d{1,2})\/(\d{1,2})\/(\d{4})/, order: 'mdy' },
  { regex: /(\d{1,2})-(\d{1,2})-(\d{4})/, order: 'mdy' },
  { regex: /(\d{4})\/(\d{1,2})\/(\d{1,2})/, order: 'ymd' },
];

function isValidCalendarDate({ year, month, day }: CalendarDate): boolean {
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

/**
 * Parse a raw date string into a calendar date, or null when unparseable.
 * A pattern that matches but names an impossible day ("2/30/2024") is
 * unparseable; later patterns are not tried.
 */
export function parseListingDate(raw: string | null | undefined): CalendarDate | null {
  if (!raw) {
    return null;
  }

  const text = raw.trim();

  for (const { regex, order } of DATE_PATTERNS) {
    const match = regex.exec(text);
    if (!match) {
      continue;
    }

    const [, first = '', second = '', third = ''] = match;
    const date: CalendarDate =
      order === 'ymd'
        ? { year: parseInt(first, 10), month: parseInt(second, 10), day: parseInt(third, 10) }
        : { year: parseInt(third, 10), month: parseInt(first, 10), day: parseInt(second, 10) };

    return isValidCalendarDate(date) ? date : null;
  }

  return null;
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/**
 * YYYY-MM-DD
 */
export function formatCalendarDate({ year, month, day }: CalendarDate): string {
  return [
    String(year).padStart(4, '0'),
    String(month).padStart(2, '0'),
    String(day).padStart(2, '0'),
  ].join('-');
}
