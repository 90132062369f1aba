import { PatcherError } from '../utils/errors.js';

export const DATE_FORMATS = ['Month-Year', 'Month-Day-Year', 'Year-Month-Day', 'Day-Month-Year', 'Full'] as const;

export type DateFormat = (typeof DATE_FORMATS)[number];

export const DEFAULT_DATE_FORMAT: DateFormat = 'Month-Day-Year';

export function isDateFormat(value: string): value is DateFormat {
  return (DATE_FORMATS as readonly string[]).includes(value);
}

// "+0000" style offsets are not accepted by Date.parse
const COMPACT_OFFSET = /([+-]\d{2})(\d{2})$/;

/** Epoch milliseconds, or null when the value is not a date. */
export function tryParseReleaseDate(value: string): number | null {
  const normalized = value.trim().replace(COMPACT_OFFSET, '$1:$2');
  const parsed = Date.parse(normalized);
  return normalized === '' || Number.isNaN(parsed) ? null : parsed;
}

/**
 * Parse an upstream release date to epoch milliseconds.
 */
export function parseReleaseDate(value: string): number {
  const parsed = tryParseReleaseDate(value);
  if (parsed === null) {
    throw new PatcherError('Unable to parse release date', {
      errorCode: 'INVALID_RELEASE_DATE',
      context: { value },
    });
  }
  return parsed;
}

function dateParts(date: Date, timeZone?: string): Record<'weekday' | 'month' | 'day' | 'year', string> {
  const parts = new Intl.DateTimeFormat('en-US', {
    weekday: 'long',
    month: 'long',
    day: '2-digit',
    year: 'numeric',
    timeZone,
  }).formatToParts(date);
  const pick = (type: Intl.DateTimeFormatPartTypes): string => parts.find((part) => part.type === type)?.value ?? '';
  return { weekday: pick('weekday'), month: pick('month'), day: pick('day'), year: pick('year') };
}

/**
 * Render the report generation date, e.g. "April 21 2024" for Month-Day-Year.
 */
export function formatReportDate(date: Date, format: DateFormat = DEFAULT_DATE_FORMAT, timeZone?: string): string {
  const { weekday, month, day, year } = dateParts(date, timeZone);
  switch (format) {
    case 'Month-Year':
      return `${month} ${year}`;
    case 'Month-Day-Year':
      return `${month} ${day} ${year}`;
    case 'Year-Month-Day':
      return `${year} ${month} ${day}`;
    case 'Day-Month-Year':
      return `${day} ${month} ${year}`;
    case 'Full':
      return `${weekday} ${month} ${day} ${year}`;
  }
}

/**
 * Short UTC rendering of a release date ("Apr 21 2024"). Unparsable values
 * are returned unchanged.
 */
export function formatReleaseDate(value: string): string {
  const parsed = tryParseReleaseDate(value);
  if (parsed === null) return value;
  const { month, day, year } = dateParts(new Date(parsed), 'UTC');
  return `${month.slice(0, 3)} ${day} ${year}`;
}

/** MM-DD-YY stamp used in report file names */
export function fileDateStamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return `${pad(date.getMonth() + 1)}-${pad(date.getDate())}-${pad(date.getFullYear() % 100)}`;
}
