import { PatchTitle } from '../models/patch-title.js';
import { PatcherError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { compareReleaseDates, compareValues } from './aggregator.js';
import { formatReleaseDate, tryParseReleaseDate } from './date-format.js';

const logger = createLogger('analyzer');

export const FILTER_CRITERIA = [
  'most_installed',
  'least_installed',
  'oldest_least_complete',
  'below_threshold',
  'high_missing',
  'recent_release',
  'zero_completion',
  'top_performers',
] as const;

export type FilterCriteria = (typeof FILTER_CRITERIA)[number];

export const DEFAULT_THRESHOLD = 70;
export const TOP_PERFORMER_PERCENT = 90;
export const RECENT_RELEASE_DAYS = 7;

// Every match is listed for these, whatever the top-N limit.
const UNLIMITED: readonly FilterCriteria[] = ['below_threshold', 'zero_completion'];

export const criteriaLabel = (criteria: FilterCriteria): string => criteria.replace(/_/g, '-');

/** Accepts "most-installed" or "most_installed", in any case. */
export function toFilterCriteria(value: string): FilterCriteria | undefined {
  const normalized = value.trim().toLowerCase().replace(/-/g, '_');
  return FILTER_CRITERIA.find((criteria) => criteria === normalized);
}

export function parseFilterCriteria(value: string): FilterCriteria {
  const criteria = toFilterCriteria(value);
  if (!criteria) {
    throw new PatcherError(`Invalid filter criteria "${value}"`, {
      errorCode: 'INVALID_CRITERIA',
      context: { allowed: FILTER_CRITERIA.map(criteriaLabel).join(', ') },
    });
  }
  return criteria;
}

export interface FilterOptions {
  /** Completion percent below which `below_threshold` keeps a title */
  threshold?: number;
  /** Keep only the first N results; ignored by `below_threshold` and `zero_completion` */
  topN?: number;
  now?: Date;
}

type Comparator = (left: PatchTitle, right: PatchTitle) => number;

const byTotalHosts: Comparator = (a, b) => compareValues(a.totalHosts, b.totalHosts);
const byCompletion: Comparator = (a, b) => compareValues(a.completionPercent, b.completionPercent);
const byReleased: Comparator = (a, b) => compareReleaseDates(a.releasedDate, b.releasedDate);
const descending =
  (compare: Comparator): Comparator =>
  (a, b) =>
    compare(b, a);

function select(
  titles: readonly PatchTitle[],
  keep: (title: PatchTitle) => boolean,
  compare?: Comparator
): PatchTitle[] {
  const kept = titles.filter(keep);
  return compare ? kept.sort(compare) : kept;
}

function applyCriteria(
  titles: readonly PatchTitle[],
  criteria: FilterCriteria,
  threshold: number,
  now: Date
): PatchTitle[] {
  const all = () => true;
  switch (criteria) {
    case 'most_installed':
      return select(titles, all, descending(byTotalHosts));
    case 'least_installed':
      return select(titles, all, byTotalHosts);
    case 'oldest_least_complete':
      return select(titles, all, (a, b) => byReleased(a, b) || byCompletion(a, b));
    case 'below_threshold':
      return select(titles, (title) => title.completionPercent < threshold, byCompletion);
    case 'high_missing':
      return select(
        titles,
        (title) => title.missingPatch * 2 > title.totalHosts,
        (a, b) => compareValues(a.missingPatch, b.missingPatch)
      );
    case 'recent_release': {
      const cutoff = now.getTime() - RECENT_RELEASE_DAYS * 24 * 60 * 60 * 1000;
      return select(
        titles,
        (title) => (tryParseReleaseDate(title.releasedDate) ?? Number.NEGATIVE_INFINITY) >= cutoff,
        descending(byReleased)
      );
    }
    case 'zero_completion':
      return select(titles, (title) => title.completionPercent === 0);
    case 'top_performers':
      return select(titles, (title) => title.completionPercent > TOP_PERFORMER_PERCENT, descending(byCompletion));
  }
}

/**
 * Filter and order report rows by one analysis criteria. Sorts are stable,
 * so titles that tie keep their report order.
 */
export function filterTitles(
  titles: readonly PatchTitle[],
  criteria: FilterCriteria,
  options: FilterOptions = {}
): PatchTitle[] {
  let result = applyCriteria(titles, criteria, options.threshold ?? DEFAULT_THRESHOLD, options.now ?? new Date());
  if (options.topN !== undefined && !UNLIMITED.includes(criteria)) {
    result = result.slice(0, options.topN);
  }

  logger.info({ criteria, matched: result.length }, 'Filtered patch titles');
  return result;
}

/**
 * Plain-text table: columns padded to their widest cell, joined by " | ",
 * with a "-+-" rule under the headers.
 */
export function formatTable(rows: readonly string[][], headers?: readonly string[]): string {
  const lines = headers ? [headers, ...rows] : [...rows];
  if (lines.length === 0) return '';

  const columns = Math.max(...lines.map((line) => line.length));
  const widths = Array.from({ length: columns }, (_, column) =>
    Math.max(...lines.map((line) => (line[column] ?? '').length))
  );
  const render = (line: readonly string[]): string =>
    widths
      .map((width, column) => (line[column] ?? '').padEnd(width))
      .join(' | ')
      .trimEnd();

  const table = lines.map(render);
  if (headers) {
    table.splice(1, 0, widths.map((width) => '-'.repeat(width)).join('-+-'));
  }
  return table.join('\n');
}

export const ANALYSIS_HEADERS = [
  'Title',
  'Released',
  'Hosts Patched',
  'Missing Patch',
  'Latest Version',
  'Completion %',
  'Total Hosts',
];

export function analysisRows(titles: readonly PatchTitle[]): string[][] {
  return titles.map((title) => [
    title.title,
    formatReleaseDate(title.releasedDate),
    String(title.hostsPatched),
    String(title.missingPatch),
    title.latestVersion || 'N/A',
    String(title.completionPercent),
    String(title.totalHosts),
  ]);
}
