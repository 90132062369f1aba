import { PatchTitle, SORTABLE_FIELDS, SortableField } from '../models/patch-title.js';
import { DeviceOsVersion, LatestOsVersion } from '../types/jamf-api.js';
import { SortError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { parseReleaseDate, tryParseReleaseDate } from './date-format.js';

const logger = createLogger('aggregator');

export const DEFAULT_OMIT_CUTOFF_HOURS = 48;

export interface OmitOptions {
  now?: Date;
  cutoffHours?: number;
}

function majorVersion(osVersion: string): string {
  return osVersion.split('.')[0];
}

/**
 * Bucket devices by iOS major version and count those on the latest release.
 *
 * Only majors present in `latestVersions` are reported, in that order. Devices
 * on any other major are ignored and empty buckets produce no row.
 */
export function calculateIosOnLatest(
  deviceVersions: readonly DeviceOsVersion[],
  latestVersions: readonly LatestOsVersion[]
): PatchTitle[] {
  const buckets = new Map<string, { latest: LatestOsVersion; patched: number; total: number }>();
  for (const latest of latestVersions) {
    if (!buckets.has(latest.osVersion)) {
      buckets.set(latest.osVersion, { latest, patched: 0, total: 0 });
    }
  }

  let ignored = 0;
  for (const device of deviceVersions) {
    const bucket = buckets.get(majorVersion(device.osVersion));
    if (!bucket) {
      ignored += 1;
      continue;
    }
    bucket.total += 1;
    if (device.osVersion === bucket.latest.productVersion) {
      bucket.patched += 1;
    }
  }

  if (ignored > 0) {
    logger.debug({ ignored }, 'Devices on majors without a latest release were skipped');
  }

  const rows: PatchTitle[] = [];
  for (const [major, bucket] of buckets) {
    if (bucket.total === 0) continue;
    rows.push(
      new PatchTitle({
        title: `iOS ${bucket.latest.productVersion}`,
        titleId: `iOS-${major}`,
        releasedDate: bucket.latest.releaseDate,
        hostsPatched: bucket.patched,
        missingPatch: bucket.total - bucket.patched,
        latestVersion: bucket.latest.productVersion,
      })
    );
  }
  return rows;
}

const canonical = (name: string): string => name.replace(/[\s_]/g, '').toLowerCase();

const FIELD_LOOKUP = new Map<string, SortableField>(SORTABLE_FIELDS.map((field) => [canonical(field), field]));

/**
 * "nonexistent_column" -> "Nonexistent Column", "hostsPatched" -> "Hosts Patched"
 */
export function humanizeColumn(name: string): string {
  return name
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .replace(/_/g, ' ')
    .replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export function resolveSortField(name: string): SortableField {
  const field = FIELD_LOOKUP.get(canonical(name));
  if (!field) {
    throw new SortError(humanizeColumn(name), {
      suggestions: [`Sortable columns: ${SORTABLE_FIELDS.map(humanizeColumn).join(', ')}`],
    });
  }
  return field;
}

export function compareValues(left: string | number, right: string | number): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

// Release dates compare by instant; unparsable ones sort last, by text.
export function compareReleaseDates(left: string, right: string): number {
  const leftTime = tryParseReleaseDate(left);
  const rightTime = tryParseReleaseDate(right);
  if (leftTime === null || rightTime === null) {
    if (leftTime !== rightTime) return leftTime === null ? 1 : -1;
    return compareValues(left, right);
  }
  return compareValues(leftTime, rightTime);
}

/**
 * Stable ascending sort on a named column. Accepts camelCase, snake_case or
 * spaced names, case-insensitively. The input array is left untouched.
 */
export function sortPatchTitles(titles: readonly PatchTitle[], column: string): PatchTitle[] {
  const field = resolveSortField(column);
  logger.debug({ field, count: titles.length }, 'Sorting patch titles');
  if (field === 'releasedDate') {
    return [...titles].sort((a, b) => compareReleaseDates(a.releasedDate, b.releasedDate));
  }
  return [...titles].sort((a, b) => compareValues(a[field], b[field]));
}

/**
 * Drop titles released within the last `cutoffHours`. An unparsable release
 * date throws.
 */
export function omitRecentReleases(titles: readonly PatchTitle[], options: OmitOptions = {}): PatchTitle[] {
  const now = options.now ?? new Date();
  const cutoffHours = options.cutoffHours ?? DEFAULT_OMIT_CUTOFF_HOURS;
  const cutoff = now.getTime() - cutoffHours * 60 * 60 * 1000;

  const kept = titles.filter((title) => parseReleaseDate(title.releasedDate) <= cutoff);
  logger.debug({ cutoffHours, omitted: titles.length - kept.length }, 'Omitted recently released titles');
  return kept;
}
