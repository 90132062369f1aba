import { z } from 'zod';
import { PatcherError } from '../utils/errors.js';

const hostCount = z.number().int().min(0);

export const PatchTitleInitSchema = z.object({
  title: z.string(),
  titleId: z.string(),
  releasedDate: z.string(),
  hostsPatched: hostCount,
  missingPatch: hostCount,
  latestVersion: z.string().default(''),
});

export type PatchTitleInit = z.input<typeof PatchTitleInitSchema>;

export interface PatchTitleRecord {
  title: string;
  titleId: string;
  releasedDate: string;
  hostsPatched: number;
  missingPatch: number;
  latestVersion: string;
  completionPercent: number;
  totalHosts: number;
}

/** Fields a report can be sorted by. */
export const SORTABLE_FIELDS = [
  'title',
  'titleId',
  'releasedDate',
  'hostsPatched',
  'missingPatch',
  'latestVersion',
  'completionPercent',
  'totalHosts',
] as const satisfies ReadonlyArray<keyof PatchTitleRecord>;

export type SortableField = (typeof SORTABLE_FIELDS)[number];

/**
 * Percentage of patched hosts, rounded to two decimals. Zero hosts is 0%.
 * Rounding works on the exact ratio and sends ties to the even hundredth,
 * so 1 of 800 hosts is 0.12 and 3 of 800 is 0.38.
 */
export function calculateCompletionPercent(hostsPatched: number, totalHosts: number): number {
  if (totalHosts <= 0) return 0;
  const scaled = hostsPatched * 10000;
  const remainder = scaled % totalHosts;
  let hundredths = (scaled - remainder) / totalHosts;
  if (remainder * 2 > totalHosts || (remainder * 2 === totalHosts && hundredths % 2 === 1)) {
    hundredths += 1;
  }
  return hundredths / 100;
}

/**
 * One report row: compliance for a software title or an iOS version bucket.
 * `totalHosts` and `completionPercent` are derived at construction.
 */
export class PatchTitle {
  readonly title: string;
  readonly titleId: string;
  readonly releasedDate: string;
  readonly hostsPatched: number;
  readonly missingPatch: number;
  readonly latestVersion: string;
  readonly totalHosts: number;
  readonly completionPercent: number;

  constructor(init: PatchTitleInit) {
    const result = PatchTitleInitSchema.safeParse(init);
    if (!result.success) {
      throw new PatcherError('Invalid patch title data', {
        errorCode: 'INVALID_PATCH_TITLE',
        context: {
          title: init.title,
          issues: result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
        },
      });
    }

    const data = result.data;
    this.title = data.title;
    this.titleId = data.titleId;
    this.releasedDate = data.releasedDate;
    this.hostsPatched = data.hostsPatched;
    this.missingPatch = data.missingPatch;
    this.latestVersion = data.latestVersion;
    this.totalHosts = data.hostsPatched + data.missingPatch;
    this.completionPercent = calculateCompletionPercent(data.hostsPatched, this.totalHosts);
    Object.freeze(this);
  }

  toRecord(): PatchTitleRecord {
    return {
      title: this.title,
      titleId: this.titleId,
      releasedDate: this.releasedDate,
      hostsPatched: this.hostsPatched,
      missingPatch: this.missingPatch,
      latestVersion: this.latestVersion,
      completionPercent: this.completionPercent,
      totalHosts: this.totalHosts,
    };
  }
}
