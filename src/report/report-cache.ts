import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { PatchTitle, PatchTitleInitSchema } from '../models/patch-title.js';
import { atomicWrite, ensureDir, hasErrorCode } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('report-cache');

export const CACHE_EXPIRATION_DAYS = 90;

const SNAPSHOT_PATTERN = /^patch_data_\d{12}\.json$/;

const SnapshotSchema = z.object({
  createdAt: z.string(),
  titles: z.array(PatchTitleInitSchema),
});

export interface ReportCacheOptions {
  now?: () => Date;
  expirationDays?: number;
}

export function snapshotFileName(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}`;
  return `patch_data_${stamp}.json`;
}

/**
 * Local snapshots of generated reports.
 *
 * Snapshot failures never fail a run: `save` and `cleanup` log a warning and
 * carry on.
 */
export class ReportCache {
  private readonly now: () => Date;
  private readonly expirationDays: number;

  constructor(
    private readonly directory: string,
    options: ReportCacheOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.expirationDays = options.expirationDays ?? CACHE_EXPIRATION_DAYS;
  }

  /**
   * Write a snapshot of `titles`, then prune expired ones. Resolves to the
   * snapshot path, or null when it could not be written.
   */
  async save(titles: readonly PatchTitle[]): Promise<string | null> {
    const createdAt = this.now();
    const filePath = path.join(this.directory, snapshotFileName(createdAt));
    const snapshot = {
      createdAt: createdAt.toISOString(),
      titles: titles.map((title) => title.toRecord()),
    };

    try {
      await ensureDir(this.directory, 0o700);
      await atomicWrite(filePath, JSON.stringify(snapshot, null, 2));
    } catch (error) {
      logger.warn({ filePath, error }, 'Unable to cache report data');
      return null;
    }

    logger.info({ filePath, count: titles.length }, 'Cached report data');
    await this.cleanup();
    return filePath;
  }

  /**
   * Remove snapshots last modified before the expiration window. Returns the
   * removed file names.
   */
  async cleanup(): Promise<string[]> {
    const threshold = this.now().getTime() - this.expirationDays * 24 * 60 * 60 * 1000;
    const removed: string[] = [];

    for (const name of await this.snapshotNames()) {
      const filePath = path.join(this.directory, name);
      try {
        const stats = await fs.stat(filePath);
        if (stats.mtimeMs < threshold) {
          await fs.unlink(filePath);
          removed.push(name);
          logger.info({ filePath }, 'Deleted expired cache file');
        }
      } catch (error) {
        logger.warn({ filePath, error }, 'Failed to delete cache file');
        break;
      }
    }

    return removed;
  }

  /**
   * Titles from the most recent snapshot, or null if there is none usable.
   */
  async loadLatest(): Promise<PatchTitle[] | null> {
    const names = await this.snapshotNames();
    const latest = names.sort().at(-1);
    if (!latest) {
      logger.debug({ directory: this.directory }, 'No cached reports found');
      return null;
    }

    const filePath = path.join(this.directory, latest);
    try {
      const parsed = SnapshotSchema.safeParse(JSON.parse(await fs.readFile(filePath, 'utf8')));
      if (!parsed.success) {
        logger.warn({ filePath }, 'Cached report has an unexpected format');
        return null;
      }
      return parsed.data.titles.map((title) => new PatchTitle(title));
    } catch (error) {
      logger.warn({ filePath, error }, 'Unable to read cached report');
      return null;
    }
  }

  private async snapshotNames(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.directory);
      return entries.filter((name) => SNAPSHOT_PATTERN.test(name));
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        logger.warn({ directory: this.directory, error }, 'Unable to list cache directory');
      }
      return [];
    }
  }
}
