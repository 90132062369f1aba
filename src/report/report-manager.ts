import path from 'path';
import { ApiClient } from '../client/api-client.js';
import { PatchTitle } from '../models/patch-title.js';
import { DirectoryCreationError, PolicyFetchError, SofaFeedError, SummaryFetchError } from '../utils/errors.js';
import { ensureDir } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';
import { calculateIosOnLatest, omitRecentReleases, sortPatchTitles } from './aggregator.js';
import { DateFormat, DEFAULT_DATE_FORMAT } from './date-format.js';
import { ReportExporter } from './exporters.js';
import { ReportCache } from './report-cache.js';

const logger = createLogger('report-manager');

export const REPORTS_DIRECTORY = 'Patch-Reports';

export interface ProcessReportsOptions {
  /** Parent directory; reports land in `<path>/Patch-Reports` */
  path: string;
  sort?: string;
  omit?: boolean;
  ios?: boolean;
  dateFormat?: DateFormat;
}

export interface ReportResult {
  reportCount: number;
  outputDir: string;
  files: string[];
}

export interface ReportManagerOptions {
  exporters: ReportExporter[];
  cache?: ReportCache | null;
  now?: () => Date;
}

export class ReportManager {
  private readonly exporters: ReportExporter[];
  private readonly cache: ReportCache | null;
  private readonly now: () => Date;

  constructor(
    private readonly api: ApiClient,
    options: ReportManagerOptions
  ) {
    this.exporters = options.exporters;
    this.cache = options.cache ?? null;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fetch, aggregate and export one report run. Any failure before export
   * aborts the run without writing a report.
   */
  async processReports(options: ProcessReportsOptions): Promise<ReportResult> {
    const outputDir = await this.prepareOutputDir(options.path);

    const policyIds = await this.api.getPolicies();
    if (policyIds.length === 0) {
      throw new PolicyFetchError(undefined, { context: { reason: 'no patch title configurations found' } });
    }

    let titles = await this.api.getSummaries(policyIds);
    if (titles.length === 0) {
      throw new SummaryFetchError(undefined, { context: { reason: 'no patch summaries returned' } });
    }

    if (options.sort) {
      titles = sortPatchTitles(titles, options.sort);
    }

    const generatedAt = this.now();
    if (options.omit) {
      titles = omitRecentReleases(titles, { now: generatedAt });
    }

    if (options.ios) {
      titles = [...titles, ...(await this.collectIosTitles())];
    }

    const context = { generatedAt, dateFormat: options.dateFormat ?? DEFAULT_DATE_FORMAT };
    const files: string[] = [];
    for (const exporter of this.exporters) {
      files.push(await exporter.export(titles, outputDir, context));
    }

    if (this.cache) {
      await this.cache.save(titles);
    }

    logger.info({ reportCount: titles.length, outputDir, files }, 'Report run completed');
    return { reportCount: titles.length, outputDir, files };
  }

  private async collectIosTitles(): Promise<PatchTitle[]> {
    const deviceIds = await this.api.getDeviceIds();
    const deviceVersions = await this.api.getDeviceOsVersions(deviceIds);
    const latestVersions = await this.api.getSofaFeed();
    if (latestVersions.length === 0) {
      throw new SofaFeedError('feed listed no OS versions');
    }

    const rows = calculateIosOnLatest(deviceVersions, latestVersions);
    logger.info({ devices: deviceVersions.length, rows: rows.length }, 'Calculated iOS compliance');
    return rows;
  }

  private async prepareOutputDir(parent: string): Promise<string> {
    const outputDir = path.join(path.resolve(parent), REPORTS_DIRECTORY);
    try {
      await ensureDir(outputDir);
    } catch (error) {
      logger.error({ outputDir, error }, 'Unable to create report directory');
      throw new DirectoryCreationError(outputDir, { cause: error });
    }
    return outputDir;
  }
}
