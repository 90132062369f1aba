import { promises as fs } from 'fs';
import path from 'path';
import { PatchTitle } from '../models/patch-title.js';
import { ExportError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { DateFormat, fileDateStamp, formatReleaseDate, formatReportDate } from './date-format.js';

const logger = createLogger('exporters');

export const REPORT_FORMATS = ['json', 'markdown'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface ReportContext {
  generatedAt: Date;
  dateFormat: DateFormat;
  /** Zone for the generation date; local time when omitted */
  timeZone?: string;
}

/**
 * Writes one report file and resolves to its path.
 */
export interface ReportExporter {
  readonly format: ReportFormat;
  export(titles: readonly PatchTitle[], outputDir: string, context: ReportContext): Promise<string>;
}

export function reportFileName(generatedAt: Date, extension: string): string {
  return `patch-report-${fileDateStamp(generatedAt)}.${extension}`;
}

async function writeReport(filePath: string, contents: string): Promise<string> {
  try {
    await fs.writeFile(filePath, contents, 'utf8');
  } catch (error) {
    logger.error({ filePath, error }, 'Failed to write report');
    throw new ExportError(filePath, { cause: error });
  }
  logger.info({ filePath }, 'Report written');
  return filePath;
}

export class JsonReportExporter implements ReportExporter {
  readonly format = 'json';

  async export(titles: readonly PatchTitle[], outputDir: string, context: ReportContext): Promise<string> {
    const document = {
      generatedAt: context.generatedAt.toISOString(),
      reportDate: formatReportDate(context.generatedAt, context.dateFormat, context.timeZone),
      count: titles.length,
      titles: titles.map((title) => title.toRecord()),
    };
    const filePath = path.join(outputDir, reportFileName(context.generatedAt, 'json'));
    return writeReport(filePath, JSON.stringify(document, null, 2) + '\n');
  }
}

const MARKDOWN_COLUMNS = [
  'Title',
  'Title Id',
  'Released',
  'Hosts Patched',
  'Missing Patch',
  'Latest Version',
  'Completion Percent',
  'Total Hosts',
];

const escapeCell = (value: string): string => value.replace(/\|/g, '\\|');

export class MarkdownReportExporter implements ReportExporter {
  readonly format = 'markdown';

  async export(titles: readonly PatchTitle[], outputDir: string, context: ReportContext): Promise<string> {
    const filePath = path.join(outputDir, reportFileName(context.generatedAt, 'md'));
    return writeReport(filePath, this.render(titles, context));
  }

  render(titles: readonly PatchTitle[], context: ReportContext): string {
    let md = '# Patch Report\n\n';
    md += `**Generated:** ${formatReportDate(context.generatedAt, context.dateFormat, context.timeZone)}  \n`;
    md += `**Titles:** ${titles.length}  \n\n`;

    if (titles.length === 0) {
      md += '*No patch titles to report.*\n';
      return md;
    }

    md += `| ${MARKDOWN_COLUMNS.join(' | ')} |\n`;
    md += `|${MARKDOWN_COLUMNS.map(() => '---').join('|')}|\n`;

    for (const title of titles) {
      const cells = [
        escapeCell(title.title),
        escapeCell(title.titleId),
        formatReleaseDate(title.releasedDate),
        String(title.hostsPatched),
        String(title.missingPatch),
        escapeCell(title.latestVersion || 'N/A'),
        `${title.completionPercent}%`,
        String(title.totalHosts),
      ];
      md += `| ${cells.join(' | ')} |\n`;
    }

    return md;
  }
}

export function createExporters(formats: readonly ReportFormat[]): ReportExporter[] {
  return formats.map((format) => (format === 'json' ? new JsonReportExporter() : new MarkdownReportExporter()));
}
