/**
 * CLI Output Utilities
 *
 * User-facing output for the patcher CLI, kept apart from the file logger.
 */

import { ReportResult } from '../report/report-manager.js';

/**
 * Print a message to stdout for CLI user output
 */
export function print(message: string): void {
  process.stdout.write(message + '\n');
}

/**
 * Print an error message to stderr for CLI error output
 */
export function printError(message: string): void {
  process.stderr.write(message + '\n');
}

export function printWarn(message: string): void {
  process.stderr.write(`Warning: ${message}\n`);
}

export function formatReportResult(result: ReportResult): string {
  const lines = [`Generated ${result.reportCount} report rows in ${result.outputDir}`];
  for (const file of result.files) {
    lines.push(`  - ${file}`);
  }
  return lines.join('\n');
}
