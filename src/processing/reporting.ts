import { writeFile } from 'fs/promises';
import * as path from 'path';
import chalk from 'chalk';
import { DataFileError } from '../errors.js';
import type { RunStatistics } from './types.js';
import { displayTimestamp, errorMessage, fileTimestamp } from './util.js';

const RULE = '='.repeat(60);

export interface DetailReport {
  fileName: string;
  content: string;
  entryCount: number;
}

/**
 * Renders one detail report: a framed header, one line per entry, and a
 * closing entry count.
 */
export function formatReport(
  title: string,
  totalLabel: string,
  lines: readonly string[],
  now: Date,
): string {
  return (
    [
      RULE,
      title,
      RULE,
      `Timestamp: ${displayTimestamp(now)}`,
      `${totalLabel}: ${lines.length}`,
      RULE,
      '',
      ...lines,
      '',
      RULE,
      `End of log - Total entries: ${lines.length}`,
      RULE,
    ].join('\n') + '\n'
  );
}

/**
 * Builds the detail reports for the non-empty outcome lists.
 */
export function buildDetailReports(
  stats: Readonly<RunStatistics>,
  now: Date,
): DetailReport[] {
  const ts = fileTimestamp(now);
  const reports: DetailReport[] = [];

  if (stats.modifications.length > 0) {
    const lines = stats.modifications.map(
      (m) => `Row ${m.row}: '${m.originalValue}' -> '${m.newValue}'`,
    );
    reports.push({
      fileName: `successful_changes_${ts}.log`,
      content: formatReport(
        'SUCCESSFUL FIELD MODIFICATIONS',
        'Total modifications',
        lines,
        now,
      ),
      entryCount: lines.length,
    });
  }

  if (stats.malformedRows.length > 0) {
    const lines = stats.malformedRows.map(
      (e) => `Row ${e.row}: ${e.errorMessage}`,
    );
    reports.push({
      fileName: `errors_malformed_json_${ts}.log`,
      content: formatReport(
        'ERRORS AND MALFORMED JSON',
        'Total errors',
        lines,
        now,
      ),
      entryCount: lines.length,
    });
  }

  if (stats.missingFieldRows.length > 0) {
    const lines = stats.missingFieldRows.map(
      (e) => `Row ${e.row}: ${e.reason}`,
    );
    reports.push({
      fileName: `missing_target_field_${ts}.log`,
      content: formatReport(
        'ROWS MISSING TARGET FIELD',
        'Total rows missing target field',
        lines,
        now,
      ),
      entryCount: lines.length,
    });
  }

  return reports;
}

/**
 * Writes the detail reports into `directory` and returns their paths.
 */
export async function writeDetailReports(
  stats: Readonly<RunStatistics>,
  directory: string,
  now: Date = new Date(),
): Promise<string[]> {
  const written: string[] = [];
  for (const report of buildDetailReports(stats, now)) {
    const reportPath = path.join(directory, report.fileName);
    try {
      await writeFile(reportPath, report.content, 'utf-8');
    } catch (error) {
      throw new DataFileError(
        `Cannot write report '${reportPath}': ${errorMessage(error)}`,
        reportPath,
        { cause: error },
      );
    }
    written.push(reportPath);
  }
  return written;
}

const MAX_MALFORMED_SHOWN = 10;
const MAX_MISSING_SHOWN = 20;
const MAX_MODIFIED_SHOWN = 10;

/**
 * Summary lines for the console, chalk-formatted.
 */
export function summaryLines(stats: Readonly<RunStatistics>): string[] {
  const lines = [
    '',
    RULE,
    chalk.bold('Processing Summary'),
    RULE,
    `Total rows in file:        ${stats.totalRows}`,
    `Rows processed:            ${stats.rowsProcessed}`,
    chalk.green(`Rows modified:             ${stats.rowsModified}`),
    `Rows in output file:       ${stats.rowsModified + 1}`,
    `Rows excluded:             ${Math.max(stats.totalRows - stats.rowsModified - 1, 0)}`,
    `Fields unchanged:          ${stats.unchangedCount}`,
    `Rows missing column:       ${stats.columnMissingCount}`,
    `Malformed JSON rows:       ${stats.malformedCount}`,
    `Rows missing target field: ${stats.missingFieldRows.length}`,
    RULE,
  ];

  if (stats.malformedRows.length > 0) {
    lines.push('', chalk.red('Rows with malformed JSON:'));
    for (const e of stats.malformedRows.slice(0, MAX_MALFORMED_SHOWN)) {
      lines.push(`  Row ${e.row}: ${e.errorMessage}`);
    }
    if (stats.malformedRows.length > MAX_MALFORMED_SHOWN) {
      lines.push(
        `  ... and ${stats.malformedRows.length - MAX_MALFORMED_SHOWN} more`,
      );
    }
  }

  if (stats.missingFieldRows.length > 0) {
    lines.push(
      '',
      chalk.yellow(
        `Rows missing target field: ${stats.missingFieldRows.length}`,
      ),
    );
    if (stats.missingFieldRows.length > MAX_MISSING_SHOWN) {
      lines.push(`  First ${MAX_MISSING_SHOWN} rows:`);
    }
    for (const e of stats.missingFieldRows.slice(0, MAX_MISSING_SHOWN)) {
      lines.push(`  Row ${e.row}: ${e.reason}`);
    }
  }

  if (stats.modifications.length > 0) {
    lines.push(
      '',
      chalk.green(`Sample of modified fields (first ${MAX_MODIFIED_SHOWN}):`),
    );
    for (const m of stats.modifications.slice(0, MAX_MODIFIED_SHOWN)) {
      lines.push(`  Row ${m.row}: '${m.originalValue}' -> '${m.newValue}'`);
    }
  }

  lines.push('', RULE);
  return lines;
}

export function printSummary(stats: Readonly<RunStatistics>): void {
  for (const line of summaryLines(stats)) {
    console.log(line);
  }
}
