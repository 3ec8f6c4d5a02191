import type { RunStatistics, TransformResult } from './types.js';

export function createEmptyStatistics(): RunStatistics {
  return {
    totalRows: 0,
    rowsProcessed: 0,
    rowsModified: 0,
    malformedCount: 0,
    malformedRows: [],
    missingFieldRows: [],
    unchangedCount: 0,
    modifications: [],
    columnMissingCount: 0,
  };
}

/**
 * Accumulates per-row outcomes for a single run. Counting is purely
 * additive; nothing recorded is ever taken back.
 */
export class OutcomeAggregator {
  private readonly stats = createEmptyStatistics();

  /** Counts a row as read, before any other check is made on it. */
  countRead(): void {
    this.stats.totalRows += 1;
  }

  /** A row too short to hold the target column. Not a processed row. */
  recordColumnMissing(): void {
    this.stats.columnMissingCount += 1;
  }

  /** Records the payload classification of a processed row. */
  record(rowNumber: number, result: TransformResult): void {
    this.stats.rowsProcessed += 1;

    switch (result.outcome) {
      case 'modified':
        this.stats.rowsModified += 1;
        this.stats.modifications.push({
          row: rowNumber,
          originalValue: result.originalValue,
          newValue: result.newValue,
        });
        break;
      case 'unchanged':
        this.stats.unchangedCount += 1;
        break;
      case 'field-missing':
        this.stats.missingFieldRows.push({
          row: rowNumber,
          reason: result.reason,
        });
        break;
      case 'malformed-payload':
        this.stats.malformedCount += 1;
        this.stats.malformedRows.push({
          row: rowNumber,
          errorMessage: result.errorMessage,
        });
        break;
    }
  }

  /** Snapshot of the statistics so far; later recording does not affect it. */
  summary(): Readonly<RunStatistics> {
    return Object.freeze({
      ...this.stats,
      malformedRows: this.stats.malformedRows.map((r) => ({ ...r })),
      missingFieldRows: this.stats.missingFieldRows.map((r) => ({ ...r })),
      modifications: this.stats.modifications.map((m) => ({ ...m })),
    });
  }
}
