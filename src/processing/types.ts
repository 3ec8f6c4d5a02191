/**
 * One delimited-text record, cells in column order.
 */
export type Row = string[];

/**
 * The find-and-replace rule applied to every data row of a run.
 */
export interface Rule {
  readonly targetFieldName: string;
  readonly searchValue: string;
  readonly replaceValue: string;
  /** 0-based column holding the JSON payload */
  readonly targetColumnIndex: number;
  /** Highest 1-based row number (header included) that is processed */
  readonly maxRowsToProcess: number;
}

export const MISSING_REASON = {
  emptyPayload: 'empty payload',
  fieldNotFound: 'target field not found',
} as const;

export type MissingReason =
  (typeof MISSING_REASON)[keyof typeof MISSING_REASON];

/**
 * Result of transforming one payload cell. `outputText` is what the
 * cell is overwritten with, whatever the outcome.
 */
export type TransformResult =
  | {
      outcome: 'modified';
      outputText: string;
      originalValue: string;
      newValue: string;
    }
  | { outcome: 'unchanged'; outputText: string }
  | { outcome: 'field-missing'; outputText: string; reason: MissingReason }
  | { outcome: 'malformed-payload'; outputText: string; errorMessage: string };

export type PayloadOutcome = TransformResult['outcome'];

export type Outcome = PayloadOutcome | 'column-missing';

export type Modification = {
  row: number;
  originalValue: string;
  newValue: string;
};

export type MalformedRow = { row: number; errorMessage: string };

export type MissingFieldRow = { row: number; reason: MissingReason };

export interface RunStatistics {
  totalRows: number;
  /** Rows that had the target column, whatever their outcome */
  rowsProcessed: number;
  rowsModified: number;
  malformedCount: number;
  malformedRows: MalformedRow[];
  missingFieldRows: MissingFieldRow[];
  unchangedCount: number;
  modifications: Modification[];
  columnMissingCount: number;
}
