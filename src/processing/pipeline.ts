import { OutcomeAggregator } from './aggregator.js';
import { transformPayload } from './field-transformer.js';
import { assembleOutput } from './output.js';
import type { Row, Rule, RunStatistics } from './types.js';

export interface PipelineResult {
  /** Header plus every row whose payload was modified */
  rows: Row[];
  stats: Readonly<RunStatistics>;
  /** True when reading stopped at `maxRowsToProcess` */
  ceilingReached: boolean;
}

/**
 * Runs the rule over the rows in order. Row 1 is the header and passes
 * through untouched; any later row is kept only if its payload changed.
 */
export function runPipeline(
  rows: Iterable<readonly string[]>,
  rule: Rule,
): PipelineResult {
  const aggregator = new OutcomeAggregator();
  const retained: Row[] = [];
  let header: Row | undefined;
  let ceilingReached = false;
  let rowNumber = 0;

  for (const source of rows) {
    rowNumber += 1;
    aggregator.countRead();

    if (rowNumber === 1) {
      header = [...source];
      continue;
    }

    if (rowNumber > rule.maxRowsToProcess) {
      ceilingReached = true;
      break;
    }

    if (source.length <= rule.targetColumnIndex) {
      aggregator.recordColumnMissing();
      continue;
    }

    const row = [...source];
    const result = transformPayload(row[rule.targetColumnIndex], rule);
    row[rule.targetColumnIndex] = result.outputText;
    aggregator.record(rowNumber, result);

    if (result.outcome === 'modified') {
      retained.push(row);
    }
  }

  return {
    rows: assembleOutput(header, retained),
    stats: aggregator.summary(),
    ceilingReached,
  };
}
