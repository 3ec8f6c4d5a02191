import { describe, it, expect } from 'vitest';
import { runPipeline } from './pipeline.js';
import type { Rule } from './types.js';

const rule: Rule = {
  targetFieldName: 'sku',
  searchValue: 'OLD',
  replaceValue: 'NEW',
  targetColumnIndex: 2,
  maxRowsToProcess: 100,
};

const header = ['id', 'product', 'fields'];

describe('runPipeline', () => {
  it('passes the header through and keeps only modified rows', () => {
    const rows = [
      header,
      ['1', 'Widget', '[{"name":"sku","value":"HP-OLD-123"}]'],
      ['2', 'Gadget', '{"name":"other","value":"x"}'],
      ['3', 'Broken', 'not valid {json'],
      ['4', 'Short'],
      ['5', 'Same', '[{"name":"sku","value":"HP-999"}]'],
      ['6', 'Empty', ''],
      ['7', 'Bolt', '{"name":"sku","value":"OLD"}'],
    ];

    const { rows: output, stats, ceilingReached } = runPipeline(rows, rule);

    expect(output).toEqual([
      header,
      ['1', 'Widget', '[{"name":"sku","value":"HP-NEW-123"}]'],
      ['7', 'Bolt', '[{"name":"sku","value":"NEW"}]'],
    ]);
    expect(ceilingReached).toBe(false);
    expect(stats.totalRows).toBe(8);
    expect(stats.rowsProcessed).toBe(6);
    expect(stats.rowsModified).toBe(2);
    expect(stats.unchangedCount).toBe(1);
    expect(stats.columnMissingCount).toBe(1);
    expect(stats.malformedCount).toBe(1);
    expect(stats.malformedRows.map((e) => e.row)).toEqual([4]);
    expect(stats.missingFieldRows).toEqual([
      { row: 3, reason: 'target field not found' },
      { row: 7, reason: 'empty payload' },
    ]);
    expect(stats.modifications).toEqual([
      { row: 2, originalValue: 'HP-OLD-123', newValue: 'HP-NEW-123' },
      { row: 8, originalValue: 'OLD', newValue: 'NEW' },
    ]);
  });

  it('never transforms the header, even when it looks like a payload', () => {
    const payloadHeader = ['a', 'b', '{"name":"sku","value":"OLD"}'];
    const { rows, stats } = runPipeline([payloadHeader], rule);
    expect(rows).toEqual([payloadHeader]);
    expect(stats.totalRows).toBe(1);
    expect(stats.rowsProcessed).toBe(0);
  });

  it('does not count a row that lacks the target column as processed', () => {
    const { rows, stats } = runPipeline([header, ['a', 'b']], {
      ...rule,
      targetColumnIndex: 5,
    });
    expect(rows).toEqual([header]);
    expect(stats.totalRows).toBe(2);
    expect(stats.rowsProcessed).toBe(0);
    expect(stats.columnMissingCount).toBe(1);
    expect(stats.missingFieldRows).toEqual([]);
  });

  it('stops at the row ceiling after counting the triggering row', () => {
    const rows = [header];
    for (let i = 1; i < 10_000; i++) {
      rows.push([String(i), 'p', '{"name":"sku","value":"OLD"}']);
    }

    const result = runPipeline(rows, { ...rule, maxRowsToProcess: 5000 });

    expect(result.ceilingReached).toBe(true);
    expect(result.stats.totalRows).toBe(5001);
    expect(result.stats.rowsProcessed).toBe(4999);
    expect(result.stats.rowsModified).toBe(4999);
    expect(result.rows).toHaveLength(5000);
    expect(result.rows[4999]).toEqual([
      '4999',
      'p',
      '[{"name":"sku","value":"NEW"}]',
    ]);
  });

  it('does not report the ceiling when the last row is exactly at it', () => {
    const rows = [header, ['1', 'p', '{"name":"sku","value":"OLD"}']];
    const result = runPipeline(rows, { ...rule, maxRowsToProcess: 2 });
    expect(result.ceilingReached).toBe(false);
    expect(result.stats.rowsModified).toBe(1);
  });

  it('reads rows lazily and stops pulling at the ceiling', () => {
    let pulled = 0;
    function* source(): Generator<string[]> {
      yield header;
      for (let i = 1; ; i++) {
        pulled += 1;
        yield [String(i), 'p', ''];
      }
    }

    const result = runPipeline(source(), { ...rule, maxRowsToProcess: 3 });
    expect(pulled).toBe(3);
    expect(result.stats.totalRows).toBe(4);
  });

  it('keeps the accounting identity between counters', () => {
    const rows = [
      header,
      ['1'],
      ['2', 'x', 'bad'],
      ['3', 'x', '{"name":"sku","value":"OLD"}'],
      ['4', 'x', '[]'],
    ];
    const { stats, rows: output } = runPipeline(rows, rule);
    expect(stats.totalRows).toBe(
      1 + stats.rowsProcessed + stats.columnMissingCount,
    );
    expect(stats.rowsProcessed).toBe(
      stats.rowsModified +
        stats.unchangedCount +
        stats.malformedCount +
        stats.missingFieldRows.length,
    );
    expect(output).toHaveLength(1 + stats.rowsModified);
  });

  it('does not mutate the input rows', () => {
    const row = ['1', 'p', '{"name":"sku","value":"OLD"}'];
    runPipeline([header, row], rule);
    expect(row).toEqual(['1', 'p', '{"name":"sku","value":"OLD"}']);
  });

  it('returns no rows for an empty input', () => {
    const result = runPipeline([], rule);
    expect(result.rows).toEqual([]);
    expect(result.stats.totalRows).toBe(0);
  });
});
