import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { parseConfig, type AppConfig } from '../config.js';
import { DataFileError } from '../errors.js';
import { processFile } from './process.js';

const INPUT = [
  'id,name,fields',
  '1,Widget,"[{""name"":""sku"",""value"":""HP-OLD-123""}]"',
  '2,Gadget,"{""name"":""other"",""value"":""x""}"',
  '3,Broken,not valid {json',
  '4,Short',
  '5,Same,"[{""name"":""sku"",""value"":""HP-999""}]"',
  '',
].join('\n');

describe('processFile', () => {
  let dir: string;
  let config: AppConfig;
  const now = new Date(2025, 11, 1, 9, 30, 0);

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'csv-json-patch-run-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    config = parseConfig(
      {
        general_settings: { target_column_index: 2 },
        processing_rules: {
          target_field_name: 'sku',
          search_value: 'OLD',
          replace_value: 'NEW',
        },
        reports: { directory: dir },
      },
      'test',
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the header and modified rows, a backup and reports', async () => {
    const inputFile = path.join(dir, 'input.csv');
    const outputFile = path.join(dir, 'output.csv');
    await writeFile(inputFile, INPUT, 'utf-8');

    const { result, backupPath, reportPaths } = await processFile(
      config,
      { inputFile, outputFile },
      now,
    );

    expect(await readFile(outputFile, 'utf-8')).toBe(
      'id,name,fields\n1,Widget,"[{""name"":""sku"",""value"":""HP-NEW-123""}]"\n',
    );
    expect(backupPath).toBe(path.join(dir, 'input_backup_20251201_093000.csv'));
    expect(
      await readFile(
        path.join(dir, 'input_backup_20251201_093000.csv'),
        'utf-8',
      ),
    ).toBe(INPUT);
    expect(reportPaths).toEqual([
      path.join(dir, 'successful_changes_20251201_093000.log'),
      path.join(dir, 'errors_malformed_json_20251201_093000.log'),
      path.join(dir, 'missing_target_field_20251201_093000.log'),
    ]);

    expect(result.stats).toMatchObject({
      totalRows: 6,
      rowsProcessed: 4,
      rowsModified: 1,
      unchangedCount: 1,
      malformedCount: 1,
      columnMissingCount: 1,
      missingFieldRows: [{ row: 3, reason: 'target field not found' }],
    });
  });

  it('skips the backup and reports when they are disabled', async () => {
    const inputFile = path.join(dir, 'input.csv');
    const outputFile = path.join(dir, 'output.csv');
    await writeFile(inputFile, INPUT, 'utf-8');

    const disabled: AppConfig = {
      ...config,
      general_settings: { ...config.general_settings, create_backup: false },
      reports: { ...config.reports, enabled: false },
    };
    const outcome = await processFile(disabled, { inputFile, outputFile }, now);

    expect(outcome.backupPath).toBeNull();
    expect(outcome.reportPaths).toEqual([]);
    expect((await readdir(dir)).sort()).toEqual(['input.csv', 'output.csv']);
  });

  it('fails without writing output when the input is missing', async () => {
    const inputFile = path.join(dir, 'missing.csv');
    const outputFile = path.join(dir, 'output.csv');
    const noBackup: AppConfig = {
      ...config,
      general_settings: { ...config.general_settings, create_backup: false },
    };

    await expect(
      processFile(noBackup, { inputFile, outputFile }, now),
    ).rejects.toBeInstanceOf(DataFileError);
    expect(await readdir(dir)).toEqual([]);
  });
});
