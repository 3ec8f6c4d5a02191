import { readFile, writeFile, rename, copyFile, rm } from 'fs/promises';
import Papa from 'papaparse';
import * as path from 'path';
import { DataFileError } from '../errors.js';
import type { Row } from './types.js';
import { errorMessage, fileTimestamp } from './util.js';

/**
 * Atomically writes a file by writing to a temp file beside it, then renaming.
 * A crash mid-write leaves the destination untouched.
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
): Promise<void> {
  const tmpPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tmp`,
  );
  try {
    await writeFile(tmpPath, data, 'utf-8');
    await rename(tmpPath, filePath); // atomic on POSIX systems
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Parses CSV text into rows of cells. The header stays in place as row 1.
 */
export function parseRows(content: string): Row[] {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const parseResult = Papa.parse<string[]>(text, {
    header: false,
    delimiter: ',',
    skipEmptyLines: true,
  });
  if (parseResult.errors.length > 0) {
    const details = parseResult.errors
      .map((e) => `row ${e.row ?? '?'}: ${e.message}`)
      .join('; ');
    throw new Error(`CSV parsing errors: ${details}`);
  }
  return parseResult.data;
}

export function serializeRows(rows: readonly Row[]): string {
  if (rows.length === 0) {
    return '';
  }
  return `${Papa.unparse(rows.map((row) => [...row]), { newline: '\n' })}\n`;
}

export async function readCsvRows(filePath: string): Promise<Row[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new DataFileError(
      `Cannot read input file '${filePath}': ${errorMessage(error)}`,
      filePath,
      { cause: error },
    );
  }

  try {
    return parseRows(content);
  } catch (error) {
    throw new DataFileError(
      `Cannot parse '${filePath}': ${errorMessage(error)}`,
      filePath,
      { cause: error },
    );
  }
}

export async function writeCsvRows(
  filePath: string,
  rows: readonly Row[],
): Promise<void> {
  try {
    await atomicWriteFile(filePath, serializeRows(rows));
  } catch (error) {
    throw new DataFileError(
      `Cannot write output file '${filePath}': ${errorMessage(error)}`,
      filePath,
      { cause: error },
    );
  }
}

/**
 * `<dir>/<stem><suffix>_<YYYYMMDD_HHMMSS><ext>`
 */
export function backupPathFor(
  inputPath: string,
  suffix: string,
  now: Date,
): string {
  const { dir, name, ext } = path.parse(inputPath);
  return path.join(dir, `${name}${suffix}_${fileTimestamp(now)}${ext}`);
}

/**
 * Copies the input file next to itself before it is processed.
 */
export async function createBackup(
  inputPath: string,
  suffix: string,
  now: Date = new Date(),
): Promise<string> {
  const backupPath = backupPathFor(inputPath, suffix, now);
  try {
    await copyFile(inputPath, backupPath);
  } catch (error) {
    throw new DataFileError(
      `Failed to create backup of '${inputPath}': ${errorMessage(error)}`,
      inputPath,
      { cause: error },
    );
  }
  return backupPath;
}
