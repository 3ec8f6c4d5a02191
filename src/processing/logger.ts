import { writeFile, appendFile } from 'fs/promises';
import chalk from 'chalk';
import { errorMessage, stripAnsi } from './util.js';

// Audit log for the current run; null when `logging.enabled` is off
let logFilePath: string | null = null;

// Per-row outcome lines go to the audit log only in verbose mode
let isVerbose = false;

/**
 * Starts a run's audit log, truncating the file left by the previous run.
 */
export async function initLogger(
  path: string | null,
  verbose: boolean = false,
): Promise<void> {
  logFilePath = path;
  isVerbose = verbose;
  if (logFilePath) {
    await writeFile(logFilePath, '', 'utf-8');
  }
}

/**
 * Appends a timestamped line to the audit log, without color codes.
 */
export async function logDebug(message: string): Promise<void> {
  if (!logFilePath) return;

  const line = `[${new Date().toISOString()}] ${stripAnsi(message)}\n`;
  try {
    await appendFile(logFilePath, line, 'utf-8');
  } catch (error) {
    // The run goes on without its audit log
    console.error(
      chalk.red(`Failed to write to log file: ${errorMessage(error)}`),
    );
  }
}

export function logInfo(message: string): void {
  console.log(message);
}

/**
 * Progress messages: shown as given, recorded trimmed.
 */
export async function logInfoTee(message: string): Promise<void> {
  logInfo(message);

  const trimmed = message.trim();
  if (trimmed) {
    await logDebug(trimmed);
  }
}

/**
 * Conditions that end a run early without failing it, such as the row ceiling.
 */
export async function logWarn(message: string): Promise<void> {
  console.log(chalk.yellow(`⚠️  ${message}`));
  await logDebug(`WARN: ${message}`);
}

/**
 * Fatal run errors. The underlying cause is recorded in the audit log only.
 */
export async function logError(
  message: string,
  error?: unknown,
): Promise<void> {
  console.error(chalk.red(`\n✗ Error: ${message}`));
  const details =
    error === undefined ? '' : `. Details: ${errorMessage(error)}`;
  await logDebug(`ERROR: ${message}${details}`);
}

/**
 * One line per modified, malformed or missing-field row.
 */
export async function logVerbose(message: string): Promise<void> {
  if (!isVerbose) return;
  await logDebug(`[VERBOSE] ${message}`);
}
