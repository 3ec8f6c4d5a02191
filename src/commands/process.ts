import chalk from 'chalk';
import { confirm, input } from '@inquirer/prompts';
import {
  applyOverrides,
  DEFAULT_CONFIG_PATH,
  loadConfig,
  toRule,
  type AppConfig,
} from '../config.js';
import { resolveFilePaths, type ResolvedPaths } from '../file-paths.js';
import {
  createBackup,
  readCsvRows,
  writeCsvRows,
} from '../processing/data-io.js';
import {
  initLogger,
  logDebug,
  logError,
  logInfo,
  logInfoTee,
  logVerbose,
  logWarn,
} from '../processing/logger.js';
import { runPipeline, type PipelineResult } from '../processing/pipeline.js';
import { printSummary, writeDetailReports } from '../processing/reporting.js';
import type { RunStatistics } from '../processing/types.js';
import type { Command } from './types.js';

interface ProcessArgs {
  input?: string;
  output?: string;
  config: string;
  yes: boolean;
  backup?: boolean;
  verbose?: boolean;
}

export interface ProcessOutcome {
  result: PipelineResult;
  backupPath: string | null;
  reportPaths: string[];
}

async function logRowDetails(stats: Readonly<RunStatistics>): Promise<void> {
  for (const m of stats.modifications) {
    await logVerbose(
      `Row ${m.row}: Modified field '${m.originalValue}' -> '${m.newValue}'`,
    );
  }
  for (const e of stats.malformedRows) {
    await logVerbose(`Row ${e.row}: Malformed JSON - ${e.errorMessage}`);
  }
  for (const e of stats.missingFieldRows) {
    await logVerbose(`Row ${e.row}: ${e.reason}`);
  }
}

/**
 * Backs up, reads, transforms and writes one file, then writes the detail
 * reports. A failure before the write leaves no output file behind.
 */
export async function processFile(
  config: AppConfig,
  paths: ResolvedPaths,
  now: Date = new Date(),
): Promise<ProcessOutcome> {
  const rule = toRule(config);
  await logInfoTee(
    `\n${chalk.cyan('Starting')} CSV processing: ${paths.inputFile}`,
  );

  let backupPath: string | null = null;
  if (config.general_settings.create_backup) {
    backupPath = await createBackup(
      paths.inputFile,
      config.general_settings.backup_suffix,
      now,
    );
    await logInfoTee(chalk.green(`✓ Backup created: ${backupPath}`));
  }

  const rows = await readCsvRows(paths.inputFile);
  await logDebug(`Read ${rows.length} rows from ${paths.inputFile}`);

  const result = runPipeline(rows, rule);
  if (result.ceilingReached) {
    await logWarn(
      `Reached maximum row limit (${rule.maxRowsToProcess}). Stopping processing.`,
    );
  }
  await logRowDetails(result.stats);

  await writeCsvRows(paths.outputFile, result.rows);
  await logInfoTee(
    chalk.green(`✓ Successfully wrote output to: ${paths.outputFile}`),
  );

  let reportPaths: string[] = [];
  if (config.reports.enabled) {
    reportPaths = await writeDetailReports(
      result.stats,
      config.reports.directory,
      now,
    );
    for (const reportPath of reportPaths) {
      await logInfoTee(`Report written to: ${reportPath}`);
    }
  }

  return { result, backupPath, reportPaths };
}

const command: Command<ProcessArgs> = {
  command: 'process [input]',
  describe: 'Find and replace a value inside the JSON payload column',

  builder: (yargs) => {
    return yargs
      .positional('input', {
        describe: 'Input CSV file (overrides file_paths.input_file)',
        type: 'string',
      })
      .option('output', {
        alias: 'o',
        describe: 'Output CSV file (overrides file_paths.output_file)',
        type: 'string',
      })
      .option('config', {
        alias: 'c',
        describe: 'Configuration file (JSON or YAML)',
        type: 'string',
        default: DEFAULT_CONFIG_PATH,
      })
      .option('yes', {
        alias: 'y',
        describe: 'Skip the confirmation prompt',
        type: 'boolean',
        default: false,
      })
      .option('backup', {
        describe: 'Copy the input file before processing (--no-backup to skip)',
        type: 'boolean',
      })
      .option('verbose', {
        describe: 'Log every row outcome to the log file',
        type: 'boolean',
      })
      .example('$0 process', 'Use file paths from config.json')
      .example(
        '$0 process products.csv -o fixed.csv --yes',
        'Process a file without prompting',
      )
      .example(
        '$0 process data.csv -c rules.yaml --no-backup',
        'Use a YAML configuration and skip the backup',
      );
  },

  handler: async (argv) => {
    let inputFile = argv.input;
    try {
      const config = applyOverrides(await loadConfig(argv.config), {
        inputFile: argv.input,
        outputFile: argv.output,
        createBackup: argv.backup,
        verbose: argv.verbose,
      });

      await initLogger(
        config.logging.enabled ? config.logging.log_file : null,
        config.logging.verbose,
      );

      const paths = await resolveFilePaths(config.file_paths, () =>
        input({ message: 'Enter the path to the input CSV file:' }),
      );
      inputFile = paths.inputFile;

      const { processing_rules: rules } = config;
      logInfo('='.repeat(60));
      logInfo(chalk.bold('CSV JSON Field Processor'));
      logInfo('='.repeat(60));
      logInfo(`Input file:    ${paths.inputFile}`);
      logInfo(`Output file:   ${paths.outputFile}`);
      logInfo(`Target column: ${config.general_settings.target_column_index}`);
      logInfo(`Target field:  ${rules.target_field_name}`);
      logInfo(
        `Replace:       '${rules.search_value}' -> '${rules.replace_value}'`,
      );

      if (!argv.yes) {
        const proceed = await confirm({
          message: 'Proceed with processing?',
          default: false,
        });
        if (!proceed) {
          logInfo(chalk.yellow('Processing cancelled.'));
          return;
        }
      }

      const { result } = await processFile(config, paths);
      printSummary(result.stats);
      logInfo(chalk.green('\n✓ Processing complete!'));
    } catch (error) {
      await logError(
        error instanceof Error ? error.message : 'Processing failed',
        error,
      );
      console.log('\nMake sure:');
      console.log(
        `  1. Input file '${inputFile ?? '(not set)'}' exists and is a valid CSV`,
      );
      console.log(`  2. Configuration file '${argv.config}' is valid`);
      console.log('  3. The output and report directories are writable');
      process.exit(1);
    }
  },
};

export default command;
