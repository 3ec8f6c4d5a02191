import { readFile } from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { Rule } from './processing/types.js';
import { errorMessage, isNodeError } from './processing/util.js';

const ConfigFile = z.object({
  file_paths: z
    .object({
      input_file: z.string().default(''),
      output_file: z.string().default(''),
    })
    .prefault({}),
  general_settings: z.object({
    target_column_index: z.number().int().min(0),
    max_rows_to_process: z.number().int().positive().default(100000),
    create_backup: z.boolean().default(true),
    backup_suffix: z.string().default('_backup'),
  }),
  processing_rules: z.object({
    target_field_name: z.string().min(1, 'target_field_name is required'),
    search_value: z.string(),
    replace_value: z.string(),
  }),
  logging: z
    .object({
      enabled: z.boolean().default(true),
      log_file: z.string().min(1).default('processing.log'),
      verbose: z.boolean().default(false),
    })
    .prefault({}),
  reports: z
    .object({
      enabled: z.boolean().default(true),
      directory: z.string().min(1).default('.'),
    })
    .prefault({}),
});

export type AppConfig = z.infer<typeof ConfigFile>;
export type ConfigFileInput = z.input<typeof ConfigFile>;

export const DEFAULT_CONFIG_PATH = 'config.json';

/**
 * Written by `config init`. Column 17 is spreadsheet column R.
 */
export const DEFAULT_CONFIG: ConfigFileInput = {
  file_paths: { input_file: '', output_file: '' },
  general_settings: {
    target_column_index: 17,
    max_rows_to_process: 100000,
    create_backup: true,
    backup_suffix: '_backup',
  },
  processing_rules: {
    target_field_name: 'sku',
    search_value: 'OLD',
    replace_value: 'NEW',
  },
  logging: { enabled: true, log_file: 'processing.log', verbose: false },
  reports: { enabled: true, directory: '.' },
};

/**
 * Validates raw configuration data. `source` names where it came from
 * in error messages.
 */
export function parseConfig(raw: unknown, source: string): AppConfig {
  const result = ConfigFile.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration in '${source}':\n${z.prettifyError(result.error)}`,
    );
  }
  return result.data;
}

function decodeConfigText(content: string, filePath: string): unknown {
  const extension = path.extname(filePath).toLowerCase();

  if (extension === '.json') {
    return JSON.parse(content);
  } else if (extension === '.yml' || extension === '.yaml') {
    return yaml.load(content);
  }
  throw new ConfigError(
    `Unsupported configuration file extension: ${extension || '(none)'}. Use .json, .yaml, or .yml`,
  );
}

export async function loadConfig(filePath: string): Promise<AppConfig> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new ConfigError(`Configuration file '${filePath}' not found.`, {
        cause: error,
      });
    }
    throw new ConfigError(
      `Cannot read configuration file '${filePath}': ${errorMessage(error)}`,
      { cause: error },
    );
  }

  let raw: unknown;
  try {
    raw = decodeConfigText(content, filePath);
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(
      `Invalid syntax in configuration file '${filePath}': ${errorMessage(error)}`,
      { cause: error },
    );
  }

  return parseConfig(raw, filePath);
}

export interface ConfigOverrides {
  inputFile?: string;
  outputFile?: string;
  createBackup?: boolean;
  verbose?: boolean;
}

/**
 * Command-line flags win over the file. Undefined overrides are ignored.
 */
export function applyOverrides(
  config: AppConfig,
  overrides: ConfigOverrides,
): AppConfig {
  return {
    ...config,
    file_paths: {
      input_file: overrides.inputFile ?? config.file_paths.input_file,
      output_file: overrides.outputFile ?? config.file_paths.output_file,
    },
    general_settings: {
      ...config.general_settings,
      create_backup:
        overrides.createBackup ?? config.general_settings.create_backup,
    },
    logging: {
      ...config.logging,
      verbose: overrides.verbose ?? config.logging.verbose,
    },
  };
}

export function toRule(config: AppConfig): Rule {
  return Object.freeze({
    targetFieldName: config.processing_rules.target_field_name,
    searchValue: config.processing_rules.search_value,
    replaceValue: config.processing_rules.replace_value,
    targetColumnIndex: config.general_settings.target_column_index,
    maxRowsToProcess: config.general_settings.max_rows_to_process,
  });
}
