import { writeFile } from 'fs/promises';
import chalk from 'chalk';
import type { ArgumentsCamelCase } from 'yargs';
import { ConfigError } from '../errors.js';
import {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
  loadConfig,
} from '../config.js';
import { isNodeError } from '../processing/util.js';
import type { Command } from './types.js';

const ACTION_CHOICES = ['init', 'show', 'validate'] as const;
type ConfigAction = (typeof ACTION_CHOICES)[number];

type ConfigOptions = {
  action: ConfigAction;
  file: string;
  force: boolean;
};

type ConfigArgs = ArgumentsCamelCase<ConfigOptions>;

/**
 * Writes the default configuration. Refuses to overwrite unless `force`.
 */
export async function writeDefaultConfig(
  filePath: string,
  force: boolean,
): Promise<void> {
  try {
    await writeFile(filePath, JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n', {
      encoding: 'utf-8',
      flag: force ? 'w' : 'wx',
    });
  } catch (error) {
    if (isNodeError(error) && error.code === 'EEXIST') {
      throw new ConfigError(
        `Configuration file '${filePath}' already exists. Use --force to overwrite it.`,
        { cause: error },
      );
    }
    throw error;
  }
}

const command: Command<ConfigArgs> = {
  command: 'config <action> [file]',
  describe: 'Create, show or validate a configuration file',

  builder: (yargs) => {
    return yargs
      .positional('action', {
        describe: 'The configuration action',
        type: 'string',
        choices: ACTION_CHOICES,
        demandOption: true,
      })
      .positional('file', {
        describe: 'Configuration file path',
        type: 'string',
        default: DEFAULT_CONFIG_PATH,
      })
      .option('force', {
        alias: 'f',
        describe: 'Overwrite an existing file (for "init")',
        type: 'boolean',
        default: false,
      })
      .example('$0 config init', 'Write a starter config.json')
      .example('$0 config show rules.yaml', 'Print the effective settings')
      .example('$0 config validate', 'Check config.json for mistakes');
  },

  handler: async (argv) => {
    const { action, file, force } = argv;

    try {
      switch (action) {
        case 'init': {
          await writeDefaultConfig(file, force);
          console.log(chalk.green(`✓ Wrote default configuration to ${file}`));
          console.log(
            chalk.dim(
              '  Edit processing_rules and general_settings before running "process".',
            ),
          );
          break;
        }

        case 'show': {
          const config = await loadConfig(file);
          console.log(JSON.stringify(config, null, 2));
          break;
        }

        case 'validate': {
          await loadConfig(file);
          console.log(chalk.green('✓ Configuration is valid'));
          break;
        }
      }
    } catch (error) {
      if (error instanceof Error) {
        console.log(chalk.red(`✗ Error: ${error.message}`));
      } else {
        console.log(chalk.red('✗ Unknown error:'), error);
      }
      process.exit(1);
    }
  },
};

export default command;
