#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import processCmd from './commands/process.js';
import configCmd from './commands/config.js';

void yargs(hideBin(process.argv))
  .command(processCmd)
  .command(configCmd)
  .scriptName('csv-json-patch')
  .demandCommand(1, 'You must provide a valid command.')
  .strict()
  .help()
  .alias('h', 'help')
  .version()
  .alias('v', 'version')
  .parse();
