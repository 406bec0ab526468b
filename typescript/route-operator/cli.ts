#!/usr/bin/env -S node --import tsx
import chalk from 'chalk';
import yargs from 'yargs';

import { errorMessage } from '@warpops/utils';

import {
  logFormatCommandOption,
  logLevelCommandOption,
} from './src/commands/options.js';
import { runCommand } from './src/commands/run.js';
import { validateCommand } from './src/commands/validate.js';
import { configureLogger, errorRed } from './src/logger.js';
import { VERSION } from './src/version.js';

console.log(chalk.blue('Warp Route'), chalk.magentaBright('Operator'));

try {
  await yargs(process.argv.slice(2))
    .scriptName('warp-operator')
    .option('log', logFormatCommandOption)
    .option('verbosity', logLevelCommandOption)
    .global(['log', 'verbosity'])
    .middleware([
      (argv) => {
        configureLogger(
          typeof argv.log === 'string' ? argv.log : undefined,
          typeof argv.verbosity === 'string' ? argv.verbosity : undefined,
        );
      },
    ])
    .command(runCommand)
    .command(validateCommand)
    .version(VERSION)
    .demandCommand()
    .strict()
    .help()
    .showHelpOnFail(false).argv;
} catch (error) {
  errorRed(`Error: ${errorMessage(error)}`);
  process.exit(1);
}
