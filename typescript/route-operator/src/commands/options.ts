import { Options } from 'yargs';

import { LogFormat, LogLevel } from '@warpops/utils';

/* Global options */

export const logFormatCommandOption: Options = {
  type: 'string',
  description: 'Log output format',
  choices: Object.values(LogFormat),
};

export const logLevelCommandOption: Options = {
  type: 'string',
  description: 'Log verbosity level',
  choices: Object.values(LogLevel),
};

/* Command-specific options */

export const warpRouteConfigCommandOption: Options = {
  type: 'string',
  description: 'Path to the warp route deployment config (JSON or YAML)',
  alias: 'c',
  demandOption: true,
};

export const coreConfigCommandOption: Options = {
  type: 'string',
  description:
    'Path to an existing core config to reuse instead of a fresh core deployment',
};

export const advancedCommandOption: Options = {
  type: 'boolean',
  description: 'Run core init in advanced mode',
  default: false,
};

export const operatorConfigCommandOption: Options = {
  type: 'string',
  description:
    'Path to the operator config (CLI binary, registry, work dir, chains)',
  alias: 'o',
};

export const keyCommandOption: Options = {
  type: 'string',
  description:
    'A hex private key for the deployer, or use the HYP_KEY env var.',
  alias: 'k',
  defaultDescription: 'process.env.HYP_KEY',
};

export const outputFormatCommandOption: Options = {
  type: 'string',
  description: 'Serialization format for the normalized output',
  choices: ['yaml', 'json'],
  default: 'yaml',
};
