import fs from 'fs';
import path from 'path';
import { CommandModule } from 'yargs';

import { errorMessage, requireEnvVar } from '@warpops/utils';

import {
  OperatorConfig,
  OperatorConfigLoader,
} from '../config/OperatorConfig.js';
import {
  WarpRouteOperator,
  operateWarpRoute,
} from '../core/WarpRouteOperator.js';
import { errorRed, getLogger, logCommandHeader, logGreen } from '../logger.js';
import { CommandRunner } from '../runner/CommandRunner.js';
import {
  ProcessExecutor,
  ShellProcessExecutor,
} from '../runner/ProcessExecutor.js';

import {
  advancedCommandOption,
  coreConfigCommandOption,
  keyCommandOption,
  operatorConfigCommandOption,
  warpRouteConfigCommandOption,
} from './options.js';

export interface RunOperatorOptions {
  warpRouteConfigPath: string;
  coreConfigPath?: string;
  operatorConfigPath?: string;
  advanced: boolean;
  // Builds the executor from the resolved operator config
  createExecutor: (config: OperatorConfig) => ProcessExecutor;
}

export function loadOperatorConfig(filePath?: string): OperatorConfig {
  return filePath
    ? OperatorConfigLoader.load(filePath).config
    : OperatorConfigLoader.defaults().config;
}

function readBytes(filePath: string): Uint8Array {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }
  return fs.readFileSync(filePath);
}

/**
 * Resolves the operator config and input documents from disk and runs a
 * single warp route operation. Resolves the process exit status.
 */
export async function runOperator(
  options: RunOperatorOptions,
): Promise<number> {
  const loaded = loadOperatorConfig(options.operatorConfigPath);
  // Commands get absolute paths, so the CLI's own cwd never matters
  const config = { ...loaded, workDir: path.resolve(loaded.workDir) };
  const warpRouteConfig = readBytes(options.warpRouteConfigPath);
  const existingCoreConfig = options.coreConfigPath
    ? readBytes(options.coreConfigPath)
    : undefined;

  const logger = getLogger();
  const runner = new CommandRunner(options.createExecutor(config), logger);
  const operator = new WarpRouteOperator({ runner, config, logger });

  return operateWarpRoute(
    operator,
    warpRouteConfig,
    options.advanced,
    existingCoreConfig,
  );
}

export const runCommand: CommandModule<
  {},
  {
    config: string;
    'core-config'?: string;
    'operator-config'?: string;
    advanced: boolean;
    key?: string;
  }
> = {
  command: 'run',
  describe:
    'Deploy core infrastructure and a warp route, then reconcile chains',
  builder: {
    config: warpRouteConfigCommandOption,
    'core-config': coreConfigCommandOption,
    'operator-config': operatorConfigCommandOption,
    advanced: advancedCommandOption,
    key: keyCommandOption,
  },
  handler: async (argv) => {
    logCommandHeader('Warp Route Operator');

    let status: number;
    try {
      // The deployer key is required before anything is read or run
      const deployerKey = argv.key || requireEnvVar('HYP_KEY');
      status = await runOperator({
        warpRouteConfigPath: argv.config,
        coreConfigPath: argv['core-config'],
        operatorConfigPath: argv['operator-config'],
        advanced: argv.advanced,
        createExecutor: (config) =>
          new ShellProcessExecutor({
            deployerKey,
            timeoutMs: config.commandTimeoutMs,
          }),
      });
    } catch (error) {
      errorRed(`Error: ${errorMessage(error)}`);
      process.exit(1);
    }

    logGreen('✅ Warp route operation completed');
    process.exit(status);
  },
};
