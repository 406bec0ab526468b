import { CommandModule } from 'yargs';

import {
  readCoreConfigFile,
  readWarpRouteConfigFile,
  serializeCoreConfig,
  serializeWarpRouteConfig,
} from '../config/serialization.js';
import { ConfigFormat } from '../config/types.js';
import { log, logGreen } from '../logger.js';

import {
  coreConfigCommandOption,
  outputFormatCommandOption,
  warpRouteConfigCommandOption,
} from './options.js';

const textDecoder = new TextDecoder();

export interface ValidatedDocuments {
  warpRouteConfig: string;
  coreConfig?: string;
}

/**
 * Parses both documents and returns their normalized serialization.
 * Throws on the first document that fails to parse.
 */
export function validateConfigFiles(
  warpRouteConfigPath: string,
  coreConfigPath: string | undefined,
  format: ConfigFormat,
): ValidatedDocuments {
  const warpRouteConfig = textDecoder.decode(
    serializeWarpRouteConfig(
      readWarpRouteConfigFile(warpRouteConfigPath),
      format,
    ),
  );
  if (!coreConfigPath) return { warpRouteConfig };

  const coreConfig = textDecoder.decode(
    serializeCoreConfig(readCoreConfigFile(coreConfigPath), format),
  );
  return { warpRouteConfig, coreConfig };
}

export const validateCommand: CommandModule<
  {},
  { config: string; 'core-config'?: string; format: string }
> = {
  command: 'validate',
  describe: 'Validate warp route and core configs without running anything',
  builder: {
    config: warpRouteConfigCommandOption,
    'core-config': coreConfigCommandOption,
    format: outputFormatCommandOption,
  },
  handler: (argv) => {
    const format: ConfigFormat = argv.format === 'json' ? 'json' : 'yaml';
    const documents = validateConfigFiles(
      argv.config,
      argv['core-config'],
      format,
    );

    logGreen(`Warp route config is valid: ${argv.config}`);
    log(documents.warpRouteConfig);
    if (documents.coreConfig !== undefined) {
      logGreen(`Core config is valid: ${argv['core-config']}`);
      log(documents.coreConfig);
    }
  },
};
