import type { Command } from '../runner/CommandRunner.js';

export interface CliCommandOptions {
  cliBinary: string;
  registryUri?: string;
  skipConfirmation: boolean;
}

/**
 * Wraps a value in single quotes for a POSIX shell. The value is kept
 * verbatim; only embedded single quotes are rewritten as '\''.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Builds the named command lines the operator hands to the runner.
 */
export class CliCommandBuilder {
  constructor(private readonly options: CliCommandOptions) {}

  registryInit(): Command {
    return this.build('registry init', ['registry', 'init']);
  }

  coreInit({
    advanced,
    configPath,
  }: {
    advanced: boolean;
    configPath?: string;
  }): Command {
    const args = ['core', 'init'];
    if (advanced) args.push('--advanced');
    if (configPath) args.push('--config', shellQuote(configPath));
    return this.build('core init', args);
  }

  coreDeploy(configPath?: string): Command {
    const args = ['core', 'deploy'];
    if (configPath) args.push('--config', shellQuote(configPath));
    return this.build('core deploy', args);
  }

  warpDeploy(configPath: string): Command {
    return this.build('warp deploy', [
      'warp',
      'deploy',
      '--config',
      shellQuote(configPath),
    ]);
  }

  coreRead(chain: string): Command {
    return this.build(`core read --chain ${chain}`, [
      'core',
      'read',
      '--chain',
      chain,
    ]);
  }

  coreApply(chain: string, input: string): Command {
    return this.build(`core apply --chain ${chain}`, [
      'core',
      'apply',
      '--chain',
      chain,
      '--input',
      shellQuote(input),
    ]);
  }

  private build(name: string, args: string[]): Command {
    const { cliBinary, registryUri, skipConfirmation } = this.options;
    const globalArgs: string[] = [];
    if (registryUri) globalArgs.push('--registry', shellQuote(registryUri));
    if (skipConfirmation) globalArgs.push('--yes');

    return {
      name,
      command: [cliBinary, ...args, ...globalArgs].join(' '),
    };
  }
}
