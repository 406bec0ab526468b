import fs from 'fs';
import path from 'path';
import type { Logger } from 'pino';

import { errorMessage, rootLogger } from '@warpops/utils';

import type { OperatorConfig } from '../config/OperatorConfig.js';
import {
  coreConfigFromBytes,
  serializeWarpRouteConfig,
  warpRouteConfigFromBytes,
} from '../config/serialization.js';
import {
  CoreConfig,
  WarpRouteConfig,
  isCollateralTokenType,
} from '../config/types.js';
import {
  ConfigDocument,
  ConfigurationInvalidError,
  DeserializationError,
  DuplicateCommandNameError,
  EncodingError,
  OperationFailedError,
  ProcessExecutionError,
} from '../errors.js';
import type {
  Command,
  CommandOutputs,
  CommandRunner,
} from '../runner/CommandRunner.js';

import { CliCommandBuilder } from './commands.js';

export const CORE_CONFIG_FILENAME = 'core-config.yaml';
export const WARP_ROUTE_CONFIG_FILENAME = 'warp-route-deployment.yaml';

export enum OperatorStage {
  InfraSetup = 'InfraSetup',
  RouteInit = 'RouteInit',
  RouteDeployDecision = 'RouteDeployDecision',
  PerChainReconcile = 'PerChainReconcile',
  Done = 'Done',
}

export type InfraMode =
  | { kind: 'fresh' }
  | { kind: 'reuse'; coreConfig: CoreConfig };

export interface OperateRequest {
  warpRouteConfig: Uint8Array;
  advanced: boolean;
  existingCoreConfig?: Uint8Array;
}

export interface OperationReport {
  status: 0;
  infraMode: InfraMode['kind'];
  deployed: boolean;
  stages: OperatorStage[];
  reconciledChains: string[];
  outputs: CommandOutputs;
}

/**
 * Decides whether this operator instance runs `warp deploy` for the route.
 */
export type DeployPolicy = (
  warpRouteConfig: WarpRouteConfig,
) => boolean | Promise<boolean>;

export const alwaysDeploy: DeployPolicy = () => true;

export interface WarpRouteOperatorOptions {
  runner: CommandRunner;
  config: OperatorConfig;
  logger?: Logger;
  deployPolicy?: DeployPolicy;
}

export class WarpRouteOperator {
  private readonly commands: CliCommandBuilder;
  private readonly logger: Logger;
  private readonly deployPolicy: DeployPolicy;

  constructor(private readonly options: WarpRouteOperatorOptions) {
    const { config } = options;
    this.commands = new CliCommandBuilder({
      cliBinary: config.cliBinary,
      registryUri: config.registryUri,
      skipConfirmation: config.skipConfirmation,
    });
    this.logger = (options.logger ?? rootLogger).child({
      module: 'warp-route-operator',
    });
    this.deployPolicy = options.deployPolicy ?? alwaysDeploy;
  }

  async operate(request: OperateRequest): Promise<OperationReport> {
    // Both documents are validated before any command runs
    const infraMode = this.resolveInfraMode(request.existingCoreConfig);
    const warpRouteConfig = parseOrThrow('warpRoute', () =>
      warpRouteConfigFromBytes(request.warpRouteConfig),
    );
    this.logger.info(
      { chains: Object.keys(warpRouteConfig), infraMode: infraMode.kind },
      'Validated warp route config',
    );
    this.warnOnMissingCollateral(warpRouteConfig);

    const outputs: Record<string, string> = {};
    const stages: OperatorStage[] = [];

    stages.push(OperatorStage.InfraSetup);
    await this.runStage(
      OperatorStage.InfraSetup,
      this.infraCommands(infraMode, request.advanced),
      outputs,
    );

    stages.push(OperatorStage.RouteInit);
    const warpRouteConfigPath = this.writeWarpRouteConfig(warpRouteConfig);

    stages.push(OperatorStage.RouteDeployDecision);
    const deployed = await this.decideDeploy(warpRouteConfig);
    if (deployed) {
      await this.runStage(
        OperatorStage.RouteDeployDecision,
        [this.commands.warpDeploy(warpRouteConfigPath)],
        outputs,
      );
    } else {
      this.logger.info('Deploy policy declined, skipping warp deploy');
    }

    stages.push(OperatorStage.PerChainReconcile);
    const reconciledChains: string[] = [];
    for (const chain of this.options.config.reconcileChains) {
      await this.reconcileChain(chain, outputs);
      reconciledChains.push(chain);
    }

    stages.push(OperatorStage.Done);
    this.logger.info(
      { deployed, reconciledChains },
      'Warp route operation completed',
    );

    return {
      status: 0,
      infraMode: infraMode.kind,
      deployed,
      stages,
      reconciledChains,
      outputs: Object.freeze(outputs),
    };
  }

  private resolveInfraMode(existingCoreConfig?: Uint8Array): InfraMode {
    // An empty payload is the job runtime's way of saying "none"
    if (!existingCoreConfig || existingCoreConfig.length === 0) {
      return { kind: 'fresh' };
    }

    const coreConfig = parseOrThrow('core', () =>
      coreConfigFromBytes(existingCoreConfig),
    );
    this.logger.info({ coreConfig }, 'Reusing existing core config');
    return { kind: 'reuse', coreConfig };
  }

  // Reusing a core config only swaps the init variant; deploy still runs.
  // A fresh init writes the template that deploy then reads.
  private infraCommands(infraMode: InfraMode, advanced: boolean): Command[] {
    const configPath =
      infraMode.kind === 'fresh'
        ? this.workPath(CORE_CONFIG_FILENAME)
        : undefined;

    return [
      this.commands.registryInit(),
      this.commands.coreInit({ advanced, configPath }),
      this.commands.coreDeploy(configPath),
    ];
  }

  private writeWarpRouteConfig(warpRouteConfig: WarpRouteConfig): string {
    const filePath = this.workPath(WARP_ROUTE_CONFIG_FILENAME);
    try {
      fs.mkdirSync(this.options.config.workDir, { recursive: true });
      fs.writeFileSync(
        filePath,
        serializeWarpRouteConfig(warpRouteConfig, 'yaml'),
      );
    } catch (error) {
      throw this.fail(
        OperatorStage.RouteInit,
        'write warp route config',
        error,
      );
    }
    this.logger.debug({ filePath }, 'Wrote warp route deployment config');
    return filePath;
  }

  private async decideDeploy(
    warpRouteConfig: WarpRouteConfig,
  ): Promise<boolean> {
    try {
      return await this.deployPolicy(warpRouteConfig);
    } catch (error) {
      throw this.fail(
        OperatorStage.RouteDeployDecision,
        'deploy policy',
        error,
      );
    }
  }

  /**
   * `core apply` embeds the exact stdout of `core read`, so the two
   * commands always run as separate, ordered batches.
   */
  private async reconcileChain(
    chain: string,
    outputs: Record<string, string>,
  ): Promise<void> {
    const read = this.commands.coreRead(chain);
    const readOutputs = await this.runStage(
      OperatorStage.PerChainReconcile,
      [read],
      outputs,
    );

    const apply = this.commands.coreApply(chain, readOutputs[read.name]);
    await this.runStage(OperatorStage.PerChainReconcile, [apply], outputs);
    this.logger.info({ chain }, 'Reconciled core config');
  }

  private async runStage(
    stage: OperatorStage,
    commands: Command[],
    outputs: Record<string, string>,
  ): Promise<CommandOutputs> {
    try {
      const batchOutputs = await this.options.runner.runBatch(commands);
      Object.assign(outputs, batchOutputs);
      return batchOutputs;
    } catch (error) {
      const step =
        error instanceof ProcessExecutionError ||
        error instanceof DuplicateCommandNameError
          ? error.commandName
          : commands.map((c) => c.name).join(', ');
      throw this.fail(stage, step, error);
    }
  }

  private fail(
    stage: OperatorStage,
    step: string,
    error: unknown,
  ): OperationFailedError {
    const cause = error instanceof Error ? error : new Error(String(error));
    this.logger.error(
      { stage, step, error: errorMessage(error) },
      'Warp route operation failed',
    );
    return new OperationFailedError(stage, step, cause);
  }

  private warnOnMissingCollateral(warpRouteConfig: WarpRouteConfig) {
    for (const [chain, chainConfig] of Object.entries(warpRouteConfig)) {
      if (isCollateralTokenType(chainConfig.type) && !chainConfig.token) {
        this.logger.warn(
          { chain, type: chainConfig.type },
          'Collateral token type configured without a token address',
        );
      }
    }
  }

  private workPath(filename: string): string {
    return path.join(this.options.config.workDir, filename);
  }
}

function parseOrThrow<T>(document: ConfigDocument, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (
      error instanceof EncodingError ||
      error instanceof DeserializationError
    ) {
      throw new ConfigurationInvalidError(document, error);
    }
    throw error;
  }
}

/**
 * Entrypoint for a job invocation. Resolves 0 when every stage succeeded;
 * failures reject with ConfigurationInvalidError or OperationFailedError.
 */
export async function operateWarpRoute(
  operator: WarpRouteOperator,
  warpRouteConfig: Uint8Array,
  advanced: boolean,
  existingCoreConfig?: Uint8Array,
): Promise<number> {
  const report = await operator.operate({
    warpRouteConfig,
    advanced,
    existingCoreConfig,
  });
  return report.status;
}
