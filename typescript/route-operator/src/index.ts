export {
  DEFAULT_CLI_BINARY,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_RECONCILE_CHAINS,
  DEFAULT_WORK_DIR,
  OperatorConfigLoader,
  OperatorConfigSchema,
} from './config/OperatorConfig.js';
export type {
  OperatorConfig,
  OperatorConfigInput,
} from './config/OperatorConfig.js';
export {
  coreConfigFromBytes,
  parseCoreConfig,
  parseWarpRouteConfig,
  readCoreConfigFile,
  readWarpRouteConfigFile,
  resolveConfigFormat,
  serializeCoreConfig,
  serializeWarpRouteConfig,
  updateChainConfig,
  updateOwner,
  warpRouteConfigFromBytes,
} from './config/serialization.js';
export type { ConfigInput } from './config/serialization.js';
export {
  ChainConfigSchema,
  CollateralTokenTypes,
  CoreConfigSchema,
  DefaultHookSchema,
  DefaultIsmSchema,
  InterchainSecurityModuleSchema,
  RequiredHookSchema,
  TokenType,
  WarpRouteConfigSchema,
  ZAddress,
  ZChainName,
  ZUintString,
  isCollateralTokenType,
} from './config/types.js';
export type {
  Address,
  ChainConfig,
  ChainName,
  ConfigFormat,
  CoreConfig,
  DefaultHookConfig,
  DefaultIsmConfig,
  InterchainSecurityModuleConfig,
  RequiredHookConfig,
  WarpRouteConfig,
} from './config/types.js';
export { CliCommandBuilder, shellQuote } from './core/commands.js';
export type { CliCommandOptions } from './core/commands.js';
export {
  CORE_CONFIG_FILENAME,
  OperatorStage,
  WARP_ROUTE_CONFIG_FILENAME,
  WarpRouteOperator,
  alwaysDeploy,
  operateWarpRoute,
} from './core/WarpRouteOperator.js';
export type {
  DeployPolicy,
  InfraMode,
  OperateRequest,
  OperationReport,
  WarpRouteOperatorOptions,
} from './core/WarpRouteOperator.js';
export {
  CommandTimeoutError,
  ConfigurationInvalidError,
  DeserializationError,
  DuplicateCommandNameError,
  EncodingError,
  OperationFailedError,
  ProcessExecutionError,
} from './errors.js';
export type { ConfigDocument } from './errors.js';
export { CommandRunner } from './runner/CommandRunner.js';
export type { Command, CommandOutputs } from './runner/CommandRunner.js';
export { ShellProcessExecutor } from './runner/ProcessExecutor.js';
export type {
  ExecFn,
  KillableProcess,
  ProcessExecutor,
  ShellProcessExecutorOptions,
} from './runner/ProcessExecutor.js';
export { VERSION } from './version.js';
