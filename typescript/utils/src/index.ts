export { isAddressEvm, isValidAddressEvm } from './addresses.js';
export { requireEnvVar, safelyAccessEnvVar } from './env.js';
export { WrappedError, errorMessage } from './errors.js';
export {
  LogFormat,
  LogLevel,
  configureRootLogger,
  createWarpOpsPinoLogger,
  getLogFormat,
  getLogLevel,
  getRootLogger,
  rootLogger,
  toLogFormat,
  toPinoLevel,
} from './logging.js';
export { tryParseJsonOrYaml } from './yaml.js';
export { failure, success } from './result.js';
export type { Result } from './result.js';
