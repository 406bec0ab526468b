import chalk, { ChalkInstance } from 'chalk';
import type { Level, Logger } from 'pino';

import {
  LogFormat,
  LogLevel,
  configureRootLogger,
  getLogFormat,
  rootLogger,
  safelyAccessEnvVar,
  toLogFormat,
} from '@warpops/utils';

let logger: Logger = rootLogger.child({ module: 'route-operator' });

export function toLogLevel(level?: string): LogLevel | undefined {
  return Object.values(LogLevel).find((l) => l === level);
}

export function configureLogger(logFormat?: string, logLevel?: string) {
  const format =
    toLogFormat(logFormat) ||
    toLogFormat(safelyAccessEnvVar('LOG_FORMAT', true)) ||
    LogFormat.Pretty;
  const level =
    toLogLevel(logLevel) ||
    toLogLevel(safelyAccessEnvVar('LOG_LEVEL', true)) ||
    LogLevel.Info;
  logger = configureRootLogger(format, level).child({
    module: 'route-operator',
  });
  return logger;
}

export function getLogger(): Logger {
  return logger;
}

export const log = (msg: string) => logger.info(msg);

export function logColor(
  level: Extract<Level, 'info' | 'warn' | 'error'>,
  chalkInstance: ChalkInstance,
  msg: string,
) {
  // Only use color when pretty is enabled
  if (getLogFormat() === LogFormat.Pretty) {
    logger[level](chalkInstance(msg));
  } else {
    logger[level](msg);
  }
}
export const logPink = (msg: string) =>
  logColor('info', chalk.magentaBright, msg);
export const logGreen = (msg: string) => logColor('info', chalk.green, msg);
export const errorRed = (msg: string) => logColor('error', chalk.red, msg);

export function logCommandHeader(msg: string) {
  logPink(`\n${msg}`);
  logPink('-'.repeat(msg.length));
}
