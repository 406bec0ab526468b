import { LevelWithSilent, pino } from 'pino';

import { safelyAccessEnvVar } from './env.js';

// A custom enum definition because pino does not export an enum
// and because we use 'off' instead of 'silent' for the CLI options
export enum LogLevel {
  Trace = 'trace',
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  Off = 'off',
}

export enum LogFormat {
  Pretty = 'pretty',
  JSON = 'json',
}

export function toPinoLevel(level?: string): LevelWithSilent | undefined {
  if (level && isPinoLevel(level)) return level;
  // 'none' kept for parity with older LOG_LEVEL values
  else if (level === 'none' || level === 'off') return 'silent';
  else return undefined;
}

function isPinoLevel(level: string): level is LevelWithSilent {
  return level in pino.levels.values;
}

export function toLogFormat(format?: string): LogFormat | undefined {
  return Object.values(LogFormat).find((f) => f === format);
}

let logLevel: LevelWithSilent =
  toPinoLevel(safelyAccessEnvVar('LOG_LEVEL', true)) || 'info';

let logFormat: LogFormat =
  toLogFormat(safelyAccessEnvVar('LOG_FORMAT', true)) || LogFormat.JSON;

export function getLogLevel() {
  return logLevel;
}

export function getLogFormat() {
  return logFormat;
}

// Note, for brevity and convenience, the rootLogger is exported directly
export let rootLogger = createWarpOpsPinoLogger(logLevel, logFormat);

export function getRootLogger() {
  return rootLogger;
}

export function configureRootLogger(
  newLogFormat: LogFormat,
  newLogLevel: LogLevel,
) {
  logFormat = newLogFormat;
  logLevel = toPinoLevel(newLogLevel) || logLevel;
  rootLogger = createWarpOpsPinoLogger(logLevel, logFormat);
  return rootLogger;
}

export function createWarpOpsPinoLogger(
  logLevel: LevelWithSilent,
  logFormat: LogFormat,
) {
  return pino({
    level: logLevel,
    name: 'warpops',
    formatters: {
      // Remove pino's default bindings of hostname but keep pid
      bindings: (defaultBindings) => ({ pid: defaultBindings.pid }),
    },
    redact: {
      paths: ['key', '*.key', 'env.HYP_KEY'],
      censor: '[redacted]',
    },
    hooks: {
      logMethod(inputArgs, method, level) {
        // Pino has no simple way of setting custom log shapes, so when
        // pretty is enabled we circumvent pino and log directly to console
        if (
          logFormat === LogFormat.Pretty &&
          level >= pino.levels.values[logLevel]
        ) {
          // eslint-disable-next-line no-console
          console.log(...inputArgs);
          // Returning without calling method prevents pino from logging
          return;
        }
        return method.apply(this, inputArgs);
      },
    },
  });
}
