import { WrappedError } from '@warpops/utils';

export class EncodingError extends Error {
  constructor(public readonly document: string) {
    super(`Invalid UTF-8 in ${document} input`);
    this.name = 'EncodingError';
  }
}

export class DeserializationError extends WrappedError {
  constructor(
    public readonly document: string,
    reason: string,
    cause?: Error,
  ) {
    super(`Failed to deserialize ${document}: ${reason}`, cause);
    this.name = 'DeserializationError';
  }
}

export class ProcessExecutionError extends WrappedError {
  constructor(
    public readonly commandName: string,
    public readonly commandLine: string,
    reason: string,
    public readonly exitCode?: number,
    public readonly stderr?: string,
    cause?: Error,
  ) {
    super(`Command "${commandName}" failed: ${reason}`, cause);
    this.name = 'ProcessExecutionError';
  }
}

export class CommandTimeoutError extends ProcessExecutionError {
  constructor(
    commandName: string,
    commandLine: string,
    public readonly timeoutMs: number,
    cause?: Error,
  ) {
    super(
      commandName,
      commandLine,
      `timed out after ${timeoutMs}ms`,
      undefined,
      undefined,
      cause,
    );
    this.name = 'CommandTimeoutError';
  }
}

export class DuplicateCommandNameError extends Error {
  constructor(public readonly commandName: string) {
    super(`Command name "${commandName}" appears more than once in the batch`);
    this.name = 'DuplicateCommandNameError';
  }
}

export type ConfigDocument = 'core' | 'warpRoute';

export class ConfigurationInvalidError extends WrappedError {
  constructor(
    public readonly document: ConfigDocument,
    cause: EncodingError | DeserializationError,
  ) {
    super(`Invalid ${document} configuration: ${cause.message}`, cause);
    this.name = 'ConfigurationInvalidError';
  }
}

export class OperationFailedError extends WrappedError {
  constructor(
    public readonly stage: string,
    public readonly step: string,
    cause: Error,
  ) {
    super(
      `Warp route operation failed at ${stage} (${step}): ${cause.message}`,
      cause,
    );
    this.name = 'OperationFailedError';
  }
}
