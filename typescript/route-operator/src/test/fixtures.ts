import { pino } from 'pino';

import {
  OperatorConfig,
  OperatorConfigLoader,
} from '../config/OperatorConfig.js';
import { ProcessExecutor } from '../runner/ProcessExecutor.js';

const address = (digit: string) => `0x${digit.repeat(40)}`;

export const OWNER = address('1');
export const MAILBOX = address('2');
export const RELAYER = address('3');
export const IGP = address('4');
export const TOKEN = address('5');
export const HOOK = address('6');
export const ISM = address('7');

export function buildCoreConfig() {
  return {
    defaultHook: { address: HOOK, type: 'merkleTreeHook' },
    defaultIsm: { address: ISM, relayer: RELAYER, type: 'trustedRelayerIsm' },
    owner: OWNER,
    requiredHook: {
      address: HOOK,
      beneficiary: OWNER,
      maxProtocolFee: '100000000000000000',
      owner: OWNER,
      protocolFee: '0',
      type: 'protocolFee',
    },
  };
}

export function buildWarpRouteConfig() {
  return {
    holesky: {
      interchainSecurityModule: {
        relayer: RELAYER,
        type: 'trustedRelayerIsm',
      },
      isNft: false,
      mailbox: MAILBOX,
      interchainGasPaymaster: IGP,
      owner: OWNER,
      type: 'collateral',
      token: TOKEN,
    },
    tangletestnet: {
      interchainSecurityModule: {
        relayer: RELAYER,
        type: 'trustedRelayerIsm',
      },
      isNft: false,
      mailbox: MAILBOX,
      owner: OWNER,
      type: 'synthetic',
    },
  };
}

export const toBytes = (value: unknown): Uint8Array =>
  Buffer.from(JSON.stringify(value), 'utf8');

export const silentLogger = pino({ level: 'silent' });

export function buildOperatorConfig(
  overrides: Record<string, unknown> = {},
): OperatorConfig {
  return OperatorConfigLoader.fromObject({
    workDir: '/tmp/warp',
    ...overrides,
  }).config;
}

/**
 * Records every invocation and answers from a per-name table. Names listed
 * in `failures` reject with the given error instead.
 */
export class FakeProcessExecutor implements ProcessExecutor {
  readonly calls: Array<{ name: string; commandLine: string }> = [];

  constructor(
    private readonly outputs: Record<string, string> = {},
    private readonly failures: Record<string, Error> = {},
  ) {}

  async execute(name: string, commandLine: string): Promise<string> {
    this.calls.push({ name, commandLine });
    const failure = this.failures[name];
    if (failure) throw failure;
    return this.outputs[name] ?? '';
  }

  get commandLines(): string[] {
    return this.calls.map((c) => c.commandLine);
  }
}

export async function captureRejection(
  promise: Promise<unknown>,
): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}
