import fs from 'fs';
import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';

import { tryParseJsonOrYaml } from '@warpops/utils';

import { ZChainName } from './types.js';

export const DEFAULT_CLI_BINARY = 'hyperlane';
export const DEFAULT_WORK_DIR = './configs';
export const DEFAULT_RECONCILE_CHAINS = ['holesky', 'tangletestnet'];
export const DEFAULT_COMMAND_TIMEOUT_MS = 10 * 60 * 1000;

export const OperatorConfigSchema = z.object({
  cliBinary: z.string().min(1).default(DEFAULT_CLI_BINARY),
  registryUri: z.string().min(1).optional(),
  workDir: z.string().min(1).default(DEFAULT_WORK_DIR),
  reconcileChains: z
    .array(ZChainName)
    .min(1, 'At least one chain must be reconciled')
    .refine(
      (chains) => new Set(chains).size === chains.length,
      'Reconcile chains must be unique',
    )
    .default(() => [...DEFAULT_RECONCILE_CHAINS]),
  commandTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_COMMAND_TIMEOUT_MS),
  skipConfirmation: z.boolean().default(true),
});

export type OperatorConfig = z.infer<typeof OperatorConfigSchema>;
export type OperatorConfigInput = z.input<typeof OperatorConfigSchema>;

export class OperatorConfigLoader {
  private constructor(public readonly config: OperatorConfig) {}

  static load(filePath: string): OperatorConfigLoader {
    if (!fs.existsSync(filePath)) {
      throw new Error(`Config file not found: ${filePath}`);
    }

    const content = fs.readFileSync(filePath, 'utf8');
    const parsed = tryParseJsonOrYaml(content);
    if (!parsed.success) {
      throw new Error(`Invalid operator config: ${parsed.error}`);
    }

    // An empty file parses to null and means "all defaults"
    return OperatorConfigLoader.fromObject(parsed.data ?? {});
  }

  static fromObject(config: unknown): OperatorConfigLoader {
    const validationResult = OperatorConfigSchema.safeParse(config);
    if (!validationResult.success) {
      throw new Error(
        `Invalid operator config: ${fromZodError(validationResult.error).message}`,
      );
    }
    return new OperatorConfigLoader(validationResult.data);
  }

  static defaults(): OperatorConfigLoader {
    return OperatorConfigLoader.fromObject({});
  }

  getReconcileChains(): string[] {
    return [...this.config.reconcileChains];
  }
}
