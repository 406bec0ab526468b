import { z } from 'zod';

import { isValidAddressEvm } from '@warpops/utils';

export const ZAddress = z
  .string()
  .refine(
    isValidAddressEvm,
    'Must be a valid EVM address (0x-prefixed, 40 hex characters, valid checksum if mixed case)',
  )
  .brand<'Address'>();

export type Address = z.infer<typeof ZAddress>;

const UINT_STRING_REGEX = /^\d+$/;

export const ZUintString = z
  .string()
  .regex(UINT_STRING_REGEX, 'Must be a non-negative base-10 integer string');

export const ZChainName = z
  .string()
  .regex(
    /^[a-z][a-z0-9_-]*$/,
    'Chain names must start with a lowercase letter and contain only lowercase letters, digits, "-" or "_"',
  );

export enum TokenType {
  synthetic = 'synthetic',
  fastSynthetic = 'fastSynthetic',
  syntheticUri = 'syntheticUri',
  collateral = 'collateral',
  collateralVault = 'collateralVault',
  XERC20 = 'xErc20',
  XERC20Lockbox = 'xErc20Lockbox',
  collateralFiat = 'collateralFiat',
  fastCollateral = 'fastCollateral',
  collateralUri = 'collateralUri',
  native = 'native',
  nativeScaled = 'nativeScaled',
}

export const CollateralTokenTypes: ReadonlySet<TokenType> = new Set([
  TokenType.collateral,
  TokenType.collateralVault,
  TokenType.XERC20,
  TokenType.XERC20Lockbox,
  TokenType.collateralFiat,
  TokenType.fastCollateral,
  TokenType.collateralUri,
]);

export const isCollateralTokenType = (type: TokenType) =>
  CollateralTokenTypes.has(type);

/* Core config */

export const DefaultHookSchema = z.object({
  address: ZAddress,
  type: z.string().min(1),
});

export const DefaultIsmSchema = z.object({
  address: ZAddress,
  relayer: ZAddress,
  type: z.string().min(1),
});

export const RequiredHookSchema = z
  .object({
    address: ZAddress,
    beneficiary: ZAddress,
    maxProtocolFee: ZUintString,
    owner: ZAddress,
    protocolFee: ZUintString,
    type: z.string().min(1),
  })
  .refine(
    ({ protocolFee, maxProtocolFee }) =>
      // Refinements still run after a field issue; malformed fees are
      // already reported by ZUintString
      !UINT_STRING_REGEX.test(protocolFee) ||
      !UINT_STRING_REGEX.test(maxProtocolFee) ||
      BigInt(protocolFee) <= BigInt(maxProtocolFee),
    {
      message: 'protocolFee must not exceed maxProtocolFee',
      path: ['protocolFee'],
    },
  );

export const CoreConfigSchema = z.object({
  defaultHook: DefaultHookSchema,
  defaultIsm: DefaultIsmSchema,
  owner: ZAddress,
  requiredHook: RequiredHookSchema,
});

/* Warp route config */

export const InterchainSecurityModuleSchema = z.object({
  relayer: ZAddress,
  type: z.string().min(1),
});

export const ChainConfigSchema = z.object({
  interchainSecurityModule: InterchainSecurityModuleSchema,
  isNft: z.boolean(),
  mailbox: ZAddress,
  interchainGasPaymaster: ZAddress.optional(),
  owner: ZAddress,
  type: z.nativeEnum(TokenType),
  token: ZAddress.optional(),
});

export const WarpRouteConfigSchema = z
  .record(ZChainName, ChainConfigSchema)
  .refine((chains) => Object.keys(chains).length > 0, {
    message: 'A warp route must include at least one chain',
  });

export type DefaultHookConfig = z.infer<typeof DefaultHookSchema>;
export type DefaultIsmConfig = z.infer<typeof DefaultIsmSchema>;
export type RequiredHookConfig = z.infer<typeof RequiredHookSchema>;
export type CoreConfig = z.infer<typeof CoreConfigSchema>;
export type InterchainSecurityModuleConfig = z.infer<
  typeof InterchainSecurityModuleSchema
>;
export type ChainConfig = z.infer<typeof ChainConfigSchema>;
export type ChainName = z.infer<typeof ZChainName>;
export type WarpRouteConfig = z.infer<typeof WarpRouteConfigSchema>;

export type ConfigFormat = 'json' | 'yaml';
