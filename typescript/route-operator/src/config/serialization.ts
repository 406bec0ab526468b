import fs from 'fs';
import path from 'path';
import { TextDecoder } from 'util';
import {
  Tags,
  parse as yamlParse,
  stringify as yamlStringify,
} from 'yaml';
import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';

import { errorMessage } from '@warpops/utils';

import { DeserializationError, EncodingError } from '../errors.js';

import {
  Address,
  ChainConfig,
  ChainName,
  ConfigFormat,
  CoreConfig,
  CoreConfigSchema,
  WarpRouteConfig,
  WarpRouteConfigSchema,
} from './types.js';

export type ConfigInput = Uint8Array | string;

const CORE_CONFIG_DOCUMENT = 'core config';
const WARP_ROUTE_CONFIG_DOCUMENT = 'warp route config';

// fatal makes the decoder throw instead of substituting U+FFFD
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

function decodeUtf8(input: ConfigInput, document: string): string {
  if (typeof input === 'string') return input;
  try {
    return utf8Decoder.decode(input);
  } catch {
    throw new EncodingError(document);
  }
}

// Unquoted 0x-prefixed addresses must stay strings, not hex integers
const YAML_PARSE_OPTIONS = {
  customTags: (tags: Tags) =>
    tags.filter((tag) => typeof tag === 'string' || tag.format !== 'HEX'),
};

function parseText(text: string, format: ConfigFormat, document: string) {
  try {
    return format === 'json'
      ? JSON.parse(text)
      : yamlParse(text, YAML_PARSE_OPTIONS);
  } catch (error) {
    throw new DeserializationError(
      document,
      `invalid ${format.toUpperCase()}: ${errorMessage(error)}`,
      error instanceof Error ? error : undefined,
    );
  }
}

function parseDocument<S extends z.ZodTypeAny>(
  input: ConfigInput,
  format: ConfigFormat,
  schema: S,
  document: string,
): z.infer<S> {
  const raw = parseText(decodeUtf8(input, document), format, document);
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new DeserializationError(
      document,
      fromZodError(result.error).message,
      result.error,
    );
  }
  return result.data;
}

function encodeDocument(value: unknown, format: ConfigFormat): Uint8Array {
  // Both encoders drop undefined properties, so absent optional
  // fields never reach the wire as null
  const text =
    format === 'json'
      ? JSON.stringify(value, null, 2)
      : yamlStringify(value, { indent: 2 });
  return Buffer.from(text, 'utf8');
}

export function parseCoreConfig(
  input: ConfigInput,
  format: ConfigFormat,
): CoreConfig {
  return parseDocument(input, format, CoreConfigSchema, CORE_CONFIG_DOCUMENT);
}

export function parseWarpRouteConfig(
  input: ConfigInput,
  format: ConfigFormat,
): WarpRouteConfig {
  return parseDocument(
    input,
    format,
    WarpRouteConfigSchema,
    WARP_ROUTE_CONFIG_DOCUMENT,
  );
}

/**
 * Parses raw job input. Documents arrive as YAML, which also
 * accepts JSON since JSON is a subset of YAML 1.2.
 */
export function coreConfigFromBytes(bytes: Uint8Array): CoreConfig {
  return parseCoreConfig(bytes, 'yaml');
}

export function warpRouteConfigFromBytes(bytes: Uint8Array): WarpRouteConfig {
  return parseWarpRouteConfig(bytes, 'yaml');
}

export function serializeCoreConfig(
  config: CoreConfig,
  format: ConfigFormat,
): Uint8Array {
  return encodeDocument(config, format);
}

export function serializeWarpRouteConfig(
  config: WarpRouteConfig,
  format: ConfigFormat,
): Uint8Array {
  return encodeDocument(config, format);
}

export function updateOwner(config: CoreConfig, newOwner: Address): CoreConfig {
  return { ...config, owner: newOwner };
}

export function updateChainConfig(
  config: WarpRouteConfig,
  chain: ChainName,
  chainConfig: ChainConfig,
): WarpRouteConfig {
  return { ...config, [chain]: chainConfig };
}

export function resolveConfigFormat(filePath: string): ConfigFormat {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.json') return 'json';
  if (extension === '.yaml' || extension === '.yml') return 'yaml';
  throw new Error(
    `Unsupported config file extension "${extension}" for ${filePath}, expected .json, .yaml or .yml`,
  );
}

function readConfigFile(filePath: string): Uint8Array {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }
  return fs.readFileSync(filePath);
}

export function readCoreConfigFile(filePath: string): CoreConfig {
  return parseCoreConfig(
    readConfigFile(filePath),
    resolveConfigFormat(filePath),
  );
}

export function readWarpRouteConfigFile(filePath: string): WarpRouteConfig {
  return parseWarpRouteConfig(
    readConfigFile(filePath),
    resolveConfigFormat(filePath),
  );
}
