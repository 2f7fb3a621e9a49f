import AjvModule, { type ErrorObject } from 'ajv';

import { parseSeed } from '../entropy/seed.js';
import { ErrorCode } from '../errors/codes.js';
import { MUTATOR_NAMES, type MutatorKind } from '../mutators/index.js';
import { PROTOCOL_VERSIONS, toProtocolVersion, type ProtocolVersion } from '../protocol/version.js';
import { ConfigError } from '../types/errors.js';
import { validateOptions, type GeneratorOptions } from '../types/options.js';

const Ajv = AjvModule.default;

/** Shape of a JSON configuration file, before seed parsing. */
export interface ConfigFile {
  protocol?: number;
  seed?: number | string;
  sizeHint?: number;
  minOpcodes?: number;
  maxOpcodes?: number;
  mutators?: MutatorKind[];
  mutationRate?: number;
  unsafeMutations?: boolean;
  allowExtensions?: boolean;
  allowBuffers?: boolean;
  metrics?: boolean;
}

export interface LoadedConfig {
  version?: ProtocolVersion;
  options: GeneratorOptions;
}

const count = { type: 'integer', minimum: 0 } as const;

export const CONFIG_FILE_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    protocol: { type: 'integer', enum: [...PROTOCOL_VERSIONS] },
    seed: {
      anyOf: [
        { type: 'integer', minimum: 0 },
        { type: 'string', pattern: '^(?:\\d+|0[xX][\\da-fA-F]+)$' },
      ],
    },
    sizeHint: count,
    minOpcodes: count,
    maxOpcodes: count,
    mutators: {
      type: 'array',
      items: { type: 'string', enum: ['all', ...MUTATOR_NAMES] },
    },
    mutationRate: { type: 'number', minimum: 0, maximum: 1 },
    unsafeMutations: { type: 'boolean' },
    allowExtensions: { type: 'boolean' },
    allowBuffers: { type: 'boolean' },
    metrics: { type: 'boolean' },
  },
} as const;

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<ConfigFile>(CONFIG_FILE_SCHEMA);

function describeErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => {
    const where = e.instancePath === '' ? '(root)' : e.instancePath;
    return `${where} ${e.message ?? 'is invalid'}`;
  });
}

function invalidFile(origin: string, details: string[], cause?: Error): ConfigError {
  const error = new ConfigError({
    message: `invalid configuration file ${origin}`,
    errorCode: ErrorCode.INVALID_CONFIG_FILE,
    context: { setting: 'config', value: origin, details },
    cause,
  });
  error.suggestions = details;
  return error;
}

/**
 * Parse and validate a configuration file's text.
 *
 * @param origin - shown in error messages, usually the file path
 * @throws {ConfigError} E105 on malformed JSON or schema violations
 */
export function parseConfigFile(text: string, origin = '<config>'): LoadedConfig {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw invalidFile(origin, [cause?.message ?? 'malformed JSON'], cause);
  }

  if (!validateConfigFile(data)) {
    throw invalidFile(origin, describeErrors(validateConfigFile.errors));
  }

  const { protocol, seed, ...rest } = data;
  const options: GeneratorOptions = { ...rest };
  if (seed !== undefined) {
    options.seed = typeof seed === 'string' ? parseSeed(seed) : seed;
  }
  validateOptions(options);

  return protocol === undefined
    ? { options }
    : { version: toProtocolVersion(protocol), options };
}
