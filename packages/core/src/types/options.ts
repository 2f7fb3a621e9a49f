/**
 * Configuration options for a generation pass
 *
 * Everything is optional with conservative defaults; the protocol version
 * is passed alongside, never defaulted.
 */

import { normalizeSeed, type Seed } from '../entropy/seed.js';
import { ErrorCode } from '../errors/codes.js';
import {
  clampRate,
  isMutatorKind,
  MUTATOR_NAMES,
  type MutatorKind,
} from '../mutators/index.js';
import { ConfigError } from './errors.js';

/**
 * Options accepted by the generator, the API and configuration files
 */
export interface GeneratorOptions {
  /** Seed for the pseudorandom mode; drawn from process entropy when absent */
  seed?: Seed;
  /** Stop the body once the output reaches this many bytes (soft cap) */
  sizeHint?: number;
  /** Lower bound of the body instruction count (default: 60) */
  minOpcodes?: number;
  /** Upper bound, inclusive (default: 300) */
  maxOpcodes?: number;
  /** Strategy names in registration order; `all` expands (default: none) */
  mutators?: readonly MutatorKind[];
  /** Trigger probability per call site, clamped to [0, 1] (default: 0.1) */
  mutationRate?: number;
  /** Keep strategies that may break structure (default: false) */
  unsafeMutations?: boolean;
  /** Allow EXT1/EXT2/EXT4 (default: false) */
  allowExtensions?: boolean;
  /** Allow NEXT_BUFFER/READONLY_BUFFER (default: false) */
  allowBuffers?: boolean;
  /** Collect per-pass metrics (default: true) */
  metrics?: boolean;
}

/**
 * Options with defaults applied, the seed normalized and the rate clamped
 */
export interface ResolvedOptions {
  seed?: bigint;
  sizeHint?: number;
  minOpcodes: number;
  maxOpcodes: number;
  mutators: MutatorKind[];
  mutationRate: number;
  unsafeMutations: boolean;
  allowExtensions: boolean;
  allowBuffers: boolean;
  metrics: boolean;
}

export const DEFAULT_OPTIONS: Readonly<Omit<ResolvedOptions, 'seed' | 'sizeHint'>> =
  Object.freeze({
    minOpcodes: 60,
    maxOpcodes: 300,
    mutators: [],
    mutationRate: 0.1,
    unsafeMutations: false,
    allowExtensions: false,
    allowBuffers: false,
    metrics: true,
  });

/**
 * Resolves partial user options into a complete configuration
 *
 * @throws {ConfigError} When a value is out of range
 */
export function resolveOptions(
  userOptions: GeneratorOptions = {}
): ResolvedOptions {
  validateOptions(userOptions);

  const resolved: ResolvedOptions = {
    minOpcodes: userOptions.minOpcodes ?? DEFAULT_OPTIONS.minOpcodes,
    maxOpcodes: userOptions.maxOpcodes ?? DEFAULT_OPTIONS.maxOpcodes,
    mutators: [...(userOptions.mutators ?? DEFAULT_OPTIONS.mutators)],
    mutationRate: clampRate(userOptions.mutationRate ?? DEFAULT_OPTIONS.mutationRate),
    unsafeMutations: userOptions.unsafeMutations ?? DEFAULT_OPTIONS.unsafeMutations,
    allowExtensions: userOptions.allowExtensions ?? DEFAULT_OPTIONS.allowExtensions,
    allowBuffers: userOptions.allowBuffers ?? DEFAULT_OPTIONS.allowBuffers,
    metrics: userOptions.metrics ?? DEFAULT_OPTIONS.metrics,
  };
  if (userOptions.seed !== undefined) {
    resolved.seed = normalizeSeed(userOptions.seed);
  }
  if (userOptions.sizeHint !== undefined) {
    resolved.sizeHint = userOptions.sizeHint;
  }
  return resolved;
}

function isCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Validates user options. A minimum above the maximum is accepted and
 * means exactly the minimum.
 *
 * @throws {ConfigError} On the first invalid value
 */
export function validateOptions(options: GeneratorOptions): void {
  for (const setting of ['minOpcodes', 'maxOpcodes'] as const) {
    const value = options[setting];
    if (value !== undefined && !isCount(value)) {
      throw new ConfigError({
        message: `${setting} must be a non-negative integer`,
        errorCode: ErrorCode.INVALID_OPCODE_RANGE,
        context: { setting, value },
      });
    }
  }

  if (options.sizeHint !== undefined && !isCount(options.sizeHint)) {
    throw new ConfigError({
      message: 'sizeHint must be a non-negative integer',
      context: { setting: 'sizeHint', value: options.sizeHint },
    });
  }

  if (options.mutationRate !== undefined && typeof options.mutationRate !== 'number') {
    throw new ConfigError({
      message: 'mutationRate must be a number',
      context: { setting: 'mutationRate', value: options.mutationRate },
    });
  }

  for (const kind of options.mutators ?? []) {
    if (!isMutatorKind(kind)) {
      throw new ConfigError({
        message: `unknown mutator "${String(kind)}"`,
        errorCode: ErrorCode.UNKNOWN_MUTATOR,
        context: {
          setting: 'mutators',
          value: kind,
          suggestion: `Use one of: all, ${MUTATOR_NAMES.join(', ')}`,
        },
      });
    }
  }

  if (options.seed !== undefined) {
    normalizeSeed(options.seed);
  }
}
