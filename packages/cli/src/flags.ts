import { readFile } from 'node:fs/promises';

import {
  ConfigError,
  ErrorCode,
  normalizeSeed,
  parseConfigFile,
  parseMutatorKinds,
  parseSeed,
  toProtocolVersion,
  validateOptions,
  type GeneratorOptions,
  type LoadedConfig,
  type ProtocolVersion,
  type Seed,
} from '@picklesmith/core';

/**
 * Raw option values as Commander hands them over: every valued flag is a
 * string, every switch a boolean.
 */
export interface CliOptions {
  protocol?: string;
  seed?: string;
  minOpcodes?: string;
  maxOpcodes?: string;
  mutators?: string;
  mutationRate?: string;
  unsafeMutations?: boolean;
  allowExt?: boolean;
  allowBuffer?: boolean;
  sizeHint?: string;
  config?: string;
  dir?: string;
  samples?: string;
  printMetrics?: boolean;
  quiet?: boolean;
}

const DIGITS = /^\d+$/;

/** Non-negative decimal integer; `flag` names the option in the message. */
export function parseCount(
  flag: string,
  value: string,
  errorCode: ErrorCode = ErrorCode.CONFIGURATION_ERROR
): number {
  const text = value.trim();
  const parsed = DIGITS.test(text) ? Number(text) : Number.NaN;
  if (!Number.isSafeInteger(parsed)) {
    throw new ConfigError({
      message: `--${flag} expects a non-negative integer, got "${value}"`,
      errorCode,
      context: { setting: flag, value },
    });
  }
  return parsed;
}

export function parseRate(value: string): number {
  const rate = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(rate)) {
    throw new ConfigError({
      message: `--mutation-rate expects a number, got "${value}"`,
      context: {
        setting: 'mutation-rate',
        value,
        suggestion: 'Values outside [0, 1] are clamped',
      },
    });
  }
  return rate;
}

export function parseProtocol(value: string): ProtocolVersion {
  const text = value.trim();
  return toProtocolVersion(DIGITS.test(text) ? Number(text) : Number.NaN);
}

/** Samples written by `--dir` when `--samples` is absent. */
export const DEFAULT_SAMPLES = 10_000;

/**
 * Sample count for `--dir`. Must be positive.
 */
export function parseSamples(value: string | undefined): number {
  if (value === undefined) return DEFAULT_SAMPLES;
  const count = parseCount('samples', value);
  if (count === 0) {
    throw new ConfigError({
      message: '--samples must be at least 1',
      context: { setting: 'samples', value },
    });
  }
  return count;
}

/**
 * Protocol precedence: the flag, then the configuration file, then the
 * seed modulo 6.
 */
export function resolveProtocol(
  flag: string | undefined,
  configured: ProtocolVersion | undefined,
  seed: Seed
): ProtocolVersion {
  if (flag !== undefined) return parseProtocol(flag);
  if (configured !== undefined) return configured;
  return toProtocolVersion(Number(normalizeSeed(seed) % 6n));
}

/**
 * Layer command-line flags over options loaded from a configuration file.
 * Flags win; switches only ever turn a feature on.
 */
export function buildGeneratorOptions(
  options: CliOptions,
  base: GeneratorOptions = {}
): GeneratorOptions {
  const merged: GeneratorOptions = { ...base };

  if (options.seed !== undefined) merged.seed = parseSeed(options.seed);
  if (options.minOpcodes !== undefined) {
    merged.minOpcodes = parseCount(
      'min-opcodes',
      options.minOpcodes,
      ErrorCode.INVALID_OPCODE_RANGE
    );
  }
  if (options.maxOpcodes !== undefined) {
    merged.maxOpcodes = parseCount(
      'max-opcodes',
      options.maxOpcodes,
      ErrorCode.INVALID_OPCODE_RANGE
    );
  }
  if (options.mutators !== undefined) {
    merged.mutators = parseMutatorKinds(options.mutators);
  }
  if (options.mutationRate !== undefined) {
    merged.mutationRate = parseRate(options.mutationRate);
  }
  if (options.sizeHint !== undefined) {
    merged.sizeHint = parseCount('size-hint', options.sizeHint);
  }
  if (options.unsafeMutations === true) merged.unsafeMutations = true;
  if (options.allowExt === true) merged.allowExtensions = true;
  if (options.allowBuffer === true) merged.allowBuffers = true;

  validateOptions(merged);
  return merged;
}

export async function loadConfig(file: string): Promise<LoadedConfig> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigError({
      message: `cannot read configuration file ${file}`,
      errorCode: ErrorCode.INVALID_CONFIG_FILE,
      context: { setting: 'config', value: file },
      cause,
    });
  }
  return parseConfigFile(text, file);
}
