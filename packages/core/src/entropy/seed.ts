import { randomBytes } from 'node:crypto';

import { ErrorCode } from '../errors/codes.js';
import { ConfigError } from '../types/errors.js';

export type Seed = bigint | number;

export const MAX_SEED = (1n << 64n) - 1n;

/** Accepts integers in [0, 2^64). */
export function normalizeSeed(seed: Seed): bigint {
  if (typeof seed === 'number' && !Number.isSafeInteger(seed)) {
    throw invalidSeed(seed);
  }
  const value = BigInt(seed);
  if (value < 0n || value > MAX_SEED) {
    throw invalidSeed(seed);
  }
  return value;
}

/** Parse a decimal or 0x-prefixed seed as given on a command line. */
export function parseSeed(text: string): bigint {
  const trimmed = text.trim();
  if (!/^(?:\d+|0[xX][\da-fA-F]+)$/.test(trimmed)) {
    throw invalidSeed(text);
  }
  return normalizeSeed(BigInt(trimmed));
}

export function randomSeed(): bigint {
  return randomBytes(8).readBigUInt64LE(0);
}

function invalidSeed(value: unknown): ConfigError {
  return new ConfigError({
    message: 'seed must be an integer between 0 and 2^64 - 1',
    errorCode: ErrorCode.INVALID_SEED,
    context: { setting: 'seed', value: String(value) },
  });
}
