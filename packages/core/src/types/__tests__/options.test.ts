import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { ConfigError } from '../errors.js';
import {
  DEFAULT_OPTIONS,
  resolveOptions,
  validateOptions,
  type GeneratorOptions,
} from '../options.js';

function configErrorOf(options: GeneratorOptions): ConfigError | undefined {
  try {
    validateOptions(options);
    return undefined;
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
}

describe('GeneratorOptions', () => {
  describe('resolveOptions defaulting behavior', () => {
    it('applies all defaults when no options are provided', () => {
      const resolved = resolveOptions();
      expect(resolved).toEqual({
        minOpcodes: 60,
        maxOpcodes: 300,
        mutators: [],
        mutationRate: 0.1,
        unsafeMutations: false,
        allowExtensions: false,
        allowBuffers: false,
        metrics: true,
      });
      expect(resolved.seed).toBeUndefined();
      expect(resolved.sizeHint).toBeUndefined();
    });

    it('keeps user values over defaults', () => {
      const resolved = resolveOptions({
        seed: 42,
        sizeHint: 512,
        minOpcodes: 10,
        maxOpcodes: 10,
        mutators: ['bitflip', 'all'],
        unsafeMutations: true,
      });
      expect(resolved.seed).toBe(42n);
      expect(resolved.sizeHint).toBe(512);
      expect(resolved.minOpcodes).toBe(10);
      expect(resolved.maxOpcodes).toBe(10);
      expect(resolved.mutators).toEqual(['bitflip', 'all']);
      expect(resolved.unsafeMutations).toBe(true);
      expect(resolved.allowBuffers).toBe(DEFAULT_OPTIONS.allowBuffers);
    });

    it('clamps the mutation rate into [0, 1]', () => {
      expect(resolveOptions({ mutationRate: 7 }).mutationRate).toBe(1);
      expect(resolveOptions({ mutationRate: -2 }).mutationRate).toBe(0);
      expect(resolveOptions({ mutationRate: Number.NaN }).mutationRate).toBe(0);
      expect(resolveOptions({ mutationRate: 0.25 }).mutationRate).toBe(0.25);
    });

    it('does not share the default mutator list', () => {
      const resolved = resolveOptions();
      resolved.mutators.push('boundary');
      expect(DEFAULT_OPTIONS.mutators).toEqual([]);
    });
  });

  describe('validateOptions', () => {
    it('accepts a minimum above the maximum', () => {
      expect(configErrorOf({ minOpcodes: 50, maxOpcodes: 10 })).toBeUndefined();
    });

    it('rejects negative and fractional counts', () => {
      expect(configErrorOf({ minOpcodes: -1 })?.errorCode).toBe(
        ErrorCode.INVALID_OPCODE_RANGE
      );
      expect(configErrorOf({ maxOpcodes: 2.5 })?.setting).toBe('maxOpcodes');
      expect(configErrorOf({ sizeHint: -4 })?.errorCode).toBe(
        ErrorCode.CONFIGURATION_ERROR
      );
    });

    it('rejects seeds outside [0, 2^64)', () => {
      expect(configErrorOf({ seed: -1 })?.errorCode).toBe(ErrorCode.INVALID_SEED);
      expect(configErrorOf({ seed: 1n << 64n })?.errorCode).toBe(ErrorCode.INVALID_SEED);
      expect(configErrorOf({ seed: (1n << 64n) - 1n })).toBeUndefined();
    });
  });
});
