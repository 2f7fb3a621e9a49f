import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { ConfigError } from '../../types/errors.js';
import { parseConfigFile } from '../options-schema.js';

function rejection(text: string): ConfigError {
  try {
    parseConfigFile(text, 'fuzz.json');
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected parseConfigFile to throw');
}

describe('parseConfigFile', () => {
  it('maps file fields onto generator options', () => {
    const loaded = parseConfigFile(
      JSON.stringify({
        protocol: 4,
        seed: '0x10',
        mutators: ['bitflip', 'all'],
        mutationRate: 0.5,
        allowBuffers: true,
      })
    );
    expect(loaded).toEqual({
      version: 4,
      options: {
        seed: 16n,
        mutators: ['bitflip', 'all'],
        mutationRate: 0.5,
        allowBuffers: true,
      },
    });
  });

  it('leaves the version out when the file has none', () => {
    const loaded = parseConfigFile('{"seed": 42, "minOpcodes": 9, "maxOpcodes": 3}');
    expect(loaded.version).toBeUndefined();
    expect(loaded.options).toEqual({ seed: 42, minOpcodes: 9, maxOpcodes: 3 });
  });

  it('rejects malformed JSON with E105', () => {
    const error = rejection('{"protocol": ');
    expect(error.errorCode).toBe(ErrorCode.INVALID_CONFIG_FILE);
    expect(error.message).toBe('invalid configuration file fuzz.json');
    expect(error.suggestions).toHaveLength(1);
  });

  it('lists every schema violation', () => {
    const error = rejection('{"protocol": 9, "mutators": ["fuzz"], "verbose": true}');
    expect(error.errorCode).toBe(ErrorCode.INVALID_CONFIG_FILE);
    expect(error.suggestions).toEqual(
      expect.arrayContaining([
        '(root) must NOT have additional properties',
        '/protocol must be equal to one of the allowed values',
        '/mutators/0 must be equal to one of the allowed values',
      ])
    );
    expect(error.context?.value).toBe('fuzz.json');
  });

  it('rejects out-of-range rates and negative counts', () => {
    expect(rejection('{"mutationRate": 1.5}').suggestions).toEqual(['/mutationRate must be <= 1']);
    expect(rejection('{"minOpcodes": -1}').suggestions).toEqual(['/minOpcodes must be >= 0']);
  });

  it('checks seed strings against the 64-bit range', () => {
    const error = rejection('{"seed": "18446744073709551616"}');
    expect(error.errorCode).toBe(ErrorCode.INVALID_SEED);
  });
});
