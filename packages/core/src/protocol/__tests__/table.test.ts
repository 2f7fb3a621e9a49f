import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { ConfigError } from '../../types/errors.js';
import {
  OPCODE_NAMES,
  OPCODES,
  introducedIn,
  isOpcodeName,
  opcodeByByte,
  opcodeByte,
  operandShape,
} from '../opcodes.js';
import {
  PROTOCOL_TABLE,
  integerOpcodesForVersion,
  isOpcodeInVersion,
  opcodesForVersion,
} from '../table.js';
import { PROTOCOL_VERSIONS, isProtocolVersion, toProtocolVersion } from '../version.js';

describe('opcode catalog', () => {
  it('assigns every opcode a distinct byte', () => {
    const bytes = new Set(OPCODE_NAMES.map(opcodeByte));
    expect(bytes.size).toBe(OPCODE_NAMES.length);
  });

  it('maps bytes back to names', () => {
    expect(opcodeByByte(0x2e)).toBe('STOP');
    expect(opcodeByByte(0x80)).toBe('PROTO');
    expect(opcodeByByte(0x95)).toBe('FRAME');
    expect(opcodeByByte(0xff)).toBeUndefined();
    for (const name of OPCODE_NAMES) {
      expect(opcodeByByte(OPCODES[name].byte)).toBe(name);
    }
  });

  it('describes operands and introduction versions', () => {
    expect(operandShape('GLOBAL')).toBe('global');
    expect(operandShape('BINGET')).toBe('memo');
    expect(introducedIn('MEMOIZE')).toBe(4);
    expect(introducedIn('NEXT_BUFFER')).toBe(5);
    expect(isOpcodeName('TUPLE3')).toBe(true);
    expect(isOpcodeName('toString')).toBe(false);
  });
});

describe('protocol table', () => {
  it('grows cumulatively across versions', () => {
    const sizes = PROTOCOL_VERSIONS.map((v) => opcodesForVersion(v).length);
    expect(sizes).toEqual([22, 41, 53, 55, 65, 68]);
    for (const version of PROTOCOL_VERSIONS.slice(1)) {
      const previous = opcodesForVersion(toProtocolVersion(version - 1));
      const current = opcodesForVersion(version);
      expect(previous.every((name) => current.includes(name))).toBe(true);
    }
  });

  it('keeps catalog order within each version', () => {
    const v5 = opcodesForVersion(5);
    expect(v5).toEqual(OPCODE_NAMES);
    expect(PROTOCOL_TABLE.get(0)?.[0]).toBe('INT');
  });

  it('restricts integer encodings by version', () => {
    expect(integerOpcodesForVersion(0)).toEqual(['INT', 'LONG']);
    expect(integerOpcodesForVersion(1)).toEqual(['INT', 'LONG', 'BININT', 'BININT1', 'BININT2']);
    expect(integerOpcodesForVersion(2)).toEqual([
      'INT',
      'LONG',
      'BININT',
      'BININT1',
      'BININT2',
      'LONG1',
      'LONG4',
    ]);
  });

  it('answers membership', () => {
    expect(isOpcodeInVersion('PROTO', 1)).toBe(false);
    expect(isOpcodeInVersion('PROTO', 2)).toBe(true);
    expect(isOpcodeInVersion('BYTEARRAY8', 4)).toBe(false);
  });
});

describe('toProtocolVersion', () => {
  it('accepts 0 through 5', () => {
    for (const v of [0, 1, 2, 3, 4, 5]) {
      expect(toProtocolVersion(v)).toBe(v);
    }
  });

  it('rejects everything else with E101', () => {
    for (const v of [-1, 6, 2.5, Number.NaN]) {
      expect(isProtocolVersion(v)).toBe(false);
      try {
        toProtocolVersion(v);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        if (error instanceof ConfigError) {
          expect(error.errorCode).toBe(ErrorCode.INVALID_PROTOCOL_VERSION);
          expect(error.setting).toBe('version');
        }
      }
    }
  });
});
