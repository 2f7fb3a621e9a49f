import type { ProtocolVersion } from './version.js';

/**
 * Operand layout following the opcode byte.
 * - none: bare opcode
 * - int: decimal line or fixed-width little-endian integer
 * - long: decimal line with `L`, or length-prefixed two's complement
 * - float: decimal line or 8-byte big-endian double
 * - text / bytes: quoted or raw line, or length-prefixed payload
 * - memo: reference-table index (decimal line or 1/4-byte little-endian)
 * - global: `module\nname\n`
 * - extension: 1/2/4-byte extension registry code
 * - persid: persistent id line
 * - proto: one version byte
 * - frame: 8-byte little-endian length
 */
export type OperandShape =
  | 'none'
  | 'int'
  | 'long'
  | 'float'
  | 'text'
  | 'bytes'
  | 'memo'
  | 'global'
  | 'extension'
  | 'persid'
  | 'proto'
  | 'frame';

export interface OpcodeInfo {
  readonly byte: number;
  readonly since: ProtocolVersion;
  readonly operand: OperandShape;
}

export const OPCODES = {
  // protocol 0
  INT: { byte: 0x49, since: 0, operand: 'int' },
  LONG: { byte: 0x4c, since: 0, operand: 'long' },
  STRING: { byte: 0x53, since: 0, operand: 'text' },
  NONE: { byte: 0x4e, since: 0, operand: 'none' },
  UNICODE: { byte: 0x56, since: 0, operand: 'text' },
  FLOAT: { byte: 0x46, since: 0, operand: 'float' },
  APPEND: { byte: 0x61, since: 0, operand: 'none' },
  LIST: { byte: 0x6c, since: 0, operand: 'none' },
  TUPLE: { byte: 0x74, since: 0, operand: 'none' },
  DICT: { byte: 0x64, since: 0, operand: 'none' },
  SETITEM: { byte: 0x73, since: 0, operand: 'none' },
  POP: { byte: 0x30, since: 0, operand: 'none' },
  DUP: { byte: 0x32, since: 0, operand: 'none' },
  MARK: { byte: 0x28, since: 0, operand: 'none' },
  GET: { byte: 0x67, since: 0, operand: 'memo' },
  PUT: { byte: 0x70, since: 0, operand: 'memo' },
  GLOBAL: { byte: 0x63, since: 0, operand: 'global' },
  REDUCE: { byte: 0x52, since: 0, operand: 'none' },
  BUILD: { byte: 0x62, since: 0, operand: 'none' },
  INST: { byte: 0x69, since: 0, operand: 'global' },
  STOP: { byte: 0x2e, since: 0, operand: 'none' },
  PERSID: { byte: 0x50, since: 0, operand: 'persid' },
  // protocol 1
  BININT: { byte: 0x4a, since: 1, operand: 'int' },
  BININT1: { byte: 0x4b, since: 1, operand: 'int' },
  BININT2: { byte: 0x4d, since: 1, operand: 'int' },
  BINSTRING: { byte: 0x54, since: 1, operand: 'bytes' },
  SHORT_BINSTRING: { byte: 0x55, since: 1, operand: 'bytes' },
  BINUNICODE: { byte: 0x58, since: 1, operand: 'text' },
  BINFLOAT: { byte: 0x47, since: 1, operand: 'float' },
  EMPTY_LIST: { byte: 0x5d, since: 1, operand: 'none' },
  APPENDS: { byte: 0x65, since: 1, operand: 'none' },
  EMPTY_TUPLE: { byte: 0x29, since: 1, operand: 'none' },
  EMPTY_DICT: { byte: 0x7d, since: 1, operand: 'none' },
  SETITEMS: { byte: 0x75, since: 1, operand: 'none' },
  POP_MARK: { byte: 0x31, since: 1, operand: 'none' },
  BINGET: { byte: 0x68, since: 1, operand: 'memo' },
  LONG_BINGET: { byte: 0x6a, since: 1, operand: 'memo' },
  BINPUT: { byte: 0x71, since: 1, operand: 'memo' },
  LONG_BINPUT: { byte: 0x72, since: 1, operand: 'memo' },
  OBJ: { byte: 0x6f, since: 1, operand: 'none' },
  BINPERSID: { byte: 0x51, since: 1, operand: 'none' },
  // protocol 2
  LONG1: { byte: 0x8a, since: 2, operand: 'long' },
  LONG4: { byte: 0x8b, since: 2, operand: 'long' },
  NEWTRUE: { byte: 0x88, since: 2, operand: 'none' },
  NEWFALSE: { byte: 0x89, since: 2, operand: 'none' },
  TUPLE1: { byte: 0x85, since: 2, operand: 'none' },
  TUPLE2: { byte: 0x86, since: 2, operand: 'none' },
  TUPLE3: { byte: 0x87, since: 2, operand: 'none' },
  EXT1: { byte: 0x82, since: 2, operand: 'extension' },
  EXT2: { byte: 0x83, since: 2, operand: 'extension' },
  EXT4: { byte: 0x84, since: 2, operand: 'extension' },
  NEWOBJ: { byte: 0x81, since: 2, operand: 'none' },
  PROTO: { byte: 0x80, since: 2, operand: 'proto' },
  // protocol 3
  BINBYTES: { byte: 0x42, since: 3, operand: 'bytes' },
  SHORT_BINBYTES: { byte: 0x43, since: 3, operand: 'bytes' },
  // protocol 4
  BINBYTES8: { byte: 0x8e, since: 4, operand: 'bytes' },
  SHORT_BINUNICODE: { byte: 0x8c, since: 4, operand: 'text' },
  BINUNICODE8: { byte: 0x8d, since: 4, operand: 'text' },
  EMPTY_SET: { byte: 0x8f, since: 4, operand: 'none' },
  ADDITEMS: { byte: 0x90, since: 4, operand: 'none' },
  FROZENSET: { byte: 0x91, since: 4, operand: 'none' },
  MEMOIZE: { byte: 0x94, since: 4, operand: 'none' },
  STACK_GLOBAL: { byte: 0x93, since: 4, operand: 'none' },
  NEWOBJ_EX: { byte: 0x92, since: 4, operand: 'none' },
  FRAME: { byte: 0x95, since: 4, operand: 'frame' },
  // protocol 5
  BYTEARRAY8: { byte: 0x96, since: 5, operand: 'bytes' },
  NEXT_BUFFER: { byte: 0x97, since: 5, operand: 'none' },
  READONLY_BUFFER: { byte: 0x98, since: 5, operand: 'none' },
} as const satisfies Record<string, OpcodeInfo>;

export type OpcodeName = keyof typeof OPCODES;

/** Catalog order; the protocol table and uniform selection index into it. */
export const OPCODE_NAMES: readonly OpcodeName[] = Object.freeze(
  Object.keys(OPCODES).filter(isOpcodeName)
);

const BY_BYTE: ReadonlyMap<number, OpcodeName> = new Map(
  OPCODE_NAMES.map((name) => [OPCODES[name].byte, name] as const)
);

export function isOpcodeName(value: string): value is OpcodeName {
  return Object.prototype.hasOwnProperty.call(OPCODES, value);
}

export function opcodeByte(name: OpcodeName): number {
  return OPCODES[name].byte;
}

export function opcodeByByte(byte: number): OpcodeName | undefined {
  return BY_BYTE.get(byte);
}

export function introducedIn(name: OpcodeName): ProtocolVersion {
  return OPCODES[name].since;
}

export function operandShape(name: OpcodeName): OperandShape {
  return OPCODES[name].operand;
}

/** Opcodes whose emission goes through the integer encoder. */
export const INTEGER_OPCODES = [
  'INT',
  'LONG',
  'BININT',
  'BININT1',
  'BININT2',
  'LONG1',
  'LONG4',
] as const satisfies readonly OpcodeName[];

export type IntegerOpcode = (typeof INTEGER_OPCODES)[number];

export function isIntegerOpcode(name: OpcodeName): name is IntegerOpcode {
  return INTEGER_OPCODES.some((candidate) => candidate === name);
}
