import type { IntegerOpcode, OpcodeName } from '../protocol/opcodes.js';
import type { ProtocolVersion } from '../protocol/version.js';

export type FloatOpcode = 'FLOAT' | 'BINFLOAT';

export type TextOpcode =
  | 'STRING'
  | 'UNICODE'
  | 'SHORT_BINUNICODE'
  | 'BINUNICODE'
  | 'BINUNICODE8';

export type BytesOpcode =
  | 'BINSTRING'
  | 'SHORT_BINSTRING'
  | 'BINBYTES'
  | 'SHORT_BINBYTES'
  | 'BINBYTES8'
  | 'BYTEARRAY8';

export type GlobalOpcode = 'GLOBAL' | 'INST';

export type MemoWriteOpcode = 'PUT' | 'BINPUT' | 'LONG_BINPUT';

export type MemoReadOpcode = 'GET' | 'BINGET' | 'LONG_BINGET';

export type ExtensionOpcode = 'EXT1' | 'EXT2' | 'EXT4';

export type BareOpcode = Exclude<
  OpcodeName,
  | IntegerOpcode
  | FloatOpcode
  | TextOpcode
  | BytesOpcode
  | GlobalOpcode
  | MemoWriteOpcode
  | MemoReadOpcode
  | ExtensionOpcode
  | 'PERSID'
  | 'PROTO'
  | 'FRAME'
>;

/**
 * A fully decided instruction: opcode plus its (already mutated) operand.
 * The encoder writes it and the simulator applies it from the same value,
 * so the two cannot disagree.
 */
export type Instruction =
  | { op: IntegerOpcode; value: bigint }
  | { op: FloatOpcode; value: number }
  | { op: TextOpcode; value: string }
  | { op: BytesOpcode; value: Uint8Array }
  | { op: GlobalOpcode; module: string; name: string }
  | { op: MemoWriteOpcode; index: number }
  | { op: MemoReadOpcode; index: number }
  | { op: ExtensionOpcode; code: number }
  | { op: 'PERSID'; id: string }
  | { op: 'PROTO'; version: ProtocolVersion }
  | { op: 'FRAME'; length: bigint }
  | { op: BareOpcode };

const TEXT_OPCODES: readonly OpcodeName[] = [
  'STRING',
  'UNICODE',
  'SHORT_BINUNICODE',
  'BINUNICODE',
  'BINUNICODE8',
];

const BYTES_OPCODES: readonly OpcodeName[] = [
  'BINSTRING',
  'SHORT_BINSTRING',
  'BINBYTES',
  'SHORT_BINBYTES',
  'BINBYTES8',
  'BYTEARRAY8',
];

export function isTextOpcode(name: OpcodeName): name is TextOpcode {
  return TEXT_OPCODES.includes(name);
}

export function isBytesOpcode(name: OpcodeName): name is BytesOpcode {
  return BYTES_OPCODES.includes(name);
}
