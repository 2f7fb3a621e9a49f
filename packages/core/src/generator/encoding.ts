import { OPCODES } from '../protocol/opcodes.js';
import { ascii, f64be, i32le, u16le, u32le, u64le, utf8 } from '../util/bytes.js';
import type { Instruction } from './instruction.js';

/** Largest payload a 1-byte length prefix can describe. */
export const SHORT_LENGTH_LIMIT = 0xff;

/**
 * Minimal little-endian two's complement, as LONG1/LONG4 carry it.
 * Zero encodes as no bytes at all.
 */
export function encodeLong(value: bigint): Uint8Array {
  if (value === 0n) return new Uint8Array(0);
  const bytes: number[] = [];
  let rest = value;
  // emit bytes until the remaining value is pure sign extension of the last byte
  for (;;) {
    const byte = Number(rest & 0xffn);
    bytes.push(byte);
    rest >>= 8n;
    const signBit = (byte & 0x80) !== 0;
    if ((rest === 0n && !signBit) || (rest === -1n && signBit)) break;
  }
  return Uint8Array.from(bytes);
}

export function decodeLong(bytes: Uint8Array): bigint {
  if (bytes.length === 0) return 0n;
  let value = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(bytes[i] ?? 0);
  }
  return BigInt.asIntN(bytes.length * 8, value);
}

export function formatFloatText(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Number.POSITIVE_INFINITY) return 'inf';
  if (value === Number.NEGATIVE_INFINITY) return '-inf';
  if (Object.is(value, -0)) return '-0.0';
  return String(value);
}

/** Body of a STRING line: backslash and quote escaped, then quoted. */
export function quoteLegacyString(text: string): string {
  return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * Raw-unicode-escape body for UNICODE: backslash, newline and anything
 * outside Latin-1 become \u / \U escapes.
 */
export function rawUnicodeEscape(text: string): Uint8Array {
  const out: number[] = [];
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (cp === 0x5c || cp === 0x0a || cp > 0xff) {
      const escape =
        cp > 0xffff
          ? `\\U${cp.toString(16).padStart(8, '0')}`
          : `\\u${cp.toString(16).padStart(4, '0')}`;
      for (const c of escape) out.push(c.charCodeAt(0));
    } else {
      out.push(cp);
    }
  }
  return Uint8Array.from(out);
}

/** Drop trailing code points until the UTF-8 form fits `limit` bytes. */
export function fitUtf8(text: string, limit: number): string {
  if (utf8(text).length <= limit) return text;
  const chars = [...text];
  while (chars.length > 0 && utf8(chars.join('')).length > limit) {
    chars.pop();
  }
  return chars.join('');
}

function concat(...parts: Array<Uint8Array | readonly number[]>): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

function line(text: string): Uint8Array {
  return ascii(`${text}\n`);
}

/** Wire bytes of one instruction: opcode byte followed by its operand. */
export function encodeInstruction(instr: Instruction): Uint8Array {
  const op = [OPCODES[instr.op].byte];
  switch (instr.op) {
    case 'INT':
      return concat(op, line(instr.value.toString()));
    case 'LONG':
      return concat(op, line(`${instr.value.toString()}L`));
    case 'BININT':
      return concat(op, i32le(Number(BigInt.asIntN(32, instr.value))));
    case 'BININT1':
      return concat(op, [Number(instr.value & 0xffn)]);
    case 'BININT2':
      return concat(op, u16le(Number(instr.value & 0xffffn)));
    case 'LONG1': {
      const body = encodeLong(instr.value);
      return concat(op, [body.length], body);
    }
    case 'LONG4': {
      const body = encodeLong(instr.value);
      return concat(op, i32le(body.length), body);
    }
    case 'FLOAT':
      return concat(op, line(formatFloatText(instr.value)));
    case 'BINFLOAT':
      return concat(op, f64be(instr.value));
    case 'STRING':
      return concat(op, line(quoteLegacyString(instr.value)));
    case 'UNICODE':
      return concat(op, rawUnicodeEscape(instr.value), [0x0a]);
    case 'SHORT_BINUNICODE': {
      const body = utf8(fitUtf8(instr.value, SHORT_LENGTH_LIMIT));
      return concat(op, [body.length], body);
    }
    case 'BINUNICODE': {
      const body = utf8(instr.value);
      return concat(op, u32le(body.length), body);
    }
    case 'BINUNICODE8': {
      const body = utf8(instr.value);
      return concat(op, u64le(body.length), body);
    }
    case 'BINSTRING':
      return concat(op, i32le(instr.value.length), instr.value);
    case 'SHORT_BINSTRING':
    case 'SHORT_BINBYTES': {
      const body = instr.value.subarray(0, SHORT_LENGTH_LIMIT);
      return concat(op, [body.length], body);
    }
    case 'BINBYTES':
      return concat(op, u32le(instr.value.length), instr.value);
    case 'BINBYTES8':
    case 'BYTEARRAY8':
      return concat(op, u64le(instr.value.length), instr.value);
    case 'GLOBAL':
    case 'INST':
      return concat(op, line(instr.module), line(instr.name));
    case 'PUT':
    case 'GET':
      return concat(op, line(String(instr.index)));
    case 'BINPUT':
    case 'BINGET':
      return concat(op, [instr.index & 0xff]);
    case 'LONG_BINPUT':
    case 'LONG_BINGET':
      return concat(op, u32le(instr.index));
    case 'EXT1':
      return concat(op, [instr.code & 0xff]);
    case 'EXT2':
      return concat(op, u16le(instr.code));
    case 'EXT4':
      return concat(op, u32le(instr.code));
    case 'PERSID':
      return concat(op, line(instr.id));
    case 'PROTO':
      return concat(op, [instr.version]);
    case 'FRAME':
      return concat(op, u64le(instr.length));
    default:
      return Uint8Array.from(op);
  }
}
