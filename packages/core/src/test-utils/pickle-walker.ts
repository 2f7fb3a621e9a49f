import { OPCODES, opcodeByByte, type OpcodeName } from '../protocol/opcodes.js';
import type { ProtocolVersion } from '../protocol/version.js';

/**
 * Structural walker used by tests in place of an external disassembler.
 * Reads every operand, tracks markers and the reference table, and checks
 * stack arity the way a disassembler does; it does not build values.
 */

export class PickleWalkError extends Error {
  constructor(
    message: string,
    readonly offset: number
  ) {
    super(`${message} at byte ${offset}`);
    this.name = 'PickleWalkError';
  }
}

export interface WalkStep {
  offset: number;
  name: OpcodeName;
  /** Decoded operand: number, bigint, string, byte length or module pair. */
  arg?: unknown;
}

export interface WalkResult {
  steps: WalkStep[];
  protocol?: number;
  /** Offset of a FRAME opcode and its declared length. */
  frame?: { offset: number; length: bigint };
  maxDepth: number;
}

export interface WalkOptions {
  /** Reject opcodes introduced after this version. */
  version?: ProtocolVersion;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });
const latin1 = new TextDecoder('latin1');

type Slot = 'mark' | 'item';

/** Items popped and pushed by instructions that do not consume a marker. */
const ARITY: Partial<Record<OpcodeName, readonly [pop: number, push: number]>> = {
  APPEND: [2, 1],
  SETITEM: [3, 1],
  BUILD: [2, 1],
  REDUCE: [2, 1],
  NEWOBJ: [2, 1],
  NEWOBJ_EX: [3, 1],
  STACK_GLOBAL: [2, 1],
  TUPLE1: [1, 1],
  TUPLE2: [2, 1],
  TUPLE3: [3, 1],
  DUP: [1, 2],
  BINPERSID: [1, 1],
  READONLY_BUFFER: [1, 1],
  PUT: [1, 1],
  BINPUT: [1, 1],
  LONG_BINPUT: [1, 1],
  MEMOIZE: [1, 1],
  PROTO: [0, 0],
  FRAME: [0, 0],
  MARK: [0, 0],
};

/** Marker consumers: items required below the marker, items pushed. */
const MARKED: Partial<Record<OpcodeName, readonly [below: number, push: number]>> = {
  APPENDS: [1, 1],
  SETITEMS: [1, 1],
  ADDITEMS: [1, 1],
  LIST: [0, 1],
  TUPLE: [0, 1],
  DICT: [0, 1],
  FROZENSET: [0, 1],
  INST: [0, 1],
  OBJ: [0, 1],
  POP_MARK: [0, 0],
};

class Reader {
  pos = 0;

  constructor(private readonly data: Uint8Array) {}

  get done(): boolean {
    return this.pos >= this.data.length;
  }

  take(n: number): Uint8Array {
    if (n < 0 || this.pos + n > this.data.length) {
      throw new PickleWalkError(`truncated operand, wanted ${n} bytes`, this.pos);
    }
    const out = this.data.subarray(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }

  u8(): number {
    return this.view(1).getUint8(0);
  }

  u16(): number {
    return this.view(2).getUint16(0, true);
  }

  u32(): number {
    return this.view(4).getUint32(0, true);
  }

  i32(): number {
    return this.view(4).getInt32(0, true);
  }

  u64(): bigint {
    return this.view(8).getBigUint64(0, true);
  }

  f64be(): number {
    return this.view(8).getFloat64(0, false);
  }

  line(): string {
    const end = this.data.indexOf(0x0a, this.pos);
    if (end === -1) throw new PickleWalkError('unterminated line', this.pos);
    const text = latin1.decode(this.data.subarray(this.pos, end));
    this.pos = end + 1;
    return text;
  }

  private view(n: number): DataView {
    const bytes = this.take(n);
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }
}

function decodeUtf8(bytes: Uint8Array, offset: number): string {
  try {
    return utf8.decode(bytes);
  } catch {
    throw new PickleWalkError('invalid UTF-8 payload', offset);
  }
}

function lengthOf(value: bigint, offset: number): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new PickleWalkError('length out of range', offset);
  }
  return Number(value);
}

function readOperand(name: OpcodeName, r: Reader, at: number): unknown {
  switch (name) {
    case 'INT': {
      const text = r.line();
      if (!/^-?\d+$/.test(text)) throw new PickleWalkError(`bad INT "${text}"`, at);
      return BigInt(text);
    }
    case 'LONG': {
      const text = r.line();
      if (!/^-?\d+L$/.test(text)) throw new PickleWalkError(`bad LONG "${text}"`, at);
      return BigInt(text.slice(0, -1));
    }
    case 'BININT':
      return r.i32();
    case 'BININT1':
      return r.u8();
    case 'BININT2':
      return r.u16();
    case 'LONG1':
      return r.take(r.u8()).length;
    case 'LONG4': {
      const n = r.i32();
      if (n < 0) throw new PickleWalkError('negative LONG4 length', at);
      return r.take(n).length;
    }
    case 'FLOAT': {
      const text = r.line();
      if (Number.isNaN(Number(text)) && !/^-?(nan|inf)$/.test(text)) {
        throw new PickleWalkError(`bad FLOAT "${text}"`, at);
      }
      return text;
    }
    case 'BINFLOAT':
      return r.f64be();
    case 'STRING': {
      const text = r.line();
      const quote = text[0];
      if (text.length < 2 || (quote !== "'" && quote !== '"') || !text.endsWith(quote)) {
        throw new PickleWalkError('STRING operand is not quoted', at);
      }
      return text.slice(1, -1);
    }
    case 'UNICODE':
    case 'PERSID':
      return r.line();
    case 'SHORT_BINUNICODE':
      return decodeUtf8(r.take(r.u8()), at);
    case 'BINUNICODE':
      return decodeUtf8(r.take(r.u32()), at);
    case 'BINUNICODE8':
      return decodeUtf8(r.take(lengthOf(r.u64(), at)), at);
    case 'BINSTRING': {
      const n = r.i32();
      if (n < 0) throw new PickleWalkError('negative BINSTRING length', at);
      return r.take(n).length;
    }
    case 'SHORT_BINSTRING':
    case 'SHORT_BINBYTES':
      return r.take(r.u8()).length;
    case 'BINBYTES':
      return r.take(r.u32()).length;
    case 'BINBYTES8':
    case 'BYTEARRAY8':
      return r.take(lengthOf(r.u64(), at)).length;
    case 'GLOBAL':
    case 'INST':
      return { module: r.line(), name: r.line() };
    case 'PUT':
    case 'GET': {
      const text = r.line();
      if (!/^\d+$/.test(text)) throw new PickleWalkError(`bad memo index "${text}"`, at);
      return Number(text);
    }
    case 'BINPUT':
    case 'BINGET':
      return r.u8();
    case 'LONG_BINPUT':
    case 'LONG_BINGET':
      return r.u32();
    case 'EXT1':
      return r.u8();
    case 'EXT2':
      return r.u16();
    case 'EXT4':
      return r.u32();
    case 'PROTO':
      return r.u8();
    case 'FRAME':
      return r.u64();
    default:
      return undefined;
  }
}

function numericArg(step: WalkStep): number {
  return typeof step.arg === 'number' ? step.arg : -1;
}

/**
 * Walk `data` up to its STOP.
 *
 * @throws {PickleWalkError} on the first structural violation
 */
export function walkPickle(data: Uint8Array, options: WalkOptions = {}): WalkResult {
  const r = new Reader(data);
  const stack: Slot[] = [];
  const memo = new Set<number>();
  const result: WalkResult = { steps: [], maxDepth: 0 };

  const popItems = (count: number, at: number, name: OpcodeName): void => {
    for (let i = 0; i < count; i++) {
      const top = stack.pop();
      if (top === undefined) throw new PickleWalkError(`${name} underflows the stack`, at);
      if (top === 'mark') throw new PickleWalkError(`${name} pops a marker`, at);
    }
  };

  while (!r.done) {
    const at = r.pos;
    const byte = r.u8();
    const name = opcodeByByte(byte);
    if (name === undefined) {
      throw new PickleWalkError(`unknown opcode 0x${byte.toString(16)}`, at);
    }
    if (options.version !== undefined && OPCODES[name].since > options.version) {
      throw new PickleWalkError(`${name} is not available in protocol ${options.version}`, at);
    }

    const step: WalkStep = { offset: at, name, arg: readOperand(name, r, at) };
    result.steps.push(step);

    if (name === 'STOP') {
      popItems(1, at, name);
      if (stack.length > 0) throw new PickleWalkError('stack not empty at STOP', at);
      if (!r.done) throw new PickleWalkError('trailing bytes after STOP', r.pos);
      return result;
    }

    if (name === 'PROTO') {
      result.protocol = numericArg(step);
    } else if (name === 'FRAME' && typeof step.arg === 'bigint') {
      result.frame = { offset: at, length: step.arg };
    }

    const marked = MARKED[name];
    const arity = ARITY[name];
    if (name === 'POP') {
      if (stack.pop() === undefined) throw new PickleWalkError('POP underflows the stack', at);
    } else if (marked) {
      const markAt = stack.lastIndexOf('mark');
      if (markAt === -1) throw new PickleWalkError(`${name} without a marker`, at);
      const group = stack.length - markAt - 1;
      stack.length = markAt;
      if (name === 'DICT' && group % 2 !== 0) {
        throw new PickleWalkError('DICT with an odd item count', at);
      }
      const [below, push] = marked;
      popItems(below, at, name);
      for (let i = 0; i < push; i++) stack.push('item');
    } else if (arity) {
      const [pop, push] = arity;
      popItems(pop, at, name);
      for (let i = 0; i < push; i++) stack.push('item');
      if (name === 'MARK') stack.push('mark');
    } else {
      // everything else produces one value
      stack.push('item');
    }

    switch (name) {
      case 'PUT':
      case 'BINPUT':
      case 'LONG_BINPUT':
      case 'MEMOIZE': {
        const index = name === 'MEMOIZE' ? memo.size : numericArg(step);
        if (memo.has(index)) throw new PickleWalkError(`memo key ${index} already defined`, at);
        memo.add(index);
        break;
      }
      case 'GET':
      case 'BINGET':
      case 'LONG_BINGET':
        if (!memo.has(numericArg(step))) {
          throw new PickleWalkError(`memo key ${numericArg(step)} never stored`, at);
        }
        break;
      default:
        break;
    }

    result.maxDepth = Math.max(result.maxDepth, stack.length);
  }

  throw new PickleWalkError('missing STOP', r.pos);
}
