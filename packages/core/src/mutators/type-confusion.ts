import { pick } from '../entropy/source.js';
import { OPCODES } from '../protocol/opcodes.js';
import { f64be, i32le, type ByteWriter } from '../util/bytes.js';
import {
  shouldMutate,
  type EmissionSnapshot,
  type MutationContext,
  type Mutator,
} from './types.js';

export type ConfusableType =
  | 'int'
  | 'float'
  | 'text'
  | 'bytes'
  | 'list'
  | 'dict'
  | 'tuple'
  | 'none'
  | 'bool';

const CONFUSABLE_TYPES: readonly ConfusableType[] = [
  'int',
  'float',
  'text',
  'bytes',
  'list',
  'dict',
  'tuple',
  'none',
  'bool',
];

const TYPE_BY_OPCODE: ReadonlyMap<number, ConfusableType> = new Map<
  number,
  ConfusableType
>([
  [OPCODES.INT.byte, 'int'],
  [OPCODES.BININT.byte, 'int'],
  [OPCODES.BININT1.byte, 'int'],
  [OPCODES.BININT2.byte, 'int'],
  [OPCODES.LONG.byte, 'int'],
  [OPCODES.LONG1.byte, 'int'],
  [OPCODES.LONG4.byte, 'int'],
  [OPCODES.FLOAT.byte, 'float'],
  [OPCODES.BINFLOAT.byte, 'float'],
  [OPCODES.STRING.byte, 'text'],
  [OPCODES.UNICODE.byte, 'text'],
  [OPCODES.SHORT_BINUNICODE.byte, 'text'],
  [OPCODES.BINUNICODE.byte, 'text'],
  [OPCODES.BINUNICODE8.byte, 'text'],
  [OPCODES.BINBYTES.byte, 'bytes'],
  [OPCODES.SHORT_BINBYTES.byte, 'bytes'],
  [OPCODES.BINBYTES8.byte, 'bytes'],
  [OPCODES.BINSTRING.byte, 'bytes'],
  [OPCODES.SHORT_BINSTRING.byte, 'bytes'],
  [OPCODES.EMPTY_LIST.byte, 'list'],
  [OPCODES.LIST.byte, 'list'],
  [OPCODES.EMPTY_TUPLE.byte, 'tuple'],
  [OPCODES.TUPLE.byte, 'tuple'],
  [OPCODES.TUPLE1.byte, 'tuple'],
  [OPCODES.TUPLE2.byte, 'tuple'],
  [OPCODES.TUPLE3.byte, 'tuple'],
  [OPCODES.EMPTY_DICT.byte, 'dict'],
  [OPCODES.DICT.byte, 'dict'],
  [OPCODES.NONE.byte, 'none'],
  [OPCODES.NEWTRUE.byte, 'bool'],
  [OPCODES.NEWFALSE.byte, 'bool'],
]);

const CONFUSED_PAYLOAD = [0x63, 0x6f, 0x6e, 0x66, 0x75, 0x73, 0x65, 0x64]; // "confused"

export function classifyOpcode(byte: number | undefined): ConfusableType | undefined {
  return byte === undefined ? undefined : TYPE_BY_OPCODE.get(byte);
}

/** Canonical producer of a value of `type`, as raw instruction bytes. */
export function producerFor(
  type: ConfusableType,
  ctx: MutationContext
): number[] {
  switch (type) {
    case 'int':
      return [OPCODES.BININT.byte, ...i32le(ctx.source.i32())];
    case 'float':
      return [OPCODES.BINFLOAT.byte, ...f64be(ctx.source.float())];
    case 'text':
      return [OPCODES.SHORT_BINUNICODE.byte, CONFUSED_PAYLOAD.length, ...CONFUSED_PAYLOAD];
    case 'bytes':
      return [OPCODES.SHORT_BINBYTES.byte, CONFUSED_PAYLOAD.length, ...CONFUSED_PAYLOAD];
    case 'list':
      return [OPCODES.EMPTY_LIST.byte];
    case 'dict':
      return [OPCODES.EMPTY_DICT.byte];
    case 'tuple':
      return [OPCODES.EMPTY_TUPLE.byte];
    case 'none':
      return [OPCODES.NONE.byte];
    case 'bool':
      return [ctx.source.bool() ? OPCODES.NEWTRUE.byte : OPCODES.NEWFALSE.byte];
  }
}

/**
 * Replaces a just-emitted value-producing instruction with a producer of a
 * different type. Always unsafe: the simulated stack keeps the original
 * type, so later instructions see a value they did not expect.
 */
export class TypeConfusionMutator implements Mutator {
  readonly name = 'type-confusion' as const;
  readonly unsafe = true;

  postEmission(
    snapshot: EmissionSnapshot,
    output: ByteWriter,
    ctx: MutationContext
  ): boolean {
    if (output.length <= snapshot.outputLength) return false;
    if (!shouldMutate(ctx)) return false;

    const original = classifyOpcode(output.byteAt(snapshot.outputLength));
    if (original === undefined) return false;

    const others = CONFUSABLE_TYPES.filter((t) => t !== original);
    const replacement = pick(ctx.source, others) ?? 'none';
    output.truncate(snapshot.outputLength);
    output.write(producerFor(replacement, ctx));
    return true;
  }
}
