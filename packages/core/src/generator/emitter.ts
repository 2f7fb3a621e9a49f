import type { EntropySource } from '../entropy/source.js';
import type {
  EmissionSnapshot,
  MutationContext,
  Mutator,
} from '../mutators/types.js';
import { isIntegerOpcode, type OpcodeName } from '../protocol/opcodes.js';
import { integerOpcodesForVersion } from '../protocol/table.js';
import type { ByteWriter } from '../util/bytes.js';
import type { MetricsCollector } from '../util/metrics.js';
import type { VmState } from '../vm/state.js';
import { encodeInstruction, fitUtf8, SHORT_LENGTH_LIMIT } from './encoding.js';
import { randomGlobal } from './globals.js';
import {
  isBytesOpcode,
  isTextOpcode,
  type BytesOpcode,
  type Instruction,
  type TextOpcode,
} from './instruction.js';
import { simulate } from './simulate.js';

/** Longest generated text or byte value before mutation. */
const MAX_VALUE_LENGTH = 31;

const U8_MAX = 0xff;
const U16_MAX = 0xffff;
const U32_MAX = 0xffffffff;

export interface EmitterOptions {
  state: VmState;
  output: ByteWriter;
  metrics: MetricsCollector;
  source: EntropySource;
  mutators: readonly Mutator[];
  /** Already clamped. */
  rate: number;
}

export interface EmitOptions {
  /** Run post-emission hooks after the write (default: true). */
  hooks?: boolean;
}

type ValueHook<T> = (mutator: Mutator, ctx: MutationContext) => T | undefined;

/**
 * Turns a chosen opcode into bytes. Operands are drawn from the entropy
 * source and passed through the value mutators before encoding; the
 * simulator then applies the same decided instruction to the VM state.
 */
export class Emitter {
  private readonly state: VmState;
  private readonly output: ByteWriter;
  private readonly metrics: MetricsCollector;
  private readonly source: EntropySource;
  private readonly mutators: readonly Mutator[];
  private readonly ctx: MutationContext;

  constructor(options: EmitterOptions) {
    this.state = options.state;
    this.output = options.output;
    this.metrics = options.metrics;
    this.source = options.source;
    this.mutators = options.mutators;
    this.ctx = { source: options.source, rate: options.rate };
  }

  /** Plan and emit one body instruction. */
  emitOpcode(name: OpcodeName): Instruction {
    const instr = this.plan(name);
    this.emit(instr);
    return instr;
  }

  emit(instr: Instruction, options: EmitOptions = {}): void {
    const { stack, memo } = this.state;
    const snapshot: EmissionSnapshot = {
      stackDepth: stack.depth,
      outputLength: this.output.length,
      memoSize: memo.size,
    };

    this.output.write(encodeInstruction(instr));
    const effect = simulate(this.state, instr);

    this.metrics.recordInstruction(instr.op);
    this.metrics.recordMarks(effect.marksPushed, effect.marksPopped);
    if (effect.underflows > 0) this.metrics.recordUnderflows(effect.underflows);
    this.metrics.observeStackDepth(stack.depth);

    if (options.hooks ?? true) {
      this.runPostEmission(snapshot);
    }
  }

  /** Decide the operand of `name`. Integer opcodes pick their own encoding. */
  plan(name: OpcodeName): Instruction {
    if (isIntegerOpcode(name)) return this.planInteger();
    if (isTextOpcode(name)) return this.planText(name);
    if (isBytesOpcode(name)) return this.planBytes(name);

    const source = this.source;
    switch (name) {
      case 'FLOAT':
      case 'BINFLOAT':
        return { op: name, value: this.mutateFloat(source.float()) };
      case 'GLOBAL':
      case 'INST': {
        const { module, name: attr } = randomGlobal(source);
        return { op: name, module, name: attr };
      }
      case 'PUT':
      case 'BINPUT':
      case 'LONG_BINPUT':
        return { op: name, index: this.state.memo.size };
      case 'GET':
      case 'BINGET':
      case 'LONG_BINGET':
        return { op: name, index: this.planMemoRead(name) };
      case 'EXT1':
        return { op: name, code: Math.min(source.u8() + 1, U8_MAX) };
      case 'EXT2':
        return { op: name, code: Math.min(source.u16() + 1, U16_MAX) };
      case 'EXT4':
        return { op: name, code: Math.min(source.u32() + 1, U32_MAX) };
      case 'PERSID':
        return { op: name, id: `pid_${source.u32()}` };
      case 'PROTO':
        return { op: name, version: this.state.version };
      case 'FRAME':
        return { op: name, length: 0n };
      default:
        return { op: name };
    }
  }

  mutateInt(value: number): number {
    return this.firstMutation(value, (m, ctx) => m.mutateInt?.(value, ctx));
  }

  mutateLong(value: bigint): bigint {
    return this.firstMutation(value, (m, ctx) => m.mutateLong?.(value, ctx));
  }

  mutateFloat(value: number): number {
    return this.firstMutation(value, (m, ctx) => m.mutateFloat?.(value, ctx));
  }

  mutateText(value: string): string {
    return this.firstMutation(value, (m, ctx) => m.mutateText?.(value, ctx));
  }

  mutateBytes(value: Uint8Array): Uint8Array {
    return this.firstMutation(value, (m, ctx) => m.mutateBytes?.(value, ctx));
  }

  mutateMemoIndex(value: number): number {
    return this.firstMutation(value, (m, ctx) => m.mutateMemoIndex?.(value, ctx));
  }

  private planInteger(): Instruction {
    const family = integerOpcodesForVersion(this.state.version);
    const op = family[this.source.chooseIndex(family.length)] ?? 'INT';
    switch (op) {
      case 'LONG':
      case 'LONG1':
      case 'LONG4':
        return { op, value: this.mutateLong(this.source.i64()) };
      case 'BININT1':
        return { op, value: BigInt(this.mutateInt(this.source.i32()) & U8_MAX) };
      case 'BININT2':
        return { op, value: BigInt(this.mutateInt(this.source.i32()) & U16_MAX) };
      case 'INT':
      case 'BININT':
        return { op, value: BigInt(this.mutateInt(this.source.i32())) };
    }
  }

  private planText(op: TextOpcode): Instruction {
    const length = this.source.u8() % (MAX_VALUE_LENGTH + 1);
    let text = '';
    for (let i = 0; i < length; i++) text += this.source.asciiChar();
    text = this.mutateText(text);
    if (op === 'SHORT_BINUNICODE') text = fitUtf8(text, SHORT_LENGTH_LIMIT);
    return { op, value: text };
  }

  private planBytes(op: BytesOpcode): Instruction {
    const length = this.source.u8() % (MAX_VALUE_LENGTH + 1);
    let value = this.mutateBytes(this.source.bytes(length));
    if (op === 'SHORT_BINSTRING' || op === 'SHORT_BINBYTES') {
      value = value.subarray(0, SHORT_LENGTH_LIMIT);
    }
    return { op, value };
  }

  private planMemoRead(op: 'GET' | 'BINGET' | 'LONG_BINGET'): number {
    const indices = this.state.memo
      .indices()
      .filter((index) => op !== 'BINGET' || index <= U8_MAX);
    const base = indices[this.source.range(0, indices.length)] ?? 0;
    const index = this.mutateMemoIndex(base);
    switch (op) {
      case 'BINGET':
        return Math.min(index, U8_MAX);
      case 'LONG_BINGET':
        return Math.min(index, U32_MAX);
      case 'GET':
        return index;
    }
  }

  /** First strategy, in registration order, that returns a value wins. */
  private firstMutation<T>(value: T, hook: ValueHook<T>): T {
    for (const mutator of this.mutators) {
      const mutated = hook(mutator, this.ctx);
      if (mutated !== undefined) {
        this.metrics.recordMutation(mutator.name);
        return mutated;
      }
    }
    return value;
  }

  private runPostEmission(snapshot: EmissionSnapshot): void {
    for (const mutator of this.mutators) {
      if (mutator.postEmission?.(snapshot, this.output, this.ctx)) {
        this.metrics.recordRewrite(mutator.name);
      }
    }
  }
}
