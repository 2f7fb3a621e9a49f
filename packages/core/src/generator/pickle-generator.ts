import { ByteCursorSource } from '../entropy/byte-source.js';
import { randomSeed, type Seed } from '../entropy/seed.js';
import { SeededEntropySource } from '../entropy/seeded-source.js';
import { pick, type EntropySource } from '../entropy/source.js';
import { ErrorCode } from '../errors/codes.js';
import {
  createMutators,
  parseMutatorKinds,
  type MutatorKind,
} from '../mutators/index.js';
import { opcodeByte } from '../protocol/opcodes.js';
import { opcodesForVersion } from '../protocol/table.js';
import {
  FRAME_MIN_VERSION,
  HEADER_MIN_VERSION,
  toProtocolVersion,
  type ProtocolVersion,
} from '../protocol/version.js';
import { GenerationError } from '../types/errors.js';
import {
  resolveOptions,
  type GeneratorOptions,
  type ResolvedOptions,
} from '../types/options.js';
import { ByteWriter, u64le } from '../util/bytes.js';
import { MetricsCollector, type MetricsSnapshot } from '../util/metrics.js';
import { VmState } from '../vm/state.js';
import { Emitter } from './emitter.js';
import { legalInstructions, type LegalityPolicy } from './legality.js';

/** Opcode byte plus the 8-byte length. */
const FRAME_HEADER_SIZE = 9;
const MAX_FRAME_LENGTH = (1n << 64n) - 1n;

/** Hard bound on cleanup emissions, whatever mutation did to the stack. */
const CLEANUP_LIMIT = 10_000;

/**
 * One generator per unit of work. Owns its VM state, output buffer and
 * configuration; a pass is synchronous and always terminates.
 *
 * @example
 * const bytes = new PickleGenerator(4).withSeed(42).withOpcodeRange(10, 10).generate();
 */
export class PickleGenerator {
  readonly version: ProtocolVersion;
  private userOptions: GeneratorOptions;
  private options: ResolvedOptions;
  private readonly vm: VmState;
  private readonly writer = new ByteWriter(1024);
  private readonly metrics: MetricsCollector;
  private seedUsed: bigint | undefined;
  private wrapped = false;

  constructor(version: number, options: GeneratorOptions = {}) {
    this.version = toProtocolVersion(version);
    opcodesForVersion(this.version);
    this.userOptions = { ...options };
    this.options = resolveOptions(this.userOptions);
    this.vm = new VmState(this.version);
    this.metrics = new MetricsCollector({ enabled: this.options.metrics });
  }

  withSeed(seed: Seed): this {
    return this.configure({ seed });
  }

  withSizeHint(bytes: number): this {
    return this.configure({ sizeHint: bytes });
  }

  withOpcodeRange(minOpcodes: number, maxOpcodes: number): this {
    return this.configure({ minOpcodes, maxOpcodes });
  }

  withMutators(kinds: string | readonly string[]): this {
    return this.configure({ mutators: parseMutatorKinds(kinds) });
  }

  withMutationRate(rate: number): this {
    return this.configure({ mutationRate: rate });
  }

  withUnsafeMutations(enabled = true): this {
    return this.configure({ unsafeMutations: enabled });
  }

  withExtensions(enabled = true): this {
    return this.configure({ allowExtensions: enabled });
  }

  withBuffers(enabled = true): this {
    return this.configure({ allowBuffers: enabled });
  }

  get config(): Readonly<ResolvedOptions> {
    return this.options;
  }

  get mutatorKinds(): readonly MutatorKind[] {
    return this.options.mutators;
  }

  /** Output of the last pass; empty after {@link reset}. */
  get output(): Uint8Array {
    return this.writer.toUint8Array();
  }

  get state(): VmState {
    return this.vm;
  }

  /** Seed of the last pseudorandom pass, undefined after a byte-driven one. */
  get lastSeed(): bigint | undefined {
    return this.seedUsed;
  }

  /** Whether the last pass wrapped its body in a length-prefixed frame. */
  get framed(): boolean {
    return this.wrapped;
  }

  getMetrics(verbosity?: 'runtime' | 'ci'): MetricsSnapshot {
    return this.metrics.snapshotMetrics({ verbosity });
  }

  /** Pseudorandom pass from the configured seed, or a fresh one. */
  generate(): Uint8Array {
    const seed = this.options.seed ?? randomSeed();
    this.seedUsed = seed;
    return this.run(new SeededEntropySource(seed));
  }

  /** Pass driven entirely by `data`; identical input gives identical output. */
  generateFromBytes(data: Uint8Array): Uint8Array {
    this.seedUsed = undefined;
    return this.run(new ByteCursorSource(data));
  }

  /** Clear state and output; configuration and version are kept. */
  reset(): void {
    this.vm.reset();
    this.writer.clear();
    this.metrics.reset();
    this.wrapped = false;
  }

  private configure(patch: GeneratorOptions): this {
    const next = { ...this.userOptions, ...patch };
    this.options = resolveOptions(next);
    this.userOptions = next;
    return this;
  }

  private get policy(): LegalityPolicy {
    return {
      allowExtensions: this.options.allowExtensions,
      allowBuffers: this.options.allowBuffers,
      unsafeMutations: this.options.unsafeMutations,
    };
  }

  private run(source: EntropySource): Uint8Array {
    this.reset();
    this.metrics.begin('GENERATE');
    const emitter = new Emitter({
      state: this.vm,
      output: this.writer,
      metrics: this.metrics,
      source,
      mutators: createMutators(this.options.mutators, {
        unsafe: this.options.unsafeMutations,
      }),
      rate: this.options.mutationRate,
    });

    try {
      if (this.version >= HEADER_MIN_VERSION && !this.vm.headerEmitted) {
        emitter.emit({ op: 'PROTO', version: this.version }, { hooks: false });
      }

      let framePos: number | undefined;
      if (this.version >= FRAME_MIN_VERSION && source.bool()) {
        framePos = this.writer.length;
        this.writer.write(new Uint8Array(FRAME_HEADER_SIZE));
      }

      const target = this.pickTarget(source);
      this.metrics.setTarget(target);

      this.metrics.begin('BODY');
      this.emitBody(emitter, source, target);
      this.metrics.end('BODY');

      this.metrics.begin('CLEANUP');
      this.cleanup(emitter);
      this.metrics.end('CLEANUP');

      emitter.emit({ op: 'STOP' }, { hooks: false });

      if (framePos !== undefined) {
        this.patchFrame(framePos);
        this.wrapped = true;
      }
    } catch (error) {
      this.writer.clear();
      throw error;
    }

    this.metrics.setOutput(this.writer.length, this.wrapped);
    this.metrics.end('GENERATE');
    return this.writer.toUint8Array();
  }

  /** Uniform over [min, max] inclusive; exactly min when min >= max. */
  private pickTarget(source: EntropySource): number {
    const { minOpcodes: min, maxOpcodes: max } = this.options;
    return min < max ? min + source.chooseIndex(max - min + 1) : min;
  }

  private emitBody(emitter: Emitter, source: EntropySource, target: number): void {
    const { sizeHint } = this.options;
    const policy = this.policy;
    for (let i = 0; i < target; i++) {
      if (sizeHint !== undefined && this.writer.length >= sizeHint) break;
      const name = pick(source, legalInstructions(this.vm, policy));
      if (name === undefined) break;
      emitter.emitOpcode(name);
    }
  }

  /**
   * Collapse the stack to one item. Marked groups become tuples first;
   * the rest is paired down with TUPLE3/TUPLE2, or popped before protocol 2
   * where those do not exist.
   */
  private cleanup(emitter: Emitter): void {
    const { stack, heap } = this.vm;
    let budget = CLEANUP_LIMIT;

    while (stack.hasMark() && budget-- > 0) {
      emitter.emit({ op: 'TUPLE' }, { hooks: false });
    }

    while (stack.depth > 1 && budget-- > 0) {
      if (this.version < HEADER_MIN_VERSION) {
        emitter.emit({ op: 'POP' }, { hooks: false });
      } else {
        emitter.emit({ op: stack.depth >= 3 ? 'TUPLE3' : 'TUPLE2' }, { hooks: false });
      }
    }

    if (stack.depth === 0) {
      emitter.emit({ op: 'NONE' }, { hooks: false });
    } else if (heap.kindOf(stack.peek()) === 'mark') {
      emitter.emit({ op: 'POP' }, { hooks: false });
      emitter.emit({ op: 'NONE' }, { hooks: false });
    }
  }

  private patchFrame(framePos: number): void {
    const length = BigInt(this.writer.length - (framePos + FRAME_HEADER_SIZE));
    if (length > MAX_FRAME_LENGTH) {
      throw new GenerationError({
        message: `frame length ${length} exceeds the 64-bit length field`,
        errorCode: ErrorCode.FRAME_LENGTH_OVERFLOW,
        context: { value: length },
      });
    }
    this.writer.patch(framePos, [opcodeByte('FRAME'), ...u64le(length)]);
  }
}
