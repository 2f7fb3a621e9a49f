import { performance } from 'node:perf_hooks';

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import { ErrorCode } from '../../errors/codes.js';
import { PROTOCOL_VERSIONS, type ProtocolVersion } from '../../protocol/version.js';
import { walkPickle } from '../../test-utils/pickle-walker.js';
import { propertyParams } from '../../test-utils/property.js';
import { ConfigError } from '../../types/errors.js';
import { VmState } from '../../vm/state.js';
import type { BareOpcode } from '../instruction.js';
import { legalInstructions, type LegalityPolicy } from '../legality.js';
import { PickleGenerator } from '../pickle-generator.js';
import { simulate } from '../simulate.js';

const versionArb = fc.constantFrom(...PROTOCOL_VERSIONS);
const seedArb = fc.bigUintN(64);

function generate(version: ProtocolVersion, seed: bigint): Uint8Array {
  return new PickleGenerator(version).withSeed(seed).generate();
}

const DEFAULT_POLICY: LegalityPolicy = {
  allowExtensions: false,
  allowBuffers: false,
  unsafeMutations: false,
};

/**
 * Input bytes that make a byte-driven pass emit `ops` as its body: one
 * choice byte per step, found by replaying the oracle on a shadow state.
 */
function steeringBytes(version: ProtocolVersion, ops: readonly BareOpcode[]): Uint8Array {
  const state = new VmState(version);
  if (version >= 2) simulate(state, { op: 'PROTO', version });
  const out: number[] = [];
  // frame coin: unframed
  if (version >= 4) out.push(0);
  for (const op of ops) {
    const legal = legalInstructions(state, DEFAULT_POLICY);
    const index = legal.indexOf(op);
    if (index === -1) throw new Error(`${op} is not legal here`);
    if (legal.length > 1) out.push(index);
    simulate(state, { op });
  }
  return Uint8Array.from(out);
}

function sharedTupleChain(pairs: number): BareOpcode[] {
  const ops: BareOpcode[] = ['NONE'];
  for (let i = 0; i < pairs; i++) ops.push('DUP', 'TUPLE2');
  return ops;
}

function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');
}

describe('PickleGenerator properties', () => {
  it('always ends with STOP and passes the structural walk', () => {
    fc.assert(
      fc.property(versionArb, seedArb, (version, seed) => {
        const bytes = generate(version, seed);
        expect(bytes[bytes.length - 1]).toBe(0x2e);
        walkPickle(bytes, { version });
      }),
      propertyParams()
    );
  });

  it('writes the header exactly from protocol 2 on', () => {
    fc.assert(
      fc.property(versionArb, seedArb, (version, seed) => {
        const bytes = generate(version, seed);
        if (version >= 2) {
          expect(bytes[0]).toBe(0x80);
          expect(bytes[1]).toBe(version);
        } else {
          expect(bytes[0]).not.toBe(0x80);
        }
      }),
      propertyParams()
    );
  });

  it('is deterministic in the seed', () => {
    fc.assert(
      fc.property(versionArb, seedArb, (version, seed) => {
        expect(generate(version, seed)).toEqual(generate(version, seed));
      }),
      propertyParams(0.5)
    );
  });

  it('frames the body with its exact length', () => {
    fc.assert(
      fc.property(fc.constantFrom<ProtocolVersion>(4, 5), seedArb, (version, seed) => {
        const generator = new PickleGenerator(version).withSeed(seed);
        const bytes = generator.generate();
        const walk = walkPickle(bytes, { version });
        if (generator.framed) {
          expect(bytes[2]).toBe(0x95);
          expect(walk.frame).toEqual({ offset: 2, length: BigInt(bytes.length - 11) });
        } else {
          expect(walk.frame).toBeUndefined();
        }
      }),
      propertyParams()
    );
  });

  it('balances markers and never underflows', () => {
    fc.assert(
      fc.property(versionArb, seedArb, (version, seed) => {
        const generator = new PickleGenerator(version).withSeed(seed);
        generator.generate();
        const metrics = generator.getMetrics();
        expect(metrics.stackUnderflows).toBe(0);
        expect(metrics.markPops).toBe(metrics.markPushes);
      }),
      propertyParams()
    );
  });

  it('emits the drawn number of body instructions', () => {
    fc.assert(
      fc.property(
        versionArb,
        seedArb,
        fc.integer({ min: 0, max: 80 }),
        fc.integer({ min: 0, max: 80 }),
        (version, seed, a, b) => {
          const [min, max] = a <= b ? [a, b] : [b, a];
          const generator = new PickleGenerator(version).withSeed(seed).withOpcodeRange(min, max);
          generator.generate();
          const m = generator.getMetrics();
          const header = version >= 2 ? 1 : 0;
          const body = m.instructions - m.cleanupInstructions - header - 1;
          expect(body).toBe(m.targetInstructions);
          expect(body).toBeGreaterThanOrEqual(min);
          expect(body).toBeLessThanOrEqual(max);
        }
      ),
      propertyParams(0.5)
    );
  });

  it('treats rate 0 like no mutators at all', () => {
    fc.assert(
      fc.property(versionArb, seedArb, (version, seed) => {
        const plain = generate(version, seed);
        const inert = new PickleGenerator(version, { mutators: ['all'], mutationRate: 0 })
          .withSeed(seed)
          .generate();
        expect(inert).toEqual(plain);
      }),
      propertyParams(0.5)
    );
  });

  it('keeps structure intact under value-level mutation', () => {
    fc.assert(
      fc.property(versionArb, seedArb, (version, seed) => {
        const bytes = new PickleGenerator(version)
          .withSeed(seed)
          .withMutators('bitflip,boundary,character,length')
          .withMutationRate(1)
          .generate();
        walkPickle(bytes, { version });
      }),
      propertyParams(0.5)
    );
  });

  it('terminates with STOP under every unsafe strategy', () => {
    fc.assert(
      fc.property(versionArb, seedArb, (version, seed) => {
        const generator = new PickleGenerator(version, {
          mutators: ['all'],
          mutationRate: 1,
          unsafeMutations: true,
          allowExtensions: true,
          allowBuffers: true,
        }).withSeed(seed);
        const bytes = generator.generate();
        expect(bytes.length).toBeGreaterThan(0);
        expect(bytes[bytes.length - 1]).toBe(0x2e);
      }),
      propertyParams(0.5)
    );
  });
});

describe('seed sensitivity', () => {
  it.each(PROTOCOL_VERSIONS)('gives 100 distinct seeds distinct output at protocol %i', (version) => {
    const outputs = new Set<string>();
    for (let seed = 1n; seed <= 100n; seed++) {
      outputs.add(toHex(generate(version, seed)));
    }
    expect(outputs.size).toBeGreaterThanOrEqual(99);
  });
});

describe('PickleGenerator scenarios', () => {
  it('protocol 0 sample has no header', () => {
    const bytes = generate(0, 999n);
    expect(bytes[0]).not.toBe(0x80);
    expect(bytes[bytes.length - 1]).toBe(0x2e);
    expect(walkPickle(bytes, { version: 0 }).protocol).toBeUndefined();
  });

  it('repeats a fixed-size protocol 4 run byte for byte', () => {
    const first = new PickleGenerator(4).withSeed(42).withOpcodeRange(10, 10);
    const second = new PickleGenerator(4).withSeed(42).withOpcodeRange(10, 10);
    const a = first.generate();
    const b = second.generate();
    expect(a).toEqual(b);
    expect(first.getMetrics().targetInstructions).toBe(10);
    expect(walkPickle(a, { version: 4 }).protocol).toBe(4);
  });

  it('protocol 3 sample over the default range walks cleanly', () => {
    const generator = new PickleGenerator(3).withSeed(7).withOpcodeRange(60, 300);
    const walk = walkPickle(generator.generate(), { version: 3 });
    expect(walk.protocol).toBe(3);
    expect(walk.steps.length).toBeGreaterThanOrEqual(62);
  });

  it('reset clears output and state but keeps the version', () => {
    const generator = new PickleGenerator(4).withSeed(3);
    generator.generate();
    expect(generator.output.length).toBeGreaterThan(0);

    generator.reset();

    expect(generator.output).toHaveLength(0);
    expect(generator.state.memo.size).toBe(0);
    expect(generator.state.stack.depth).toBe(0);
    expect(generator.state.headerEmitted).toBe(false);
    expect(generator.framed).toBe(false);
    expect(generator.version).toBe(4);
  });

  it('stops the body early once the size hint is reached', () => {
    const generator = new PickleGenerator(3).withSeed(11).withOpcodeRange(300, 300).withSizeHint(20);
    generator.generate();
    const m = generator.getMetrics();
    expect(m.targetInstructions).toBe(300);
    expect(m.instructions - m.cleanupInstructions - 2).toBeLessThan(300);
  });

  it('accepts min above max as exactly min', () => {
    const generator = new PickleGenerator(2).withSeed(5).withOpcodeRange(12, 4);
    generator.generate();
    expect(generator.getMetrics().targetInstructions).toBe(12);
  });

  it('reports the seed it drew', () => {
    const generator = new PickleGenerator(2);
    const bytes = generator.generate();
    const seed = generator.lastSeed;
    expect(seed).toBeDefined();
    if (seed !== undefined) {
      expect(new PickleGenerator(2).withSeed(seed).generate()).toEqual(bytes);
    }
  });
});

describe('generateFromBytes', () => {
  it('falls back to the first legal choice on empty input', () => {
    const generator = new PickleGenerator(2);
    const bytes = generator.generateFromBytes(new Uint8Array(0));
    const expected = [
      0x80,
      2,
      ...Array.from({ length: 60 }, () => [0x49, 0x30, 0x0a]).flat(),
      ...Array.from({ length: 29 }, () => 0x87),
      0x86,
      0x2e,
    ];
    expect([...bytes]).toEqual(expected);
    expect(generator.lastSeed).toBeUndefined();
  });

  it('pops down to one item before protocol 2', () => {
    const bytes = new PickleGenerator(0).generateFromBytes(new Uint8Array(0));
    expect(bytes).toHaveLength(60 * 3 + 59 + 1);
    expect(bytes[180]).toBe(0x30);
    expect(bytes[bytes.length - 1]).toBe(0x2e);
  });

  it('is deterministic in the input buffer and always walkable', () => {
    fc.assert(
      fc.property(versionArb, fc.uint8Array({ maxLength: 512 }), (version, data) => {
        const a = new PickleGenerator(version).generateFromBytes(data);
        const b = new PickleGenerator(version).generateFromBytes(data);
        expect(a).toEqual(b);
        walkPickle(a, { version });
      }),
      propertyParams()
    );
  });

  it.each([
    ['SETITEM', 2, ['EMPTY_DICT', ...sharedTupleChain(40), 'NONE', 'SETITEM']],
    ['FROZENSET', 4, ['MARK', ...sharedTupleChain(40), 'DUP', 'FROZENSET']],
  ] as const)('keys a deeply shared tuple quickly for %s', (last, version, ops) => {
    const body: readonly BareOpcode[] = ops;
    const started = performance.now();
    const bytes = new PickleGenerator(version)
      .withOpcodeRange(body.length, body.length)
      .generateFromBytes(steeringBytes(version, body));
    expect(performance.now() - started).toBeLessThan(5000);

    const { steps, frame } = walkPickle(bytes, { version });
    expect(frame).toBeUndefined();
    expect(steps.map((step) => step.name)).toEqual(['PROTO', ...body, 'STOP']);
    expect(steps[steps.length - 2]?.name).toBe(last);
  });
});

describe('configuration', () => {
  it('rejects unsupported versions', () => {
    try {
      new PickleGenerator(6);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.errorCode).toBe(ErrorCode.INVALID_PROTOCOL_VERSION);
      }
    }
  });

  it('applies builder settings', () => {
    const generator = new PickleGenerator(5)
      .withMutators('all')
      .withMutationRate(3)
      .withUnsafeMutations()
      .withExtensions()
      .withBuffers();
    expect(generator.mutatorKinds).toEqual(['all']);
    expect(generator.config.mutationRate).toBe(1);
    expect(generator.config.unsafeMutations).toBe(true);
    expect(generator.config.allowExtensions).toBe(true);
    expect(generator.config.allowBuffers).toBe(true);
  });

  it('keeps the previous settings when a builder call is rejected', () => {
    const generator = new PickleGenerator(1).withOpcodeRange(5, 9);
    expect(() => generator.withMutators('fuzz')).toThrow(ConfigError);
    expect(() => generator.withOpcodeRange(-1, 3)).toThrow(ConfigError);
    expect(generator.config.minOpcodes).toBe(5);
    expect(generator.config.maxOpcodes).toBe(9);
  });
});
