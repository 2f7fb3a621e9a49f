import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import { SeededEntropySource } from '../../entropy/seeded-source.js';
import { BitFlipMutator, TypeConfusionMutator, type Mutator } from '../../mutators/index.js';
import { propertyParams } from '../../test-utils/property.js';
import { ByteWriter } from '../../util/bytes.js';
import { MetricsCollector } from '../../util/metrics.js';
import { VmState } from '../../vm/state.js';
import { Emitter } from '../emitter.js';

function setup(version: 0 | 1 | 2 | 3 | 4 | 5, mutators: Mutator[] = [], rate = 0) {
  const state = new VmState(version);
  const output = new ByteWriter();
  const metrics = new MetricsCollector({ now: () => 0 });
  const emitter = new Emitter({
    state,
    output,
    metrics,
    source: new SeededEntropySource(7),
    mutators,
    rate,
  });
  return { state, output, metrics, emitter };
}

describe('Emitter', () => {
  it('writes, simulates and counts one instruction', () => {
    const { state, output, metrics, emitter } = setup(1);
    emitter.emit({ op: 'MARK' });
    emitter.emit({ op: 'BININT1', value: 3n });
    emitter.emit({ op: 'LIST' });
    expect([...output.toUint8Array()]).toEqual([0x28, 0x4b, 3, 0x6c]);
    expect(state.stack.depth).toBe(1);
    const snapshot = metrics.snapshotMetrics({ verbosity: 'ci' });
    expect(snapshot.instructions).toBe(3);
    expect(snapshot.markPushes).toBe(1);
    expect(snapshot.markPops).toBe(1);
    expect(snapshot.maxStackDepth).toBe(2);
  });

  it('plans reference writes at the next free index', () => {
    const { state, emitter } = setup(1);
    emitter.emit({ op: 'NONE' });
    expect(emitter.plan('BINPUT')).toEqual({ op: 'BINPUT', index: 0 });
    emitter.emit({ op: 'BINPUT', index: 0 });
    expect(state.memo.size).toBe(1);
    expect(emitter.plan('LONG_BINPUT')).toEqual({ op: 'LONG_BINPUT', index: 1 });
    expect(emitter.plan('BINGET')).toEqual({ op: 'BINGET', index: 0 });
  });

  it('plans header and frame operands', () => {
    const { emitter } = setup(4);
    expect(emitter.plan('PROTO')).toEqual({ op: 'PROTO', version: 4 });
    expect(emitter.plan('FRAME')).toEqual({ op: 'FRAME', length: 0n });
    expect(emitter.plan('EMPTY_SET')).toEqual({ op: 'EMPTY_SET' });
  });

  it('keeps short text and byte operands within one length byte', () => {
    const { emitter } = setup(4);
    for (let i = 0; i < 50; i++) {
      const text = emitter.plan('SHORT_BINUNICODE');
      const bytes = emitter.plan('SHORT_BINBYTES');
      if (text.op === 'SHORT_BINUNICODE') expect(text.value.length).toBeLessThan(32);
      if (bytes.op === 'SHORT_BINBYTES') expect(bytes.value.length).toBeLessThan(32);
    }
  });

  it('draws integer encodings available in the version', () => {
    const { emitter } = setup(0);
    for (let i = 0; i < 50; i++) {
      expect(['INT', 'LONG']).toContain(emitter.plan('BININT').op);
    }
  });

  it('flips exactly one bit at rate 1', () => {
    const { emitter, metrics } = setup(1, [new BitFlipMutator()], 1);
    fc.assert(
      fc.property(fc.integer({ min: -0x80000000, max: 0x7fffffff }), (value) => {
        const diff = (emitter.mutateInt(value) ^ value) >>> 0;
        return diff !== 0 && (diff & (diff - 1)) === 0;
      }),
      propertyParams()
    );
    expect(metrics.snapshotMetrics().mutationsApplied).toBeGreaterThan(0);
  });

  it('leaves values untouched at rate 0', () => {
    const { emitter, metrics } = setup(1, [new BitFlipMutator()], 0);
    expect(emitter.mutateInt(1234)).toBe(1234);
    expect(emitter.mutateLong(-5n)).toBe(-5n);
    expect(metrics.snapshotMetrics().mutationsApplied).toBe(0);
  });

  it('runs post-emission hooks only when asked', () => {
    const { output, metrics, emitter } = setup(2, [new TypeConfusionMutator()], 1);
    emitter.emit({ op: 'NONE' }, { hooks: false });
    expect([...output.toUint8Array()]).toEqual([0x4e]);

    emitter.emit({ op: 'NONE' });
    expect(output.byteAt(1)).not.toBe(0x4e);
    expect(metrics.snapshotMetrics().rewritesApplied).toBe(1);
  });
});
