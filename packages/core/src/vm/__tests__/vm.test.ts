import { describe, it, expect } from 'vitest';

import { InternalError } from '../../types/errors.js';
import { ValueHeap } from '../heap.js';
import { ReferenceTable } from '../memo.js';
import { VmStack } from '../stack.js';
import { VmState } from '../state.js';
import type { ValueOf } from '../values.js';

const int = (value: bigint) => ({ kind: 'int', value }) as const;

describe('ValueHeap', () => {
  it('renders structural keys', () => {
    const heap = new ValueHeap();
    const one = heap.alloc(int(1n));
    const text = heap.alloc({ kind: 'text', value: 'a"b' });
    const bytes = heap.alloc({ kind: 'bytes', value: Uint8Array.from([0, 255]) });
    const tuple = heap.alloc({ kind: 'tuple', items: [one, text] });
    expect(heap.keyOf(one)).toBe('i:1');
    expect(heap.keyOf(text)).toBe('s:"a\\"b"');
    expect(heap.keyOf(bytes)).toBe('y:00ff');
    expect(heap.keyOf(tuple)).toBe('(i:1,s:"a\\"b")');
  });

  it('distinguishes -0.0 from 0.0 and bool from int', () => {
    const heap = new ValueHeap();
    const neg = heap.alloc({ kind: 'float', value: -0 });
    const pos = heap.alloc({ kind: 'float', value: 0 });
    const t = heap.alloc({ kind: 'bool', value: true });
    const one = heap.alloc(int(1n));
    expect(heap.equals(neg, pos)).toBe(false);
    expect(heap.equals(t, one)).toBe(false);
  });

  it('compares mappings and sets regardless of order', () => {
    const heap = new ValueHeap();
    const a = heap.alloc(int(1n));
    const b = heap.alloc(int(2n));
    const s1 = heap.alloc({ kind: 'set', members: [a, b] });
    const s2 = heap.alloc({ kind: 'set', members: [b, a] });
    const d1 = heap.alloc({ kind: 'dict', entries: [[a, b], [b, a]] });
    const d2 = heap.alloc({ kind: 'dict', entries: [[b, a], [a, b]] });
    expect(heap.equals(s1, s2)).toBe(true);
    expect(heap.equals(d1, d2)).toBe(true);
  });

  it('terminates on self-referencing containers', () => {
    const heap = new ValueHeap();
    const list: ValueOf<'list'> = { kind: 'list', items: [] };
    const handle = heap.alloc(list);
    list.items.push(handle);
    expect(heap.keyOf(handle)).toBe('[<cycle>]');
  });

  it('keys deeply shared tuples in bounded size', () => {
    const heap = new ValueHeap();
    const chain = (leaf: bigint | undefined): number => {
      let handle = heap.alloc(leaf === undefined ? { kind: 'none' } : int(leaf));
      for (let i = 0; i < 200; i++) {
        handle = heap.alloc({ kind: 'tuple', items: [handle, handle] });
      }
      return handle;
    };
    const a = chain(undefined);
    const b = chain(undefined);
    const c = chain(1n);

    const key = heap.keyOf(a);
    expect(key).toHaveLength(133);
    expect(key).toMatch(/^\(#[0-9a-f]{64},#[0-9a-f]{64}\)$/);
    expect(heap.equals(a, b)).toBe(true);
    expect(heap.equals(a, c)).toBe(false);
  });

  it('reuses a cyclic member key once its cycle is closed', () => {
    const heap = new ValueHeap();
    const list: ValueOf<'list'> = { kind: 'list', items: [] };
    const inner = heap.alloc(list);
    list.items.push(inner);
    const pair = heap.alloc({ kind: 'tuple', items: [inner, inner] });
    expect(heap.keyOf(pair)).toBe('([<cycle>],[<cycle>])');
  });

  it('overwrites mapping entries by key value', () => {
    const heap = new ValueHeap();
    const dict: ValueOf<'dict'> = { kind: 'dict', entries: [] };
    const k1 = heap.alloc(int(7n));
    const k2 = heap.alloc(int(7n));
    const v1 = heap.alloc({ kind: 'none' });
    const v2 = heap.alloc({ kind: 'text', value: 'x' });
    heap.dictSet(dict, k1, v1);
    heap.dictSet(dict, k2, v2);
    expect(dict.entries).toEqual([[k1, v2]]);
  });

  it('adds set members once and deduplicates groups', () => {
    const heap = new ValueHeap();
    const set: ValueOf<'set'> = { kind: 'set', members: [] };
    const a = heap.alloc({ kind: 'text', value: 'a' });
    const b = heap.alloc({ kind: 'text', value: 'a' });
    const c = heap.alloc({ kind: 'text', value: 'c' });
    heap.setAdd(set, a);
    heap.setAdd(set, b);
    expect(set.members).toEqual([a]);
    expect(heap.uniqueMembers([a, c, b])).toEqual([a, c]);
  });

  it('clones shallowly under a new handle', () => {
    const heap = new ValueHeap();
    const member = heap.alloc(int(3n));
    const list = heap.alloc({ kind: 'list', items: [member] });
    const copy = heap.clone(list);
    expect(copy).not.toBe(list);
    const copied = heap.as(copy, 'list');
    copied?.items.push(member);
    expect(heap.as(list, 'list')?.items).toEqual([member]);
    expect(heap.as(copy, 'tuple')).toBeUndefined();
  });

  it('throws InternalError on dangling handles', () => {
    const heap = new ValueHeap();
    expect(() => heap.get(3)).toThrow(InternalError);
    expect(heap.kindOf(undefined)).toBeUndefined();
  });
});

describe('VmStack', () => {
  it('answers marker queries from the topmost marker', () => {
    const heap = new ValueHeap();
    const stack = new VmStack(heap);
    const push = (h: number) => stack.push(h);
    const one = heap.alloc(int(1n));
    const mark = heap.alloc({ kind: 'mark' });
    const text = heap.alloc({ kind: 'text', value: 't' });

    expect(stack.hasMark()).toBe(false);
    expect(stack.countAboveMark()).toBeUndefined();

    push(one);
    push(mark);
    push(text);
    push(one);

    expect(stack.depth).toBe(4);
    expect(stack.topmostMarkIndex()).toBe(1);
    expect(stack.countAboveMark()).toBe(2);
    expect(stack.available()).toBe(2);
    expect(stack.kindBelowMark()).toBe('int');
    expect(stack.kindAboveMark()).toBe('text');
    expect(stack.kindAt(0)).toBe('int');
    expect(stack.kindAt(1)).toBe('text');

    expect(stack.popToMark()).toEqual([text, one]);
    expect(stack.depth).toBe(1);
    expect(stack.popToMark()).toBeUndefined();
    expect(stack.available()).toBe(1);
  });

  it('reports no item below a marker at the bottom', () => {
    const heap = new ValueHeap();
    const stack = new VmStack(heap);
    stack.push(heap.alloc({ kind: 'mark' }));
    expect(stack.kindBelowMark()).toBeUndefined();
    expect(stack.kindAboveMark()).toBeUndefined();
    expect(stack.countAboveMark()).toBe(0);
  });
});

describe('ReferenceTable', () => {
  it('stores, overwrites and lists indices in order', () => {
    const memo = new ReferenceTable();
    expect(memo.isEmpty).toBe(true);
    memo.put(5, 1);
    memo.put(2, 0);
    memo.put(5, 3);
    expect(memo.size).toBe(2);
    expect(memo.get(5)).toBe(3);
    expect(memo.has(4)).toBe(false);
    expect(memo.indices()).toEqual([2, 5]);
  });
});

describe('VmState', () => {
  it('resets stack, memo, heap and header flag but keeps the version', () => {
    const state = new VmState(3);
    const handle = state.pushNone();
    state.pushMark();
    state.memo.put(0, handle);
    state.headerEmitted = true;

    state.reset();

    expect(state.version).toBe(3);
    expect(state.stack.depth).toBe(0);
    expect(state.memo.size).toBe(0);
    expect(state.heap.size).toBe(0);
    expect(state.headerEmitted).toBe(false);
  });
});
