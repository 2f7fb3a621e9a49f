import { createHash } from 'node:crypto';

import { InternalError } from '../types/errors.js';
import type { Handle, StackValue, ValueKind, ValueOf } from './values.js';

const MAX_KEY_DEPTH = 256;

/** Member keys longer than this are folded into a sha256 digest. */
const MAX_MEMBER_KEY_LENGTH = 64;

interface KeyContext {
  /** Containers being rendered, with the depth they were opened at. */
  open: Map<Handle, number>;
  /** Finished container keys for this call. */
  done: Map<Handle, string>;
  /** Shallowest open container a `<cycle>` pointed back to. */
  low: number;
}

function hex(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) out += b.toString(16).padStart(2, '0');
  return out;
}

/**
 * Arena of simulated values. Containers refer to their members by handle,
 * so one value may be held by the stack, by the reference table and by
 * other containers at once, and an in-place mutation is seen by all of
 * them.
 *
 * Value equality (mapping keys, set members) goes through
 * {@link ValueHeap.keyOf}, never through handle identity.
 */
export class ValueHeap {
  private readonly slots: StackValue[] = [];

  get size(): number {
    return this.slots.length;
  }

  alloc(value: StackValue): Handle {
    this.slots.push(value);
    return this.slots.length - 1;
  }

  get(handle: Handle): StackValue {
    const value = this.slots[handle];
    if (value === undefined) {
      throw new InternalError({
        message: `dangling value handle ${handle}`,
        context: { value: handle },
      });
    }
    return value;
  }

  kindOf(handle: Handle | undefined): ValueKind | undefined {
    return handle === undefined ? undefined : this.get(handle).kind;
  }

  /** Narrowing read; undefined when the handle holds another kind. */
  as<K extends ValueKind>(handle: Handle, kind: K): ValueOf<K> | undefined {
    const value = this.get(handle);
    return isKind(value, kind) ? value : undefined;
  }

  /** Shallow copy under a new handle; members stay shared. */
  clone(handle: Handle): Handle {
    return this.alloc(shallowCopy(this.get(handle)));
  }

  clear(): void {
    this.slots.length = 0;
  }

  /**
   * Canonical structural key. Two handles with equal keys hold equal values.
   * Mappings and sets are order-insensitive; a container reached again
   * while it is still being rendered becomes `<cycle>`.
   *
   * Shared members are rendered once per call, and long member keys are
   * replaced by their digest, so the cost is linear in the number of
   * distinct containers reached.
   */
  keyOf(handle: Handle): string {
    return this.render(
      handle,
      { open: new Map(), done: new Map(), low: Number.POSITIVE_INFINITY },
      0
    );
  }

  equals(a: Handle, b: Handle): boolean {
    return a === b || this.keyOf(a) === this.keyOf(b);
  }

  /** Insert or overwrite by key value; insertion order is kept. */
  dictSet(dict: ValueOf<'dict'>, key: Handle, value: Handle): void {
    const wanted = this.keyOf(key);
    const existing = dict.entries.find(([k]) => this.keyOf(k) === wanted);
    if (existing) {
      existing[1] = value;
      return;
    }
    dict.entries.push([key, value]);
  }

  setAdd(set: ValueOf<'set'>, member: Handle): void {
    const wanted = this.keyOf(member);
    if (!set.members.some((m) => this.keyOf(m) === wanted)) {
      set.members.push(member);
    }
  }

  uniqueMembers(members: readonly Handle[]): Handle[] {
    const seen = new Set<string>();
    const out: Handle[] = [];
    for (const member of members) {
      const key = this.keyOf(member);
      if (!seen.has(key)) {
        seen.add(key);
        out.push(member);
      }
    }
    return out;
  }

  private render(handle: Handle, ctx: KeyContext, depth: number): string {
    const openedAt = ctx.open.get(handle);
    if (openedAt !== undefined) {
      ctx.low = Math.min(ctx.low, openedAt);
      return '<cycle>';
    }
    if (depth > MAX_KEY_DEPTH) return '<deep>';
    const value = this.get(handle);
    switch (value.kind) {
      case 'int':
        return `i:${value.value}`;
      case 'float':
        return `f:${Object.is(value.value, -0) ? '-0' : String(value.value)}`;
      case 'bool':
        return value.value ? 'b:1' : 'b:0';
      case 'none':
        return 'none';
      case 'mark':
        return 'mark';
      case 'bytes':
        return `y:${hex(value.value)}`;
      case 'bytearray':
        return `ba:${hex(value.value)}`;
      case 'text':
        return `s:${JSON.stringify(value.value)}`;
      case 'global':
        return `g:${value.module}.${value.name}`;
      case 'list':
        return this.nested(handle, ctx, depth, (child) =>
          `[${value.items.map(child).join(',')}]`
        );
      case 'tuple':
        return this.nested(handle, ctx, depth, (child) =>
          `(${value.items.map(child).join(',')})`
        );
      case 'set':
      case 'frozenset':
        return this.nested(handle, ctx, depth, (child) =>
          `${value.kind}{${value.members.map(child).sort().join(',')}}`
        );
      case 'dict':
        return this.nested(handle, ctx, depth, (child) =>
          `{${value.entries
            .map(([k, v]) => `${child(k)}:${child(v)}`)
            .sort()
            .join(',')}}`
        );
      case 'callable':
        return this.nested(handle, ctx, depth, (child) =>
          `call<${child(value.target)}>`
        );
      case 'instance':
        return this.nested(handle, ctx, depth, (child) =>
          `obj<${child(value.callable)};${child(value.args)}>`
        );
    }
  }

  private nested(
    handle: Handle,
    ctx: KeyContext,
    depth: number,
    build: (child: (member: Handle) => string) => string
  ): string {
    const finished = ctx.done.get(handle);
    if (finished !== undefined) return finished;

    const outerLow = ctx.low;
    ctx.low = Number.POSITIVE_INFINITY;
    ctx.open.set(handle, depth);
    try {
      const key = build((member) => memberKey(this.render(member, ctx, depth + 1)));
      // a key that saw an open ancestor depends on the path taken to it
      if (ctx.low >= depth) ctx.done.set(handle, key);
      return key;
    } finally {
      ctx.open.delete(handle);
      ctx.low = Math.min(outerLow, ctx.low >= depth ? Number.POSITIVE_INFINITY : ctx.low);
    }
  }
}

function memberKey(key: string): string {
  if (key.length <= MAX_MEMBER_KEY_LENGTH) return key;
  return `#${createHash('sha256').update(key).digest('hex')}`;
}

function isKind<K extends ValueKind>(
  value: StackValue,
  kind: K
): value is ValueOf<K> {
  return value.kind === kind;
}

function shallowCopy(value: StackValue): StackValue {
  switch (value.kind) {
    case 'list':
      return { kind: 'list', items: [...value.items] };
    case 'tuple':
      return { kind: 'tuple', items: [...value.items] };
    case 'dict':
      return {
        kind: 'dict',
        entries: value.entries.map(([k, v]): [Handle, Handle] => [k, v]),
      };
    case 'set':
      return { kind: 'set', members: [...value.members] };
    case 'frozenset':
      return { kind: 'frozenset', members: [...value.members] };
    case 'bytes':
      return { kind: 'bytes', value: value.value.slice() };
    case 'bytearray':
      return { kind: 'bytearray', value: value.value.slice() };
    default:
      return { ...value };
  }
}
