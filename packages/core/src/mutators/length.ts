import { shouldMutate, type MutationContext, type Mutator } from './types.js';

type LengthEdit = 'truncate' | 'extend' | 'duplicate';

const EDITS: readonly LengthEdit[] = ['truncate', 'extend', 'duplicate'];

function chooseEdit(ctx: MutationContext): LengthEdit {
  return EDITS[ctx.source.range(0, EDITS.length)] ?? 'truncate';
}

/** Truncates, extends by 1–9 units, or doubles a string or byte payload. */
export class LengthMutator implements Mutator {
  readonly name = 'length' as const;
  readonly unsafe = false;

  mutateText(value: string, ctx: MutationContext): string | undefined {
    if (!shouldMutate(ctx)) return undefined;
    switch (chooseEdit(ctx)) {
      case 'truncate':
        return value.length === 0
          ? value
          : value.slice(0, ctx.source.range(0, value.length));
      case 'extend': {
        const extra = ctx.source.range(1, 10);
        let suffix = '';
        for (let i = 0; i < extra; i++) {
          suffix += String.fromCharCode((ctx.source.u8() % 26) + 0x61);
        }
        return value + suffix;
      }
      case 'duplicate':
        return value + value;
    }
  }

  mutateBytes(value: Uint8Array, ctx: MutationContext): Uint8Array | undefined {
    if (!shouldMutate(ctx)) return undefined;
    switch (chooseEdit(ctx)) {
      case 'truncate':
        return value.length === 0
          ? value
          : value.slice(0, ctx.source.range(0, value.length));
      case 'extend': {
        const extra = ctx.source.range(1, 10);
        const out = new Uint8Array(value.length + extra);
        out.set(value);
        for (let i = value.length; i < out.length; i++) {
          out[i] = ctx.source.u8();
        }
        return out;
      }
      case 'duplicate': {
        const out = new Uint8Array(value.length * 2);
        out.set(value);
        out.set(value, value.length);
        return out;
      }
    }
  }
}
