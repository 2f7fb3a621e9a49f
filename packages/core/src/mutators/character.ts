import { shouldMutate, type MutationContext, type Mutator } from './types.js';

/** Replaces one character (printable, `!`..`~`) or one byte. */
export class CharacterMutator implements Mutator {
  readonly name = 'character' as const;
  readonly unsafe = false;

  mutateText(value: string, ctx: MutationContext): string | undefined {
    if (!shouldMutate(ctx) || value.length === 0) return undefined;
    const chars = [...value];
    const index = ctx.source.range(0, chars.length);
    chars[index] = String.fromCharCode((ctx.source.u8() % 94) + 33);
    return chars.join('');
  }

  mutateBytes(value: Uint8Array, ctx: MutationContext): Uint8Array | undefined {
    if (!shouldMutate(ctx) || value.length === 0) return undefined;
    const out = value.slice();
    out[ctx.source.range(0, out.length)] = ctx.source.u8();
    return out;
  }
}
