import { shouldMutate, type MutationContext, type Mutator } from './types.js';

/** ±1; wraps for integers, saturates at 0 for reference indices. */
export class OffByOneMutator implements Mutator {
  readonly name = 'off-by-one' as const;
  readonly unsafe = false;

  mutateInt(value: number, ctx: MutationContext): number | undefined {
    if (!shouldMutate(ctx)) return undefined;
    return ctx.source.bool() ? (value + 1) | 0 : (value - 1) | 0;
  }

  mutateLong(value: bigint, ctx: MutationContext): bigint | undefined {
    if (!shouldMutate(ctx)) return undefined;
    return BigInt.asIntN(64, ctx.source.bool() ? value + 1n : value - 1n);
  }

  mutateMemoIndex(value: number, ctx: MutationContext): number | undefined {
    if (!shouldMutate(ctx)) return undefined;
    return ctx.source.bool() ? value + 1 : Math.max(0, value - 1);
  }
}
