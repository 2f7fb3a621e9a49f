import { shouldMutate, type MutationContext, type Mutator } from './types.js';

/** Flips one random bit of an integer value. */
export class BitFlipMutator implements Mutator {
  readonly name = 'bitflip' as const;
  readonly unsafe = false;

  mutateInt(value: number, ctx: MutationContext): number | undefined {
    if (!shouldMutate(ctx)) return undefined;
    const bit = ctx.source.range(0, 32);
    return (value ^ (1 << bit)) | 0;
  }

  mutateLong(value: bigint, ctx: MutationContext): bigint | undefined {
    if (!shouldMutate(ctx)) return undefined;
    const bit = BigInt(ctx.source.range(0, 64));
    return BigInt.asIntN(64, value ^ (1n << bit));
  }
}
