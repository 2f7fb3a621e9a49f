import { pick } from '../entropy/source.js';
import {
  I32_MAX,
  I32_MIN,
  I64_MAX,
  I64_MIN,
  shouldMutate,
  type MutationContext,
  type Mutator,
} from './types.js';

const INT_BOUNDARIES = [0, -1, 1, I32_MAX, I32_MIN] as const;
const LONG_BOUNDARIES = [0n, -1n, 1n, I64_MAX, I64_MIN] as const;
const FLOAT_BOUNDARIES = [
  0,
  -1,
  1,
  Number.MAX_VALUE,
  -Number.MAX_VALUE,
  Number.POSITIVE_INFINITY,
  Number.NEGATIVE_INFINITY,
  Number.NaN,
] as const;

/** Substitutes a well-known edge value. */
export class BoundaryMutator implements Mutator {
  readonly name = 'boundary' as const;
  readonly unsafe = false;

  mutateInt(_value: number, ctx: MutationContext): number | undefined {
    if (!shouldMutate(ctx)) return undefined;
    return pick(ctx.source, INT_BOUNDARIES);
  }

  mutateLong(_value: bigint, ctx: MutationContext): bigint | undefined {
    if (!shouldMutate(ctx)) return undefined;
    return pick(ctx.source, LONG_BOUNDARIES);
  }

  mutateFloat(_value: number, ctx: MutationContext): number | undefined {
    if (!shouldMutate(ctx)) return undefined;
    return pick(ctx.source, FLOAT_BOUNDARIES);
  }
}
