import { shouldMutate, type MutationContext, type Mutator } from './types.js';

const UNSAFE_INDEX_LIMIT = 1000;

/**
 * Perturbs reference-table reads. Safe mode nudges the index by one or
 * keeps it; unsafe mode draws any index below 1000, usually a missing one.
 */
export class MemoIndexMutator implements Mutator {
  readonly name = 'memo-index' as const;
  readonly unsafe: boolean;

  constructor(unsafe = false) {
    this.unsafe = unsafe;
  }

  mutateMemoIndex(value: number, ctx: MutationContext): number | undefined {
    if (!shouldMutate(ctx)) return undefined;
    if (this.unsafe) {
      return ctx.source.range(0, UNSAFE_INDEX_LIMIT);
    }
    switch (ctx.source.range(0, 3)) {
      case 0:
        return value + 1;
      case 1:
        return Math.max(0, value - 1);
      default:
        return value;
    }
  }
}
