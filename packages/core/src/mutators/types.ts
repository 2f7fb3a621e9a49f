import type { EntropySource } from '../entropy/source.js';
import type { ByteWriter } from '../util/bytes.js';

export const MUTATOR_NAMES = [
  'bitflip',
  'boundary',
  'off-by-one',
  'character',
  'length',
  'memo-index',
  'type-confusion',
] as const;

export type MutatorName = (typeof MUTATOR_NAMES)[number];

/** A selectable name: one strategy, or `all`. */
export type MutatorKind = MutatorName | 'all';

/** Captured right before an instruction is written. */
export interface EmissionSnapshot {
  readonly stackDepth: number;
  readonly outputLength: number;
  readonly memoSize: number;
}

export interface MutationContext {
  readonly source: EntropySource;
  /** Already clamped to [0, 1]. */
  readonly rate: number;
}

/**
 * A mutation strategy. Every capability is optional; a value hook returns
 * the replacement, or undefined to leave the value alone.
 */
export interface Mutator {
  readonly name: MutatorName;
  /** True when the strategy can produce structurally invalid output. */
  readonly unsafe: boolean;
  mutateInt?(value: number, ctx: MutationContext): number | undefined;
  mutateLong?(value: bigint, ctx: MutationContext): bigint | undefined;
  mutateFloat?(value: number, ctx: MutationContext): number | undefined;
  mutateText?(value: string, ctx: MutationContext): string | undefined;
  mutateBytes?(value: Uint8Array, ctx: MutationContext): Uint8Array | undefined;
  mutateMemoIndex?(value: number, ctx: MutationContext): number | undefined;
  /** Rewrite raw output after emission; returns true when it did. */
  postEmission?(
    snapshot: EmissionSnapshot,
    output: ByteWriter,
    ctx: MutationContext
  ): boolean;
}

/**
 * Trigger check shared by every strategy. Rate 0 never fires and rate 1
 * always fires, neither consuming entropy.
 */
export function shouldMutate(ctx: MutationContext): boolean {
  if (ctx.rate <= 0) return false;
  if (ctx.rate >= 1) return true;
  return ctx.source.float() <= ctx.rate;
}

export function clampRate(rate: number): number {
  if (Number.isNaN(rate)) return 0;
  return Math.min(1, Math.max(0, rate));
}

export const I32_MAX = 0x7fffffff;
export const I32_MIN = -0x80000000;
export const I64_MAX = (1n << 63n) - 1n;
export const I64_MIN = -(1n << 63n);
