import { ErrorCode } from '../errors/codes.js';
import { ConfigError } from '../types/errors.js';
import { BitFlipMutator } from './bitflip.js';
import { BoundaryMutator } from './boundary.js';
import { CharacterMutator } from './character.js';
import { LengthMutator } from './length.js';
import { MemoIndexMutator } from './memo-index.js';
import { OffByOneMutator } from './off-by-one.js';
import { TypeConfusionMutator } from './type-confusion.js';
import {
  MUTATOR_NAMES,
  type MutatorKind,
  type MutatorName,
  type Mutator,
} from './types.js';

export * from './types.js';
export { BitFlipMutator } from './bitflip.js';
export { BoundaryMutator } from './boundary.js';
export { CharacterMutator } from './character.js';
export { LengthMutator } from './length.js';
export { MemoIndexMutator } from './memo-index.js';
export { OffByOneMutator } from './off-by-one.js';
export {
  TypeConfusionMutator,
  classifyOpcode,
  producerFor,
  type ConfusableType,
} from './type-confusion.js';

export interface MutatorPolicy {
  unsafe: boolean;
}

export function isMutatorKind(value: string): value is MutatorKind {
  return value === 'all' || MUTATOR_NAMES.some((name) => name === value);
}

/**
 * Resolve `all` and drop duplicates, keeping first-seen order. `all` leaves
 * out `memo-index` unless unsafe mutations are on.
 */
export function expandMutatorKinds(
  kinds: readonly MutatorKind[],
  policy: MutatorPolicy
): MutatorName[] {
  const out: MutatorName[] = [];
  const add = (name: MutatorName): void => {
    if (!out.includes(name)) out.push(name);
  };
  for (const kind of kinds) {
    if (kind === 'all') {
      for (const name of MUTATOR_NAMES) {
        if (name !== 'memo-index' || policy.unsafe) add(name);
      }
    } else {
      add(kind);
    }
  }
  return out;
}

export function createMutator(name: MutatorName, policy: MutatorPolicy): Mutator {
  switch (name) {
    case 'bitflip':
      return new BitFlipMutator();
    case 'boundary':
      return new BoundaryMutator();
    case 'off-by-one':
      return new OffByOneMutator();
    case 'character':
      return new CharacterMutator();
    case 'length':
      return new LengthMutator();
    case 'memo-index':
      return new MemoIndexMutator(policy.unsafe);
    case 'type-confusion':
      return new TypeConfusionMutator();
  }
}

/**
 * Instantiate strategies in registration order. Strategies that declare
 * themselves unsafe are dropped unless the policy allows them.
 */
export function createMutators(
  kinds: readonly MutatorKind[],
  policy: MutatorPolicy
): Mutator[] {
  return expandMutatorKinds(kinds, policy)
    .map((name) => createMutator(name, policy))
    .filter((mutator) => policy.unsafe || !mutator.unsafe);
}

/** Parse a comma-separated list (or list of lists) of mutator names. */
export function parseMutatorKinds(input: string | readonly string[]): MutatorKind[] {
  const parts = (typeof input === 'string' ? [input] : input)
    .flatMap((chunk) => chunk.split(','))
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0);
  return parts.map((part) => {
    if (!isMutatorKind(part)) {
      throw new ConfigError({
        message: `unknown mutator "${part}"`,
        errorCode: ErrorCode.UNKNOWN_MUTATOR,
        context: {
          setting: 'mutators',
          value: part,
          suggestion: `Use one of: all, ${MUTATOR_NAMES.join(', ')}`,
        },
      });
    }
    return part;
  });
}
