import type { OpcodeName } from '../protocol/opcodes.js';
import { opcodesForVersion } from '../protocol/table.js';
import { isBytesLikeKind, isCallableKind, type ValueKind } from '../vm/values.js';
import type { VmState } from '../vm/state.js';

export interface LegalityPolicy {
  readonly allowExtensions: boolean;
  readonly allowBuffers: boolean;
  /** Relaxes STACK_GLOBAL to accept any two operands. */
  readonly unsafeMutations: boolean;
}

/**
 * Stack facts computed once per query. `available` counts the items a
 * non-marker instruction can reach: everything above the topmost marker,
 * or the whole stack when there is none.
 */
export interface StackView {
  readonly depth: number;
  readonly available: number;
  readonly hasMark: boolean;
  readonly countAboveMark: number;
  readonly kindBelowMark: ValueKind | undefined;
  readonly kindAboveMark: ValueKind | undefined;
  kindAt(depth: number): ValueKind | undefined;
  readonly memoEmpty: boolean;
  readonly memoSize: number;
  readonly memoHasShortIndex: boolean;
  readonly headerEmitted: boolean;
}

export function describeState(state: VmState): StackView {
  const { stack, memo } = state;
  const markIndex = stack.topmostMarkIndex();
  const countAboveMark = markIndex === -1 ? 0 : stack.depth - markIndex - 1;
  return {
    depth: stack.depth,
    available: markIndex === -1 ? stack.depth : countAboveMark,
    hasMark: markIndex !== -1,
    countAboveMark,
    kindBelowMark: stack.kindBelowMark(),
    kindAboveMark: stack.kindAboveMark(),
    kindAt: (depth) => stack.kindAt(depth),
    memoEmpty: memo.isEmpty,
    memoSize: memo.size,
    memoHasShortIndex: memo.indices().some((i) => i < 256),
    headerEmitted: state.headerEmitted,
  };
}

function topIsValue(view: StackView): boolean {
  return view.available >= 1;
}

function isOneOf(kind: ValueKind | undefined, ...kinds: ValueKind[]): boolean {
  return kind !== undefined && kinds.includes(kind);
}

/** Precondition of one instruction over the current simulated state. */
export function canEmit(
  name: OpcodeName,
  view: StackView,
  policy: LegalityPolicy
): boolean {
  switch (name) {
    // value producers
    case 'INT':
    case 'BININT':
    case 'BININT1':
    case 'BININT2':
    case 'LONG':
    case 'LONG1':
    case 'LONG4':
    case 'FLOAT':
    case 'BINFLOAT':
    case 'STRING':
    case 'BINSTRING':
    case 'SHORT_BINSTRING':
    case 'UNICODE':
    case 'SHORT_BINUNICODE':
    case 'BINUNICODE':
    case 'BINUNICODE8':
    case 'BINBYTES':
    case 'SHORT_BINBYTES':
    case 'BINBYTES8':
    case 'BYTEARRAY8':
    case 'NONE':
    case 'NEWTRUE':
    case 'NEWFALSE':
    case 'EMPTY_LIST':
    case 'EMPTY_TUPLE':
    case 'EMPTY_DICT':
    case 'EMPTY_SET':
    case 'GLOBAL':
    case 'PERSID':
    case 'MARK':
      return true;

    // stack shuffling
    case 'POP':
      return view.depth >= 1;
    case 'DUP':
      return topIsValue(view);
    case 'POP_MARK':
      return view.hasMark;

    // containers
    case 'APPEND':
      return view.available >= 2 && view.kindAt(1) === 'list';
    case 'APPENDS':
      return view.hasMark && view.kindBelowMark === 'list' && view.countAboveMark > 0;
    case 'SETITEM':
      return view.available >= 3 && view.kindAt(2) === 'dict';
    case 'SETITEMS':
      return (
        view.hasMark &&
        view.kindBelowMark === 'dict' &&
        view.countAboveMark > 0 &&
        view.countAboveMark % 2 === 0
      );
    case 'ADDITEMS':
      return view.hasMark && view.kindBelowMark === 'set' && view.countAboveMark > 0;
    case 'LIST':
    case 'TUPLE':
    case 'FROZENSET':
      return view.hasMark;
    case 'DICT':
      return view.hasMark && view.countAboveMark % 2 === 0;
    case 'TUPLE1':
      return view.available >= 1;
    case 'TUPLE2':
      return view.available >= 2;
    case 'TUPLE3':
      return view.available >= 3;

    // objects
    case 'REDUCE':
    case 'NEWOBJ':
      return (
        view.available >= 2 &&
        isCallableKind(view.kindAt(1)) &&
        view.kindAt(0) === 'tuple'
      );
    case 'NEWOBJ_EX':
      return (
        view.available >= 3 &&
        isCallableKind(view.kindAt(2)) &&
        view.kindAt(1) === 'tuple' &&
        view.kindAt(0) === 'dict'
      );
    case 'BUILD':
      return (
        view.available >= 2 &&
        view.kindAt(1) === 'instance' &&
        isOneOf(view.kindAt(0), 'tuple', 'dict')
      );
    case 'INST':
      return view.hasMark && view.countAboveMark > 0;
    case 'OBJ':
      return view.hasMark && isCallableKind(view.kindAboveMark);
    case 'STACK_GLOBAL':
      if (view.available < 2) return false;
      return (
        policy.unsafeMutations ||
        (view.kindAt(0) === 'text' && view.kindAt(1) === 'text')
      );

    // reference table
    case 'GET':
    case 'LONG_BINGET':
      return !view.memoEmpty;
    case 'BINGET':
      return view.memoHasShortIndex;
    case 'BINPUT':
      // a write never reuses an index
      return topIsValue(view) && view.memoSize < 256;
    case 'PUT':
    case 'LONG_BINPUT':
    case 'MEMOIZE':
      return topIsValue(view);

    // persistence, extensions, buffers
    case 'BINPERSID':
      return topIsValue(view);
    case 'EXT1':
    case 'EXT2':
    case 'EXT4':
      return policy.allowExtensions;
    case 'NEXT_BUFFER':
      return policy.allowBuffers;
    case 'READONLY_BUFFER':
      return (
        policy.allowBuffers &&
        view.available >= 1 &&
        isBytesLikeKind(view.kindAt(0))
      );

    // framing
    case 'PROTO':
      return !view.headerEmitted;
    case 'STOP':
    case 'FRAME':
      return false;
  }
}

/** Legal instructions for the state's version, in protocol-table order. */
export function legalInstructions(
  state: VmState,
  policy: LegalityPolicy
): OpcodeName[] {
  const view = describeState(state);
  return opcodesForVersion(state.version).filter((name) =>
    canEmit(name, view, policy)
  );
}
