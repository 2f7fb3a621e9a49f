/** Index into a {@link ValueHeap}. */
export type Handle = number;

export type StackValue =
  | { kind: 'int'; value: bigint }
  | { kind: 'float'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'none' }
  | { kind: 'bytes'; value: Uint8Array }
  | { kind: 'text'; value: string }
  | { kind: 'bytearray'; value: Uint8Array }
  | { kind: 'list'; items: Handle[] }
  | { kind: 'tuple'; items: readonly Handle[] }
  | { kind: 'dict'; entries: Array<[key: Handle, value: Handle]> }
  | { kind: 'set'; members: Handle[] }
  | { kind: 'frozenset'; members: readonly Handle[] }
  | { kind: 'mark' }
  | { kind: 'global'; module: string; name: string }
  | { kind: 'callable'; target: Handle }
  | { kind: 'instance'; callable: Handle; args: Handle };

export type ValueKind = StackValue['kind'];

export type ValueOf<K extends ValueKind> = Extract<StackValue, { kind: K }>;

/** Kinds the format can invoke: REDUCE, NEWOBJ and OBJ targets. */
export const CALLABLE_KINDS: readonly ValueKind[] = ['callable', 'global'];

export const BYTES_LIKE_KINDS: readonly ValueKind[] = ['bytes', 'bytearray'];

export function isCallableKind(kind: ValueKind | undefined): boolean {
  return kind !== undefined && CALLABLE_KINDS.includes(kind);
}

export function isBytesLikeKind(kind: ValueKind | undefined): boolean {
  return kind !== undefined && BYTES_LIKE_KINDS.includes(kind);
}

export const MARK: ValueOf<'mark'> = Object.freeze({ kind: 'mark' });
export const NONE: ValueOf<'none'> = Object.freeze({ kind: 'none' });
