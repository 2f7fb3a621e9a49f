/**
 * One contract for both entropy modes. The generator never knows whether it
 * is driven by a seeded PRNG or by a fuzz engine's byte buffer.
 */
export interface EntropySource {
  readonly kind: 'seeded' | 'bytes';
  bool(): boolean;
  u8(): number;
  u16(): number;
  u32(): number;
  i32(): number;
  i64(): bigint;
  /** Unit interval, [0, 1). */
  float(): number;
  /** Half-open [min, max); `min` when the range is empty. */
  range(min: number, max: number): number;
  bytes(length: number): Uint8Array;
  asciiChar(): string;
  /** Index below `n`; 0 (consuming nothing) when `n <= 1`. */
  chooseIndex(n: number): number;
}

/** The 95 printable ASCII characters. */
export const ASCII_CHARS =
  'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789 !"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';

export function charAt(alphabet: string, index: number): string {
  return alphabet.charAt(index) || alphabet.charAt(0);
}

/** Pick one element of a non-empty list. */
export function pick<T>(source: EntropySource, items: readonly [T, ...T[]]): T;
export function pick<T>(source: EntropySource, items: readonly T[]): T | undefined;
export function pick<T>(source: EntropySource, items: readonly T[]): T | undefined {
  return items[source.chooseIndex(items.length)];
}
