// Deterministic PRNG primitives backing the seeded entropy source.

const MASK64 = (1n << 64n) - 1n;

/**
 * splitmix64 step over a bigint state. Returns [nextState, output].
 * Used only to expand a 64-bit seed into xoshiro state words.
 */
export function splitmix64(state: bigint): [bigint, bigint] {
  const next = (state + 0x9e3779b97f4a7c15n) & MASK64;
  let z = next;
  z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK64;
  z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK64;
  return [next, (z ^ (z >> 31n)) & MASK64];
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/**
 * xoshiro128** with uint32 state words.
 * Initialization: two splitmix64 outputs of the seed, split into four words.
 * Step: result = rotl(s1 * 5, 7) * 9; then the xoshiro128 state shuffle.
 * next() returns result >>> 0
 */
export class Xoshiro128 {
  private s0: number;
  private s1: number;
  private s2: number;
  private s3: number;

  constructor(seed: bigint) {
    const [state, first] = splitmix64(seed & MASK64);
    const [, second] = splitmix64(state);
    this.s0 = Number(first & 0xffffffffn);
    this.s1 = Number(first >> 32n);
    this.s2 = Number(second & 0xffffffffn);
    this.s3 = Number(second >> 32n);
    if ((this.s0 | this.s1 | this.s2 | this.s3) === 0) {
      // all-zero state is a fixed point
      this.s0 = 1;
    }
  }

  /** Returns the next uint32 value. */
  next(): number {
    const result = Math.imul(rotl(Math.imul(this.s1, 5) >>> 0, 7), 9) >>> 0;
    const t = (this.s1 << 9) >>> 0;

    this.s2 = (this.s2 ^ this.s0) >>> 0;
    this.s3 = (this.s3 ^ this.s1) >>> 0;
    this.s1 = (this.s1 ^ this.s2) >>> 0;
    this.s0 = (this.s0 ^ this.s3) >>> 0;
    this.s2 = (this.s2 ^ t) >>> 0;
    this.s3 = rotl(this.s3, 11);

    return result;
  }

  /** Returns a deterministic float in [0, 1) with 53 bits of precision. */
  nextFloat01(): number {
    const hi = this.next() >>> 5;
    const lo = this.next() >>> 6;
    return (hi * 67108864 + lo) / 9007199254740992;
  }
}
