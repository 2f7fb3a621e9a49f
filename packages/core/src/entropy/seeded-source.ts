import { Xoshiro128 } from '../util/rng.js';
import { ASCII_CHARS, charAt, type EntropySource } from './source.js';
import { normalizeSeed, type Seed } from './seed.js';

/**
 * Unlimited entropy from a 64-bit seed. Identical seeds give identical
 * query results in any process.
 */
export class SeededEntropySource implements EntropySource {
  readonly kind = 'seeded' as const;
  readonly seed: bigint;
  private readonly rng: Xoshiro128;

  constructor(seed: Seed) {
    this.seed = normalizeSeed(seed);
    this.rng = new Xoshiro128(this.seed);
  }

  bool(): boolean {
    return this.rng.next() >>> 31 === 1;
  }

  u8(): number {
    return this.rng.next() >>> 24;
  }

  u16(): number {
    return this.rng.next() >>> 16;
  }

  u32(): number {
    return this.rng.next();
  }

  i32(): number {
    return this.rng.next() | 0;
  }

  i64(): bigint {
    const lo = BigInt(this.rng.next());
    const hi = BigInt(this.rng.next());
    return BigInt.asIntN(64, (hi << 32n) | lo);
  }

  float(): number {
    return this.rng.nextFloat01();
  }

  range(min: number, max: number): number {
    if (min >= max) return min;
    return min + this.chooseIndex(max - min);
  }

  bytes(length: number): Uint8Array {
    const out = new Uint8Array(Math.max(0, length));
    for (let i = 0; i < out.length; i++) {
      out[i] = this.u8();
    }
    return out;
  }

  asciiChar(): string {
    return charAt(ASCII_CHARS, this.chooseIndex(ASCII_CHARS.length));
  }

  chooseIndex(n: number): number {
    if (n <= 1) return 0;
    return Math.floor(this.rng.nextFloat01() * n);
  }
}
