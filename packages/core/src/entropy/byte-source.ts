import { ASCII_CHARS, charAt, type EntropySource } from './source.js';

/**
 * Entropy read from a finite buffer handed over by a fuzz engine.
 *
 * Multi-byte values are little-endian. A query that needs more bytes than
 * remain drains the cursor and answers with its default (false, 0, 0.0,
 * empty, index 0, `min`), so once exhausted every later query is a default
 * too and generation always runs to completion.
 */
export class ByteCursorSource implements EntropySource {
  readonly kind = 'bytes' as const;
  private readonly data: Uint8Array;
  private offset = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  get exhausted(): boolean {
    return this.remaining === 0;
  }

  bool(): boolean {
    const b = this.take(1);
    return b !== undefined && (b & 1) === 1;
  }

  u8(): number {
    return this.take(1) ?? 0;
  }

  u16(): number {
    return this.take(2) ?? 0;
  }

  u32(): number {
    return this.take(4) ?? 0;
  }

  i32(): number {
    return (this.take(4) ?? 0) | 0;
  }

  i64(): bigint {
    if (this.remaining < 8) {
      this.drain();
      return 0n;
    }
    let value = 0n;
    for (let i = 7; i >= 0; i--) {
      value = (value << 8n) | BigInt(this.data[this.offset + i] ?? 0);
    }
    this.offset += 8;
    return BigInt.asIntN(64, value);
  }

  float(): number {
    return (this.take(4) ?? 0) / 0x100000000;
  }

  range(min: number, max: number): number {
    if (min >= max) return min;
    return min + this.chooseIndex(max - min);
  }

  bytes(length: number): Uint8Array {
    if (length <= 0) return new Uint8Array(0);
    if (this.remaining < length) {
      this.drain();
      return new Uint8Array(0);
    }
    const out = this.data.slice(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }

  asciiChar(): string {
    return charAt(ASCII_CHARS, this.chooseIndex(ASCII_CHARS.length));
  }

  chooseIndex(n: number): number {
    if (n <= 1) return 0;
    const width = n <= 0x100 ? 1 : n <= 0x10000 ? 2 : 4;
    const raw = this.take(width);
    return raw === undefined ? 0 : raw % n;
  }

  /** Unsigned little-endian read of `width` (1–4) bytes. */
  private take(width: number): number | undefined {
    if (this.remaining < width) {
      this.drain();
      return undefined;
    }
    let value = 0;
    for (let i = width - 1; i >= 0; i--) {
      value = value * 256 + (this.data[this.offset + i] ?? 0);
    }
    this.offset += width;
    return value;
  }

  private drain(): void {
    this.offset = this.data.length;
  }
}
