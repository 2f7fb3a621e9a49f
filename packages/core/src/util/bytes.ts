const textEncoder = new TextEncoder();

export function utf8(text: string): Uint8Array {
  return textEncoder.encode(text);
}

/** Latin-1 view of an ASCII line (every char code fits one byte). */
export function ascii(text: string): Uint8Array {
  const out = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    out[i] = text.charCodeAt(i) & 0xff;
  }
  return out;
}

export function u16le(value: number): Uint8Array {
  const out = new Uint8Array(2);
  new DataView(out.buffer).setUint16(0, value & 0xffff, true);
  return out;
}

export function u32le(value: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, value >>> 0, true);
  return out;
}

export function i32le(value: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setInt32(0, value | 0, true);
  return out;
}

export function u64le(value: bigint | number): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, BigInt.asUintN(64, BigInt(value)), true);
  return out;
}

export function f64be(value: number): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setFloat64(0, value, false);
  return out;
}

/** Growable output buffer with truncate and in-place patch. */
export class ByteWriter {
  private buf: Uint8Array;
  private len = 0;

  constructor(initialCapacity = 256) {
    this.buf = new Uint8Array(Math.max(16, initialCapacity));
  }

  get length(): number {
    return this.len;
  }

  byteAt(index: number): number | undefined {
    return index >= 0 && index < this.len ? this.buf[index] : undefined;
  }

  push(byte: number): void {
    this.reserve(1);
    this.buf[this.len++] = byte & 0xff;
  }

  write(bytes: Uint8Array | readonly number[]): void {
    this.reserve(bytes.length);
    this.buf.set(bytes, this.len);
    this.len += bytes.length;
  }

  writeAscii(text: string): void {
    this.write(ascii(text));
  }

  /** Overwrite bytes already written, starting at `offset`. */
  patch(offset: number, bytes: Uint8Array | readonly number[]): void {
    if (offset < 0 || offset + bytes.length > this.len) {
      throw new RangeError(
        `patch [${offset}, ${offset + bytes.length}) outside output of ${this.len} bytes`
      );
    }
    this.buf.set(bytes, offset);
  }

  truncate(length: number): void {
    this.len = Math.max(0, Math.min(this.len, length));
  }

  clear(): void {
    this.len = 0;
  }

  slice(start: number, end: number = this.len): Uint8Array {
    return this.buf.slice(Math.max(0, start), Math.min(end, this.len));
  }

  toUint8Array(): Uint8Array {
    return this.buf.slice(0, this.len);
  }

  private reserve(extra: number): void {
    const needed = this.len + extra;
    if (needed <= this.buf.length) return;
    let capacity = this.buf.length * 2;
    while (capacity < needed) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buf.subarray(0, this.len));
    this.buf = next;
  }
}
