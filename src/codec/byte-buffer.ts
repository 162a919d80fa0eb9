/**
 * Growable byte accumulator for stream decoders.
 *
 * Appends copy into spare capacity; consumed bytes are dropped from the
 * front by advancing an offset, and compacted on the next append.
 */
export class ByteBuffer {
  private bytes: Uint8Array = new Uint8Array(0);
  private start = 0;
  private end = 0;

  get length(): number {
    return this.end - this.start;
  }

  append(chunk: Uint8Array): void {
    if (chunk.length === 0) return;

    if (this.end + chunk.length > this.bytes.length) {
      const live = this.length;
      const capacity = Math.max(live + chunk.length, this.bytes.length * 2, 256);
      const grown = new Uint8Array(capacity);
      grown.set(this.bytes.subarray(this.start, this.end), 0);
      this.bytes = grown;
      this.start = 0;
      this.end = live;
    }

    this.bytes.set(chunk, this.end);
    this.end += chunk.length;
  }

  /** Byte at offset `index` from the unconsumed start. */
  at(index: number): number {
    return this.bytes[this.start + index];
  }

  /** Offset of the first `byte` at or after `from`, or -1. */
  indexOf(byte: number, from = 0): number {
    return this.bytes.subarray(this.start, this.end).indexOf(byte, from);
  }

  /** Remove and return the first `count` bytes (copied). */
  take(count: number): Uint8Array {
    const n = Math.min(count, this.length);
    const out = this.bytes.slice(this.start, this.start + n);
    this.start += n;
    if (this.start === this.end) {
      this.start = 0;
      this.end = 0;
    }
    return out;
  }

  /** Drop the first `count` bytes without copying them out. */
  skip(count: number): void {
    this.start = Math.min(this.start + count, this.end);
    if (this.start === this.end) {
      this.start = 0;
      this.end = 0;
    }
  }

  takeAll(): Uint8Array {
    return this.take(this.length);
  }
}
