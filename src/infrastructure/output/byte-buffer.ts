import type { ByteSink } from '../../ports/output';

const DEFAULT_INITIAL_CAPACITY = 1024;

const textDecoder = new TextDecoder();

/**
 * Growable in-memory byte sink.
 *
 * Capacity doubles whenever a write does not fit, so appending n bytes
 * costs amortized O(n).
 *
 * @example
 * ```ts
 * const buffer = new ByteBuffer();
 * encoder.encodeInto(form, boundary, buffer);
 * await fetch(url, { method: 'POST', body: buffer.toBytes(), headers });
 * ```
 */
export class ByteBuffer implements ByteSink {
  private bytes: Uint8Array;
  private size = 0;

  constructor(initialCapacity: number = DEFAULT_INITIAL_CAPACITY) {
    if (!Number.isSafeInteger(initialCapacity) || initialCapacity < 0) {
      throw new RangeError('Initial capacity must be a non-negative safe integer');
    }
    this.bytes = new Uint8Array(initialCapacity);
  }

  /** Number of bytes written */
  get length(): number {
    return this.size;
  }

  /** Bytes that fit before the next reallocation */
  get capacity(): number {
    return this.bytes.length;
  }

  write(chunk: Uint8Array): void {
    this.ensureCapacity(this.size + chunk.length);
    this.bytes.set(chunk, this.size);
    this.size += chunk.length;
  }

  /**
   * Copy of the written bytes.
   */
  toBytes(): Uint8Array {
    return this.bytes.slice(0, this.size);
  }

  /**
   * Written bytes decoded as UTF-8. Invalid sequences become U+FFFD.
   */
  toString(): string {
    return textDecoder.decode(this.bytes.subarray(0, this.size));
  }

  /**
   * Forget the written bytes, keeping the allocated capacity.
   */
  clear(): void {
    this.size = 0;
  }

  private ensureCapacity(required: number): void {
    if (required <= this.bytes.length) {
      return;
    }
    let capacity = Math.max(this.bytes.length, 1);
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.bytes.subarray(0, this.size));
    this.bytes = grown;
  }
}
