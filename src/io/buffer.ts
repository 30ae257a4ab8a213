import { BufferLimitError, IoError } from "../errors.js";
import type { ByteSource } from "./sources.js";

export type BufferLimits = {
  initialCapacity: number;
  maxCapacity: number;
};

/**
 * Growable byte window over a {@link ByteSource}.
 *
 * Bytes in `[start, end)` are buffered but not yet consumed. Refills may drop
 * the consumed prefix and move the window to the front of the array, so
 * indexes into `bytes` are only stable until the next `ensure`. The array is
 * reallocated only when a single request is larger than the current capacity.
 */
export class RefillBuffer {
  private data: Uint8Array;
  private head = 0;
  private tail = 0;
  // Absolute input offset of data[0].
  private origin = 0;
  private exhausted = false;
  private peak: number;

  constructor(
    private readonly source: ByteSource,
    private readonly limits: BufferLimits
  ) {
    this.data = new Uint8Array(limits.initialCapacity);
    this.peak = limits.initialCapacity;
  }

  get bytes(): Uint8Array {
    return this.data;
  }

  get start(): number {
    return this.head;
  }

  get end(): number {
    return this.tail;
  }

  get available(): number {
    return this.tail - this.head;
  }

  /** True once the source has reported end of input. */
  get ended(): boolean {
    return this.exhausted;
  }

  get capacity(): number {
    return this.data.length;
  }

  get peakCapacity(): number {
    return this.peak;
  }

  /** Absolute offset of the first unconsumed byte. */
  get position(): number {
    return this.origin + this.head;
  }

  offsetAt(index: number): number {
    return this.origin + index;
  }

  slice(start: number, end: number): Uint8Array {
    return this.data.subarray(start, end);
  }

  /**
   * Makes at least `n` unconsumed bytes available. Returns false when the
   * input ends first.
   *
   * The last `lookahead` of those bytes only decide where a token ends and
   * are not part of it, so they may take the buffer past `maxCapacity`.
   */
  ensure(n: number, lookahead = 0): boolean {
    while (this.tail - this.head < n) {
      if (this.exhausted) {
        return false;
      }
      this.reserve(n, lookahead);
      this.fill();
    }
    return true;
  }

  advance(n: number): void {
    if (n < 0 || n > this.tail - this.head) {
      throw new RangeError(`Cannot advance ${n} bytes with ${this.tail - this.head} available`);
    }
    this.head += n;
  }

  private reserve(n: number, lookahead: number): void {
    const window = this.tail - this.head;
    if (this.head > 0 && (this.head >= window || this.data.length - this.head < n)) {
      this.compact();
    }
    if (this.data.length < n) {
      this.grow(n, lookahead);
    }
  }

  private compact(): void {
    this.data.copyWithin(0, this.head, this.tail);
    this.origin += this.head;
    this.tail -= this.head;
    this.head = 0;
  }

  private grow(n: number, lookahead: number): void {
    const maxCapacity = this.limits.maxCapacity;
    if (n - lookahead > maxCapacity) {
      throw new BufferLimitError(
        `Token exceeds the maximum buffer capacity of ${maxCapacity} bytes`,
        this.position
      );
    }
    const capacity = Math.min(Math.max(this.data.length * 2, n), Math.max(maxCapacity, n));
    const next = new Uint8Array(capacity);
    next.set(this.data.subarray(this.head, this.tail));
    this.origin += this.head;
    this.tail -= this.head;
    this.head = 0;
    this.data = next;
    this.peak = Math.max(this.peak, capacity);
  }

  private fill(): void {
    const space = this.data.length - this.tail;
    let count: number;
    try {
      count = this.source.read(this.data.subarray(this.tail));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new IoError(`Failed to read input: ${message}`, { cause: error });
    }
    if (!Number.isInteger(count) || count < 0 || count > space) {
      throw new IoError(`Byte source returned an invalid count: ${count}`);
    }
    if (count === 0) {
      this.exhausted = true;
      return;
    }
    this.tail += count;
  }
}
