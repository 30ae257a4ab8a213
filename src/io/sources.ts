import { closeSync, openSync, readSync } from "node:fs";

/**
 * Supplies input bytes on demand.
 *
 * `read` copies up to `target.length` bytes into the front of `target` and
 * returns how many it wrote; `0` means end of input. It may block, and it
 * reports failures by throwing.
 */
export interface ByteSource {
  read(target: Uint8Array): number;
  close?(): void;
}

const encoder = new TextEncoder();

const toBytes = (chunk: Uint8Array | string): Uint8Array =>
  typeof chunk === "string" ? encoder.encode(chunk) : chunk;

export class MemorySource implements ByteSource {
  private readonly data: Uint8Array;
  private offset = 0;

  /** `maxRead` caps the bytes handed out per call. */
  constructor(
    data: Uint8Array | string,
    private readonly maxRead = Number.POSITIVE_INFINITY
  ) {
    this.data = toBytes(data);
  }

  read(target: Uint8Array): number {
    const count = Math.min(target.length, this.data.length - this.offset, this.maxRead);
    target.set(this.data.subarray(this.offset, this.offset + count));
    this.offset += count;
    return count;
  }
}

/**
 * Serves the chunks of an iterable, one chunk (or what fits of it) per read.
 * Empty chunks are passed over so they never read as end of input.
 */
export class IterableSource implements ByteSource {
  private readonly iterator: Iterator<Uint8Array | string>;
  private pending: Uint8Array = new Uint8Array(0);
  private done = false;

  constructor(chunks: Iterable<Uint8Array | string>) {
    this.iterator = chunks[Symbol.iterator]();
  }

  read(target: Uint8Array): number {
    while (this.pending.length === 0) {
      if (this.done) {
        return 0;
      }
      const next = this.iterator.next();
      if (next.done) {
        this.done = true;
        return 0;
      }
      this.pending = toBytes(next.value);
    }

    const count = Math.min(target.length, this.pending.length);
    target.set(this.pending.subarray(0, count));
    this.pending = this.pending.subarray(count);
    return count;
  }

  close(): void {
    if (!this.done) {
      this.done = true;
      this.iterator.return?.();
    }
  }
}

const abortError = () => new Error("Operation aborted");

export class FileSource implements ByteSource {
  private fd: number | undefined;

  private constructor(
    fd: number,
    private readonly signal?: AbortSignal
  ) {
    this.fd = fd;
  }

  static open(path: string, signal?: AbortSignal): FileSource {
    if (signal?.aborted) {
      throw abortError();
    }
    return new FileSource(openSync(path, "r"), signal);
  }

  read(target: Uint8Array): number {
    if (this.signal?.aborted) {
      this.close();
      throw abortError();
    }
    if (this.fd === undefined) {
      throw new Error("File source is closed");
    }
    return readSync(this.fd, target, 0, target.length, null);
  }

  close(): void {
    if (this.fd !== undefined) {
      closeSync(this.fd);
      this.fd = undefined;
    }
  }
}
