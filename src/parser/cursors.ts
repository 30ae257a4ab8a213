import type { JsonValue, ObjectEntry } from "./value.js";

/** The parser operations a cursor delegates to. */
export interface CursorHost {
  nextElement(depth: number, serial: number): JsonValue | undefined;
  nextEntry(depth: number, serial: number): ObjectEntry | undefined;
  skipContainer(depth: number, serial: number): void;
}

abstract class ContainerCursor {
  protected done = false;

  constructor(
    protected readonly host: CursorHost,
    /** Nesting depth of this container; the top-level value opens depth 1. */
    readonly depth: number,
    protected readonly serial: number
  ) {}

  get exhausted(): boolean {
    return this.done;
  }

  /**
   * Gives up on the rest of the container. Whatever is left of it is
   * skipped without being decoded. Calling this on a finished cursor, or on
   * a parser that already failed, does nothing.
   */
  dispose(): void {
    if (this.done) {
      return;
    }
    this.done = true;
    this.host.skipContainer(this.depth, this.serial);
  }
}

export class ArrayCursor extends ContainerCursor implements Iterable<JsonValue> {
  /** The next element, or undefined once the closing `]` was read. */
  next(): JsonValue | undefined {
    if (this.done) {
      return undefined;
    }
    const value = this.host.nextElement(this.depth, this.serial);
    if (value === undefined) {
      this.done = true;
    }
    return value;
  }

  // Leaving a for-of early disposes the cursor.
  *[Symbol.iterator](): Generator<JsonValue, void, undefined> {
    try {
      for (let value = this.next(); value !== undefined; value = this.next()) {
        yield value;
      }
    } finally {
      this.dispose();
    }
  }
}

export class ObjectCursor extends ContainerCursor implements Iterable<ObjectEntry> {
  /** The next key and value, or undefined once the closing `}` was read. */
  next(): ObjectEntry | undefined {
    if (this.done) {
      return undefined;
    }
    const entry = this.host.nextEntry(this.depth, this.serial);
    if (entry === undefined) {
      this.done = true;
    }
    return entry;
  }

  /**
   * Moves forward to the first remaining entry named `key` and returns its
   * value. Entries before it are skipped; entries after it stay unread.
   */
  find(key: string): JsonValue | undefined {
    for (let entry = this.next(); entry !== undefined; entry = this.next()) {
      if (entry.key === key) {
        return entry.value;
      }
    }
    return undefined;
  }

  *[Symbol.iterator](): Generator<ObjectEntry, void, undefined> {
    try {
      for (let entry = this.next(); entry !== undefined; entry = this.next()) {
        yield entry;
      }
    } finally {
      this.dispose();
    }
  }
}
