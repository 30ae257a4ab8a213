import { describe, expect, it } from "vitest";
import { BufferLimitError, IoError } from "../errors.js";
import { RefillBuffer } from "./buffer.js";
import { MemorySource, type ByteSource } from "./sources.js";

const text = (buffer: RefillBuffer): string =>
  Buffer.from(buffer.slice(buffer.start, buffer.end)).toString("utf8");

describe("RefillBuffer", () => {
  it("compacts the consumed prefix before growing", () => {
    const buffer = new RefillBuffer(new MemorySource("abcdefgh", 3), {
      initialCapacity: 4,
      maxCapacity: 16,
    });

    expect(buffer.ensure(2)).toBe(true);
    expect(text(buffer)).toBe("abc");

    buffer.advance(2);
    expect(buffer.position).toBe(2);

    expect(buffer.ensure(4)).toBe(true);
    expect(text(buffer)).toBe("cdef");
    expect(buffer.capacity).toBe(4);
    expect(buffer.start).toBe(0);
    expect(buffer.position).toBe(2);

    expect(buffer.ensure(6)).toBe(true);
    expect(text(buffer)).toBe("cdefgh");
    expect(buffer.capacity).toBe(8);
    expect(buffer.peakCapacity).toBe(8);
    expect(buffer.offsetAt(buffer.end)).toBe(8);
  });

  it("reports end of input without losing buffered bytes", () => {
    const buffer = new RefillBuffer(new MemorySource("xyz"), { initialCapacity: 8, maxCapacity: 8 });

    expect(buffer.ensure(5)).toBe(false);
    expect(buffer.ended).toBe(true);
    expect(buffer.available).toBe(3);
    expect(text(buffer)).toBe("xyz");
  });

  it("refuses to grow past the maximum capacity", () => {
    const buffer = new RefillBuffer(new MemorySource("x".repeat(20)), {
      initialCapacity: 4,
      maxCapacity: 8,
    });

    expect(() => buffer.ensure(9)).toThrow(BufferLimitError);
    expect(() => buffer.ensure(9)).toThrow(
      "Token exceeds the maximum buffer capacity of 8 bytes at byte 0"
    );
  });

  it("lets lookahead bytes pass the maximum capacity", () => {
    const buffer = new RefillBuffer(new MemorySource("x".repeat(20)), {
      initialCapacity: 8,
      maxCapacity: 8,
    });

    expect(buffer.ensure(9, 1)).toBe(true);
    expect(buffer.capacity).toBe(9);
    expect(() => buffer.ensure(10, 1)).toThrow(BufferLimitError);
  });

  it("wraps source failures as I/O errors", () => {
    const cause = new Error("disk gone");
    const failing: ByteSource = {
      read() {
        throw cause;
      },
    };
    const buffer = new RefillBuffer(failing, { initialCapacity: 4, maxCapacity: 4 });

    let error: unknown;
    try {
      buffer.ensure(1);
    } catch (caught) {
      error = caught;
    }

    if (!(error instanceof IoError)) {
      throw new Error("Expected an IoError");
    }
    expect(error.kind).toBe("io");
    expect(error.code).toBe("io-failure");
    expect(error.message).toBe("Failed to read input: disk gone");
    expect(error.cause).toBe(cause);
  });

  it("rejects impossible read counts", () => {
    const lying: ByteSource = { read: () => 99 };
    const buffer = new RefillBuffer(lying, { initialCapacity: 4, maxCapacity: 4 });

    expect(() => buffer.ensure(1)).toThrow("Byte source returned an invalid count: 99");
  });

  it("does not advance past the buffered window", () => {
    const buffer = new RefillBuffer(new MemorySource("ab"), { initialCapacity: 4, maxCapacity: 4 });
    buffer.ensure(2);

    expect(() => buffer.advance(3)).toThrow(RangeError);
  });
});
