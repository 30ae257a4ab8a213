import { describe, expect, it } from "vitest";
import { JsonAnalyzer } from "../analysis/analyzer.js";
import { BufferLimitError } from "../errors.js";
import { IterableSource, MemorySource } from "../io/sources.js";
import { Parser } from "./parser.js";
import { readDocuments, walkDocuments } from "./walk.js";

const encoder = new TextEncoder();

const DOCUMENTS = [
  '{"a":[1,2,{"b":"x\\u00e9"}],"c":null}',
  '[-12.5e+3, 0, 1E-2, true, false, null, "\\ud83d\\ude00", "tab\\there", {"nested": {"deep": [[], {}]}}]',
  '"plain string with ünïcödé and 日本語"',
  " 42 ",
  '1 "two" [3] {"four":4}',
];

const splitAt = (bytes: Uint8Array, cuts: number[]): Uint8Array[] => {
  const chunks: Uint8Array[] = [];
  let previous = 0;
  for (const cut of [...cuts, bytes.length]) {
    chunks.push(bytes.subarray(previous, cut));
    previous = cut;
  }
  return chunks;
};

const decodeChunks = (chunks: Uint8Array[]) =>
  readDocuments(new IterableSource(chunks), { initialBufferCapacity: 4 });

describe("chunk boundaries", () => {
  it.each(DOCUMENTS)("decodes %s the same at every single split point", (document) => {
    const bytes = encoder.encode(document);
    const expected = readDocuments(new MemorySource(bytes));

    for (let cut = 0; cut <= bytes.length; cut += 1) {
      expect(decodeChunks(splitAt(bytes, [cut]))).toEqual(expected);
    }
  });

  it.each(DOCUMENTS)("decodes %s the same for every fixed chunk size", (document) => {
    const bytes = encoder.encode(document);
    const expected = readDocuments(new MemorySource(bytes));

    for (let size = 1; size <= 8; size += 1) {
      const cuts: number[] = [];
      for (let cut = size; cut < bytes.length; cut += size) {
        cuts.push(cut);
      }
      expect(decodeChunks(splitAt(bytes, cuts))).toEqual(expected);
    }
  });

  it("decodes a \\u escape split in the middle", () => {
    const bytes = encoder.encode('"x\\u00e9"');
    expect(decodeChunks(splitAt(bytes, [6]))).toEqual(["xé"]);
  });

  it("decodes a number split in the middle", () => {
    const bytes = encoder.encode("[12345.678e9]");
    expect(decodeChunks(splitAt(bytes, [4, 9]))).toEqual([12345.678e9]);
  });

  it("decodes a multi-byte character split between chunks", () => {
    const bytes = encoder.encode('["é"]');
    expect(decodeChunks(splitAt(bytes, [3]))).toEqual([["é"]]);
  });

  it("reports offsets relative to the whole input", () => {
    const bytes = encoder.encode('[1, 2, 3, 4, 5, 6, 7, 8, 9, 10 11]');
    expect(() => decodeChunks(splitAt(bytes, [5, 10, 15, 20, 25, 30]))).toThrow(
      "Expected ',' or ']' after array element at byte 31"
    );
  });
});

describe("bounded memory", () => {
  it("never grows the buffer for a long document of short tokens", () => {
    const records = 50_000;
    function* chunks() {
      yield "[";
      for (let i = 0; i < records; i += 1) {
        yield `{"id":${i % 1000},"name":"abcdefgh","ok":true},`;
      }
      yield "0]";
    }

    const parser = new Parser(new IterableSource(chunks()), { initialBufferCapacity: 64, maxBufferCapacity: 64 });
    const analyzer = new JsonAnalyzer();
    walkDocuments(parser, analyzer);
    const report = analyzer.getReport();

    expect(parser.peakBufferCapacity).toBe(64);
    expect(report.tokens.objects).toBe(records);
    expect(report.tokens.numbers).toBe(records + 1);
    expect(report.strings.uniqueCount).toBe(4);
    expect(parser.position).toBeGreaterThan(records * 36);
  });

  it("grows only as far as the longest token needs", () => {
    const long = "a".repeat(1000);
    const parser = new Parser(new MemorySource(`["${long}", 1]`), {
      initialBufferCapacity: 16,
      maxBufferCapacity: 2048,
    });
    const root = parser.next();
    if (root?.type !== "array") throw new Error("Expected an array");
    const value = root.value.next();
    if (value?.type !== "string") throw new Error("Expected a string");

    expect(value.value.read()).toBe(long);
    expect(parser.peakBufferCapacity).toBeGreaterThanOrEqual(1002);
    expect(parser.peakBufferCapacity).toBeLessThanOrEqual(2048);
  });

  it.each([
    ["12345678", 8, [12345678]],
    ["[12345678]", 8, [[12345678]]],
    ["true false", 5, [true, false]],
    ["[null]", 4, [[null]]],
  ])("fits %j when its longest token matches a limit of %i bytes", (input, limit, expected) => {
    expect(
      readDocuments(new MemorySource(input), { initialBufferCapacity: limit, maxBufferCapacity: limit })
    ).toEqual(expected);
  });

  it("fails a number one byte longer than the buffer limit", () => {
    expect(() =>
      readDocuments(new MemorySource("123456789"), { initialBufferCapacity: 8, maxBufferCapacity: 8 })
    ).toThrow("Token exceeds the maximum buffer capacity of 8 bytes at byte 0");
  });

  it("fails a token larger than the buffer limit", () => {
    const input = `["${"a".repeat(1000)}"]`;
    let error: unknown;
    try {
      readDocuments(new MemorySource(input), { initialBufferCapacity: 16, maxBufferCapacity: 512 });
    } catch (caught) {
      error = caught;
    }

    expect(error).toBeInstanceOf(BufferLimitError);
    expect(error).toMatchObject({ code: "buffer-limit", offset: 1 });
  });
});
