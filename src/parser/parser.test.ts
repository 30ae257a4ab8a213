import { describe, expect, it } from "vitest";
import { ExpiredError, IoError, JsonPullError, LexicalError, StructuralError } from "../errors.js";
import { MemorySource } from "../io/sources.js";
import { Parser } from "./parser.js";
import type { JsonValue } from "./value.js";
import { readDocuments } from "./walk.js";

const failureOf = (run: () => unknown): JsonPullError => {
  try {
    run();
  } catch (error) {
    if (error instanceof JsonPullError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a decoding failure");
};

const scalar = (value: JsonValue | undefined): unknown => {
  if (value === undefined) {
    return undefined;
  }
  switch (value.type) {
    case "number":
    case "string":
      return value.value.read();
    case "boolean":
    case "null":
      return value.value;
    default:
      return value.type;
  }
};

describe("Parser", () => {
  it("pulls a nested document step by step", () => {
    const parser = Parser.from('{"a":[1,2,{"b":"x\\u00e9"}],"c":null}');

    const root = parser.next();
    if (root?.type !== "object") throw new Error("Expected an object");
    const object = root.value;

    const a = object.next();
    expect(a?.key).toBe("a");
    if (a?.value.type !== "array") throw new Error("Expected an array");
    const array = a.value.value;

    expect(scalar(array.next())).toBe(1);
    expect(scalar(array.next())).toBe(2);

    const inner = array.next();
    if (inner?.type !== "object") throw new Error("Expected an object");
    const b = inner.value.next();
    expect(b?.key).toBe("b");
    expect(scalar(b?.value)).toBe("xé");
    expect(inner.value.next()).toBeUndefined();

    expect(array.next()).toBeUndefined();

    const c = object.next();
    expect(c?.key).toBe("c");
    expect(c?.value).toEqual({ type: "null", value: null });
    expect(object.next()).toBeUndefined();

    expect(parser.next()).toBeUndefined();
    expect(parser.depth).toBe(0);
  });

  it("reads whitespace-separated top-level scalars", () => {
    const seen: unknown[] = [];
    for (const value of Parser.from("null true false 0 1 -2 6.28")) {
      seen.push(scalar(value));
    }

    expect(seen).toEqual([null, true, false, 0, 1, -2, 6.28]);
  });

  it("reads empty containers", () => {
    expect(readDocuments(new MemorySource("{ } [ ]"))).toEqual([{}, []]);
  });

  it("skips unread values when the parent moves on", () => {
    const parser = Parser.from('{"a" : 2, "b":[3, 4], "c": false}');
    const root = parser.next();
    if (root?.type !== "object") throw new Error("Expected an object");

    const keys: string[] = [];
    const values: unknown[] = [];
    for (let entry = root.value.next(); entry !== undefined; entry = root.value.next()) {
      keys.push(entry.key);
      values.push(entry.value.type === "boolean" || entry.value.type === "number" ? scalar(entry.value) : entry.value.type);
    }

    expect(keys).toEqual(["a", "b", "c"]);
    expect(values).toEqual([2, "array", false]);
  });

  it("tracks the position of the next unread byte", () => {
    const parser = Parser.from("[1, 2]  ");
    const root = parser.next();
    expect(parser.position).toBe(1);
    if (root?.type !== "array") throw new Error("Expected an array");
    root.value.next();
    expect(parser.position).toBe(2);
    root.value.dispose();
    expect(parser.position).toBe(6);
  });

  it("accepts bytes as input", () => {
    expect(scalar(Parser.from(new TextEncoder().encode('"ok"')).next())).toBe("ok");
  });

  describe("errors", () => {
    it.each([
      ["[1 2]", "missing-comma", 3],
      ["[1,]", "trailing-comma", 3],
      ['{"a":1,}', "trailing-comma", 7],
      ['{"a" 1}', "missing-colon", 5],
      ["{1:2}", "expected-key", 1],
      ["[:]", "unexpected-token", 1],
      ["[1}", "unexpected-token", 2],
      ['{"a":', "unexpected-eof", 5],
      ["[1, 2", "unexpected-eof", 5],
    ])("reports %j as a structural error", (input, code, offset) => {
      const error = failureOf(() => readDocuments(new MemorySource(input)));

      expect(error).toBeInstanceOf(StructuralError);
      expect(error.code).toBe(code);
      expect(error.offset).toBe(offset);
    });

    it.each([
      ["nul", "unexpected-eof", 3],
      ["trxu false", "invalid-literal", 2],
      ["potato", "unexpected-byte", 0],
      ["// comment", "unexpected-byte", 0],
      ["{'a':1}", "unexpected-byte", 1],
      ['["tab\there"]', "control-character", 5],
      ["[01]", "invalid-number", 2],
      ['"open', "unexpected-eof", 5],
    ])("reports %j as a lexical error", (input, code, offset) => {
      const error = failureOf(() => readDocuments(new MemorySource(input)));

      expect(error).toBeInstanceOf(LexicalError);
      expect(error.code).toBe(code);
      expect(error.offset).toBe(offset);
    });

    it("includes the offset in the message", () => {
      expect(() => readDocuments(new MemorySource('{"a":'))).toThrow("Unexpected end of input at byte 5");
      expect(() => readDocuments(new MemorySource("potato"))).toThrow("Unexpected byte 'p' at byte 0");
    });

    it("rejects invalid UTF-8 inside strings", () => {
      const error = failureOf(() => readDocuments(new MemorySource(Uint8Array.from([0x22, 0xff, 0x22]))));

      expect(error.code).toBe("invalid-utf8");
      expect(error.offset).toBe(1);
    });

    it("keeps failing with the same error once poisoned", () => {
      const parser = Parser.from("[1 2] 3");
      const root = parser.next();
      if (root?.type !== "array") throw new Error("Expected an array");
      expect(scalar(root.value.next())).toBe(1);

      const error = failureOf(() => root.value.next());
      expect(error.code).toBe("missing-comma");
      expect(parser.poisoned).toBe(true);

      expect(() => parser.next()).toThrow(error);
      expect(failureOf(() => parser.next())).toBe(error);
      expect(failureOf(() => root.value.next())).toBe(error);
      expect(() => root.value.dispose()).not.toThrow();
    });

    it("rejects a second top-level value when only one is allowed", () => {
      const parser = Parser.from("1 2", { multipleValues: false });
      expect(scalar(parser.next())).toBe(1);

      const error = failureOf(() => parser.next());
      expect(error.code).toBe("trailing-content");
      expect(error.offset).toBe(2);
    });

    it("allows trailing whitespace after a single value", () => {
      expect(readDocuments(new MemorySource("[1]  \n", 2), { multipleValues: false })).toEqual([[1]]);
    });
  });

  describe("depth", () => {
    it("fails when nesting exceeds the limit", () => {
      const error = failureOf(() => readDocuments(new MemorySource("[".repeat(1000))));

      expect(error).toBeInstanceOf(StructuralError);
      expect(error.code).toBe("depth-exceeded");
      expect(error.offset).toBe(512);
      expect(error.message).toBe("Maximum nesting depth of 512 exceeded at byte 512");
    });

    it("accepts nesting up to the limit", () => {
      const [document] = readDocuments(new MemorySource("[".repeat(4) + "]".repeat(4)), { maxDepth: 4 });
      expect(document).toEqual([[[[]]]]);
    });

    it("counts skipped containers too", () => {
      const parser = Parser.from('[{"a":[[0]]}]', { maxDepth: 3 });
      const root = parser.next();
      if (root?.type !== "array") throw new Error("Expected an array");

      const error = failureOf(() => root.value.dispose());
      expect(error.code).toBe("depth-exceeded");
      expect(error.offset).toBe(7);
    });

    it("does not use the call stack for deep documents", () => {
      const depth = 100_000;
      const parser = Parser.from("[".repeat(depth) + "]".repeat(depth), { maxDepth: depth });

      let value = parser.next();
      let levels = 0;
      while (value?.type === "array") {
        levels += 1;
        value = value.value.next();
      }

      expect(levels).toBe(depth);
      expect(parser.depth).toBe(depth - 1);
      expect(parser.next()).toBeUndefined();
      expect(parser.depth).toBe(0);
    });
  });

  describe("close", () => {
    it("fails later reads", () => {
      const parser = Parser.from("1 2");
      parser.next();
      parser.close();

      const error = failureOf(() => parser.next());
      expect(error).toBeInstanceOf(IoError);
      expect(error.code).toBe("closed");
    });

    it("expires outstanding views", () => {
      const parser = Parser.from('"text"');
      const value = parser.next();
      if (value?.type !== "string") throw new Error("Expected a string");
      parser.close();

      expect(() => value.value.read()).toThrow(ExpiredError);
    });

    it("keeps the first failure", () => {
      const parser = Parser.from("?");
      const error = failureOf(() => parser.next());
      parser.close();

      expect(failureOf(() => parser.next())).toBe(error);
    });
  });

  it("rejects invalid options", () => {
    expect(() => Parser.from("1", { maxDepth: 0 })).toThrow("maxDepth must be a positive integer, got 0");
    expect(() => Parser.from("1", { initialBufferCapacity: 10, maxBufferCapacity: 8 })).toThrow(
      "initialBufferCapacity (10) exceeds maxBufferCapacity (8)"
    );
  });
});
