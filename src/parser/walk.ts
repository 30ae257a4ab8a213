import type { ByteSource } from "../io/sources.js";
import type { ParserOptions } from "../options.js";
import type { ArrayCursor, ObjectCursor } from "./cursors.js";
import { Parser } from "./parser.js";
import type { JsonValue } from "./value.js";
import type { NumberView, StringView } from "./views.js";

/**
 * Receives a depth-first token stream. Views passed to `stringValue` and
 * `numberValue` are only readable during the call.
 */
export interface TokenSink {
  startObject(): void;
  endObject(): void;
  startArray(): void;
  endArray(): void;
  key(name: string): void;
  stringValue(value: StringView): void;
  numberValue(value: NumberView): void;
  booleanValue(value: boolean): void;
  nullValue(): void;
}

type OpenContainer = { type: "array"; cursor: ArrayCursor } | { type: "object"; cursor: ObjectCursor };

const emitValue = (value: JsonValue, sink: TokenSink): OpenContainer | undefined => {
  switch (value.type) {
    case "null":
      sink.nullValue();
      return undefined;
    case "boolean":
      sink.booleanValue(value.value);
      return undefined;
    case "number":
      sink.numberValue(value.value);
      return undefined;
    case "string":
      sink.stringValue(value.value);
      return undefined;
    case "array":
      sink.startArray();
      return { type: "array", cursor: value.value };
    case "object":
      sink.startObject();
      return { type: "object", cursor: value.value };
  }
};

/** Feeds one value, and everything inside it, to `sink`. */
export const walkValue = (value: JsonValue, sink: TokenSink): void => {
  // Cursors of the containers still open, outermost first.
  const open: OpenContainer[] = [];
  let pending: JsonValue | undefined = value;

  for (;;) {
    if (pending !== undefined) {
      const container = emitValue(pending, sink);
      if (container) {
        open.push(container);
      }
      pending = undefined;
    }

    const current = open.at(-1);
    if (!current) {
      return;
    }

    if (current.type === "array") {
      pending = current.cursor.next();
      if (pending === undefined) {
        open.pop();
        sink.endArray();
      }
    } else {
      const entry = current.cursor.next();
      if (entry === undefined) {
        open.pop();
        sink.endObject();
      } else {
        sink.key(entry.key);
        pending = entry.value;
      }
    }
  }
};

/** Walks every top-level value; returns how many there were. */
export const walkDocuments = (parser: Parser, sink: TokenSink): number => {
  let count = 0;
  for (let value = parser.next(); value !== undefined; value = parser.next()) {
    walkValue(value, sink);
    count += 1;
  }
  return count;
};

export type JsonData = null | boolean | number | string | JsonData[] | { [key: string]: JsonData };

type Container = { value: JsonData[] } | { value: { [key: string]: JsonData }; key: string };

/**
 * Builds plain values from the token stream, with the same results as
 * `JSON.parse`: later duplicate keys win and `__proto__` is an ordinary key.
 */
export class TreeBuilder implements TokenSink {
  readonly documents: JsonData[] = [];
  private readonly containers: Container[] = [];

  startObject(): void {
    const value: { [key: string]: JsonData } = {};
    this.attach(value);
    this.containers.push({ value, key: "" });
  }

  endObject(): void {
    this.close();
  }

  startArray(): void {
    const value: JsonData[] = [];
    this.attach(value);
    this.containers.push({ value });
  }

  endArray(): void {
    this.close();
  }

  key(name: string): void {
    const container = this.containers.at(-1);
    if (!container || !("key" in container)) {
      throw new Error("Key outside of an object");
    }
    container.key = name;
  }

  stringValue(value: StringView): void {
    this.attach(value.read());
  }

  numberValue(value: NumberView): void {
    this.attach(value.read());
  }

  booleanValue(value: boolean): void {
    this.attach(value);
  }

  nullValue(): void {
    this.attach(null);
  }

  private close(): void {
    if (!this.containers.pop()) {
      throw new Error("Unbalanced container");
    }
  }

  private attach(value: JsonData): void {
    const container = this.containers.at(-1);
    if (!container) {
      this.documents.push(value);
    } else if ("key" in container) {
      Object.defineProperty(container.value, container.key, {
        value,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    } else {
      container.value.push(value);
    }
  }
}

/** Decodes `value` completely into plain data. */
export const materialize = (value: JsonValue): JsonData => {
  const builder = new TreeBuilder();
  walkValue(value, builder);
  return builder.documents[0];
};

/** Decodes every top-level value from `source`. */
export const readDocuments = (source: ByteSource, options?: ParserOptions): JsonData[] => {
  const parser = new Parser(source, options);
  try {
    const builder = new TreeBuilder();
    walkDocuments(parser, builder);
    return builder.documents;
  } finally {
    parser.close();
  }
};
