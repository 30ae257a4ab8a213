import type { ArrayCursor, ObjectCursor } from "./cursors.js";
import type { NumberView, StringView } from "./views.js";

/**
 * One decoded value. Scalars carry their data (numbers and strings as lazy
 * views); containers carry a cursor bound to the parser.
 */
export type JsonValue =
  | { type: "null"; value: null }
  | { type: "boolean"; value: boolean }
  | { type: "number"; value: NumberView }
  | { type: "string"; value: StringView }
  | { type: "array"; value: ArrayCursor }
  | { type: "object"; value: ObjectCursor };

export type JsonValueType = JsonValue["type"];

export type ObjectEntry = {
  key: string;
  value: JsonValue;
};
