export type ErrorKind = "io" | "lexical" | "structural" | "expired" | "range" | "limit";

export type LexicalCode =
  | "unexpected-byte"
  | "unexpected-eof"
  | "invalid-escape"
  | "invalid-utf8"
  | "control-character"
  | "invalid-number"
  | "invalid-literal";

export type StructuralCode =
  | "unexpected-token"
  | "unexpected-eof"
  | "missing-comma"
  | "trailing-comma"
  | "missing-colon"
  | "expected-key"
  | "trailing-content"
  | "depth-exceeded";

export type ErrorCode =
  | LexicalCode
  | StructuralCode
  | "io-failure"
  | "closed"
  | "view-expired"
  | "cursor-expired"
  | "out-of-range"
  | "not-an-integer"
  | "buffer-limit";

const describeOffset = (message: string, offset?: number): string =>
  offset === undefined ? message : `${message} at byte ${offset}`;

/**
 * Base class of every error raised by the decoder.
 *
 * `offset` is the absolute byte offset in the input where the problem was
 * detected, when one applies.
 */
export class JsonPullError extends Error {
  constructor(
    readonly kind: ErrorKind,
    readonly code: ErrorCode,
    message: string,
    readonly offset?: number,
    options?: ErrorOptions
  ) {
    super(describeOffset(message, offset), options);
    this.name = new.target.name;
  }
}

/** A failure reported by the byte source, or use of a closed parser. */
export class IoError extends JsonPullError {
  constructor(message: string, options?: ErrorOptions & { code?: "io-failure" | "closed" }) {
    super("io", options?.code ?? "io-failure", message, undefined, options);
  }
}

export class LexicalError extends JsonPullError {
  constructor(code: LexicalCode, message: string, offset: number) {
    super("lexical", code, message, offset);
  }
}

export class StructuralError extends JsonPullError {
  constructor(code: StructuralCode, message: string, offset: number) {
    super("structural", code, message, offset);
  }
}

/** A view or cursor was used after the parser advanced past it. */
export class ExpiredError extends JsonPullError {
  constructor(code: "view-expired" | "cursor-expired", message: string) {
    super("expired", code, message);
  }
}

export class NumberRangeError extends JsonPullError {
  constructor(code: "out-of-range" | "not-an-integer", message: string) {
    super("range", code, message);
  }
}

/** A single token needs more buffer than `maxBufferCapacity` allows. */
export class BufferLimitError extends JsonPullError {
  constructor(message: string, offset: number) {
    super("limit", "buffer-limit", message, offset);
  }
}
