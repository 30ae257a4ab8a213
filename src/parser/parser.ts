import { ExpiredError, IoError, LexicalError, StructuralError, type StructuralCode } from "../errors.js";
import { RefillBuffer } from "../io/buffer.js";
import { MemorySource, type ByteSource } from "../io/sources.js";
import { resolveOptions, type ParserOptions, type ResolvedParserOptions } from "../options.js";
import { ContextStack, Expect, FrameKind, ROOT_SERIAL, type Frame } from "./context.js";
import { ArrayCursor, ObjectCursor, type CursorHost } from "./cursors.js";
import {
  FALSE_BYTES,
  NULL_BYTES,
  ScanStatus,
  TRUE_BYTES,
  createLiteralScanState,
  createNumberScanState,
  createStringScanState,
  scanLiteral,
  scanNumber,
  scanString,
  type ScanResult,
} from "./scanner.js";
import { Byte, TokenType, isDigit, isWhitespace, type PunctuationType, type Token } from "./tokens.js";
import type { JsonValue, ObjectEntry } from "./value.js";
import { NumberView, StringView, decodeString, type ViewOwner } from "./views.js";

const PUNCTUATION: Partial<Record<TokenType, string>> = {
  [TokenType.BeginObject]: "{",
  [TokenType.EndObject]: "}",
  [TokenType.BeginArray]: "[",
  [TokenType.EndArray]: "]",
  [TokenType.Comma]: ",",
  [TokenType.Colon]: ":",
};

const describeByte = (b: number): string =>
  b > 0x20 && b < 0x7f ? `'${String.fromCharCode(b)}'` : `0x${b.toString(16).padStart(2, "0")}`;

const isValueStart = (token: Token): boolean =>
  token.type === TokenType.BeginObject ||
  token.type === TokenType.BeginArray ||
  token.type === TokenType.String ||
  token.type === TokenType.Number ||
  token.type === TokenType.True ||
  token.type === TokenType.False ||
  token.type === TokenType.Null;

/**
 * Pull parser over a {@link ByteSource}.
 *
 * `next()` returns the next top-level value, or undefined at the end of
 * input. Arrays and objects come back as cursors that pull their children
 * through this same parser; strings and numbers come back as views into the
 * buffer. Every call that moves the parser forward invalidates the views
 * handed out before it, and advancing at one depth first skips whatever is
 * left of deeper containers.
 *
 * The grammar is driven by an explicit frame stack, so nesting depth costs
 * heap frames (capped by `maxDepth`) and never call stack.
 *
 * After any error raised while advancing, the parser is poisoned and keeps
 * rethrowing that error.
 */
export class Parser implements CursorHost, ViewOwner, Iterable<JsonValue> {
  private readonly options: ResolvedParserOptions;
  private readonly buffer: RefillBuffer;
  private readonly stack: ContextStack;
  private epoch = 0;
  private failed = false;
  private failure: unknown;
  private closed = false;
  private topLevelValues = 0;

  constructor(
    private readonly source: ByteSource,
    options: ParserOptions = {}
  ) {
    this.options = resolveOptions(options);
    this.buffer = new RefillBuffer(source, {
      initialCapacity: this.options.initialBufferCapacity,
      maxCapacity: this.options.maxBufferCapacity,
    });
    this.stack = new ContextStack(this.options.maxDepth);
  }

  static from(input: string | Uint8Array, options?: ParserOptions): Parser {
    return new Parser(new MemorySource(input), options);
  }

  /** Bumped by every call that advances the parser. */
  get generation(): number {
    return this.epoch;
  }

  get bytes(): Uint8Array {
    return this.buffer.bytes;
  }

  /** Number of containers currently open. */
  get depth(): number {
    return this.stack.depth;
  }

  /** Absolute byte offset of the next unconsumed byte. */
  get position(): number {
    return this.buffer.position;
  }

  get bufferCapacity(): number {
    return this.buffer.capacity;
  }

  get peakBufferCapacity(): number {
    return this.buffer.peakCapacity;
  }

  get poisoned(): boolean {
    return this.failed;
  }

  next(): JsonValue | undefined {
    return this.nextElement(0, ROOT_SERIAL);
  }

  *values(): Generator<JsonValue, void, undefined> {
    for (let value = this.next(); value !== undefined; value = this.next()) {
      yield value;
    }
  }

  [Symbol.iterator](): Generator<JsonValue, void, undefined> {
    return this.values();
  }

  /** Releases the source. Later reads fail; open cursors can still be disposed. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.epoch += 1;
    if (!this.failed) {
      this.failed = true;
      this.failure = new IoError("Parser is closed", { code: "closed" });
    }
    this.source.close?.();
  }

  /** @internal */
  nextElement(depth: number, serial: number): JsonValue | undefined {
    return this.advanceAs(depth, serial, () => {
      const token = depth === 0 ? this.advanceRoot() : this.advanceArray(this.innermost(FrameKind.Array));
      return token === undefined ? undefined : this.toValue(token);
    });
  }

  /** @internal */
  nextEntry(depth: number, serial: number): ObjectEntry | undefined {
    return this.advanceAs(depth, serial, () => {
      const entry = this.advanceObject(this.innermost(FrameKind.Object), true);
      return entry === undefined ? undefined : { key: entry.key, value: this.toValue(entry.token) };
    });
  }

  /** @internal */
  skipContainer(depth: number, serial: number): void {
    if (this.failed || !this.stack.holds(depth, serial)) {
      return;
    }
    this.advanceAs(depth, serial, () => this.skipTo(depth - 1));
  }

  private advanceAs<T>(depth: number, serial: number, step: () => T): T {
    if (this.failed) {
      throw this.failure;
    }
    if (!this.stack.holds(depth, serial)) {
      throw new ExpiredError("cursor-expired", "Cursor used after the parser moved past its container");
    }
    this.epoch += 1;
    try {
      this.skipTo(depth);
      return step();
    } catch (error) {
      this.failed = true;
      this.failure = error;
      throw error;
    }
  }

  private innermost(kind: FrameKind): Frame {
    const frame = this.stack.top();
    if (!frame || frame.kind !== kind) {
      throw new Error("Cursor does not match the innermost open container");
    }
    return frame;
  }

  // Consumes deeper containers without decoding them. Runs the same
  // transitions as normal reads, so skipped input is still checked.
  private skipTo(depth: number): void {
    for (let frame = this.stack.top(); frame && this.stack.depth > depth; frame = this.stack.top()) {
      if (frame.kind === FrameKind.Array) {
        this.advanceArray(frame);
      } else {
        this.advanceObject(frame, false);
      }
    }
  }

  private advanceRoot(): Token | undefined {
    const token = this.readToken();
    if (token.type === TokenType.End) {
      return undefined;
    }
    if (this.topLevelValues > 0 && !this.options.multipleValues) {
      throw new StructuralError("trailing-content", "Unexpected content after the top-level value", token.offset);
    }
    this.topLevelValues += 1;
    return this.openValue(token);
  }

  private advanceArray(frame: Frame): Token | undefined {
    let token = this.readToken();
    if (frame.expect === Expect.ArrayAfterValue) {
      if (token.type === TokenType.EndArray) {
        this.stack.pop();
        return undefined;
      }
      if (token.type !== TokenType.Comma) {
        throw this.afterValueError(token, "Expected ',' or ']' after array element");
      }
      token = this.readToken();
      if (token.type === TokenType.EndArray) {
        throw new StructuralError("trailing-comma", "Trailing comma in array", token.offset);
      }
    } else if (token.type === TokenType.EndArray) {
      this.stack.pop();
      return undefined;
    }
    frame.expect = Expect.ArrayAfterValue;
    return this.openValue(token);
  }

  /** `key` is only decoded when asked for; skipping passes false and gets "". */
  private advanceObject(frame: Frame, decodeKey: boolean): { key: string; token: Token } | undefined {
    let token = this.readToken();
    if (frame.expect === Expect.AfterValue) {
      if (token.type === TokenType.EndObject) {
        this.stack.pop();
        return undefined;
      }
      if (token.type !== TokenType.Comma) {
        throw this.afterValueError(token, "Expected ',' or '}' after object value");
      }
      token = this.readToken();
      if (token.type === TokenType.EndObject) {
        throw new StructuralError("trailing-comma", "Trailing comma in object", token.offset);
      }
    } else if (token.type === TokenType.EndObject) {
      this.stack.pop();
      return undefined;
    }

    if (token.type !== TokenType.String) {
      throw this.structural(token, "expected-key", "Expected a string key");
    }
    frame.expect = Expect.ObjectAfterKey;
    const key = decodeKey ? decodeString(this.buffer.bytes, token.start, token.end, token.escaped) : "";

    const colon = this.readToken();
    if (colon.type !== TokenType.Colon) {
      throw this.structural(colon, "missing-colon", "Expected ':' after object key");
    }
    frame.expect = Expect.ObjectValueStart;

    const value = this.readToken();
    frame.expect = Expect.AfterValue;
    return { key, token: this.openValue(value) };
  }

  private openValue(token: Token): Token {
    switch (token.type) {
      case TokenType.BeginObject:
        this.stack.push(FrameKind.Object, token.offset);
        return token;
      case TokenType.BeginArray:
        this.stack.push(FrameKind.Array, token.offset);
        return token;
      case TokenType.String:
      case TokenType.Number:
      case TokenType.True:
      case TokenType.False:
      case TokenType.Null:
        return token;
      default:
        throw this.structural(token, "unexpected-token", `Unexpected '${PUNCTUATION[token.type]}' where a value was expected`);
    }
  }

  private toValue(token: Token): JsonValue {
    switch (token.type) {
      case TokenType.BeginObject:
        return { type: "object", value: new ObjectCursor(this, this.stack.depth, this.topSerial()) };
      case TokenType.BeginArray:
        return { type: "array", value: new ArrayCursor(this, this.stack.depth, this.topSerial()) };
      case TokenType.String:
        return { type: "string", value: new StringView(this, token.start, token.end, token.escaped, this.epoch) };
      case TokenType.Number:
        return { type: "number", value: new NumberView(this, token.start, token.end, this.epoch) };
      case TokenType.True:
        return { type: "boolean", value: true };
      case TokenType.False:
        return { type: "boolean", value: false };
      case TokenType.Null:
        return { type: "null", value: null };
      default:
        throw new Error(`Token ${TokenType[token.type]} is not a value`);
    }
  }

  private topSerial(): number {
    return this.stack.top()?.serial ?? ROOT_SERIAL;
  }

  private afterValueError(token: Token, message: string): StructuralError {
    return this.structural(token, isValueStart(token) ? "missing-comma" : "unexpected-token", message);
  }

  private structural(token: Token, code: StructuralCode, message: string): StructuralError {
    if (token.type === TokenType.End) {
      return new StructuralError("unexpected-eof", "Unexpected end of input", token.offset);
    }
    return new StructuralError(code, message, token.offset);
  }

  private readToken(): Token {
    const buffer = this.buffer;
    for (;;) {
      if (buffer.available === 0 && !buffer.ensure(1)) {
        return { type: TokenType.End, offset: buffer.position };
      }
      const bytes = buffer.bytes;
      const end = buffer.end;
      let i = buffer.start;
      while (i < end && isWhitespace(bytes[i])) {
        i += 1;
      }
      buffer.advance(i - buffer.start);
      if (i < end) {
        break;
      }
    }

    const offset = buffer.position;
    const b = buffer.bytes[buffer.start];
    switch (b) {
      case Byte.OpenBrace:
        return this.punctuation(TokenType.BeginObject, offset);
      case Byte.CloseBrace:
        return this.punctuation(TokenType.EndObject, offset);
      case Byte.OpenBracket:
        return this.punctuation(TokenType.BeginArray, offset);
      case Byte.CloseBracket:
        return this.punctuation(TokenType.EndArray, offset);
      case Byte.Comma:
        return this.punctuation(TokenType.Comma, offset);
      case Byte.Colon:
        return this.punctuation(TokenType.Colon, offset);
      case Byte.Quote:
        return this.readString(offset);
      case Byte.LowerT:
        return this.readLiteral(TokenType.True, TRUE_BYTES, offset);
      case Byte.LowerF:
        return this.readLiteral(TokenType.False, FALSE_BYTES, offset);
      case Byte.LowerN:
        return this.readLiteral(TokenType.Null, NULL_BYTES, offset);
      default:
        if (b === Byte.Minus || isDigit(b)) {
          return this.readNumber(offset);
        }
        throw new LexicalError("unexpected-byte", `Unexpected byte ${describeByte(b)}`, offset);
    }
  }

  private punctuation(type: PunctuationType, offset: number): Token {
    this.buffer.advance(1);
    return { type, offset };
  }

  // Runs a scanner until the token is complete, refilling in between. The
  // scanner keeps its own progress, so each refill resumes where it stopped.
  // Numbers and literals end one byte before a delimiter, which `lookahead`
  // keeps out of the token size limit.
  private scan(
    run: (bytes: Uint8Array, start: number, end: number, eof: boolean) => ScanResult,
    lookahead: number
  ): number {
    const buffer = this.buffer;
    for (;;) {
      const result = run(buffer.bytes, buffer.start, buffer.end, buffer.ended);
      if (result.status === ScanStatus.Complete) {
        return result.length;
      }
      if (result.status === ScanStatus.Invalid) {
        throw new LexicalError(result.code, result.message, buffer.position + result.at);
      }
      buffer.ensure(buffer.available + 1, lookahead);
    }
  }

  private readString(offset: number): Token {
    const state = createStringScanState();
    const length = this.scan((bytes, start, end, eof) => scanString(bytes, start, end, eof, state), 0);
    const start = this.buffer.start;
    this.buffer.advance(length);
    return { type: TokenType.String, offset, start: start + 1, end: start + length - 1, escaped: state.escaped };
  }

  private readNumber(offset: number): Token {
    const state = createNumberScanState();
    const length = this.scan((bytes, start, end, eof) => scanNumber(bytes, start, end, eof, state), 1);
    const start = this.buffer.start;
    this.buffer.advance(length);
    return { type: TokenType.Number, offset, start, end: start + length };
  }

  private readLiteral(
    type: TokenType.True | TokenType.False | TokenType.Null,
    keyword: Uint8Array,
    offset: number
  ): Token {
    const state = createLiteralScanState();
    this.buffer.advance(
      this.scan((bytes, start, end, eof) => scanLiteral(bytes, start, end, eof, state, keyword), 1)
    );
    return { type, offset };
  }
}
