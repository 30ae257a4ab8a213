import { ExpiredError, NumberRangeError } from "../errors.js";
import { Byte, hexValue } from "./tokens.js";

/** What a view needs from the parser that issued it. */
export interface ViewOwner {
  readonly generation: number;
  readonly bytes: Uint8Array;
}

export interface TextSink {
  write(chunk: string): unknown;
}

export const DEFAULT_CHUNK_BYTES = 16 * 1024;

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

const parseHex4 = (bytes: Uint8Array, at: number): number =>
  (hexValue(bytes[at]) << 12) |
  (hexValue(bytes[at + 1]) << 8) |
  (hexValue(bytes[at + 2]) << 4) |
  hexValue(bytes[at + 3]);

const isHighSurrogate = (unit: number): boolean => unit >= 0xd800 && unit <= 0xdbff;
const isLowSurrogate = (unit: number): boolean => unit >= 0xdc00 && unit <= 0xdfff;

/**
 * Decodes the escape starting at the backslash at `at`. A `\uXXXX` high
 * surrogate immediately followed by a low surrogate escape is decoded as one
 * pair. Escape syntax was checked by the scanner.
 */
const decodeEscape = (bytes: Uint8Array, at: number, end: number): [text: string, length: number] => {
  switch (bytes[at + 1]) {
    case Byte.Quote:
      return ['"', 2];
    case Byte.Backslash:
      return ["\\", 2];
    case Byte.Slash:
      return ["/", 2];
    case Byte.LowerB:
      return ["\b", 2];
    case Byte.LowerF:
      return ["\f", 2];
    case Byte.LowerN:
      return ["\n", 2];
    case Byte.LowerR:
      return ["\r", 2];
    case Byte.LowerT:
      return ["\t", 2];
    default: {
      const unit = parseHex4(bytes, at + 2);
      if (
        isHighSurrogate(unit) &&
        at + 12 <= end &&
        bytes[at + 6] === Byte.Backslash &&
        bytes[at + 7] === Byte.LowerU
      ) {
        const low = parseHex4(bytes, at + 8);
        if (isLowSurrogate(low)) {
          return [String.fromCharCode(unit, low), 12];
        }
      }
      return [String.fromCharCode(unit), 6];
    }
  }
};

/**
 * Decodes string content (quotes excluded) in pieces of at most `chunkBytes`
 * raw bytes. `bytesOf` is called again after every yield, since the consumer
 * may have advanced the parser in between.
 */
function* decodeSegments(
  bytesOf: () => Uint8Array,
  start: number,
  end: number,
  chunkBytes: number
): Generator<string> {
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  let bytes = bytesOf();
  let runStart = start;
  let i = start;
  while (i < end) {
    if (bytes[i] !== Byte.Backslash) {
      i += 1;
      if (i - runStart >= chunkBytes) {
        const text = decoder.decode(bytes.subarray(runStart, i), { stream: true });
        runStart = i;
        if (text.length > 0) {
          yield text;
          bytes = bytesOf();
        }
      }
      continue;
    }
    if (i > runStart) {
      // Escapes are ASCII, so no sequence is left pending here.
      const text = decoder.decode(bytes.subarray(runStart, i), { stream: true });
      if (text.length > 0) {
        yield text;
        bytes = bytesOf();
      }
    }
    const [text, length] = decodeEscape(bytes, i, end);
    i += length;
    runStart = i;
    yield text;
    bytes = bytesOf();
  }
  const tail = decoder.decode(bytesOf().subarray(runStart, end));
  if (tail.length > 0) yield tail;
}

export const decodeString = (bytes: Uint8Array, start: number, end: number, escaped: boolean): string => {
  if (!escaped) {
    return utf8.decode(bytes.subarray(start, end));
  }
  let result = "";
  for (const segment of decodeSegments(() => bytes, start, end, Number.POSITIVE_INFINITY)) {
    result += segment;
  }
  return result;
};

/**
 * Lazy handle on a string token held in the parser's buffer. Valid until
 * the parser advances; reading it afterwards throws {@link ExpiredError}.
 */
export class StringView {
  constructor(
    private readonly owner: ViewOwner,
    private readonly start: number,
    private readonly end: number,
    /** Whether the raw text contains escape sequences. */
    readonly escaped: boolean,
    private readonly generation: number
  ) {}

  get isValid(): boolean {
    return this.owner.generation === this.generation;
  }

  /** Length of the raw (still escaped) content in bytes. */
  get byteLength(): number {
    return this.end - this.start;
  }

  read(): string {
    return decodeString(this.liveBytes(), this.start, this.end, this.escaped);
  }

  /**
   * Streams the decoded text to `sink` in pieces decoded from at most
   * `chunkBytes` raw bytes each.
   */
  readInto(sink: TextSink, chunkBytes = DEFAULT_CHUNK_BYTES): void {
    if (!Number.isSafeInteger(chunkBytes) || chunkBytes < 1) {
      throw new TypeError(`chunkBytes must be a positive integer, got ${chunkBytes}`);
    }
    for (const segment of decodeSegments(() => this.liveBytes(), this.start, this.end, chunkBytes)) {
      sink.write(segment);
    }
  }

  /** Decoded code points, one at a time. Single pass. */
  *chars(): Generator<string> {
    for (const segment of decodeSegments(() => this.liveBytes(), this.start, this.end, DEFAULT_CHUNK_BYTES)) {
      for (const char of segment) {
        yield char;
      }
    }
  }

  private liveBytes(): Uint8Array {
    if (!this.isValid) {
      throw new ExpiredError("view-expired", "String view read after the parser advanced past it");
    }
    return this.owner.bytes;
  }
}

export type IntegerWidth = "int8" | "uint8" | "int16" | "uint16" | "int32" | "uint32" | "safe";

const INTEGER_BOUNDS: Record<IntegerWidth, readonly [bigint, bigint]> = {
  int8: [-128n, 127n],
  uint8: [0n, 255n],
  int16: [-32768n, 32767n],
  uint16: [0n, 65535n],
  int32: [-2147483648n, 2147483647n],
  uint32: [0n, 4294967295n],
  safe: [BigInt(Number.MIN_SAFE_INTEGER), BigInt(Number.MAX_SAFE_INTEGER)],
};

// Refuse integers with more digits than this rather than build them.
const MAX_INTEGER_DIGITS = 4096;

const NUMBER_PATTERN = /^(-?)(\d+)(?:\.(\d+))?(?:[eE]([+-]?\d+))?$/;

export class NumberView {
  constructor(
    private readonly owner: ViewOwner,
    private readonly start: number,
    private readonly end: number,
    private readonly generation: number
  ) {}

  get isValid(): boolean {
    return this.owner.generation === this.generation;
  }

  /** True when the literal has no fraction and no exponent. */
  get isInteger(): boolean {
    return !/[.eE]/.test(this.text());
  }

  /** The number exactly as written in the input. */
  text(): string {
    if (!this.isValid) {
      throw new ExpiredError("view-expired", "Number view read after the parser advanced past it");
    }
    return utf8.decode(this.owner.bytes.subarray(this.start, this.end));
  }

  read(): number {
    const text = this.text();
    const value = Number(text);
    if (!Number.isFinite(value)) {
      throw new NumberRangeError("out-of-range", `Number ${text} is not representable as a finite double`);
    }
    return value;
  }

  /** Exact integer value; `1.5e1` reads as 15n, `1.5` is rejected. */
  readBigInt(): bigint {
    const text = this.text();
    const match = NUMBER_PATTERN.exec(text);
    if (!match) {
      throw new NumberRangeError("not-an-integer", `Number ${text} is malformed`);
    }
    const [, sign, integer, fraction = "", exponent = "0"] = match;
    let digits = (integer + fraction).replace(/^0+/, "");
    if (digits.length === 0) {
      return 0n;
    }
    let scale = Number(exponent) - fraction.length;
    const trimmed = digits.replace(/0+$/, "");
    scale += digits.length - trimmed.length;
    digits = trimmed;
    if (scale < 0) {
      throw new NumberRangeError("not-an-integer", `Number ${text} is not an integer`);
    }
    if (digits.length + scale > MAX_INTEGER_DIGITS) {
      throw new NumberRangeError("out-of-range", `Number ${text} is too large`);
    }
    const magnitude = BigInt(digits) * 10n ** BigInt(scale);
    return sign === "-" ? -magnitude : magnitude;
  }

  readInteger(width: IntegerWidth = "safe"): number {
    const value = this.readBigInt();
    const [min, max] = INTEGER_BOUNDS[width];
    if (value < min || value > max) {
      throw new NumberRangeError("out-of-range", `Number ${value} does not fit in ${width}`);
    }
    return Number(value);
  }
}
