import type { LexicalCode } from "../errors.js";
import { Byte, hexValue, isDelimiter, isDigit } from "./tokens.js";

// Token recognizers over a byte window. None of them assumes the token is
// fully buffered: reaching `end` without a token boundary answers NeedMore
// (unless `eof` is set), and the caller-owned state lets the next call carry
// on from the same byte and sub-state after a refill. State offsets are
// relative to the token start, so compaction does not disturb them.

export enum ScanStatus {
  Complete,
  NeedMore,
  Invalid,
}

export type ScanResult =
  | { status: ScanStatus.Complete; length: number }
  | { status: ScanStatus.NeedMore }
  | { status: ScanStatus.Invalid; code: LexicalCode; at: number; message: string };

const NEED_MORE: ScanResult = { status: ScanStatus.NeedMore };

const complete = (length: number): ScanResult => ({ status: ScanStatus.Complete, length });

const invalid = (code: LexicalCode, at: number, message: string): ScanResult => ({
  status: ScanStatus.Invalid,
  code,
  at,
  message,
});

export type StringScanState = {
  offset: number;
  afterBackslash: boolean;
  hexRemaining: number;
  utf8Remaining: number;
  utf8Lower: number;
  utf8Upper: number;
  escaped: boolean;
};

export const createStringScanState = (): StringScanState => ({
  offset: 1,
  afterBackslash: false,
  hexRemaining: 0,
  utf8Remaining: 0,
  utf8Lower: 0x80,
  utf8Upper: 0xbf,
  escaped: false,
});

const isSimpleEscape = (b: number): boolean =>
  b === Byte.Quote ||
  b === Byte.Backslash ||
  b === Byte.Slash ||
  b === Byte.LowerB ||
  b === Byte.LowerF ||
  b === Byte.LowerN ||
  b === Byte.LowerR ||
  b === Byte.LowerT;

/**
 * Scans a string token whose opening quote is at `start`. The completed
 * length includes both quotes.
 */
export const scanString = (
  bytes: Uint8Array,
  start: number,
  end: number,
  eof: boolean,
  state: StringScanState
): ScanResult => {
  let i = start + state.offset;
  for (; i < end; i += 1) {
    const b = bytes[i];

    if (state.utf8Remaining > 0) {
      if (b < state.utf8Lower || b > state.utf8Upper) {
        return invalid("invalid-utf8", i - start, "Invalid UTF-8 continuation byte in string");
      }
      state.utf8Remaining -= 1;
      state.utf8Lower = 0x80;
      state.utf8Upper = 0xbf;
      continue;
    }

    if (state.afterBackslash) {
      if (b === Byte.LowerU) {
        state.hexRemaining = 4;
      } else if (!isSimpleEscape(b)) {
        return invalid("invalid-escape", i - start, `Invalid escape sequence '\\${String.fromCharCode(b)}'`);
      }
      state.afterBackslash = false;
      continue;
    }

    if (state.hexRemaining > 0) {
      if (hexValue(b) < 0) {
        return invalid("invalid-escape", i - start, "Invalid hex digit in \\u escape");
      }
      state.hexRemaining -= 1;
      continue;
    }

    if (b === Byte.Quote) {
      state.offset = i - start + 1;
      return complete(state.offset);
    }
    if (b === Byte.Backslash) {
      state.afterBackslash = true;
      state.escaped = true;
      continue;
    }
    if (b < 0x20) {
      return invalid("control-character", i - start, "Unescaped control character in string");
    }
    if (b < 0x80) {
      continue;
    }

    // Lead byte of a multi-byte sequence. The bounds on the first
    // continuation byte rule out overlong forms, surrogates and code points
    // past U+10FFFF.
    if (b >= 0xc2 && b <= 0xdf) {
      state.utf8Remaining = 1;
    } else if (b === 0xe0) {
      state.utf8Remaining = 2;
      state.utf8Lower = 0xa0;
    } else if ((b >= 0xe1 && b <= 0xec) || b === 0xee || b === 0xef) {
      state.utf8Remaining = 2;
    } else if (b === 0xed) {
      state.utf8Remaining = 2;
      state.utf8Upper = 0x9f;
    } else if (b === 0xf0) {
      state.utf8Remaining = 3;
      state.utf8Lower = 0x90;
    } else if (b >= 0xf1 && b <= 0xf3) {
      state.utf8Remaining = 3;
    } else if (b === 0xf4) {
      state.utf8Remaining = 3;
      state.utf8Upper = 0x8f;
    } else {
      return invalid("invalid-utf8", i - start, "Invalid UTF-8 lead byte in string");
    }
  }

  state.offset = i - start;
  if (eof) {
    return invalid("unexpected-eof", i - start, "Unterminated string");
  }
  return NEED_MORE;
};

export enum NumberPhase {
  Start,
  Sign,
  Zero,
  Integer,
  Dot,
  Fraction,
  Exponent,
  ExponentSign,
  ExponentDigits,
}

export type NumberScanState = {
  offset: number;
  phase: NumberPhase;
};

export const createNumberScanState = (): NumberScanState => ({ offset: 0, phase: NumberPhase.Start });

const isTerminalPhase = (phase: NumberPhase): boolean =>
  phase === NumberPhase.Zero ||
  phase === NumberPhase.Integer ||
  phase === NumberPhase.Fraction ||
  phase === NumberPhase.ExponentDigits;

const nextNumberPhase = (phase: NumberPhase, b: number): NumberPhase | undefined => {
  switch (phase) {
    case NumberPhase.Start:
      if (b === Byte.Minus) return NumberPhase.Sign;
      if (b === Byte.Zero) return NumberPhase.Zero;
      return isDigit(b) ? NumberPhase.Integer : undefined;
    case NumberPhase.Sign:
      if (b === Byte.Zero) return NumberPhase.Zero;
      return isDigit(b) ? NumberPhase.Integer : undefined;
    case NumberPhase.Zero:
      if (b === Byte.Dot) return NumberPhase.Dot;
      if (b === Byte.LowerE || b === Byte.UpperE) return NumberPhase.Exponent;
      return undefined;
    case NumberPhase.Integer:
      if (isDigit(b)) return NumberPhase.Integer;
      if (b === Byte.Dot) return NumberPhase.Dot;
      if (b === Byte.LowerE || b === Byte.UpperE) return NumberPhase.Exponent;
      return undefined;
    case NumberPhase.Dot:
      return isDigit(b) ? NumberPhase.Fraction : undefined;
    case NumberPhase.Fraction:
      if (isDigit(b)) return NumberPhase.Fraction;
      if (b === Byte.LowerE || b === Byte.UpperE) return NumberPhase.Exponent;
      return undefined;
    case NumberPhase.Exponent:
      if (b === Byte.Plus || b === Byte.Minus) return NumberPhase.ExponentSign;
      return isDigit(b) ? NumberPhase.ExponentDigits : undefined;
    case NumberPhase.ExponentSign:
    case NumberPhase.ExponentDigits:
      return isDigit(b) ? NumberPhase.ExponentDigits : undefined;
  }
};

const numberErrorMessage = (phase: NumberPhase, b: number): string => {
  switch (phase) {
    case NumberPhase.Zero:
      return isDigit(b) ? "Leading zeros are not allowed" : "Unexpected character in number";
    case NumberPhase.Sign:
      return "Expected digit after '-'";
    case NumberPhase.Dot:
      return "Expected digit after '.'";
    case NumberPhase.Exponent:
    case NumberPhase.ExponentSign:
      return "Expected digit in exponent";
    default:
      return "Unexpected character in number";
  }
};

/**
 * Scans a number starting at `start`. The token ends before the first byte
 * outside the grammar, which must be a delimiter; deciding that needs one
 * byte of lookahead or end of input.
 */
export const scanNumber = (
  bytes: Uint8Array,
  start: number,
  end: number,
  eof: boolean,
  state: NumberScanState
): ScanResult => {
  let i = start + state.offset;
  for (; i < end; i += 1) {
    const b = bytes[i];
    const next = nextNumberPhase(state.phase, b);
    if (next !== undefined) {
      state.phase = next;
      continue;
    }
    if (isTerminalPhase(state.phase) && isDelimiter(b)) {
      state.offset = i - start;
      return complete(state.offset);
    }
    return invalid("invalid-number", i - start, numberErrorMessage(state.phase, b));
  }

  state.offset = i - start;
  if (!eof) {
    return NEED_MORE;
  }
  if (isTerminalPhase(state.phase)) {
    return complete(state.offset);
  }
  return invalid("unexpected-eof", state.offset, "Unexpected end of input in number");
};

export type LiteralScanState = {
  offset: number;
};

export const createLiteralScanState = (): LiteralScanState => ({ offset: 0 });

export const TRUE_BYTES = Uint8Array.from([0x74, 0x72, 0x75, 0x65]);
export const FALSE_BYTES = Uint8Array.from([0x66, 0x61, 0x6c, 0x73, 0x65]);
export const NULL_BYTES = Uint8Array.from([0x6e, 0x75, 0x6c, 0x6c]);

/** Matches `keyword` exactly, followed by a delimiter or end of input. */
export const scanLiteral = (
  bytes: Uint8Array,
  start: number,
  end: number,
  eof: boolean,
  state: LiteralScanState,
  keyword: Uint8Array
): ScanResult => {
  while (state.offset < keyword.length) {
    const i = start + state.offset;
    if (i >= end) {
      return eof
        ? invalid("unexpected-eof", state.offset, "Unexpected end of input in literal")
        : NEED_MORE;
    }
    if (bytes[i] !== keyword[state.offset]) {
      return invalid("invalid-literal", state.offset, "Invalid literal");
    }
    state.offset += 1;
  }

  const i = start + keyword.length;
  if (i >= end) {
    return eof ? complete(keyword.length) : NEED_MORE;
  }
  if (!isDelimiter(bytes[i])) {
    return invalid("invalid-literal", keyword.length, "Invalid literal");
  }
  return complete(keyword.length);
};
