export enum TokenType {
  BeginObject = 0x01,
  EndObject = 0x02,
  BeginArray = 0x03,
  EndArray = 0x04,
  Comma = 0x05,
  Colon = 0x06,
  String = 0x07,
  Number = 0x08,
  True = 0x09,
  False = 0x0a,
  Null = 0x0b,
  End = 0x0c,
}

export type PunctuationType =
  | TokenType.BeginObject
  | TokenType.EndObject
  | TokenType.BeginArray
  | TokenType.EndArray
  | TokenType.Comma
  | TokenType.Colon;

/**
 * A recognized token. `start`/`end` index the refill buffer and are only
 * valid until the next refill; for strings they exclude the quotes.
 */
export type Token =
  | { type: PunctuationType | TokenType.True | TokenType.False | TokenType.Null | TokenType.End; offset: number }
  | { type: TokenType.String; offset: number; start: number; end: number; escaped: boolean }
  | { type: TokenType.Number; offset: number; start: number; end: number };

export const Byte = {
  Tab: 0x09,
  LineFeed: 0x0a,
  CarriageReturn: 0x0d,
  Space: 0x20,
  Quote: 0x22,
  Plus: 0x2b,
  Comma: 0x2c,
  Minus: 0x2d,
  Dot: 0x2e,
  Slash: 0x2f,
  Zero: 0x30,
  One: 0x31,
  Nine: 0x39,
  Colon: 0x3a,
  UpperA: 0x41,
  UpperE: 0x45,
  UpperF: 0x46,
  OpenBracket: 0x5b,
  Backslash: 0x5c,
  CloseBracket: 0x5d,
  LowerA: 0x61,
  LowerB: 0x62,
  LowerE: 0x65,
  LowerF: 0x66,
  LowerN: 0x6e,
  LowerR: 0x72,
  LowerT: 0x74,
  LowerU: 0x75,
  OpenBrace: 0x7b,
  CloseBrace: 0x7d,
} as const;

export const isWhitespace = (b: number): boolean =>
  b === Byte.Space || b === Byte.LineFeed || b === Byte.CarriageReturn || b === Byte.Tab;

export const isDigit = (b: number): boolean => b >= Byte.Zero && b <= Byte.Nine;

/** Bytes that may directly follow a number or literal. */
export const isDelimiter = (b: number): boolean =>
  isWhitespace(b) ||
  b === Byte.Comma ||
  b === Byte.Colon ||
  b === Byte.OpenBracket ||
  b === Byte.CloseBracket ||
  b === Byte.OpenBrace ||
  b === Byte.CloseBrace ||
  b === Byte.Quote;

export const hexValue = (b: number): number => {
  if (b >= Byte.Zero && b <= Byte.Nine) return b - Byte.Zero;
  if (b >= Byte.LowerA && b <= Byte.LowerF) return b - Byte.LowerA + 10;
  if (b >= Byte.UpperA && b <= Byte.UpperF) return b - Byte.UpperA + 10;
  return -1;
};
