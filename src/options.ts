export const DEFAULT_MAX_DEPTH = 512;
export const DEFAULT_INITIAL_BUFFER_CAPACITY = 64 * 1024;
export const DEFAULT_MAX_BUFFER_CAPACITY = 64 * 1024 * 1024;

export type ParserOptions = {
  /** Deepest allowed nesting of arrays and objects. */
  maxDepth?: number;
  initialBufferCapacity?: number;
  /**
   * Size limit for any single token. A number or literal that fills it may
   * still take one more byte to see the delimiter after it.
   */
  maxBufferCapacity?: number;
  /** Accept several whitespace-separated top-level values. */
  multipleValues?: boolean;
};

export type ResolvedParserOptions = Required<ParserOptions>;

const positiveInteger = (value: number, label: string): number => {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new TypeError(`${label} must be a positive integer, got ${value}`);
  }
  return value;
};

export const resolveOptions = (options: ParserOptions = {}): ResolvedParserOptions => {
  const maxBufferCapacity = positiveInteger(
    options.maxBufferCapacity ?? DEFAULT_MAX_BUFFER_CAPACITY,
    "maxBufferCapacity"
  );
  const initialBufferCapacity = positiveInteger(
    options.initialBufferCapacity ?? Math.min(DEFAULT_INITIAL_BUFFER_CAPACITY, maxBufferCapacity),
    "initialBufferCapacity"
  );
  if (initialBufferCapacity > maxBufferCapacity) {
    throw new TypeError(
      `initialBufferCapacity (${initialBufferCapacity}) exceeds maxBufferCapacity (${maxBufferCapacity})`
    );
  }

  return {
    maxDepth: positiveInteger(options.maxDepth ?? DEFAULT_MAX_DEPTH, "maxDepth"),
    initialBufferCapacity,
    maxBufferCapacity,
    multipleValues: options.multipleValues ?? true,
  };
};
