import type { TokenSink } from "../parser/walk.js";
import type { NumberView, StringView } from "../parser/views.js";

export type NumericArrayType = "uint8" | "int8" | "uint16" | "int16" | "uint32" | "int32" | "float64";

export type AnalyzerOptions = {
  /** Distinct strings remembered for de-duplication stats. */
  maxUniqueStrings?: number;
  /** Longer strings are counted but never decoded. */
  maxTrackedStringBytes?: number;
  maxReportedArrays?: number;
};

export type AnalysisReport = {
  documents: number;
  maxDepth: number;
  tokens: {
    objects: number;
    arrays: number;
    keys: number;
    strings: number;
    numbers: number;
    booleans: number;
    nulls: number;
  };
  strings: {
    uniqueCount: number;
    totalCount: number;
    uniqueBytes: number;
    totalBytes: number;
    /** True once the unique-string table filled up. */
    truncated: boolean;
  };
  /** Arrays holding only numbers, by path, with the narrowest element type. */
  arrays: Map<string, NumericArrayType>;
};

type ArrayStats = {
  count: number;
  min: number;
  max: number;
  isInteger: boolean;
  isValid: boolean;
};

type Container =
  | { type: "root" }
  | { type: "object" }
  | { type: "array"; index: number; stats: ArrayStats };

const classify = (stats: ArrayStats): NumericArrayType => {
  if (!stats.isInteger) return "float64";
  if (stats.min >= 0 && stats.max <= 255) return "uint8";
  if (stats.min >= -128 && stats.max <= 127) return "int8";
  if (stats.min >= 0 && stats.max <= 65535) return "uint16";
  if (stats.min >= -32768 && stats.max <= 32767) return "int16";
  if (stats.min >= 0 && stats.max <= 4294967295) return "uint32";
  if (stats.min >= -2147483648 && stats.max <= 2147483647) return "int32";
  return "float64";
};

/**
 * Collects statistics from a token stream. Memory stays bounded: the string
 * table and the array map stop growing at their configured limits.
 */
export class JsonAnalyzer implements TokenSink {
  private readonly path: (string | number)[] = [];
  private readonly containers: Container[] = [{ type: "root" }];
  private readonly seen = new Set<string>();
  private readonly maxUniqueStrings: number;
  private readonly maxTrackedStringBytes: number;
  private readonly maxReportedArrays: number;

  private readonly report: AnalysisReport = {
    documents: 0,
    maxDepth: 0,
    tokens: { objects: 0, arrays: 0, keys: 0, strings: 0, numbers: 0, booleans: 0, nulls: 0 },
    strings: { uniqueCount: 0, totalCount: 0, uniqueBytes: 0, totalBytes: 0, truncated: false },
    arrays: new Map(),
  };

  constructor(options: AnalyzerOptions = {}) {
    this.maxUniqueStrings = options.maxUniqueStrings ?? 100_000;
    this.maxTrackedStringBytes = options.maxTrackedStringBytes ?? 256;
    this.maxReportedArrays = options.maxReportedArrays ?? 1_000;
  }

  getReport(): AnalysisReport {
    return this.report;
  }

  startObject(): void {
    this.beforeValue();
    this.invalidateParentArray();
    this.report.tokens.objects += 1;
    this.containers.push({ type: "object" });
    this.trackDepth();
  }

  endObject(): void {
    const container = this.containers.pop();
    if (!container || container.type !== "object") throw new Error("Unbalanced object");
    this.afterValue();
  }

  startArray(): void {
    this.beforeValue();
    // An array inside an array means the outer one is not a numeric leaf.
    this.invalidateParentArray();
    this.report.tokens.arrays += 1;
    this.containers.push({
      type: "array",
      index: -1,
      stats: { count: 0, min: Infinity, max: -Infinity, isInteger: true, isValid: true },
    });
    this.trackDepth();
  }

  endArray(): void {
    const container = this.containers.pop();
    if (!container || container.type !== "array") throw new Error("Unbalanced array");

    const { stats } = container;
    if (stats.isValid && stats.count > 0 && this.report.arrays.size < this.maxReportedArrays) {
      // The path still ends at this array: the element index was popped by afterValue.
      this.report.arrays.set(`/${this.path.join("/")}`, classify(stats));
    }
    this.afterValue();
  }

  key(name: string): void {
    this.report.tokens.keys += 1;
    this.path.push(name);
    this.registerString(name, Buffer.byteLength(name, "utf8"));
  }

  stringValue(value: StringView): void {
    this.beforeValue();
    this.invalidateParentArray();
    this.report.tokens.strings += 1;
    const byteLength = value.byteLength;
    this.registerString(byteLength <= this.maxTrackedStringBytes ? value.read() : undefined, byteLength);
    this.afterValue();
  }

  numberValue(value: NumberView): void {
    this.beforeValue();
    this.report.tokens.numbers += 1;
    const container = this.currentContainer();
    if (container.type === "array" && container.stats.isValid) {
      const num = Number(value.text());
      const { stats } = container;
      stats.count += 1;
      if (num < stats.min) stats.min = num;
      if (num > stats.max) stats.max = num;
      if (!Number.isInteger(num) || !value.isInteger) stats.isInteger = false;
    }
    this.afterValue();
  }

  booleanValue(): void {
    this.beforeValue();
    this.invalidateParentArray();
    this.report.tokens.booleans += 1;
    this.afterValue();
  }

  nullValue(): void {
    this.beforeValue();
    this.invalidateParentArray();
    this.report.tokens.nulls += 1;
    this.afterValue();
  }

  /** `value` is undefined for strings too long to decode. */
  private registerString(value: string | undefined, byteLength: number): void {
    const stats = this.report.strings;
    stats.totalCount += 1;
    stats.totalBytes += byteLength;

    if (value === undefined) {
      stats.uniqueCount += 1;
      stats.uniqueBytes += byteLength;
      return;
    }
    if (this.seen.has(value)) {
      return;
    }
    stats.uniqueCount += 1;
    stats.uniqueBytes += byteLength;
    if (this.seen.size < this.maxUniqueStrings) {
      this.seen.add(value);
    } else {
      stats.truncated = true;
    }
  }

  private currentContainer(): Container {
    return this.containers[this.containers.length - 1];
  }

  private invalidateParentArray(): void {
    const container = this.currentContainer();
    if (container.type === "array") container.stats.isValid = false;
  }

  private trackDepth(): void {
    // The root pseudo-container does not count.
    this.report.maxDepth = Math.max(this.report.maxDepth, this.containers.length - 1);
  }

  private beforeValue(): void {
    const container = this.currentContainer();
    if (container.type === "array") {
      container.index += 1;
      this.path.push(container.index);
    }
  }

  private afterValue(): void {
    const container = this.currentContainer();
    if (container.type === "array" || container.type === "object") {
      // Pops the index pushed by beforeValue, or the key pushed by key().
      this.path.pop();
    } else {
      this.report.documents += 1;
    }
  }
}
