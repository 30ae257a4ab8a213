export { Parser } from "./parser/parser.js";
export { ArrayCursor, ObjectCursor } from "./parser/cursors.js";
export { NumberView, StringView } from "./parser/views.js";
export type { IntegerWidth, TextSink } from "./parser/views.js";
export type { JsonValue, JsonValueType, ObjectEntry } from "./parser/value.js";
export { TreeBuilder, materialize, readDocuments, walkDocuments, walkValue } from "./parser/walk.js";
export type { JsonData, TokenSink } from "./parser/walk.js";
export { FileSource, IterableSource, MemorySource } from "./io/sources.js";
export type { ByteSource } from "./io/sources.js";
export { RefillBuffer } from "./io/buffer.js";
export { resolveOptions } from "./options.js";
export type { ParserOptions } from "./options.js";
export { JsonAnalyzer } from "./analysis/analyzer.js";
export type { AnalysisReport, AnalyzerOptions, NumericArrayType } from "./analysis/analyzer.js";
export {
  BufferLimitError,
  ExpiredError,
  IoError,
  JsonPullError,
  LexicalError,
  NumberRangeError,
  StructuralError,
} from "./errors.js";
export type { ErrorCode, ErrorKind } from "./errors.js";
