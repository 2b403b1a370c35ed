export { parseLines, parseReport, measurementCount } from "./parsers/report.js";
export { buildRecognizers, classifyLine } from "./parsers/recognizers.js";
export type { LineMatch, MeasurementCapture, Recognizer } from "./parsers/recognizers.js";
export { emptyRun } from "./parsers/types.js";
export type {
  BenchmarkRun,
  Measurement,
  PatternKind,
  Section,
  ReportEncoding,
  ParseOptions,
  ReportOptions,
  LineTrace,
  MetadataField,
} from "./parsers/types.js";
export { decodeReport, detectEncoding, splitLines } from "./core/encoding.js";
export { TABLE_COLUMNS, toRows, rowValues } from "./core/table.js";
export type { TableRow, TableColumn, TableCell } from "./core/table.js";
export { toCsv, toJson, writeRows, writeXlsx } from "./core/writers.js";
export {
  ReportError,
  DecodeError,
  ClassificationError,
  NumericFormatError,
  ReportNotFoundError,
} from "./core/errors.js";
