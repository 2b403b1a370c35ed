import { loadConfig } from "../core/config.js";
import { isReportEncoding, REPORT_ENCODINGS } from "../core/encoding.js";
import { UsageError } from "../core/errors.js";
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from "../core/writers.js";
import type { LineTrace, ReportEncoding } from "../parsers/types.js";

export interface ResolvedOptions {
  encoding: ReportEncoding;
  format: OutputFormat;
  legacy: boolean;
}

/** CLI flag > config file > default */
export function resolveOptions(flags: { encoding?: string; format?: string; legacy?: boolean }): ResolvedOptions {
  const cfg = loadConfig();

  const encoding = flags.encoding ?? cfg.encoding;
  if (!isReportEncoding(encoding)) {
    throw new UsageError(`Unsupported encoding '${encoding}'. Supported: ${REPORT_ENCODINGS.join(", ")}`);
  }

  const format = flags.format ?? cfg.format;
  if (!isOutputFormat(format)) {
    throw new UsageError(`Unsupported format '${format}'. Supported: ${OUTPUT_FORMATS.join(", ")}`);
  }

  return { encoding, format, legacy: flags.legacy ?? cfg.legacy };
}

/** `--verbose` output: one stderr line per input line */
export function printTrace(event: LineTrace): void {
  const section = event.section ?? "-";
  console.error(`${String(event.lineNumber).padStart(4)} ${event.kind.padEnd(11)} ${section.padEnd(5)} ${event.line}`);
}
