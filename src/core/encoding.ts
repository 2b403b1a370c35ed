import { DecodeError } from "./errors.js";
import type { ReportEncoding } from "../parsers/types.js";

export const REPORT_ENCODINGS: readonly ReportEncoding[] = ["utf-8", "utf-16le", "auto"];

export function isReportEncoding(value: string): value is ReportEncoding {
  return (REPORT_ENCODINGS as readonly string[]).includes(value);
}

/**
 * Pick the concrete encoding for `auto`: CDM7 writes UTF-16LE with a
 * byte order mark, CDM8 writes UTF-8.
 */
export function detectEncoding(bytes: Uint8Array): "utf-8" | "utf-16le" {
  return bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe ? "utf-16le" : "utf-8";
}

/** Decode report bytes; a leading byte order mark is dropped */
export function decodeReport(bytes: Uint8Array, encoding: ReportEncoding, source = "<input>"): string {
  const resolved = encoding === "auto" ? detectEncoding(bytes) : encoding;
  try {
    return new TextDecoder(resolved, { fatal: true }).decode(bytes);
  } catch (err) {
    throw new DecodeError(source, resolved, err);
  }
}

export function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}
