export type ReportErrorCode =
  | "decode"
  | "classification"
  | "numeric"
  | "not_found"
  | "usage";

/** Base class for everything the parser and CLI report as a user-facing failure */
export class ReportError extends Error {
  readonly code: ReportErrorCode;
  readonly lineNumber?: number; // 1-based
  readonly line?: string;

  constructor(message: string, code: ReportErrorCode, lineNumber?: number, line?: string) {
    super(lineNumber !== undefined ? `${message} (line ${lineNumber})` : message);
    this.name = "ReportError";
    this.code = code;
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

export class DecodeError extends ReportError {
  constructor(path: string, encoding: string, cause?: unknown) {
    super(`Cannot decode ${path} as ${encoding}`, "decode");
    this.name = "DecodeError";
    if (cause !== undefined) this.cause = cause;
  }
}

/** A measurement line showed up outside any [Read]/[Write]/[Mix] section */
export class ClassificationError extends ReportError {
  constructor(lineNumber: number, line: string) {
    super("Cannot classify test result as read, write or mix", "classification", lineNumber, line);
    this.name = "ClassificationError";
  }
}

export class NumericFormatError extends ReportError {
  readonly field: string;
  readonly value: string;

  constructor(field: string, value: string, lineNumber: number, line: string) {
    super(`Invalid number for ${field}: "${value}"`, "numeric", lineNumber, line);
    this.name = "NumericFormatError";
    this.field = field;
    this.value = value;
  }
}

export class ReportNotFoundError extends ReportError {
  constructor(path: string) {
    super(`File not found: ${path}`, "not_found");
    this.name = "ReportNotFoundError";
  }
}

export class UsageError extends ReportError {
  constructor(message: string) {
    super(message, "usage");
    this.name = "UsageError";
  }
}

/** Message of an unknown thrown value, without a stack trace */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
