import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { buildRecognizers, classifyLine, type MeasurementCapture } from "./recognizers.js";
import { decodeReport, splitLines } from "../core/encoding.js";
import { ClassificationError, NumericFormatError, ReportNotFoundError } from "../core/errors.js";
import {
  emptyRun,
  type BenchmarkRun,
  type Measurement,
  type ParseOptions,
  type PatternKind,
  type ReportOptions,
  type Section,
} from "./types.js";

/** Where a line sits, for error messages */
interface LineRef {
  lineNumber: number;
  line: string;
}

/** Float with thousands separators removed: "1,234.56" → 1234.56 */
function toFloat(field: string, raw: string, at: LineRef): number {
  const cleaned = raw.replace(/,/g, "");
  const value = Number(cleaned);
  if (cleaned === "" || !Number.isFinite(value)) {
    throw new NumericFormatError(field, raw, at.lineNumber, at.line);
  }
  return value;
}

function toInt(field: string, raw: string, at: LineRef): number {
  const value = Number.parseInt(raw, 10);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value)) {
    throw new NumericFormatError(field, raw, at.lineNumber, at.line);
  }
  return value;
}

function toMeasurement(c: MeasurementCapture, at: LineRef): Measurement {
  // Recognizers only let SEQ, RND, Sequential and Random through
  const patternKind: PatternKind = c.token === "SEQ" || c.token === "Sequential" ? "sequential" : "random";
  return Object.freeze({
    patternKind,
    patternToken: c.token,
    blockSizeValue: toFloat("blocksize", c.blockSize, at),
    blockSizeUnit: c.blockSizeUnit,
    queueDepth: toInt("queues", c.queues, at),
    threadCount: toInt("threads", c.threads, at),
    throughputValue: toFloat("rate", c.rate, at),
    throughputUnit: c.rateUnit,
    iopsValue: toFloat("iops", c.iops, at),
    iopsUnit: c.iopsUnit,
    latencyValue: toFloat("latency", c.latency, at),
    latencyUnit: c.latencyUnit,
  });
}

function measurementsFor(run: BenchmarkRun, section: Section): Measurement[] {
  switch (section) {
    case "read":
      return run.readMeasurements;
    case "write":
      return run.writeMeasurements;
    case "mix":
      return run.mixMeasurements;
  }
}

/**
 * Single pass over report lines.
 *
 * A `[Read]`, `[Write]` or `[Mix]` header opens a section; measurement lines
 * go to the open section and keep it open; any metadata line closes it.
 * Unrecognized lines are skipped and leave the section as it is.
 *
 * @throws ClassificationError when a measurement appears with no open section
 * @throws NumericFormatError when a captured number does not parse
 */
export function parseLines(lines: Iterable<string>, options: ParseOptions = {}): BenchmarkRun {
  const recognizers = buildRecognizers({ legacy: options.legacy });
  const run = emptyRun();
  let section: Section | null = null;
  let lineNumber = 0;

  for (const line of lines) {
    lineNumber++;
    const match = classifyLine(line, recognizers);

    switch (match.kind) {
      case "section":
        section = match.section;
        break;
      case "measurement": {
        if (section === null) throw new ClassificationError(lineNumber, line);
        measurementsFor(run, section).push(toMeasurement(match.capture, { lineNumber, line }));
        break;
      }
      case "metadata":
        section = null;
        run[match.field] = match.value;
        break;
      case "none":
        break;
    }

    options.trace?.({ lineNumber, kind: match.kind, section, line });
  }

  return run;
}

/** Read, decode and parse one report file */
export async function parseReport(path: string, options: ReportOptions = {}): Promise<BenchmarkRun> {
  if (!existsSync(path)) {
    throw new ReportNotFoundError(path);
  }
  const bytes = await readFile(path);
  const text = decodeReport(bytes, options.encoding ?? "utf-8", path);
  return parseLines(splitLines(text), options);
}

/** Total measurements across the three sections */
export function measurementCount(run: BenchmarkRun): number {
  return run.readMeasurements.length + run.writeMeasurements.length + run.mixMeasurements.length;
}
