import { basename, dirname, extname, resolve } from "node:path";
import { writeFile, mkdir } from "node:fs/promises";
import { parseReport, measurementCount } from "../parsers/report.js";
import { RunLogger } from "../core/run-logger.js";
import { ReportError, errorMessage } from "../core/errors.js";
import { TABLE_COLUMNS, toRows, rowValues, formatTable } from "../core/table.js";
import { toCsv, toJson, writeRows } from "../core/writers.js";
import { resolveOptions, printTrace } from "./options.js";
import type { BenchmarkRun, MetadataField } from "../parsers/types.js";

export interface ParseCommandOptions {
  encoding?: string;
  format?: string;
  output?: string;
  legacy?: boolean;
  verbose?: boolean;
}

const METADATA_LABELS: ReadonlyArray<readonly [string, MetadataField]> = [
  ["Profile", "profile"],
  ["Test", "testLabel"],
  ["Mode", "mode"],
  ["Time", "measurementTime"],
  ["Date", "date"],
  ["OS", "operatingSystem"],
  ["Comment", "comment"],
];

// Terminal table leaves out the metadata columns already shown above it
const FIRST_MEASUREMENT_COLUMN = TABLE_COLUMNS.indexOf("read_write_mix");

/** Metadata block plus measurement counts, for the terminal */
export function formatSummary(run: BenchmarkRun): string {
  const lines: string[] = [];
  for (const [label, key] of METADATA_LABELS) {
    const value = run[key];
    if (value !== null) lines.push(`${label.padStart(7)}: ${value}`);
  }
  lines.push(
    `Results: ${run.readMeasurements.length} read, ${run.writeMeasurements.length} write, ${run.mixMeasurements.length} mix`
  );
  return lines.join("\n");
}

export async function parseCommand(file: string, options: ParseCommandOptions = {}): Promise<BenchmarkRun> {
  const { encoding, format, legacy } = resolveOptions(options);
  const filepath = resolve(file);
  const started = Date.now();

  const logger = new RunLogger("parse");
  logger.logStart({ command: "parse", target: filepath, encoding, legacy });

  let run: BenchmarkRun;
  try {
    run = await parseReport(filepath, {
      encoding,
      legacy,
      trace: options.verbose ? printTrace : undefined,
    });
  } catch (err) {
    logger.logFailure(filepath, {
      code: err instanceof ReportError ? err.code : "internal",
      message: errorMessage(err),
      lineNumber: err instanceof ReportError ? err.lineNumber : undefined,
    });
    logger.logEnd({ parsed: 0, failed: 1, durationMs: Date.now() - started });
    throw err;
  }

  logger.logReport(filepath, {
    read: run.readMeasurements.length,
    write: run.writeMeasurements.length,
    mix: run.mixMeasurements.length,
  });
  logger.logEnd({ parsed: 1, failed: 0, durationMs: Date.now() - started });

  const rows = toRows(run).map(rowValues);

  if (options.output) {
    const out = resolve(options.output);
    if (extname(out).toLowerCase() === ".json") {
      await mkdir(dirname(out), { recursive: true });
      await writeFile(out, toJson(run) + "\n", "utf-8");
    } else {
      await writeRows(out, TABLE_COLUMNS, rows);
    }
    console.log(`Parsed: ${basename(filepath)} (${measurementCount(run)} results)`);
    console.log(`Saved: ${out}`);
    return run;
  }

  switch (format) {
    case "json":
      console.log(toJson(run));
      break;
    case "csv":
      console.log(toCsv(TABLE_COLUMNS, rows));
      break;
    case "table":
      console.log(`Parsed: ${basename(filepath)}`);
      console.log(formatSummary(run));
      if (rows.length > 0) {
        console.log();
        const header = TABLE_COLUMNS.slice(FIRST_MEASUREMENT_COLUMN);
        console.log(formatTable(header, rows.map((r) => r.slice(FIRST_MEASUREMENT_COLUMN))));
      }
      break;
  }
  return run;
}
