import { existsSync, readdirSync, statSync } from "node:fs";
import { resolve, extname, join, relative } from "node:path";
import { parseReport, measurementCount } from "../parsers/report.js";
import { RunLogger } from "../core/run-logger.js";
import { ReportError, ReportNotFoundError, UsageError, errorMessage } from "../core/errors.js";
import { TABLE_COLUMNS, toRows, rowValues, type TableCell } from "../core/table.js";
import { writeRows } from "../core/writers.js";
import { resolveOptions } from "./options.js";

export interface BatchCommandOptions {
  encoding?: string;
  output?: string;
  legacy?: boolean;
}

export interface BatchSummary {
  parsed: number;
  failed: number;
  rows: number;
}

export const BATCH_COLUMNS = ["source", ...TABLE_COLUMNS] as const;

/** Recursively collect report files (.txt) from a directory, sorted by path */
export function collectReports(dir: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir)) {
    const full = join(dir, entry);
    const stat = statSync(full);
    if (stat.isDirectory()) {
      files.push(...collectReports(full));
    } else if (extname(full).toLowerCase() === ".txt") {
      files.push(full);
    }
  }
  return files.sort();
}

export async function batchCommand(folder: string, options: BatchCommandOptions = {}): Promise<BatchSummary> {
  const { encoding, legacy } = resolveOptions(options);
  const dir = resolve(folder);

  if (!existsSync(dir)) {
    throw new ReportNotFoundError(dir);
  }
  if (!statSync(dir).isDirectory()) {
    throw new UsageError(`Not a folder: ${dir}. Use 'diskmark parse' for a single report`);
  }

  const reports = collectReports(dir);
  if (reports.length === 0) {
    throw new UsageError(`No .txt reports found in ${folder}`);
  }

  const started = Date.now();
  const logger = new RunLogger("batch");
  logger.logStart({ command: "batch", target: dir, encoding, legacy });

  console.log(`Parsing: ${reports.length} report${reports.length !== 1 ? "s" : ""} found`);

  const table: TableCell[][] = [];
  let parsed = 0;
  let failed = 0;

  // One file at a time; a failing report does not stop the batch
  for (const file of reports) {
    const name = relative(dir, file);
    try {
      const run = await parseReport(file, { encoding, legacy });
      for (const row of toRows(run)) {
        table.push([name, ...rowValues(row)]);
      }
      logger.logReport(file, {
        read: run.readMeasurements.length,
        write: run.writeMeasurements.length,
        mix: run.mixMeasurements.length,
      });
      console.log(`  ✅ ${name.padEnd(40)} ${measurementCount(run)} results`);
      parsed++;
    } catch (err) {
      logger.logFailure(file, {
        code: err instanceof ReportError ? err.code : "internal",
        message: errorMessage(err),
        lineNumber: err instanceof ReportError ? err.lineNumber : undefined,
      });
      console.error(`  ❌ ${name} — ${errorMessage(err)}`);
      failed++;
    }
  }

  logger.logEnd({ parsed, failed, durationMs: Date.now() - started });

  const parts = [`Parsed: ${parsed} of ${reports.length} reports (${table.length} rows)`];
  if (failed > 0) parts.push(`(${failed} failed)`);
  console.log(parts.join(" "));

  if (options.output) {
    const out = resolve(options.output);
    await writeRows(out, BATCH_COLUMNS, table);
    console.log(`Saved: ${out}`);
  }

  return { parsed, failed, rows: table.length };
}
