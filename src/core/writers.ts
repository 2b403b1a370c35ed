import Papa from "papaparse";
import ExcelJS from "exceljs";
import { writeFile, mkdir } from "node:fs/promises";
import { dirname, extname } from "node:path";
import type { BenchmarkRun } from "../parsers/types.js";
import type { TableCell } from "./table.js";

export type OutputFormat = "table" | "json" | "csv";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["table", "json", "csv"];

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

export function toJson(run: BenchmarkRun): string {
  return JSON.stringify(run, null, 2);
}

/** CSV with a header line; null cells are left empty */
export function toCsv(header: readonly string[], rows: TableCell[][]): string {
  // unparse() turns an empty data array into one row of empty cells
  if (rows.length === 0) return Papa.unparse([[...header]], { newline: "\n" });
  return Papa.unparse({ fields: [...header], data: rows }, { newline: "\n" });
}

export async function writeXlsx(
  outputPath: string,
  header: readonly string[],
  rows: TableCell[][]
): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Measurements");
  sheet.columns = header.map((h) => ({ header: h, key: h, width: Math.max(10, h.length + 2) }));
  for (const row of rows) {
    sheet.addRow(row);
  }
  await mkdir(dirname(outputPath), { recursive: true });
  await workbook.xlsx.writeFile(outputPath);
}

/**
 * Write rows to `outputPath`. `.xlsx` gets a workbook, anything else CSV.
 * Returns the kind of file written.
 */
export async function writeRows(
  outputPath: string,
  header: readonly string[],
  rows: TableCell[][]
): Promise<"xlsx" | "csv"> {
  if (extname(outputPath).toLowerCase() === ".xlsx") {
    await writeXlsx(outputPath, header, rows);
    return "xlsx";
  }
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, toCsv(header, rows) + "\n", "utf-8");
  return "csv";
}
