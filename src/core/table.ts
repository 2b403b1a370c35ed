import type { BenchmarkRun, Measurement, Section } from "../parsers/types.js";

export const TABLE_COLUMNS = [
  "date",
  "test",
  "time",
  "os",
  "mode",
  "profile",
  "comment",
  "read_write_mix",
  "type",
  "blocksize",
  "unit_blocksize",
  "queues",
  "threads",
  "rate",
  "unit_rate",
  "iops",
  "unit_iops",
  "latency",
  "unit_latency",
] as const;

export type TableColumn = (typeof TABLE_COLUMNS)[number];

export interface TableRow {
  date: string | null;
  test: string | null;
  time: string | null;
  os: string | null;
  mode: string | null;
  profile: string | null;
  comment: string | null;
  read_write_mix: Section;
  type: string;
  blocksize: number;
  unit_blocksize: string;
  queues: number;
  threads: number;
  rate: number;
  unit_rate: string;
  iops: number;
  unit_iops: string;
  latency: number;
  unit_latency: string;
}

export type TableCell = string | number | null;

function toRow(run: BenchmarkRun, section: Section, m: Measurement): TableRow {
  return {
    date: run.date,
    test: run.testLabel,
    time: run.measurementTime,
    os: run.operatingSystem,
    mode: run.mode,
    profile: run.profile,
    comment: run.comment,
    read_write_mix: section,
    type: m.patternToken,
    blocksize: m.blockSizeValue,
    unit_blocksize: m.blockSizeUnit,
    queues: m.queueDepth,
    threads: m.threadCount,
    rate: m.throughputValue,
    unit_rate: m.throughputUnit,
    iops: m.iopsValue,
    unit_iops: m.iopsUnit,
    latency: m.latencyValue,
    unit_latency: m.latencyUnit,
  };
}

/** One row per measurement: read rows, then write rows, then mix rows */
export function toRows(run: BenchmarkRun): TableRow[] {
  return [
    ...run.readMeasurements.map((m) => toRow(run, "read", m)),
    ...run.writeMeasurements.map((m) => toRow(run, "write", m)),
    ...run.mixMeasurements.map((m) => toRow(run, "mix", m)),
  ];
}

/** Row values in `TABLE_COLUMNS` order */
export function rowValues(row: TableRow): TableCell[] {
  return TABLE_COLUMNS.map((column) => row[column]);
}

/** Aligned plain-text rendering for the terminal */
export function formatTable(header: readonly string[], rows: readonly TableCell[][]): string {
  const cells = [header.map(String), ...rows.map((r) => r.map((v) => (v === null ? "" : String(v))))];
  const widths = header.map((_, i) => Math.max(...cells.map((r) => (r[i] ?? "").length)));
  return cells
    .map((r) => r.map((v, i) => v.padEnd(widths[i])).join("  ").trimEnd())
    .join("\n");
}
