import { appendFileSync, mkdirSync, existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import { diskmarkHome } from "./config.js";

export function logsDir(): string {
  return join(diskmarkHome(), "logs");
}

export interface RunLogEntry {
  type: "run_start" | "report" | "failure" | "run_end";
  timestamp: string;
  [key: string]: unknown;
}

/**
 * RunLogger — appends JSONL to a run file incrementally.
 * Each write is appendFileSync (crash-safe — no buffering).
 */
export class RunLogger {
  private filepath: string;

  constructor(command: string, dir?: string) {
    const target = dir ?? logsDir();
    if (!existsSync(target)) mkdirSync(target, { recursive: true });

    const ts = new Date().toISOString().replace(/[:.]/g, "-");
    const id = randomUUID().slice(0, 8);
    this.filepath = join(target, `${ts}_${command}_${id}.jsonl`);
  }

  get path(): string {
    return this.filepath;
  }

  private append(entry: RunLogEntry): void {
    appendFileSync(this.filepath, JSON.stringify(entry) + "\n", "utf-8");
  }

  logStart(metadata: { command: string; target: string; encoding: string; legacy: boolean }): void {
    this.append({ type: "run_start", timestamp: new Date().toISOString(), ...metadata });
  }

  logReport(file: string, counts: { read: number; write: number; mix: number }): void {
    this.append({ type: "report", timestamp: new Date().toISOString(), file, ...counts });
  }

  logFailure(file: string, failure: { code: string; message: string; lineNumber?: number }): void {
    this.append({ type: "failure", timestamp: new Date().toISOString(), file, ...failure });
  }

  logEnd(summary: { parsed: number; failed: number; durationMs: number }): void {
    this.append({ type: "run_end", timestamp: new Date().toISOString(), ...summary });
  }
}

export interface RunLogStats {
  runs: number;
  reports: number;
  measurements: number;
  failures: Record<string, number>; // by error code
}

function countOf(entry: Record<string, unknown>, key: string): number {
  const value = entry[key];
  return typeof value === "number" ? value : 0;
}

/** Scan all run JSONL files in `dir` */
export function scanRunLogs(dir = logsDir()): RunLogStats {
  const stats: RunLogStats = { runs: 0, reports: 0, measurements: 0, failures: {} };
  if (!existsSync(dir)) return stats;

  const files = readdirSync(dir).filter((f) => f.endsWith(".jsonl"));
  stats.runs = files.length;

  for (const file of files) {
    const raw = readFileSync(join(dir, file), "utf-8").trim();
    if (!raw) continue;

    for (const line of raw.split("\n")) {
      let entry: unknown;
      try {
        entry = JSON.parse(line);
      } catch {
        continue; // torn line from an interrupted run
      }
      if (typeof entry !== "object" || entry === null) continue;
      const record: Record<string, unknown> = { ...entry };

      if (record.type === "report") {
        stats.reports++;
        stats.measurements += countOf(record, "read") + countOf(record, "write") + countOf(record, "mix");
      }
      if (record.type === "failure" && typeof record.code === "string") {
        stats.failures[record.code] = (stats.failures[record.code] ?? 0) + 1;
      }
    }
  }

  return stats;
}
