export type PatternKind = "sequential" | "random";

export type Section = "read" | "write" | "mix";

export type ReportEncoding = "utf-8" | "utf-16le" | "auto";

/** One result line, e.g. `SEQ 1MiB (Q= 8, T= 1): 531.458 MB/s [506.8 IOPS] <15726.77 us>` */
export interface Measurement {
  readonly patternKind: PatternKind;
  readonly patternToken: string;   // as printed: "SEQ", "RND", "Sequential", "Random"
  readonly blockSizeValue: number;
  readonly blockSizeUnit: string;  // e.g. "MiB", "KiB"
  readonly queueDepth: number;
  readonly threadCount: number;
  readonly throughputValue: number;
  readonly throughputUnit: string; // e.g. "MB/s"
  readonly iopsValue: number;
  readonly iopsUnit: string;
  readonly latencyValue: number;
  readonly latencyUnit: string;    // e.g. "us"
}

export interface BenchmarkRun {
  testLabel: string | null;        // "1 GiB (x5) [E: 96% (894/932GiB)]"
  date: string | null;             // kept as printed, not reparsed
  operatingSystem: string | null;
  mode: string | null;
  measurementTime: string | null;  // "Measure 5 sec / Interval 5 sec"
  profile: string | null;
  comment: string | null;
  readMeasurements: Measurement[];
  writeMeasurements: Measurement[];
  mixMeasurements: Measurement[];
}

export type MetadataField =
  | "profile"
  | "testLabel"
  | "mode"
  | "measurementTime"
  | "date"
  | "operatingSystem"
  | "comment";

export interface ParseOptions {
  /** Only accept SEQ/RND tokens, not Sequential/Random (older report format) */
  legacy?: boolean;
  /** Called once per line with its classification */
  trace?: (event: LineTrace) => void;
}

export interface ReportOptions extends ParseOptions {
  encoding?: ReportEncoding;
}

export interface LineTrace {
  lineNumber: number;
  kind: "measurement" | "section" | "metadata" | "none";
  section: Section | null; // active section after the line was applied
  line: string;
}

export function emptyRun(): BenchmarkRun {
  return {
    testLabel: null,
    date: null,
    operatingSystem: null,
    mode: null,
    measurementTime: null,
    profile: null,
    comment: null,
    readMeasurements: [],
    writeMeasurements: [],
    mixMeasurements: [],
  };
}
