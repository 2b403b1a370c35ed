import type { MetadataField, Section } from "./types.js";

/** Captured text of a measurement line, before numeric conversion */
export interface MeasurementCapture {
  token: string;
  blockSize: string;
  blockSizeUnit: string;
  queues: string;
  threads: string;
  rate: string;
  rateUnit: string;
  iops: string;
  iopsUnit: string;
  latency: string;
  latencyUnit: string;
}

export type LineMatch =
  | { kind: "measurement"; capture: MeasurementCapture }
  | { kind: "section"; section: Section }
  | { kind: "metadata"; field: MetadataField; value: string }
  | { kind: "none" };

export interface Recognizer {
  recognize(line: string): LineMatch | null;
}

const NO_MATCH: LineMatch = { kind: "none" };

// "  SEQ    1MiB (Q=  8, T= 1):   531.458 MB/s [    506.8 IOPS] < 15726.77 us>"
function measurementPattern(tokens: string): RegExp {
  return new RegExp(
    `^\\s*(?<token>${tokens})\\s*(?<blockSize>\\d+(?:\\.\\d+)?)(?<blockSizeUnit>\\S+)` +
      `\\s*\\(Q=\\s*(?<queues>\\d+),\\s*T=\\s*(?<threads>\\d+)\\):` +
      `\\s*(?<rate>[\\d.,]+)\\s+(?<rateUnit>\\S+)` +
      `\\s*\\[\\s*(?<iops>[\\d.,]+)\\s+(?<iopsUnit>\\S+?)\\s*\\]` +
      `\\s*<\\s*(?<latency>[\\d.,]+)\\s+(?<latencyUnit>\\S+?)\\s*>\\s*$`
  );
}

const SECTION_TOKENS: ReadonlyMap<string, Section> = new Map<string, Section>([
  ["Read", "read"],
  ["Write", "write"],
  ["Mix", "mix"],
]);

const METADATA_LABELS: ReadonlyArray<readonly [label: string, field: MetadataField]> = [
  ["Profile", "profile"],
  ["Test", "testLabel"],
  ["Mode", "mode"],
  ["Time", "measurementTime"],
  ["Date", "date"],
  ["OS", "operatingSystem"],
  ["Comment", "comment"],
];

function measurementRecognizer(legacy: boolean): Recognizer {
  const pattern = measurementPattern(legacy ? "SEQ|RND" : "SEQ|RND|Sequential|Random");
  return {
    recognize(line) {
      const g = pattern.exec(line)?.groups;
      if (!g) return null;
      return {
        kind: "measurement",
        capture: {
          token: g.token,
          blockSize: g.blockSize,
          blockSizeUnit: g.blockSizeUnit,
          queues: g.queues,
          threads: g.threads,
          rate: g.rate,
          rateUnit: g.rateUnit,
          iops: g.iops,
          iopsUnit: g.iopsUnit,
          latency: g.latency,
          latencyUnit: g.latencyUnit,
        },
      };
    },
  };
}

function sectionRecognizer(): Recognizer {
  // "[Read]", or "[Mix] Read 70%/Write 30%"
  const pattern = new RegExp("^\\s*\\[(Read|Write|Mix)\\](?:\\s.*)?$");
  return {
    recognize(line) {
      const m = pattern.exec(line);
      const section = m ? SECTION_TOKENS.get(m[1]) : undefined;
      if (!section) return null;
      return { kind: "section", section };
    },
  };
}

function metadataRecognizer(label: string, field: MetadataField): Recognizer {
  const pattern = new RegExp(`^\\s*${label}: (.+)$`);
  return {
    recognize(line) {
      const m = pattern.exec(line);
      if (!m) return null;
      return { kind: "metadata", field, value: m[1].trim() };
    },
  };
}

/**
 * Recognizers in precedence order. The measurement shape is tried before
 * the section header, and the metadata labels come last; their literal
 * prefixes never overlap, so their relative order does not matter.
 */
export function buildRecognizers(options: { legacy?: boolean } = {}): Recognizer[] {
  const legacy = options.legacy ?? false;
  return [
    measurementRecognizer(legacy),
    sectionRecognizer(),
    ...METADATA_LABELS.map(([label, field]) => metadataRecognizer(label, field)),
  ];
}

/** First recognizer to match wins; anything else is `none` */
export function classifyLine(line: string, recognizers: readonly Recognizer[]): LineMatch {
  for (const recognizer of recognizers) {
    const match = recognizer.recognize(line);
    if (match) return match;
  }
  return NO_MATCH;
}
