import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { isReportEncoding, REPORT_ENCODINGS } from "./encoding.js";
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from "./writers.js";
import type { ReportEncoding } from "../parsers/types.js";

export interface DiskmarkConfig {
  encoding: ReportEncoding;
  format: OutputFormat;
  legacy: boolean;
}

export const CONFIG_KEYS = ["encoding", "format", "legacy"] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

const DEFAULT_CONFIG: DiskmarkConfig = {
  encoding: "utf-8",
  format: "table",
  legacy: false,
};

/** `$DISKMARK_HOME`, or ~/.diskmark */
export function diskmarkHome(): string {
  if (process.env.DISKMARK_HOME) return process.env.DISKMARK_HOME;
  const home = process.env.HOME ?? process.env.USERPROFILE ?? "~";
  return join(home, ".diskmark");
}

export function configPath(): string {
  return join(diskmarkHome(), "config.json");
}

/** Keep only known keys with valid values; the rest fall back to defaults */
function sanitize(raw: unknown): DiskmarkConfig {
  const cfg = { ...DEFAULT_CONFIG };
  if (typeof raw !== "object" || raw === null) return cfg;
  const source = new Map(Object.entries(raw));
  const encoding = source.get("encoding");
  const format = source.get("format");
  const legacy = source.get("legacy");
  if (typeof encoding === "string" && isReportEncoding(encoding)) cfg.encoding = encoding;
  if (typeof format === "string" && isOutputFormat(format)) cfg.format = format;
  if (typeof legacy === "boolean") cfg.legacy = legacy;
  return cfg;
}

/** Read config from disk. Returns defaults if file doesn't exist. */
export function loadConfig(path = configPath()): DiskmarkConfig {
  if (!existsSync(path)) {
    return { ...DEFAULT_CONFIG };
  }
  try {
    return sanitize(JSON.parse(readFileSync(path, "utf-8")));
  } catch {
    // Unreadable config is treated as absent
    return { ...DEFAULT_CONFIG };
  }
}

/** Write config to disk. Creates parent dirs if needed. */
export function saveConfig(config: DiskmarkConfig, path = configPath()): void {
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2) + "\n", "utf-8");
}

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

/**
 * Apply `key=value` to a config. Returns an error message instead of
 * throwing so callers can decide how to report it.
 */
export function applyConfigValue(
  config: DiskmarkConfig,
  key: ConfigKey,
  value: string
): { config: DiskmarkConfig } | { error: string } {
  switch (key) {
    case "encoding":
      if (!isReportEncoding(value)) {
        return { error: `Invalid encoding: "${value}". Valid: ${REPORT_ENCODINGS.join(", ")}` };
      }
      return { config: { ...config, encoding: value } };
    case "format":
      if (!isOutputFormat(value)) {
        return { error: `Invalid format: "${value}". Valid: ${OUTPUT_FORMATS.join(", ")}` };
      }
      return { config: { ...config, format: value } };
    case "legacy":
      if (value !== "true" && value !== "false") {
        return { error: `Invalid legacy value: "${value}". Valid: true, false` };
      }
      return { config: { ...config, legacy: value === "true" } };
  }
}
