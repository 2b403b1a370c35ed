/**
 * Shared test helpers.
 */
import { mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

/** Build one result line in the report's own layout */
export function resultLine(
  token: string,
  rate: string,
  opts: { block?: string; queues?: number; threads?: number; iops?: string; latency?: string } = {}
): string {
  const block = opts.block ?? "1MiB";
  const queues = String(opts.queues ?? 8).padStart(3);
  const threads = String(opts.threads ?? 1).padStart(2);
  const iops = (opts.iops ?? "506.8").padStart(9);
  const latency = (opts.latency ?? "15726.77").padStart(9);
  return `  ${token.padEnd(4)} ${block} (Q=${queues}, T=${threads}): ${rate.padStart(9)} MB/s [${iops} IOPS] <${latency} us>`;
}

/** Fresh temp directory for a test */
export function tempDir(prefix = "diskmark-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/** Console output captured by a vi.spyOn mock, one call per line */
export function captured(calls: unknown[][]): string {
  return calls.map((args) => args.map(String).join(" ")).join("\n");
}
