import { describe, it, expect } from "vitest";
import { parseLines } from "../../src/parsers/report.js";
import { TABLE_COLUMNS, toRows, rowValues, formatTable } from "../../src/core/table.js";
import { resultLine } from "./helpers.js";

const SCENARIO = [
  "Profile: Default",
  "Test: 1 GiB (x5)",
  "[Read]",
  "SEQ    1MiB (Q= 8, T= 1):   531.458 MB/s [   506.8 IOPS] <   15726.77 us>",
  "[Write]",
  "SEQ    1MiB (Q= 8, T= 1):   500.000 MB/s [   480.0 IOPS] <   16000.00 us>",
];

describe("Story 2.1: Flattened rows", () => {
  it("has the fixed column set", () => {
    expect([...TABLE_COLUMNS]).toEqual([
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
    ]);
  });

  it("produces one row per measurement with run metadata repeated", () => {
    const rows = toRows(parseLines(SCENARIO));

    expect(rows).toHaveLength(2);
    expect(rows[0]).toEqual({
      date: null,
      test: "1 GiB (x5)",
      time: null,
      os: null,
      mode: null,
      profile: "Default",
      comment: null,
      read_write_mix: "read",
      type: "SEQ",
      blocksize: 1,
      unit_blocksize: "MiB",
      queues: 8,
      threads: 1,
      rate: 531.458,
      unit_rate: "MB/s",
      iops: 506.8,
      unit_iops: "IOPS",
      latency: 15726.77,
      unit_latency: "us",
    });
    expect(rows[1].read_write_mix).toBe("write");
    expect(rows[1].profile).toBe("Default");
  });

  it("orders read rows, then write rows, then mix rows", () => {
    const run = parseLines([
      "[Mix]",
      resultLine("SEQ", "1.000"),
      "[Write]",
      resultLine("SEQ", "2.000"),
      "[Read]",
      resultLine("SEQ", "3.000"),
      "[Write]",
      resultLine("SEQ", "4.000"),
    ]);

    expect(toRows(run).map((r) => [r.read_write_mix, r.rate])).toEqual([
      ["read", 3],
      ["write", 2],
      ["write", 4],
      ["mix", 1],
    ]);
  });

  it("rowValues follows the column order", () => {
    const [row] = toRows(parseLines(SCENARIO));
    expect(rowValues(row)).toEqual([
      null,
      "1 GiB (x5)",
      null,
      null,
      null,
      "Default",
      null,
      "read",
      "SEQ",
      1,
      "MiB",
      8,
      1,
      531.458,
      "MB/s",
      506.8,
      "IOPS",
      15726.77,
      "us",
    ]);
  });

  it("an empty run has no rows", () => {
    expect(toRows(parseLines([]))).toEqual([]);
  });
});

describe("Story 2.2: Terminal table", () => {
  it("pads columns to the widest cell", () => {
    const text = formatTable(
      ["a", "bb"],
      [
        [1, null],
        ["xyz", "q"],
      ]
    );
    expect(text).toBe("a    bb\n1\nxyz  q");
  });
});

describe("Story 2.4: Library entry point", () => {
  it("re-exports the parser and the flattening", async () => {
    const lib = await import("../../src/lib.js");
    const rows = lib.toRows(lib.parseLines(SCENARIO));

    expect(rows.map((r) => r.read_write_mix)).toEqual(["read", "write"]);
    expect(lib.TABLE_COLUMNS).toHaveLength(19);
    expect(new lib.ClassificationError(3, "x").code).toBe("classification");
  });
});
