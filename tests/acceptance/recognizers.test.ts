import { describe, it, expect } from "vitest";
import { buildRecognizers, classifyLine } from "../../src/parsers/recognizers.js";
import { resultLine } from "./helpers.js";

describe("Story 1.1: Line recognizers", () => {
  const recognizers = buildRecognizers();

  it("captures every field of a result line", () => {
    const match = classifyLine(
      "  RND    4KiB (Q= 32, T=16):  1,250.117 MB/s [ 305,204.3 IOPS] <  1675.32 us>",
      recognizers
    );
    expect(match).toEqual({
      kind: "measurement",
      capture: {
        token: "RND",
        blockSize: "4",
        blockSizeUnit: "KiB",
        queues: "32",
        threads: "16",
        rate: "1,250.117",
        rateUnit: "MB/s",
        iops: "305,204.3",
        iopsUnit: "IOPS",
        latency: "1675.32",
        latencyUnit: "us",
      },
    });
  });

  it("accepts the long Sequential/Random tokens", () => {
    expect(classifyLine(resultLine("Sequential", "182.406"), recognizers).kind).toBe("measurement");
    expect(classifyLine(resultLine("Random", "1.204", { block: "4KiB" }), recognizers).kind).toBe("measurement");
  });

  it("rejects a line that is missing part of the result shape", () => {
    // no latency
    expect(classifyLine("  SEQ    1MiB (Q=  8, T= 1):   531.458 MB/s [    506.8 IOPS]", recognizers)).toEqual({
      kind: "none",
    });
  });

  it("recognizes section headers, including the Mix ratio suffix", () => {
    expect(classifyLine("[Read]", recognizers)).toEqual({ kind: "section", section: "read" });
    expect(classifyLine("  [Write]  ", recognizers)).toEqual({ kind: "section", section: "write" });
    expect(classifyLine("[Mix] Read 70%/Write 30%", recognizers)).toEqual({ kind: "section", section: "mix" });
  });

  it("section tokens are case-sensitive", () => {
    expect(classifyLine("[read]", recognizers).kind).toBe("none");
    expect(classifyLine("[MIX]", recognizers).kind).toBe("none");
  });

  it("maps each metadata label to its field, trimmed", () => {
    expect(classifyLine("Profile: Default", recognizers)).toEqual({
      kind: "metadata",
      field: "profile",
      value: "Default",
    });
    expect(classifyLine("   Test: 1 GiB (x5) [E: 96% (894/932GiB)]  ", recognizers)).toEqual({
      kind: "metadata",
      field: "testLabel",
      value: "1 GiB (x5) [E: 96% (894/932GiB)]",
    });
    expect(classifyLine("   Mode: [Admin]", recognizers)).toEqual({ kind: "metadata", field: "mode", value: "[Admin]" });
    expect(classifyLine("   Time: Measure 5 sec / Interval 5 sec", recognizers)).toEqual({
      kind: "metadata",
      field: "measurementTime",
      value: "Measure 5 sec / Interval 5 sec",
    });
    expect(classifyLine("   Date: 2026/03/14 9:12:08", recognizers)).toEqual({
      kind: "metadata",
      field: "date",
      value: "2026/03/14 9:12:08",
    });
    expect(classifyLine("     OS: Windows 10  [10.0 Build 19045] (x64)", recognizers)).toEqual({
      kind: "metadata",
      field: "operatingSystem",
      value: "Windows 10  [10.0 Build 19045] (x64)",
    });
    expect(classifyLine("Comment: spare drive", recognizers)).toEqual({
      kind: "metadata",
      field: "comment",
      value: "spare drive",
    });
  });

  it("ignores a label with nothing after it", () => {
    expect(classifyLine("Comment: ", recognizers).kind).toBe("none");
  });

  it("ignores banners and blank lines", () => {
    for (const line of [
      "",
      "------------------------------------------------------------------------------",
      "CrystalDiskMark 8.0.4 x64 (C) 2007-2021 hiyohiyo",
      "                                  Crystal Dew World: https://crystalmark.info/",
      "* MB/s = 1,000,000 bytes/s [SATA/600 = 600,000,000 bytes/s]",
    ]) {
      expect(classifyLine(line, recognizers)).toEqual({ kind: "none" });
    }
  });

  it("legacy grammar drops long tokens but keeps every section", () => {
    const legacy = buildRecognizers({ legacy: true });
    expect(classifyLine(resultLine("SEQ", "531.458"), legacy).kind).toBe("measurement");
    expect(classifyLine(resultLine("Sequential", "531.458"), legacy).kind).toBe("none");
    expect(classifyLine("[Mix] Read 70%/Write 30%", legacy)).toEqual({ kind: "section", section: "mix" });
    expect(classifyLine("[Write]", legacy)).toEqual({ kind: "section", section: "write" });
  });
});
