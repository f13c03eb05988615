import { describe, it, expect } from "vitest";
import { findGapsAndOverlaps, reportGapsAndOverlaps } from "./gaps.js";
import { recordingLogger } from "./testing.js";
import { LayerRecord } from "./util.js";

function layer(borehole_name: string, start: number, end: number): LayerRecord {
  return { borehole_name, start, end, material: "clay" };
}

describe("findGapsAndOverlaps", () => {
  it("flags a gap inside one borehole", () => {
    const rows = [layer("A", 0, 2), layer("A", 3, 5)];
    expect(findGapsAndOverlaps(rows)).toEqual([rows[1]]);
  });

  it("flags an overlap inside one borehole", () => {
    const rows = [layer("A", 0, 3), layer("A", 2, 5)];
    expect(findGapsAndOverlaps(rows)).toEqual([rows[1]]);
  });

  it("never flags across boreholes", () => {
    expect(findGapsAndOverlaps([layer("A", 0, 2), layer("B", 0, 2)])).toEqual([]);
    expect(findGapsAndOverlaps([layer("A", 0, 2), layer("B", 10, 12)])).toEqual([]);
  });

  it("never flags the first row", () => {
    expect(findGapsAndOverlaps([layer("A", 4, 6)])).toEqual([]);
  });

  it("accepts continuous elevation layers", () => {
    expect(findGapsAndOverlaps([layer("A", 100, 95), layer("A", 95, 90)])).toEqual([]);
  });
});

describe("reportGapsAndOverlaps", () => {
  it("logs and returns the count", () => {
    const logger = recordingLogger();
    const n = reportGapsAndOverlaps([layer("A", 0, 2), layer("A", 3, 5), layer("A", 4, 6)], logger);
    expect(n).toBe(2);
    expect(logger.lines).toEqual(["Number of layers with gaps or overlaps: 2"]);
  });

  it("reports zero for an empty set", () => {
    const logger = recordingLogger();
    expect(reportGapsAndOverlaps([], logger)).toBe(0);
  });
});
