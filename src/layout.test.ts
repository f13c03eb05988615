import { describe, it, expect } from "vitest";
import { computeLayout, LayoutOptions } from "./layout.js";
import { LayerRecord } from "./util.js";

const depth: LayoutOptions = { thickness: 1, spacing: 5, elevation: false, drawOnZero: true };

function layer(borehole_name: string, start: number, end: number, material = "clay"): LayerRecord {
  return { borehole_name, start, end, material };
}

describe("computeLayout", () => {
  it("negates depths so boxes go downwards", () => {
    const [a, b] = computeLayout([layer("A", 0, 2), layer("A", 2, 5)], depth);
    expect([a.x1, a.x2, a.y1, a.y2]).toEqual([0, 1, 0, -2]);
    expect([b.x1, b.x2, b.y1, b.y2]).toEqual([0, 1, -2, -5]);
  });

  it("ignores draw on zero in depth mode", () => {
    const rows = [layer("A", 3, 4)];
    expect(computeLayout(rows, { ...depth, drawOnZero: false })).toEqual(computeLayout(rows, depth));
  });

  it("shifts elevations so each borehole top is at zero", () => {
    const out = computeLayout([layer("A", 100, 95), layer("A", 95, 90)], { ...depth, elevation: true });
    expect(out.map((r) => [r.y1, r.y2])).toEqual([
      [0, -5],
      [-5, -10],
    ]);
  });

  it("keeps raw elevations when not drawing on zero", () => {
    const out = computeLayout([layer("A", 100, 95)], { ...depth, elevation: true, drawOnZero: false });
    expect([out[0].y1, out[0].y2]).toEqual([100, 95]);
  });

  it("shifts each borehole by its own top", () => {
    const out = computeLayout([layer("A", 100, 95), layer("B", 50, 48)], { ...depth, elevation: true });
    expect(out.map((r) => [r.y1, r.y2])).toEqual([
      [0, -5],
      [0, -2],
    ]);
  });

  it("places the second borehole one thickness plus one spacing to the right", () => {
    const out = computeLayout([layer("A", 0, 2), layer("B", 40, 80), layer("B", 80, 90)], depth);
    expect(out.map((r) => [r.x1, r.x2])).toEqual([
      [0, 1],
      [6, 7],
      [6, 7],
    ]);
  });

  it("orders columns by first appearance", () => {
    const out = computeLayout([layer("Z", 0, 1), layer("A", 0, 1)], { ...depth, thickness: 2, spacing: 3 });
    expect(out.map((r) => `${r.borehole_name}:${r.x1}-${r.x2}`)).toEqual(["Z:0-2", "A:5-7"]);
  });

  it("keeps the record fields", () => {
    const [r] = computeLayout([layer("A", 0, 2, "sand")], depth);
    expect(r).toEqual({ borehole_name: "A", start: 0, end: 2, material: "sand", x1: 0, x2: 1, y1: 0, y2: -2 });
  });

  it("is deterministic", () => {
    const rows = [layer("A", 0, 2), layer("B", 1, 3)];
    expect(computeLayout(rows, depth)).toEqual(computeLayout(rows, depth));
  });
});
