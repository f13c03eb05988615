import { describe, it, expect } from "vitest";
import { DxfSurface, trueColor } from "./dxf_surface.js";
import { renderDrawing } from "./render_dxf.js";
import { ColorMap, LayoutRecord } from "./util.js";

type Tagged = { layers: string[]; entityLayers: Array<[string, string]> };

/** Reads LAYER table names and the layer of every HATCH and LWPOLYLINE out of DXF text. */
function readLayers(dxf: string): Tagged {
  const lines = dxf.split(/\r?\n/).map((l) => l.trim());
  const out: Tagged = { layers: [], entityLayers: [] };
  let current = "";
  for (let i = 0; i + 1 < lines.length; i += 2) {
    const [code, value] = [lines[i], lines[i + 1]];
    if (code === "0") current = value;
    else if (code === "2" && current === "LAYER") out.layers.push(value);
    else if (code === "8" && (current === "HATCH" || current === "LWPOLYLINE")) out.entityLayers.push([current, value]);
  }
  return out;
}

function column(material: string, start: number, end: number): LayoutRecord {
  return { borehole_name: "BH1", start, end, material, x1: 0, x2: 1, y1: 0 - start, y2: 0 - end };
}

describe("trueColor", () => {
  it("packs RGB into one integer", () => {
    expect(trueColor([255, 0, 0])).toBe(16711680);
    expect(trueColor([0, 128, 255])).toBe(33023);
    expect(trueColor([255, 255, 255])).toBe(16777215);
  });
});

describe("DxfSurface", () => {
  it("writes layers, hatched boxes and texts", () => {
    const s = new DxfSurface();
    s.addLayer("clay", [200, 150, 100]);
    s.addLayer("borehole_boxes", [255, 255, 255]);
    s.addFilledBox(
      [
        { x: 0, y: 0 },
        { x: 1, y: 0 },
        { x: 1, y: -2 },
        { x: 0, y: -2 },
      ],
      { outlineLayer: "borehole_boxes", fillLayer: "clay" },
    );
    s.addText("BH1", { x: 0.5, y: 2 }, { height: 0.5, layer: "borehole_boxes", align: "center" });
    const text = s.toString();
    expect(text).toContain("HATCH");
    expect(text).toContain("SOLID");
    expect(text).toContain("LWPOLYLINE");
    expect(text).toContain("BH1");
    expect(text).toContain("clay");
  });

  it("adds a layer name only once", () => {
    const s = new DxfSurface();
    s.addLayer("clay", [1, 2, 3]);
    expect(() => s.addLayer("clay", [4, 5, 6])).not.toThrow();
  });

  it("adds names that differ only in case once", () => {
    const s = new DxfSurface();
    s.addLayer("Clay", [1, 2, 3]);
    s.addLayer("clay", [4, 5, 6]);
    expect(readLayers(s.toString()).layers.filter((n) => n.toLowerCase() === "clay")).toEqual(["Clay"]);
  });

  it("hatches every material on a layer that exists in the table", () => {
    const s = new DxfSurface();
    const records = [
      column("sand/gravel", 0, 1),
      column("Clay", 1, 2),
      column("clay", 2, 3),
      column("borehole_boxes", 3, 4),
    ];
    const colors: ColorMap = { "sand/gravel": [1, 1, 1], Clay: [2, 2, 2], clay: [3, 3, 3], borehole_boxes: [4, 4, 4] };
    renderDrawing(s, records, colors, { legend: false, dimension: false, boreholeName: false });
    const { layers, entityLayers } = readLayers(s.toString());
    const hatched = entityLayers.filter(([type]) => type === "HATCH").map(([, layer]) => layer);
    expect(hatched).toEqual(["sand_gravel", "Clay", "clay_2", "borehole_boxes_2"]);
    for (const [, layer] of entityLayers) expect(layers).toContain(layer);
    expect(layers.filter((n) => n.toLowerCase() === "borehole_boxes")).toEqual(["borehole_boxes"]);
  });
});
