import { DrawingSurface, Point } from "./dxf_surface.js";
import { ColorMap, DrawingIOError, LayoutRecord, Rgb, uniqueInOrder } from "./util.js";

/** Fixed drawing layers besides the one-per-material layers. */
export const FIXED_LAYERS: Record<string, Rgb> = {
  legend_boxes: [255, 255, 255],
  legend_text: [255, 255, 255],
  dimension_text: [255, 255, 255],
  borehole_boxes: [255, 255, 255],
  borehole_text: [255, 255, 255],
};

export const LEGEND_X = -20;
export const LEGEND_BOX_HEIGHT = 1;
export const LEGEND_BOX_GAP = 0.5;
export const LEGEND_BOX_WIDTH = 1.618;

export type RenderToggles = {
  legend: boolean;
  dimension: boolean;
  boreholeName: boolean;
};

function rect(x1: number, y1: number, x2: number, y2: number): Point[] {
  return [
    { x: x1, y: y1 },
    { x: x2, y: y1 },
    { x: x2, y: y2 },
    { x: x1, y: y2 },
  ];
}

/** Two decimals, ties to even. */
function round2(v: number): number {
  const scaled = v * 100;
  const floor = Math.floor(scaled);
  const frac = scaled - floor;
  let n = frac > 0.5 ? floor + 1 : floor;
  if (frac === 0.5 && floor % 2 !== 0) n = floor + 1;
  return n / 100;
}

/** Materials in order of first appearance; object key order is not reliable for numeric names. */
export function materialOrder(records: Array<{ material: string }>): string[] {
  return uniqueInOrder(records.map((r) => r.material));
}

// Characters DXF does not allow in a layer name.
const ILLEGAL_LAYER_CHARS = /[<>\/\\":;?*|=`]/g;

// Layer names are case-insensitive in DXF; "0" and "Defpoints" always exist.
const RESERVED_LAYERS = ["0", "defpoints", ...Object.keys(FIXED_LAYERS)];

/**
 * Maps each material to the layer it is drawn on: illegal characters become
 * "_", and a name already taken (ignoring case) by a fixed layer or an earlier
 * material gets a numeric suffix.
 */
export function materialLayers(materials: string[]): Map<string, string> {
  const taken = new Set(RESERVED_LAYERS.map((n) => n.toLowerCase()));
  const layers = new Map<string, string>();
  for (const material of materials) {
    if (layers.has(material)) continue;
    const base = material.replace(ILLEGAL_LAYER_CHARS, "_").trim() || "material";
    let name = base;
    for (let i = 2; taken.has(name.toLowerCase()); i += 1) name = `${base}_${i}`;
    taken.add(name.toLowerCase());
    layers.set(material, name);
  }
  return layers;
}

function layerOf(layers: Map<string, string>, material: string): string {
  return layers.get(material) ?? material;
}

export function createLayers(
  surface: DrawingSurface,
  colors: ColorMap,
  materials: string[],
  layers = materialLayers(materials),
): void {
  for (const m of materials) surface.addLayer(layerOf(layers, m), colors[m]);
  for (const [name, color] of Object.entries(FIXED_LAYERS)) surface.addLayer(name, color);
}

export function drawLog(
  surface: DrawingSurface,
  records: LayoutRecord[],
  layers = materialLayers(materialOrder(records)),
): void {
  for (const r of records) {
    surface.addFilledBox(rect(r.x1, r.y1, r.x2, r.y2), {
      outlineLayer: "borehole_boxes",
      fillLayer: layerOf(layers, r.material),
    });
  }
}

export function drawLegend(surface: DrawingSurface, materials: string[], layers = materialLayers(materials)): void {
  materials.forEach((material, i) => {
    const y1 = -LEGEND_BOX_HEIGHT - i * (LEGEND_BOX_HEIGHT + LEGEND_BOX_GAP);
    const x2 = LEGEND_X + LEGEND_BOX_WIDTH;
    surface.addFilledBox(rect(LEGEND_X, y1, x2, y1 + LEGEND_BOX_HEIGHT), {
      outlineLayer: "legend_boxes",
      fillLayer: layerOf(layers, material),
    });
    surface.addText(material, { x: x2 + 1, y: y1 + LEGEND_BOX_HEIGHT / 2 }, {
      height: 1,
      layer: "legend_text",
      align: "middle-left",
    });
  });
}

/**
 * Writes the start and end value beside every box. A boundary shared by two
 * layers with the same value is labelled once.
 */
export function drawDimensions(surface: DrawingSurface, records: LayoutRecord[]): number {
  const drawn = new Set<string>();
  for (const r of records) {
    const x = r.x1 - 0.5;
    const labels: Array<[number, string]> = [
      [r.y1, String(round2(r.start))],
      [r.y2, String(round2(r.end))],
    ];
    for (const [y, text] of labels) {
      const key = `${x}|${y}|${text}`;
      if (drawn.has(key)) continue;
      surface.addText(text, { x, y }, { height: 0.5, layer: "dimension_text", align: "middle-right" });
      drawn.add(key);
    }
  }
  return drawn.size;
}

export function drawBoreholeNames(surface: DrawingSurface, records: LayoutRecord[]): void {
  const columns = new Map<string, { x: number; top: number }>();
  for (const r of records) {
    const top = Math.max(r.y1, r.y2);
    const col = columns.get(r.borehole_name);
    if (!col) {
      columns.set(r.borehole_name, { x: (r.x1 + r.x2) / 2, top });
    } else if (top > col.top) {
      col.top = top;
    }
  }
  for (const [name, col] of columns) {
    surface.addText(name, { x: col.x, y: col.top + 2 }, { height: 0.5, layer: "borehole_text", align: "center" });
  }
}

export function renderDrawing(
  surface: DrawingSurface,
  records: LayoutRecord[],
  colors: ColorMap,
  toggles: RenderToggles,
): void {
  const materials = materialOrder(records);
  const layers = materialLayers(materials);
  createLayers(surface, colors, materials, layers);
  drawLog(surface, records, layers);
  if (toggles.legend) drawLegend(surface, materials, layers);
  if (toggles.dimension) drawDimensions(surface, records);
  if (toggles.boreholeName) drawBoreholeNames(surface, records);
}

export function saveDrawing(surface: DrawingSurface, path: string): void {
  try {
    surface.save(path);
  } catch (e: unknown) {
    throw new DrawingIOError(path, e);
  }
}
