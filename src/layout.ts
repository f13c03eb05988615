import fs from "fs";
import { pathToFileURL } from "url";
import { LayerRecord, LayoutRecord } from "./util.js";

export type LayoutOptions = {
  thickness: number;
  spacing: number;
  elevation: boolean;
  drawOnZero: boolean;
};

function boreholeIndex(rows: LayerRecord[]): Map<string, number> {
  const index = new Map<string, number>();
  for (const r of rows) {
    if (!index.has(r.borehole_name)) index.set(r.borehole_name, index.size);
  }
  return index;
}

function boreholeStarts(rows: LayerRecord[]): Map<string, number> {
  const starts = new Map<string, number>();
  for (const r of rows) {
    if (!starts.has(r.borehole_name)) starts.set(r.borehole_name, r.start);
  }
  return starts;
}

/**
 * Box coordinates for every layer. Columns are laid left to right in order of
 * first appearance; y follows the layer values, negated for depths and shifted
 * so each top sits at 0 when drawing elevations on zero.
 */
export function computeLayout(rows: LayerRecord[], opts: LayoutOptions): LayoutRecord[] {
  const index = boreholeIndex(rows);
  const starts = boreholeStarts(rows);
  const pitch = opts.thickness + opts.spacing;

  return rows.map((r) => {
    const x1 = pitch * (index.get(r.borehole_name) ?? 0);
    const x2 = opts.thickness + x1;
    const top = starts.get(r.borehole_name) ?? r.start;
    let y1: number;
    let y2: number;
    if (opts.elevation && opts.drawOnZero) {
      y1 = r.start - top;
      y2 = r.end - top;
    } else if (opts.elevation) {
      y1 = r.start;
      y2 = r.end;
    } else {
      // 0 - v rather than -v: a surface at depth 0 stays +0
      y1 = 0 - r.start;
      y2 = 0 - r.end;
    }
    return { ...r, x1, x2, y1, y2 };
  });
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const input = process.argv[2];
  const output = process.argv[3] ?? "-";
  const flags = new Set(process.argv.slice(4));
  const rows: LayerRecord[] = JSON.parse(fs.readFileSync(input, "utf8"));
  const out = computeLayout(rows, {
    thickness: 1,
    spacing: 5,
    elevation: flags.has("--elevation"),
    drawOnZero: !flags.has("--no-draw-on-zero"),
  });
  const data = JSON.stringify(out, null, 2);
  if (output === "-") {
    process.stdout.write(data);
  } else {
    fs.writeFileSync(output, data, "utf8");
  }
}
