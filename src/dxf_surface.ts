import fs from "fs";
import {
  DxfWriter,
  HatchBoundaryPaths,
  HatchPolylineBoundary,
  HatchPredefinedPatterns,
  LWPolylineFlags,
  TextHorizontalAlignment,
  TextVerticalAlignment,
  pattern,
  point2d,
  point3d,
  vertex,
} from "@tarikjabiri/dxf";
import { Rgb } from "./util.js";

export type Point = { x: number; y: number };

export type TextAlign = "left" | "middle-left" | "middle-right" | "center";

export type BoxStyle = {
  outlineLayer: string;
  fillLayer: string;
};

export type TextStyle = {
  height: number;
  layer: string;
  align: TextAlign;
};

/** What the emitter needs from a drawing document. */
export interface DrawingSurface {
  addLayer(name: string, color: Rgb): void;
  /** Closed outline plus a solid fill traced on the same corners. */
  addFilledBox(corners: Point[], style: BoxStyle): void;
  addText(text: string, at: Point, style: TextStyle): void;
  save(path: string): void;
}

const ALIGNMENTS: Record<TextAlign, [TextHorizontalAlignment, TextVerticalAlignment]> = {
  left: [TextHorizontalAlignment.Left, TextVerticalAlignment.BaseLine],
  "middle-left": [TextHorizontalAlignment.Left, TextVerticalAlignment.Middle],
  "middle-right": [TextHorizontalAlignment.Right, TextVerticalAlignment.Middle],
  center: [TextHorizontalAlignment.Center, TextVerticalAlignment.BaseLine],
};

const WHITE_ACI = 7;

export function trueColor([r, g, b]: Rgb): number {
  return (r << 16) | (g << 8) | b;
}

export class DxfSurface implements DrawingSurface {
  private readonly dxf = new DxfWriter();
  private readonly layers = new Set<string>();

  // Names are compared the way CAD programs do, ignoring case.
  addLayer(name: string, color: Rgb): void {
    const key = name.toLowerCase();
    if (this.layers.has(key)) return;
    const layer = this.dxf.addLayer(name, WHITE_ACI, "CONTINUOUS");
    layer.trueColor = trueColor(color);
    this.layers.add(key);
  }

  addFilledBox(corners: Point[], style: BoxStyle): void {
    // Hatch first so the outline draws on top of it.
    const path = new HatchPolylineBoundary();
    for (const c of corners) path.add(vertex(c.x, c.y));
    const boundary = new HatchBoundaryPaths();
    boundary.addPolylineBoundary(path);
    this.dxf.addHatch(boundary, pattern({ name: HatchPredefinedPatterns.SOLID }), {
      layerName: style.fillLayer,
    });
    this.dxf.addLWPolyline(
      corners.map((c) => ({ point: point2d(c.x, c.y) })),
      { flags: LWPolylineFlags.Closed, layerName: style.outlineLayer },
    );
  }

  addText(text: string, at: Point, style: TextStyle): void {
    const [horizontalAlignment, verticalAlignment] = ALIGNMENTS[style.align];
    const p = point3d(at.x, at.y, 0);
    this.dxf.addText(p, style.height, text, {
      layerName: style.layer,
      horizontalAlignment,
      verticalAlignment,
      // non-default alignments are placed by the second point
      secondAlignmentPoint: p,
    });
  }

  toString(): string {
    return this.dxf.stringify();
  }

  save(path: string): void {
    fs.writeFileSync(path, this.toString(), "utf8");
  }
}
