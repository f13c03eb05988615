import { resolveColors } from "./colors.js";
import { DrawingSurface, DxfSurface } from "./dxf_surface.js";
import { reportGapsAndOverlaps } from "./gaps.js";
import { computeLayout } from "./layout.js";
import { DrawOptions, mergeOptions } from "./options.js";
import { materialOrder, renderDrawing, saveDrawing } from "./render_dxf.js";
import { sanitizeRecords } from "./sanitize.js";
import { ColorMap, LayoutRecord, Logger, RawRow, consoleLogger } from "./util.js";

export type Borehole2DDeps = {
  logger?: Logger;
  surface?: DrawingSurface;
};

export type Borehole2DResult = {
  path: string;
  records: LayoutRecord[];
  colors: ColorMap;
  valueErrors: number;
  gapsAndOverlaps: number;
};

/**
 * Draws the boreholes described by `rows` and saves the drawing to
 * `options.path` (borehole2D.dxf by default).
 */
export function borehole2D(
  rows: RawRow[],
  opts: DrawOptions = mergeOptions(),
  deps: Borehole2DDeps = {},
): Borehole2DResult {
  const logger = deps.logger ?? consoleLogger;
  const surface = deps.surface ?? new DxfSurface();

  const sanitized = sanitizeRecords(rows, opts.elevation, logger);
  const colors = resolveColors(opts.colors, opts.colorscale, materialOrder(sanitized), logger);
  const gapsAndOverlaps = reportGapsAndOverlaps(sanitized, logger);
  const records = computeLayout(sanitized, {
    thickness: opts.borehole_thickness,
    spacing: opts.space_between_boreholes,
    elevation: opts.elevation,
    drawOnZero: opts.draw_on_zero,
  });

  renderDrawing(surface, records, colors, {
    legend: opts.legend,
    dimension: opts.dimension,
    boreholeName: opts.borehole_name,
  });
  saveDrawing(surface, opts.path);

  return {
    path: opts.path,
    records,
    colors,
    valueErrors: rows.length - sanitized.length,
    gapsAndOverlaps,
  };
}
