import fs from "fs";
import yaml from "js-yaml";
import { DEFAULT_COLORSCALE } from "./colors.js";
import { ConfigError, isPlainObject } from "./util.js";

export type DrawOptions = {
  borehole_thickness: number;
  space_between_boreholes: number;
  legend: boolean;
  borehole_name: boolean;
  dimension: boolean;
  elevation: boolean;
  draw_on_zero: boolean;
  /** Material → color; checked when colors are resolved, not here. */
  colors?: unknown;
  colorscale: string;
  path: string;
};

export const DEFAULT_PATH = "borehole2D.dxf";

export const defaultOptions: DrawOptions = {
  borehole_thickness: 1,
  space_between_boreholes: 5,
  legend: true,
  borehole_name: true,
  dimension: true,
  elevation: false,
  draw_on_zero: true,
  colors: undefined,
  colorscale: DEFAULT_COLORSCALE,
  path: DEFAULT_PATH,
};

function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

function asBool(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (v === "true") return true;
  if (v === "false") return false;
  return undefined;
}

function asStr(v: unknown): string | undefined {
  return typeof v === "string" && v.trim().length > 0 ? v : undefined;
}

export function mergeOptions(raw?: unknown): DrawOptions {
  if (raw === undefined || raw === null) return { ...defaultOptions };
  if (!isPlainObject(raw)) throw new ConfigError("Options must be a mapping of option names to values");
  const d = defaultOptions;
  return {
    borehole_thickness: asNum(raw.borehole_thickness) ?? d.borehole_thickness,
    space_between_boreholes: asNum(raw.space_between_boreholes) ?? d.space_between_boreholes,
    legend: asBool(raw.legend) ?? d.legend,
    borehole_name: asBool(raw.borehole_name) ?? d.borehole_name,
    dimension: asBool(raw.dimension) ?? d.dimension,
    elevation: asBool(raw.elevation) ?? d.elevation,
    draw_on_zero: asBool(raw.draw_on_zero) ?? d.draw_on_zero,
    colors: raw.colors ?? undefined,
    colorscale: asStr(raw.colorscale) ?? d.colorscale,
    path: asStr(raw.path) ?? d.path,
  };
}

export function loadOptions(file: string): DrawOptions {
  return mergeOptions(yaml.load(fs.readFileSync(file, "utf8")));
}
