import fs from "fs";
import { pathToFileURL } from "url";
import { ColorMap, ConfigError, Logger, PaletteError, Rgb, consoleLogger, isPlainObject, uniqueInOrder } from "./util.js";

export const DEFAULT_COLORSCALE = "Pastel1";

export type ColorEvaluation = {
  ok: boolean;
  colors: ColorMap;
};

function loadTable(file: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(fs.readFileSync(new URL(`../data/${file}`, import.meta.url), "utf8"));
  if (!isPlainObject(parsed)) throw new Error(`Color table ${file} is not an object`);
  return parsed;
}

function hexToRgb(hex: string): Rgb | undefined {
  const m = /^#([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i.exec(hex.trim());
  if (!m) return undefined;
  let digits = m[1];
  if (digits.length <= 4) {
    digits = digits
      .split("")
      .map((d) => d + d)
      .join("");
  }
  // alpha, if any, is dropped
  return [
    parseInt(digits.slice(0, 2), 16),
    parseInt(digits.slice(2, 4), 16),
    parseInt(digits.slice(4, 6), 16),
  ];
}

function buildNamedColors(): Map<string, Rgb> {
  const out = new Map<string, Rgb>();
  for (const [name, value] of Object.entries(loadTable("named_colors.json"))) {
    const rgb = typeof value === "string" ? hexToRgb(value) : undefined;
    if (rgb) out.set(name.toLowerCase(), rgb);
  }
  return out;
}

function buildPalettes(): Map<string, Rgb[]> {
  const out = new Map<string, Rgb[]>();
  for (const [name, value] of Object.entries(loadTable("palettes.json"))) {
    if (!Array.isArray(value)) continue;
    const colors = value
      .map((v) => (typeof v === "string" ? hexToRgb(v) : undefined))
      .filter((c): c is Rgb => c !== undefined);
    if (colors.length > 0) out.set(name, colors);
  }
  return out;
}

const namedColors = buildNamedColors();
const palettes = buildPalettes();

export function paletteNames(): string[] {
  return Array.from(palettes.keys());
}

function isChannel(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v) && v >= 0 && v <= 255;
}

/**
 * Resolves a user color to an RGB triple. Accepts `[r, g, b]` in 0..255, hex
 * strings, CSS color names, the one-letter base colors, `tab:` colors and gray
 * levels written as a string between "0" and "1".
 */
export function parseColor(value: unknown): Rgb | undefined {
  if (Array.isArray(value)) {
    if (value.length !== 3) return undefined;
    const [r, g, b] = value;
    if (!isChannel(r) || !isChannel(g) || !isChannel(b)) return undefined;
    return [Math.round(r), Math.round(g), Math.round(b)];
  }
  if (typeof value !== "string") return undefined;
  const s = value.trim();
  if (s.startsWith("#")) return hexToRgb(s);
  const named = namedColors.get(s.toLowerCase());
  if (named) return [...named];
  if (/^\d*\.?\d+$/.test(s)) {
    const level = Number(s);
    if (level >= 0 && level <= 1) {
      const v = Math.floor(level * 255);
      return [v, v, v];
    }
  }
  return undefined;
}

/**
 * Accepts the user's colors only if every material has a valid one. The first
 * missing or invalid entry rejects the whole map.
 */
// No prototype, so a material named "__proto__" is an ordinary key.
function emptyColorMap(): ColorMap {
  return Object.create(null);
}

export function evaluateUserColors(
  userColors: Record<string, unknown>,
  materials: string[],
  logger: Logger = consoleLogger,
): ColorEvaluation {
  const colors = emptyColorMap();
  for (const material of uniqueInOrder(materials)) {
    if (!Object.prototype.hasOwnProperty.call(userColors, material)) {
      logger.warn(`There is no color for ${material}. The dxf will be created with the program default colors.`);
      return { ok: false, colors: emptyColorMap() };
    }
    const rgb = parseColor(userColors[material]);
    if (!rgb) {
      logger.warn(`${material} has a non-valid color. The dxf will be created with the program default colors.`);
      return { ok: false, colors: emptyColorMap() };
    }
    colors[material] = rgb;
  }
  return { ok: true, colors };
}

/** Samples `palette` at evenly spaced points in [0, 1], one per material. */
export function synthesizeFromPalette(palette: string, materials: string[]): ColorMap {
  const table = palettes.get(palette);
  if (!table) throw new PaletteError(palette);
  const unique = uniqueInOrder(materials);
  const n = unique.length;
  const colors = emptyColorMap();
  unique.forEach((material, i) => {
    const x = n > 1 ? i / (n - 1) : 0;
    const idx = Math.min(Math.floor(x * table.length), table.length - 1);
    colors[material] = [...table[idx]];
  });
  return colors;
}

export function resolveColors(
  userColors: unknown,
  colorscale: string,
  materials: string[],
  logger: Logger = consoleLogger,
): ColorMap {
  if (userColors !== undefined && userColors !== null) {
    if (!isPlainObject(userColors)) {
      throw new ConfigError("colors must be a mapping of material names to RGB triples or color strings");
    }
    const evaluation = evaluateUserColors(userColors, materials, logger);
    if (evaluation.ok) return evaluation.colors;
  }
  return synthesizeFromPalette(colorscale, materials);
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const palette = process.argv[2];
  const materials = process.argv.slice(3);
  try {
    process.stdout.write(JSON.stringify(synthesizeFromPalette(palette, materials), null, 2));
  } catch (e: unknown) {
    console.error(e instanceof Error ? e.message : String(e));
    console.error(`Known palettes: ${paletteNames().join(", ")}`);
    process.exit(1);
  }
}
