import fs from "fs";

export type Rgb = [number, number, number];

export type ColorMap = Record<string, Rgb>;

/** One material interval of one borehole, after sanitizing. */
export type LayerRecord = {
  borehole_name: string;
  start: number;
  end: number;
  material: string;
};

export type LayoutBox = {
  x1: number;
  x2: number;
  y1: number;
  y2: number;
};

export type LayoutRecord = LayerRecord & LayoutBox;

export type RawRow = Record<string, unknown>;

export type Logger = {
  info(message: string): void;
  warn(message: string): void;
};

export const consoleLogger: Logger = {
  info: (message) => console.error(`borehole2d: ${message}`),
  warn: (message) => console.error(`borehole2d: warning: ${message}`),
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
};

export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}

export class PaletteError extends Error {
  constructor(readonly palette: string) {
    super(`Error creating the colors dict. Verify the colorscale name you provided: ${palette}`);
    this.name = "PaletteError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class DrawingIOError extends Error {
  constructor(readonly path: string, cause?: unknown) {
    super(`Error saving the drawing to ${path}${cause instanceof Error ? `: ${cause.message}` : ""}`);
    this.name = "DrawingIOError";
  }
}

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Distinct values in order of first appearance. */
export function uniqueInOrder(values: string[]): string[] {
  return Array.from(new Set(values));
}
