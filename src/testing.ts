import { BoxStyle, DrawingSurface, Point, TextStyle } from "./dxf_surface.js";
import { Logger, Rgb } from "./util.js";

/** Keeps every message in `lines`; warnings are also kept in `warnings`. */
export type RecordingLogger = Logger & { lines: string[]; warnings: string[] };

export function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  const warnings: string[] = [];
  return {
    lines,
    warnings,
    info: (message) => lines.push(message),
    warn: (message) => {
      lines.push(message);
      warnings.push(message);
    },
  };
}

/** In-memory surface that remembers every primitive it was given. */
export class RecordingSurface implements DrawingSurface {
  layers: Array<{ name: string; color: Rgb }> = [];
  boxes: Array<{ corners: Point[]; style: BoxStyle }> = [];
  texts: Array<{ text: string; at: Point; style: TextStyle }> = [];
  savedTo: string[] = [];

  addLayer(name: string, color: Rgb): void {
    this.layers.push({ name, color });
  }

  addFilledBox(corners: Point[], style: BoxStyle): void {
    this.boxes.push({ corners, style });
  }

  addText(text: string, at: Point, style: TextStyle): void {
    this.texts.push({ text, at, style });
  }

  save(path: string): void {
    this.savedTo.push(path);
  }

  textsOn(layer: string): Array<{ text: string; at: Point; style: TextStyle }> {
    return this.texts.filter((t) => t.style.layer === layer);
  }
}
