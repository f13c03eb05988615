import fs from "fs";
import yaml from "js-yaml";
import { pathToFileURL } from "url";
import { LayerRecord, Logger, RawRow, SchemaError, consoleLogger, isPlainObject } from "./util.js";

export const REQUIRED_COLUMNS = ["borehole_name", "start", "end", "material"] as const;

export const UNSPECIFIED_MATERIAL = "unspecified soil";

function missingColumns(rows: RawRow[]): string[] {
  const seen = new Set<string>();
  for (const r of rows) {
    for (const k of Object.keys(r)) seen.add(k);
  }
  return REQUIRED_COLUMNS.filter((c) => !seen.has(c));
}

// Only native numbers count; "5" read from a spreadsheet cell is a value error.
function isNumeric(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

function asText(v: unknown): string {
  return String(v);
}

function asMaterial(v: unknown): string {
  if (v === undefined || v === null) return UNSPECIFIED_MATERIAL;
  if (typeof v === "number" && Number.isNaN(v)) return UNSPECIFIED_MATERIAL;
  return String(v);
}

export function compareLayers(elevation: boolean) {
  return (a: LayerRecord, b: LayerRecord): number => {
    if (a.borehole_name !== b.borehole_name) return a.borehole_name < b.borehole_name ? -1 : 1;
    return elevation ? b.start - a.start : a.start - b.start;
  };
}

/**
 * Checks the required columns, drops rows whose start/end are not numbers and
 * sorts the rest by borehole, then by start (descending when the values are
 * elevations).
 */
export function sanitizeRecords(rows: RawRow[], elevation = false, logger: Logger = consoleLogger): LayerRecord[] {
  const missing = missingColumns(rows);
  if (missing.length > 0) {
    throw new SchemaError(
      `The records do not have one of the following columns: ${REQUIRED_COLUMNS.join(", ")} (missing: ${missing.join(", ")})`,
    );
  }

  const valid: LayerRecord[] = [];
  let valueErrors = 0;
  for (const r of rows) {
    const start = r.start;
    const end = r.end;
    if (!isNumeric(start) || !isNumeric(end)) {
      valueErrors += 1;
      continue;
    }
    valid.push({
      borehole_name: asText(r.borehole_name),
      start,
      end,
      material: asMaterial(r.material),
    });
  }
  logger.info(`Number of layers with value error: ${valueErrors}`);

  // Array.prototype.sort is stable, so equal (borehole, start) keep input order.
  return valid.sort(compareLayers(elevation));
}

export function toRows(doc: unknown): RawRow[] {
  const list = isPlainObject(doc) && Array.isArray(doc.records) ? doc.records : doc;
  if (!Array.isArray(list)) {
    throw new SchemaError("Expected a list of records or an object with a 'records' list");
  }
  return list.filter(isPlainObject);
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const input = process.argv[2];
  const output = process.argv[3] ?? "-";
  const elevation = process.argv[4] === "--elevation";
  const rows = toRows(yaml.load(fs.readFileSync(input, "utf8")));
  const data = JSON.stringify(sanitizeRecords(rows, elevation), null, 2);
  if (output === "-") {
    process.stdout.write(data);
  } else {
    fs.writeFileSync(output, data, "utf8");
  }
}
