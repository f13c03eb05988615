import { LayerRecord, Logger, consoleLogger } from "./util.js";

/**
 * Layers whose start does not meet the end of the layer above them in the same
 * borehole. Input must already be sorted by sanitizeRecords.
 */
export function findGapsAndOverlaps(rows: LayerRecord[]): LayerRecord[] {
  return rows.filter((r, i) => {
    const prev = i > 0 ? rows[i - 1] : r;
    const previousLayerEnd = i > 0 ? prev.end : r.start;
    return previousLayerEnd !== r.start && prev.borehole_name === r.borehole_name;
  });
}

export function reportGapsAndOverlaps(rows: LayerRecord[], logger: Logger = consoleLogger): number {
  const flagged = findGapsAndOverlaps(rows);
  logger.info(`Number of layers with gaps or overlaps: ${flagged.length}`);
  return flagged.length;
}
