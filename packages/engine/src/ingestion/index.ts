/**
 * Data ingestion module.
 *
 * Pipeline:
 * Overpass API -> spot candidates -> reconciliation -> SpotStore
 */

import type { AccessibilitySpot, Coordinate } from "@openramp/types";
import type { SpotStore } from "../spots/spot-store.js";
import { fetchAccessibilityElements, parseAccessibilityElements } from "./overpass/index.js";
import type { OverpassOptions, ParseOptions } from "./overpass/index.js";
import { reconcileImport } from "./reconcile.js";

/** Result of an import */
export interface ImportResult {
  /** Spots that made it into the store */
  added: AccessibilitySpot[];
  stats: {
    /** Candidates parsed from the response */
    fetchedCount: number;
    /** Candidates dropped as near-duplicates */
    duplicateCount: number;
    importTimeMs: number;
  };
}

export interface ImportOptions {
  overpass?: OverpassOptions;
  parse?: ParseOptions;
}

/**
 * Import OpenStreetMap accessibility features around a point.
 *
 * The store is only touched after the fetch succeeds, so a failed or
 * cancelled import leaves it exactly as it was.
 *
 * @throws ImportAbortedError if `options.overpass.signal` aborts
 * @throws ImportFailedError on transport failure
 */
export async function importAround(
  center: Coordinate,
  radiusMeters: number,
  store: SpotStore,
  options?: ImportOptions,
): Promise<ImportResult> {
  const startTime = Date.now();

  const response = await fetchAccessibilityElements(center, radiusMeters, options?.overpass);
  const candidates = parseAccessibilityElements(response, options?.parse);
  const added = reconcileImport(candidates, store);

  const importTimeMs = Date.now() - startTime;
  console.log(
    `[import] ${candidates.length} fetched, ${added.length} added around (${center.lat.toFixed(4)},${center.lng.toFixed(4)}) r=${radiusMeters}m in ${importTimeMs}ms`,
  );

  return {
    added,
    stats: {
      fetchedCount: candidates.length,
      duplicateCount: candidates.length - added.length,
      importTimeMs,
    },
  };
}

export { reconcileImport, DUPLICATE_RADIUS_METERS } from "./reconcile.js";
export { ImportAbortedError, ImportFailedError } from "./errors.js";
export * from "./overpass/index.js";
