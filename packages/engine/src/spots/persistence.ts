/**
 * Persistence port for the spot store.
 *
 * The store hands the whole collection to `save` after every mutation
 * and reads it back once through `load` when opened. Implementations
 * overwrite the previous snapshot wholesale; there is no versioning.
 */

import { decodeSpotRecords, encodeSpot, type AccessibilitySpot } from "@openramp/types";

/** Fixed key under which the serialized collection is kept */
export const SPOTS_STORAGE_KEY = "accessibility_spots";

export interface SpotPersistence {
  /** Read the last saved collection; malformed records are dropped */
  load(): AccessibilitySpot[];
  /** Replace the saved collection. May throw; the store logs and continues. */
  save(spots: readonly AccessibilitySpot[]): void;
}

/** Serialize a collection to the single JSON blob persisted under SPOTS_STORAGE_KEY */
export function serializeSpots(spots: readonly AccessibilitySpot[]): string {
  return JSON.stringify(spots.map(encodeSpot));
}

/**
 * Parse a persisted blob back into spots.
 *
 * A blob that is not a JSON array yields an empty collection.
 */
export function deserializeSpots(blob: string): AccessibilitySpot[] {
  const parsed: unknown = JSON.parse(blob);
  if (!Array.isArray(parsed)) {
    console.warn("[persist] Stored blob is not an array, ignoring");
    return [];
  }
  return decodeSpotRecords(parsed);
}

/** Keeps the last saved blob in memory. Used by tests and as the default port. */
export class MemorySpotPersistence implements SpotPersistence {
  private blob: string | null;

  constructor(initial: readonly AccessibilitySpot[] = []) {
    this.blob = initial.length > 0 ? serializeSpots(initial) : null;
  }

  load(): AccessibilitySpot[] {
    return this.blob === null ? [] : deserializeSpots(this.blob);
  }

  save(spots: readonly AccessibilitySpot[]): void {
    this.blob = serializeSpots(spots);
  }

  /** The raw blob as last written, for inspection */
  snapshot(): string | null {
    return this.blob;
  }
}
