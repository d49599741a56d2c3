/**
 * Proximity queries over a spot snapshot.
 */

import type { AccessibilitySpot, Coordinate, SpotWithDistance } from "@openramp/types";
import { haversineDistance } from "../geo/distance.js";

/**
 * Find spots within `radiusMeters` of `center`, nearest first.
 *
 * Each result pairs the spot with its distance from the center. The
 * boundary is inclusive, and spots at equal distance keep their input
 * order (Array.prototype.sort is stable). The input is not modified.
 *
 * @returns An empty array when nothing is in range
 */
export function findSpotsNear(
  center: Coordinate,
  radiusMeters: number,
  spots: Iterable<AccessibilitySpot>,
): SpotWithDistance[] {
  const results: SpotWithDistance[] = [];

  for (const spot of spots) {
    const distanceMeters = haversineDistance(center, spot.coordinate);
    if (distanceMeters <= radiusMeters) {
      results.push({ spot, distanceMeters });
    }
  }

  return results.sort((a, b) => a.distanceMeters - b.distanceMeters);
}
