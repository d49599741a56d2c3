/**
 * Audience filters for browsing spots.
 */

import type {
  AccessibilityFilter,
  AccessibilitySpot,
  SpotType,
  SpotWithDistance,
} from "@openramp/types";

/** Spot types each filter admits; `null` admits everything */
const FILTER_TYPES: Record<AccessibilityFilter, ReadonlySet<SpotType> | null> = {
  all: null,
  wheelchair: new Set(["ramp", "elevator", "accessible-entrance"]),
  stroller: new Set(["ramp", "step-free-route"]),
  ramp: new Set(["ramp"]),
  elevator: new Set(["elevator"]),
};

export function matchesFilter(spot: AccessibilitySpot, filter: AccessibilityFilter): boolean {
  const types = FILTER_TYPES[filter];
  return types === null || types.has(spot.type);
}

export function filterSpots(
  spots: readonly AccessibilitySpot[],
  filter: AccessibilityFilter,
): AccessibilitySpot[] {
  return spots.filter((spot) => matchesFilter(spot, filter));
}

/** Same as filterSpots, for proximity results; order is preserved */
export function filterNearby(
  results: readonly SpotWithDistance[],
  filter: AccessibilityFilter,
): SpotWithDistance[] {
  return results.filter((r) => matchesFilter(r.spot, filter));
}
