/**
 * Merge imported spot candidates into a store.
 *
 * A candidate is treated as a duplicate when any stored spot lies
 * within DUPLICATE_RADIUS_METERS of it. Only coordinates are compared,
 * so two distinct features closer than the threshold collapse into
 * whichever reached the store first.
 */

import type { AccessibilitySpot } from "@openramp/types";
import { haversineDistance } from "../geo/distance.js";
import type { SpotStore } from "../spots/spot-store.js";

/** Candidates closer than this to a stored spot are not imported */
export const DUPLICATE_RADIUS_METERS = 10;

/**
 * Add every candidate that has no stored spot within the threshold.
 *
 * Candidates are checked in order against the store as it stands when
 * they are reached, so an earlier candidate from the same batch can
 * suppress a later one.
 *
 * @returns The candidates that were added, in incoming order
 */
export function reconcileImport(
  incoming: readonly AccessibilitySpot[],
  store: SpotStore,
): AccessibilitySpot[] {
  const added: AccessibilitySpot[] = [];

  for (const candidate of incoming) {
    const isDuplicate = store
      .all()
      .some((existing) => haversineDistance(candidate.coordinate, existing.coordinate) < DUPLICATE_RADIUS_METERS);

    if (!isDuplicate) {
      store.add(candidate);
      added.push(candidate);
    }
  }

  return added;
}
