/**
 * Neighborhood accessibility score.
 *
 * Combines three fixed-weight terms into a 0-100 integer:
 *
 * - quantity: 5 points per spot, capped at 40 (saturates at 8 spots)
 * - quality:  share of working spots × 30, kept fractional
 * - variety:  5 points per distinct spot type (6 types → 30)
 *
 * The sum is truncated once, then clamped to 100. These weights are a
 * compatibility surface: stored and displayed scores depend on them.
 */

import type {
  AccessibilitySpot,
  AreaScoreBreakdown,
  AreaScoreCategory,
  Coordinate,
  SpotWithDistance,
} from "@openramp/types";
import { findSpotsNear } from "../query/proximity.js";

export const QUANTITY_POINTS_PER_SPOT = 5;
export const MAX_QUANTITY_SCORE = 40;
export const MAX_QUALITY_SCORE = 30;
export const VARIETY_POINTS_PER_TYPE = 5;
export const MAX_AREA_SCORE = 100;

type ScoredItem = AccessibilitySpot | SpotWithDistance;

function spotOf(item: ScoredItem): AccessibilitySpot {
  return "spot" in item ? item.spot : item;
}

/** Score a set of nearby spots, returning every intermediate term */
export function scoreBreakdown(nearby: readonly ScoredItem[]): AreaScoreBreakdown {
  const totalSpots = nearby.length;
  if (totalSpots === 0) {
    return {
      totalSpots: 0,
      workingSpots: 0,
      uniqueTypes: 0,
      quantityScore: 0,
      qualityScore: 0,
      varietyScore: 0,
      score: 0,
    };
  }

  const spots = nearby.map(spotOf);
  const workingSpots = spots.filter((s) => s.status === "working").length;
  const uniqueTypes = new Set(spots.map((s) => s.type)).size;

  const quantityScore = Math.min(totalSpots * QUANTITY_POINTS_PER_SPOT, MAX_QUANTITY_SCORE);
  const qualityScore = (workingSpots / totalSpots) * MAX_QUALITY_SCORE;
  const varietyScore = uniqueTypes * VARIETY_POINTS_PER_TYPE;

  const total = Math.floor(quantityScore + qualityScore + varietyScore);

  return {
    totalSpots,
    workingSpots,
    uniqueTypes,
    quantityScore,
    qualityScore,
    varietyScore,
    score: Math.min(total, MAX_AREA_SCORE),
  };
}

/**
 * Score a set of nearby spots.
 *
 * @returns An integer in [0, 100]; 0 for an empty set
 */
export function scoreSpots(nearby: readonly ScoredItem[]): number {
  return scoreBreakdown(nearby).score;
}

/** Lowest score in each display band */
export const EXCELLENT_SCORE_THRESHOLD = 80;
export const MODERATE_SCORE_THRESHOLD = 50;

/** Map a score to its display band; 0 means nothing was found */
export function scoreCategory(score: number): AreaScoreCategory {
  if (score >= EXCELLENT_SCORE_THRESHOLD) return "excellent";
  if (score >= MODERATE_SCORE_THRESHOLD) return "moderate";
  if (score >= 1) return "limited";
  return "no-data";
}

/**
 * Score the area within `radiusMeters` of `center`.
 *
 * Runs a proximity query over `spots` and scores the result.
 */
export function scoreArea(
  center: Coordinate,
  radiusMeters: number,
  spots: Iterable<AccessibilitySpot>,
): AreaScoreBreakdown {
  return scoreBreakdown(findSpotsNear(center, radiusMeters, spots));
}
