/**
 * Area accessibility score types.
 */

/** Intermediate terms of an area score, useful for display and debugging */
export interface AreaScoreBreakdown {
  totalSpots: number;
  workingSpots: number;
  uniqueTypes: number;
  /** Up to 40 points, 5 per spot */
  quantityScore: number;
  /** Up to 30 points, share of working spots (not rounded) */
  qualityScore: number;
  /** Up to 30 points, 5 per distinct type */
  varietyScore: number;
  /** Final 0-100 integer */
  score: number;
}

/** Display band of an area score */
export type AreaScoreCategory = "excellent" | "moderate" | "limited" | "no-data";

export const AREA_SCORE_DESCRIPTIONS: Record<AreaScoreCategory, string> = {
  excellent: "Excellent accessibility",
  moderate: "Moderate accessibility",
  limited: "Limited accessibility",
  "no-data": "No data available",
};
