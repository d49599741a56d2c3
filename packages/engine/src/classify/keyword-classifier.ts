/**
 * Text-based type classification for user submissions.
 *
 * The point-creation flow asks a TypeClassifier to guess a spot type
 * from free text (a typed or transcribed description). Any model can sit
 * behind the interface; KeywordTypeClassifier is the built-in heuristic.
 */

import { SPOT_TYPES, type SpotType } from "@openramp/types";

export interface TypeGuess {
  type: SpotType;
  /** 0-1 */
  confidence: number;
}

export interface TypeClassifier {
  /** @returns null when the text gives no usable signal */
  classify(text: string): TypeGuess | null;
}

/** Phrases that hint at each type, matched as lowercase substrings */
export const DEFAULT_TYPE_KEYWORDS: Record<SpotType, readonly string[]> = {
  ramp: ["ramp", "slope", "incline", "gradient", "wheelchair access"],
  elevator: ["elevator", "lift", "vertical", "floors"],
  "accessible-entrance": ["entrance", "door", "entry", "access point", "way in"],
  "step-free-route": ["path", "route", "step-free", "walkway", "sidewalk"],
  "accessible-parking": ["parking", "car", "space"],
  "accessible-toilet": ["toilet", "bathroom", "restroom", "wc", "lavatory"],
};

/**
 * Counts keyword hits per type and picks the type with the most.
 *
 * Confidence is the winner's share of all hits. Ties go to the type
 * listed first in SPOT_TYPES.
 */
export class KeywordTypeClassifier implements TypeClassifier {
  constructor(
    private readonly keywords: Record<SpotType, readonly string[]> = DEFAULT_TYPE_KEYWORDS,
  ) {}

  classify(text: string): TypeGuess | null {
    const lowered = text.toLowerCase();
    let best: SpotType | null = null;
    let bestHits = 0;
    let totalHits = 0;

    for (const type of SPOT_TYPES) {
      const hits = this.keywords[type].filter((k) => lowered.includes(k)).length;
      totalHits += hits;
      if (hits > bestHits) {
        best = type;
        bestHits = hits;
      }
    }

    if (best === null) return null;
    return { type: best, confidence: bestHits / totalHits };
  }
}
