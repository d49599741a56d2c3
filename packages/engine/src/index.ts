/**
 * @openramp/engine
 *
 * Spatial query and scoring engine for urban accessibility features.
 *
 * Key concepts:
 * - Spot: A ramp, elevator, entrance or other feature at a coordinate
 * - SpotStore: The session's id-keyed spot collection, persisted on every change
 * - Area score: 0-100 summary of the spots within a radius
 *
 * Pipeline:
 * 1. Submit spots, or import them from OpenStreetMap -> SpotStore
 * 2. Query spots around a point -> SpotWithDistance[]
 * 3. Score the neighborhood -> AreaScoreBreakdown
 */

export { haversineDistance, EARTH_RADIUS_METERS } from "./geo/distance.js";
export { findSpotsNear } from "./query/proximity.js";
export {
  scoreSpots,
  scoreBreakdown,
  scoreArea,
  scoreCategory,
  EXCELLENT_SCORE_THRESHOLD,
  MODERATE_SCORE_THRESHOLD,
  QUANTITY_POINTS_PER_SPOT,
  MAX_QUANTITY_SCORE,
  MAX_QUALITY_SCORE,
  VARIETY_POINTS_PER_TYPE,
  MAX_AREA_SCORE,
} from "./scoring/area-score.js";

export * from "./spots/index.js";
export * from "./classify/index.js";
export * from "./ingestion/index.js";
