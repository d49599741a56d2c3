import type { AreaScoreBreakdown, AreaScoreCategory, Coordinate, SpotRecord } from "@openramp/types";

export interface HealthResponse {
  status: "ok";
  uptime: number;
  spots: number;
}

/** A stored spot with its vote counts */
export interface SpotResponse extends SpotRecord {
  upvotes: number;
  downvotes: number;
}

export interface SpotListResponse {
  spots: SpotResponse[];
}

export interface NearbySpot extends SpotResponse {
  distanceMeters: number;
}

export interface NearbySpotsResponse {
  center: Coordinate;
  radiusMeters: number;
  spots: NearbySpot[];
}

/** Result of a submission: the stored spot and whether it was new */
export interface SubmitResult {
  spot: SpotResponse;
  created: boolean;
}

export interface VoteResponse {
  id: string;
  upvotes: number;
  downvotes: number;
}

export interface AreaScoreResponse extends AreaScoreBreakdown {
  center: Coordinate;
  radiusMeters: number;
  category: AreaScoreCategory;
  /** e.g. "Moderate accessibility" */
  description: string;
}

export interface ImportResponse {
  added: SpotResponse[];
  fetchedCount: number;
  duplicateCount: number;
  importTimeMs: number;
}

export interface ErrorResponse {
  message: string;
}
