/**
 * API request/response types for the OpenRamp server.
 *
 * These mirror the server's models. Spot payloads travel as SpotRecords
 * (display labels for type and status) and are decoded into domain
 * spots by the clients.
 */

import type {
  AccessibilityFilter,
  AreaScoreBreakdown,
  AreaScoreCategory,
  Coordinate,
  SpotRecord,
  SpotStatus,
  SpotType,
} from "@openramp/types";

// ---------------------------------------------------------------------------
// Spots
// ---------------------------------------------------------------------------

export interface CreateSpotRequest {
  id?: string;
  title: string;
  description: string;
  type?: SpotType;
  status?: SpotStatus;
  latitude: number;
  longitude: number;
  createdAt?: string;
  photoReference?: string;
}

export interface UpdateSpotRequest {
  title: string;
  description: string;
  type: SpotType;
  status: SpotStatus;
  latitude: number;
  longitude: number;
  photoReference?: string;
}

export interface SpotListResponse {
  spots: SpotRecord[];
}

export interface NearbySpotRecord extends SpotRecord {
  distanceMeters: number;
}

export interface NearbySpotsResponse {
  center: Coordinate;
  radiusMeters: number;
  spots: NearbySpotRecord[];
}

export interface NearbyQuery {
  center: Coordinate;
  /** Meters (server default: 500) */
  radiusMeters?: number;
  filter?: AccessibilityFilter;
}

export interface VoteCounts {
  id: string;
  upvotes: number;
  downvotes: number;
}

// ---------------------------------------------------------------------------
// Area score
// ---------------------------------------------------------------------------

export interface AreaScoreResponse extends AreaScoreBreakdown {
  center: Coordinate;
  radiusMeters: number;
  category: AreaScoreCategory;
  description: string;
}

// ---------------------------------------------------------------------------
// Imports
// ---------------------------------------------------------------------------

export interface ImportRequest {
  lat: number;
  lng: number;
  radius?: number;
}

export interface ImportResponse {
  added: SpotRecord[];
  fetchedCount: number;
  duplicateCount: number;
  importTimeMs: number;
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface HealthResponse {
  status: "ok";
  uptime: number;
  spots: number;
}
