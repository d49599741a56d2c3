/**
 * Accessibility spots - the recorded features the engine stores,
 * queries and scores.
 */

import type { Coordinate } from "./geo.js";

/**
 * Feature categories a spot can belong to.
 *
 * The list is fixed: scoring counts distinct types present, and full
 * variety is reached when all six appear.
 */
export const SPOT_TYPES = [
  "ramp",
  "elevator",
  "accessible-entrance",
  "step-free-route",
  "accessible-parking",
  "accessible-toilet",
] as const;

export type SpotType = (typeof SPOT_TYPES)[number];

/** Operational state reported for a spot */
export const SPOT_STATUSES = ["working", "not-working", "under-maintenance"] as const;

export type SpotStatus = (typeof SPOT_STATUSES)[number];

/** Human-readable labels, also the values written to serialized records */
export const SPOT_TYPE_LABELS: Record<SpotType, string> = {
  ramp: "Ramp",
  elevator: "Elevator",
  "accessible-entrance": "Accessible Entrance",
  "step-free-route": "Step-Free Route",
  "accessible-parking": "Accessible Parking",
  "accessible-toilet": "Accessible Toilet",
};

export const SPOT_STATUS_LABELS: Record<SpotStatus, string> = {
  working: "Working",
  "not-working": "Not Working",
  "under-maintenance": "Under Maintenance",
};

export function isSpotType(value: unknown): value is SpotType {
  return typeof value === "string" && (SPOT_TYPES as readonly string[]).includes(value);
}

export function isSpotStatus(value: unknown): value is SpotStatus {
  return typeof value === "string" && (SPOT_STATUSES as readonly string[]).includes(value);
}

/** A single recorded accessibility feature at a coordinate */
export interface AccessibilitySpot {
  /** Globally unique, assigned at creation, never changes */
  readonly id: string;
  title: string;
  description: string;
  type: SpotType;
  status: SpotStatus;
  coordinate: Coordinate;
  /** Set once at creation */
  readonly createdAt: Date;
  /** Opaque reference to an externally stored image */
  photoReference?: string;
}

/** A spot evaluated against a query center */
export interface SpotWithDistance {
  spot: AccessibilitySpot;
  /** Great-circle distance from the query center */
  distanceMeters: number;
}

/**
 * Serialized form of a spot, shared by local persistence and the
 * remote API. Type and status are written as their display labels.
 */
export interface SpotRecord {
  id: string;
  title: string;
  description: string;
  type: string;
  status: string;
  latitude: number;
  longitude: number;
  /** ISO-8601 timestamp */
  createdAt: string;
  photoReference?: string;
  upvotes?: number;
  downvotes?: number;
}

/** Preset audience filters for browsing spots */
export const ACCESSIBILITY_FILTERS = ["all", "wheelchair", "stroller", "ramp", "elevator"] as const;

export type AccessibilityFilter = (typeof ACCESSIBILITY_FILTERS)[number];

export function isAccessibilityFilter(value: unknown): value is AccessibilityFilter {
  return (
    typeof value === "string" && (ACCESSIBILITY_FILTERS as readonly string[]).includes(value)
  );
}
