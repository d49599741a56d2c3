/**
 * Great-circle distance on a spherical Earth.
 */

import type { Coordinate } from "@openramp/types";

/** Mean Earth radius in meters */
export const EARTH_RADIUS_METERS = 6_371_000;

/**
 * Haversine distance between two coordinates, in meters.
 *
 * Symmetric in its arguments and exactly zero for identical points.
 */
export function haversineDistance(a: Coordinate, b: Coordinate): number {
  const toRad = Math.PI / 180;
  const dLat = (b.lat - a.lat) * toRad;
  const dLng = (b.lng - a.lng) * toRad;
  const sinHalfLat = Math.sin(dLat / 2);
  const sinHalfLng = Math.sin(dLng / 2);
  const h =
    sinHalfLat * sinHalfLat +
    Math.cos(a.lat * toRad) * Math.cos(b.lat * toRad) * sinHalfLng * sinHalfLng;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}
