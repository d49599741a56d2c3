/**
 * Geographic utility types.
 */

/** A point in WGS84 degrees */
export interface Coordinate {
  lat: number;
  lng: number;
}
