/**
 * Overpass API query construction and execution.
 *
 * Generates an Overpass QL radius query for accessibility features and
 * fetches results via the overpass-ts client.
 */

import type { Coordinate } from "@openramp/types";
import { overpassJson } from "overpass-ts";
import type { OverpassJson, OverpassOptions as OverpassTsOptions } from "overpass-ts";
import { ImportAbortedError, ImportFailedError } from "../errors.js";

/** Options for Overpass API requests */
export interface OverpassOptions {
  /** Overpass API endpoint URL (for self-hosted instances) */
  endpoint?: string;
  /** Server-side query timeout in seconds (default: 25) */
  timeout?: number;
  /** User-agent string */
  userAgent?: string;
  /** Abandon the request; the returned promise rejects with ImportAbortedError */
  signal?: AbortSignal;
}

export const DEFAULT_ENDPOINT = "https://overpass-api.de/api/interpreter";
export const DEFAULT_TIMEOUT = 25;

/**
 * Build an Overpass QL query for accessibility features around a point.
 *
 * Fetches:
 * - Entrances tagged wheelchair=yes
 * - Steps with a wheelchair ramp
 * - Elevators
 * - Parking and toilets tagged wheelchair=yes
 * - Tactile paving
 *
 * Uses `out center;` so ways and relations carry a representative point.
 *
 * @param center - Query center (WGS84)
 * @param radiusMeters - Search radius in meters
 * @param timeout - Query timeout in seconds
 * @returns Overpass QL query string
 */
export function buildAccessibilityQuery(
  center: Coordinate,
  radiusMeters: number,
  timeout: number = DEFAULT_TIMEOUT,
): string {
  const around = `(around:${radiusMeters},${center.lat},${center.lng})`;

  return `[out:json][timeout:${timeout}];
(
  node["entrance"="yes"]["wheelchair"="yes"]${around};
  node["highway"="steps"]["ramp:wheelchair"="yes"]${around};
  way["highway"="steps"]["ramp:wheelchair"="yes"]${around};
  node["highway"="elevator"]${around};
  node["amenity"="parking"]["wheelchair"="yes"]${around};
  way["amenity"="parking"]["wheelchair"="yes"]${around};
  node["amenity"="toilets"]["wheelchair"="yes"]${around};
  node["tactile_paving"="yes"]${around};
);
out center;`;
}

/** Resolve with `promise`, or reject as soon as `signal` aborts */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new ImportAbortedError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new ImportAbortedError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Fetch accessibility features around a point from the Overpass API.
 *
 * No client-side timeout is applied; the request may wait as long as
 * the server lets it. Pass `signal` to abandon it.
 *
 * @throws ImportAbortedError if `signal` aborts first
 * @throws ImportFailedError on any transport or server error
 */
export async function fetchAccessibilityElements(
  center: Coordinate,
  radiusMeters: number,
  options?: OverpassOptions,
): Promise<OverpassJson> {
  const query = buildAccessibilityQuery(center, radiusMeters, options?.timeout ?? DEFAULT_TIMEOUT);

  const overpassOpts: Partial<OverpassTsOptions> = {
    endpoint: options?.endpoint ?? DEFAULT_ENDPOINT,
  };
  if (options?.userAgent) {
    overpassOpts.userAgent = options.userAgent;
  }

  try {
    return await untilAborted(overpassJson(query, overpassOpts), options?.signal);
  } catch (err) {
    if (err instanceof ImportAbortedError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new ImportFailedError(`Overpass request failed: ${reason}`, { cause: err });
  }
}
