/**
 * Server configuration, read from the environment.
 *
 * - PORT: HTTP port (default 3000)
 * - OPENRAMP_DB_PATH: SQLite file holding the spot collection
 *   (default ~/.openramp/spots.sqlite, ":memory:" for a throwaway store)
 * - OVERPASS_ENDPOINT: Overpass API interpreter URL
 * - OVERPASS_TIMEOUT: server-side Overpass timeout in seconds (default 25)
 * - IMPORT_RADIUS_METERS: radius used when an import request names none (default 1000)
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { DEFAULT_ENDPOINT, DEFAULT_TIMEOUT } from "@openramp/engine";

export interface ServerConfig {
  port: number;
  dbPath: string;
  overpassEndpoint: string;
  overpassTimeout: number;
  importRadiusMeters: number;
}

/** Radius for nearby and score queries that name none */
export const DEFAULT_QUERY_RADIUS_METERS = 500;

export const DEFAULT_DB_PATH = join(homedir(), ".openramp", "spots.sqlite");

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: intFromEnv(env["PORT"], 3000),
    dbPath: env["OPENRAMP_DB_PATH"] || DEFAULT_DB_PATH,
    overpassEndpoint: env["OVERPASS_ENDPOINT"] || DEFAULT_ENDPOINT,
    overpassTimeout: intFromEnv(env["OVERPASS_TIMEOUT"], DEFAULT_TIMEOUT),
    importRadiusMeters: intFromEnv(env["IMPORT_RADIUS_METERS"], 1000),
  };
}
