/**
 * Import service: OpenStreetMap imports into the shared store.
 *
 * At most one import runs at a time. Starting a new import aborts the
 * one in flight, whose request then fails with ImportAbortedError (409).
 */

import { importAround, type OverpassOptions } from "@openramp/engine";
import type { Coordinate } from "@openramp/types";
import type { ImportResponse } from "../models/responses.js";
import { loadConfig } from "../config.js";
import { getSpotRegistry, type SpotRegistryService } from "./spot-registry.service.js";

export class ImportService {
  private current: AbortController | null = null;

  constructor(
    private readonly registry: SpotRegistryService,
    private readonly overpass: Omit<OverpassOptions, "signal"> = {},
    private readonly defaultRadiusMeters = 1000,
  ) {}

  /** Whether an import is in flight */
  get busy(): boolean {
    return this.current !== null;
  }

  /**
   * @throws ImportAbortedError if a newer import supersedes this one
   * @throws ImportFailedError if the Overpass request fails
   */
  async run(center: Coordinate, radiusMeters = this.defaultRadiusMeters): Promise<ImportResponse> {
    if (this.current) {
      console.log("[import] Superseding in-flight import");
      this.current.abort();
    }
    const controller = new AbortController();
    this.current = controller;

    try {
      const { added, stats } = await importAround(center, radiusMeters, this.registry.store, {
        overpass: { ...this.overpass, signal: controller.signal },
      });
      return {
        added: added.map((spot) => this.registry.get(spot.id)),
        ...stats,
      };
    } finally {
      if (this.current === controller) {
        this.current = null;
      }
    }
  }
}

let service: ImportService | null = null;

export function getImportService(): ImportService {
  if (!service) {
    const config = loadConfig();
    service = new ImportService(
      getSpotRegistry(),
      {
        endpoint: config.overpassEndpoint,
        timeout: config.overpassTimeout,
        userAgent: "openramp-server",
      },
      config.importRadiusMeters,
    );
  }
  return service;
}

/** Replace the process-wide import service (tests, embedding) */
export function setImportService(next: ImportService | null): void {
  service = next;
}
