import type { Coordinate } from "@openramp/types";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { AreaScoreResponse, ImportRequest, ImportResponse } from "./types.js";

export class AreaClient {
  private client: BaseClient;
  private imports: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/area", config);
    this.imports = new BaseClient("api/imports", config);
  }

  /** Accessibility score (0-100) and its breakdown around a point */
  public async getScore(center: Coordinate, radiusMeters?: number): Promise<AreaScoreResponse> {
    const query: Record<string, unknown> = { lat: center.lat, lng: center.lng };
    if (radiusMeters !== undefined) query["radius"] = radiusMeters;
    return this.client.get<AreaScoreResponse>({ path: "score", query });
  }

  /**
   * Ask the server to import OpenStreetMap features around a point.
   * Rejects with a 409 response when a newer import supersedes this one.
   */
  public async importAround(request: ImportRequest, signal?: AbortSignal): Promise<ImportResponse> {
    return this.imports.post<ImportResponse>(signal ? { body: request, signal } : { body: request });
  }
}
