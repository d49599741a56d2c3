/**
 * Remote spot store client.
 *
 * Uploads, edits and votes go straight to the server; reads are decoded
 * from SpotRecords into domain spots, skipping records that fail to
 * decode. Transport errors propagate to the caller.
 */

import {
  SpotDecodeError,
  decodeSpotRecord,
  decodeSpotRecords,
  type AccessibilitySpot,
  type SpotRecord,
  type SpotWithDistance,
} from "@openramp/types";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import type {
  CreateSpotRequest,
  NearbyQuery,
  NearbySpotsResponse,
  SpotListResponse,
  UpdateSpotRequest,
  VoteCounts,
} from "./types.js";

export interface ListenOptions {
  /** Delay between polls in milliseconds (default: 10000) */
  intervalMs?: number;
  /** Called when a poll fails; polling continues (default: log a warning) */
  onError?: (err: unknown) => void;
}

function toCreateRequest(spot: AccessibilitySpot): CreateSpotRequest {
  const request: CreateSpotRequest = {
    id: spot.id,
    title: spot.title,
    description: spot.description,
    type: spot.type,
    status: spot.status,
    latitude: spot.coordinate.lat,
    longitude: spot.coordinate.lng,
    createdAt: spot.createdAt.toISOString(),
  };
  if (spot.photoReference) request.photoReference = spot.photoReference;
  return request;
}

export class SpotClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/spots", config);
  }

  /** Store a spot under its own id, replacing any spot with that id */
  public async uploadSpot(spot: AccessibilitySpot): Promise<AccessibilitySpot> {
    const record = await this.client.post<SpotRecord>({ body: toCreateRequest(spot) });
    return decodeSpotRecord(record);
  }

  /** Replace a spot's editable fields; rejects with a 404 response for unknown ids */
  public async updateSpot(spot: AccessibilitySpot): Promise<AccessibilitySpot> {
    const body: UpdateSpotRequest = {
      title: spot.title,
      description: spot.description,
      type: spot.type,
      status: spot.status,
      latitude: spot.coordinate.lat,
      longitude: spot.coordinate.lng,
    };
    if (spot.photoReference) body.photoReference = spot.photoReference;
    const record = await this.client.put<SpotRecord>({ path: spot.id, body });
    return decodeSpotRecord(record);
  }

  /** Every stored spot; malformed records are skipped */
  public async fetchAllSpots(signal?: AbortSignal): Promise<AccessibilitySpot[]> {
    const response = await this.client.get<SpotListResponse>(signal ? { signal } : {});
    return decodeSpotRecords(response.spots);
  }

  /** Spots around a point, nearest first; malformed records are skipped */
  public async fetchNearby(query: NearbyQuery): Promise<SpotWithDistance[]> {
    const params: Record<string, unknown> = { lat: query.center.lat, lng: query.center.lng };
    if (query.radiusMeters !== undefined) params["radius"] = query.radiusMeters;
    if (query.filter) params["filter"] = query.filter;

    const response = await this.client.get<NearbySpotsResponse>({ path: "nearby", query: params });

    const results: SpotWithDistance[] = [];
    for (const record of response.spots) {
      try {
        results.push({ spot: decodeSpotRecord(record), distanceMeters: record.distanceMeters });
      } catch (err) {
        if (!(err instanceof SpotDecodeError)) throw err;
        console.warn(`[spots] Skipping nearby record ${err.recordId ?? "(no id)"}: ${err.message}`);
      }
    }
    return results;
  }

  public async upvoteSpot(id: string): Promise<VoteCounts> {
    return this.client.post<VoteCounts>({ path: [id, "upvote"] });
  }

  public async downvoteSpot(id: string): Promise<VoteCounts> {
    return this.client.post<VoteCounts>({ path: [id, "downvote"] });
  }

  public async deleteSpot(id: string): Promise<void> {
    await this.client.delete<unknown>({ path: id });
  }

  /**
   * Poll the server and report the spot list whenever it changes.
   *
   * The first successful poll is always reported. Polls never overlap:
   * the next one is scheduled after the previous one settles.
   *
   * @returns A function that stops polling and cancels any request in flight
   */
  public listenForSpotUpdates(
    onUpdate: (spots: AccessibilitySpot[]) => void,
    options?: ListenOptions,
  ): () => void {
    const intervalMs = options?.intervalMs ?? 10_000;
    const onError =
      options?.onError ??
      ((err: unknown) => {
        console.warn(`[spots] Poll failed: ${err instanceof Error ? err.message : String(err)}`);
      });

    const abort = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    let lastSeen: string | null = null;

    const poll = async (): Promise<void> => {
      try {
        const spots = await this.fetchAllSpots(abort.signal);
        const signature = JSON.stringify(spots);
        if (!abort.signal.aborted && signature !== lastSeen) {
          lastSeen = signature;
          onUpdate(spots);
        }
      } catch (err) {
        if (!abort.signal.aborted) onError(err);
      }
      if (!abort.signal.aborted) {
        timer = setTimeout(() => void poll(), intervalMs);
      }
    };

    void poll();

    return () => {
      abort.abort();
      clearTimeout(timer);
    };
  }
}
