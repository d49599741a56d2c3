/**
 * Spot registry service: the server's view of the spot store.
 *
 * Owns the process-wide SpotStore and the vote tally, and maps engine
 * types to API records. Votes are kept in memory only; they reset when
 * the server restarts.
 */

import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import {
  KeywordTypeClassifier,
  SpotStore,
  SqliteSpotPersistence,
  filterNearby,
  findSpotsNear,
  scoreArea,
  scoreCategory,
  type TypeClassifier,
} from "@openramp/engine";
import {
  AREA_SCORE_DESCRIPTIONS,
  encodeSpot,
  type AccessibilityFilter,
  type AccessibilitySpot,
  type Coordinate,
} from "@openramp/types";
import type { CreateSpotRequest, UpdateSpotRequest } from "../models/requests.js";
import type {
  AreaScoreResponse,
  NearbySpotsResponse,
  SpotResponse,
  SubmitResult,
  VoteResponse,
} from "../models/responses.js";
import { loadConfig } from "../config.js";

export class SpotNotFoundError extends Error {
  readonly status = 404;

  constructor(id: string) {
    super(`Spot not found: ${id}`);
    this.name = "SpotNotFoundError";
  }
}

/** Raised when a submission names no type and none can be inferred */
export class UnclassifiableSpotError extends Error {
  readonly status = 422;

  constructor() {
    super("Could not infer a spot type from the title or description; please choose one");
    this.name = "UnclassifiableSpotError";
  }
}

interface Votes {
  upvotes: number;
  downvotes: number;
}

export class SpotRegistryService {
  private readonly votes = new Map<string, Votes>();

  constructor(
    readonly store: SpotStore = new SpotStore(),
    private readonly classifier: TypeClassifier = new KeywordTypeClassifier(),
  ) {}

  list(): SpotResponse[] {
    return this.store.all().map((spot) => this.toResponse(spot));
  }

  get(id: string): SpotResponse {
    return this.toResponse(this.require(id));
  }

  nearby(center: Coordinate, radiusMeters: number, filter: AccessibilityFilter): NearbySpotsResponse {
    const results = filterNearby(findSpotsNear(center, radiusMeters, this.store.all()), filter);
    return {
      center,
      radiusMeters,
      spots: results.map(({ spot, distanceMeters }) => ({
        ...this.toResponse(spot),
        distanceMeters,
      })),
    };
  }

  score(center: Coordinate, radiusMeters: number): AreaScoreResponse {
    const breakdown = scoreArea(center, radiusMeters, this.store.all());
    const category = scoreCategory(breakdown.score);
    return {
      center,
      radiusMeters,
      ...breakdown,
      category,
      description: AREA_SCORE_DESCRIPTIONS[category],
    };
  }

  /**
   * Add a submitted spot. When the request carries no type, the
   * classifier guesses one from the title and description.
   *
   * Submitting an id that already exists replaces that spot's fields but
   * keeps its original `createdAt` and its votes.
   *
   * @throws UnclassifiableSpotError if no type is given and none can be guessed
   */
  create(req: CreateSpotRequest): SubmitResult {
    const type = req.type ?? this.classifier.classify(`${req.title} ${req.description}`)?.type;
    if (!type) {
      throw new UnclassifiableSpotError();
    }

    const existing = req.id === undefined ? undefined : this.store.get(req.id);
    const spot: AccessibilitySpot = {
      id: req.id ?? randomUUID(),
      title: req.title,
      description: req.description,
      type,
      status: req.status ?? "working",
      coordinate: { lat: req.latitude, lng: req.longitude },
      createdAt: existing?.createdAt ?? req.createdAt ?? new Date(),
    };
    if (req.photoReference) spot.photoReference = req.photoReference;

    if (existing) {
      this.store.update(spot);
      console.log(`[spots] Replaced ${spot.type} "${spot.title}" (${spot.id})`);
    } else {
      this.store.add(spot);
      console.log(`[spots] Added ${spot.type} "${spot.title}" (${spot.id})`);
    }
    return { spot: this.toResponse(spot), created: !existing };
  }

  /** @throws SpotNotFoundError */
  update(id: string, req: UpdateSpotRequest): SpotResponse {
    const existing = this.require(id);
    const spot: AccessibilitySpot = {
      id,
      title: req.title,
      description: req.description,
      type: req.type,
      status: req.status,
      coordinate: { lat: req.latitude, lng: req.longitude },
      createdAt: existing.createdAt,
    };
    if (req.photoReference) spot.photoReference = req.photoReference;

    if (!this.store.update(spot)) {
      throw new SpotNotFoundError(id);
    }
    return this.get(id);
  }

  /** @throws SpotNotFoundError */
  remove(id: string): void {
    if (!this.store.remove(id)) {
      throw new SpotNotFoundError(id);
    }
    this.votes.delete(id);
    console.log(`[spots] Removed ${id}`);
  }

  /** @throws SpotNotFoundError */
  upvote(id: string): VoteResponse {
    return this.vote(id, "upvotes");
  }

  /** @throws SpotNotFoundError */
  downvote(id: string): VoteResponse {
    return this.vote(id, "downvotes");
  }

  private vote(id: string, direction: keyof Votes): VoteResponse {
    this.require(id);
    const votes = this.votesFor(id);
    votes[direction] += 1;
    this.votes.set(id, votes);
    return { id, ...votes };
  }

  private votesFor(id: string): Votes {
    const votes = this.votes.get(id);
    return votes ? { ...votes } : { upvotes: 0, downvotes: 0 };
  }

  private require(id: string): AccessibilitySpot {
    const spot = this.store.get(id);
    if (!spot) {
      throw new SpotNotFoundError(id);
    }
    return spot;
  }

  private toResponse(spot: AccessibilitySpot): SpotResponse {
    return { ...encodeSpot(spot), ...this.votesFor(spot.id) };
  }
}

// ─── Process-wide instance ──────────────────────────────────────────────────

let registry: SpotRegistryService | null = null;

/** Open the SQLite-backed store on first use */
export function getSpotRegistry(): SpotRegistryService {
  if (!registry) {
    const { dbPath } = loadConfig();
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    const store = SpotStore.open(new SqliteSpotPersistence({ filePath: dbPath }));
    console.log(`[spots] Loaded ${store.size} spot(s) from ${dbPath}`);
    registry = new SpotRegistryService(store);
  }
  return registry;
}

/** Replace the process-wide registry (tests, embedding) */
export function setSpotRegistry(next: SpotRegistryService | null): void {
  registry = next;
}
