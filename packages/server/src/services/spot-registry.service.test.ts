import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MemorySpotPersistence, SpotStore } from "@openramp/engine";
import type { AccessibilitySpot } from "@openramp/types";
import {
  SpotNotFoundError,
  SpotRegistryService,
  UnclassifiableSpotError,
} from "./spot-registry.service.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const CENTER = { lat: 37.9755, lng: 23.7348 };

function makeSpot(overrides?: Partial<AccessibilitySpot>): AccessibilitySpot {
  return {
    id: "s1",
    title: "Museum Ramp",
    description: "Side entrance ramp",
    type: "ramp",
    status: "working",
    coordinate: CENTER,
    createdAt: new Date("2025-03-01T12:00:00.000Z"),
    ...overrides,
  };
}

function makeRegistry(spots: AccessibilitySpot[] = []) {
  const persistence = new MemorySpotPersistence();
  const registry = new SpotRegistryService(new SpotStore(persistence, spots));
  return { registry, persistence };
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("SpotRegistryService", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("list / get", () => {
    it("returns records with labels and zero votes", () => {
      const { registry } = makeRegistry([makeSpot()]);

      expect(registry.list()).toEqual([
        {
          id: "s1",
          title: "Museum Ramp",
          description: "Side entrance ramp",
          type: "Ramp",
          status: "Working",
          latitude: 37.9755,
          longitude: 23.7348,
          createdAt: "2025-03-01T12:00:00.000Z",
          upvotes: 0,
          downvotes: 0,
        },
      ]);
    });

    it("throws SpotNotFoundError for an unknown id", () => {
      const { registry } = makeRegistry();
      expect(() => registry.get("missing")).toThrow(SpotNotFoundError);
    });
  });

  describe("create", () => {
    it("uses the given type and defaults status to working", () => {
      const { registry, persistence } = makeRegistry();

      const { spot: created, created: isNew } = registry.create({
        id: "new-1",
        title: "Station Lift",
        description: "",
        type: "elevator",
        latitude: 1,
        longitude: 2,
        createdAt: new Date("2025-04-01T00:00:00.000Z"),
      });

      expect(isNew).toBe(true);
      expect(created).toMatchObject({
        id: "new-1",
        type: "Elevator",
        status: "Working",
        latitude: 1,
        longitude: 2,
        createdAt: "2025-04-01T00:00:00.000Z",
      });
      expect(persistence.snapshot()).toContain('"id":"new-1"');
    });

    it("classifies the text when no type is given", () => {
      const { registry } = makeRegistry();

      const { spot: created } = registry.create({
        title: "Side ramp",
        description: "Gentle slope by the gate",
        latitude: 1,
        longitude: 2,
      });

      expect(created.type).toBe("Ramp");
      expect(created.id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it("rejects text that gives no type signal", () => {
      const { registry } = makeRegistry();

      expect(() =>
        registry.create({ title: "Blue bench", description: "Near the fountain", latitude: 1, longitude: 2 }),
      ).toThrow(UnclassifiableSpotError);
      expect(registry.store.size).toBe(0);
    });

    it("keeps the photo reference", () => {
      const { registry } = makeRegistry();
      const { spot: created } = registry.create({
        title: "Lift",
        description: "",
        type: "elevator",
        latitude: 1,
        longitude: 2,
        photoReference: "photos/abc.jpg",
      });
      expect(created.photoReference).toBe("photos/abc.jpg");
    });

    it("keeps createdAt and votes when an existing id is submitted again", () => {
      const { registry } = makeRegistry();
      registry.create({
        id: "a",
        title: "Side ramp",
        description: "",
        type: "ramp",
        latitude: 1,
        longitude: 2,
        createdAt: new Date("2020-01-01T00:00:00.000Z"),
      });
      registry.upvote("a");

      const { spot, created } = registry.create({
        id: "a",
        title: "Side ramp",
        description: "Handrail added",
        type: "ramp",
        status: "under-maintenance",
        latitude: 1,
        longitude: 2,
        createdAt: new Date("2026-01-01T00:00:00.000Z"),
      });

      expect(created).toBe(false);
      expect(spot).toMatchObject({
        id: "a",
        description: "Handrail added",
        status: "Under Maintenance",
        createdAt: "2020-01-01T00:00:00.000Z",
        upvotes: 1,
        downvotes: 0,
      });
      expect(registry.store.size).toBe(1);
      expect(registry.store.get("a")?.createdAt.toISOString()).toBe("2020-01-01T00:00:00.000Z");
    });
  });

  describe("update", () => {
    it("replaces fields but keeps id and createdAt", () => {
      const { registry } = makeRegistry([makeSpot()]);

      const updated = registry.update("s1", {
        title: "Museum Ramp (rebuilt)",
        description: "Closed for repairs",
        type: "ramp",
        status: "under-maintenance",
        latitude: 10,
        longitude: 20,
      });

      expect(updated).toMatchObject({
        id: "s1",
        title: "Museum Ramp (rebuilt)",
        status: "Under Maintenance",
        latitude: 10,
        longitude: 20,
        createdAt: "2025-03-01T12:00:00.000Z",
      });
    });

    it("throws SpotNotFoundError for an unknown id", () => {
      const { registry } = makeRegistry();
      expect(() =>
        registry.update("missing", {
          title: "x",
          description: "",
          type: "ramp",
          status: "working",
          latitude: 0,
          longitude: 0,
        }),
      ).toThrow(SpotNotFoundError);
    });
  });

  describe("remove", () => {
    it("removes the spot and its votes", () => {
      const { registry } = makeRegistry([makeSpot()]);
      registry.upvote("s1");

      registry.remove("s1");
      expect(registry.store.size).toBe(0);

      registry.create({ id: "s1", title: "Again", description: "", type: "ramp", latitude: 0, longitude: 0 });
      expect(registry.get("s1").upvotes).toBe(0);
    });

    it("throws SpotNotFoundError for an unknown id", () => {
      const { registry } = makeRegistry();
      expect(() => registry.remove("missing")).toThrow(SpotNotFoundError);
    });
  });

  describe("votes", () => {
    it("counts up and down votes separately", () => {
      const { registry } = makeRegistry([makeSpot()]);

      registry.upvote("s1");
      registry.upvote("s1");
      const result = registry.downvote("s1");

      expect(result).toEqual({ id: "s1", upvotes: 2, downvotes: 1 });
      expect(registry.get("s1")).toMatchObject({ upvotes: 2, downvotes: 1 });
    });

    it("rejects votes for unknown spots", () => {
      const { registry } = makeRegistry();
      expect(() => registry.upvote("missing")).toThrow(SpotNotFoundError);
    });
  });

  describe("nearby / score", () => {
    // ~111 m and ~1.1 km north of CENTER
    const near = makeSpot({ id: "near", type: "elevator", coordinate: { lat: 37.9765, lng: 23.7348 } });
    const far = makeSpot({ id: "far", coordinate: { lat: 37.9855, lng: 23.7348 } });

    it("returns spots in range, nearest first, with distances", () => {
      const { registry } = makeRegistry([far, near, makeSpot()]);

      const result = registry.nearby(CENTER, 500, "all");

      expect(result.center).toEqual(CENTER);
      expect(result.radiusMeters).toBe(500);
      expect(result.spots.map((s) => s.id)).toEqual(["s1", "near"]);
      expect(result.spots[0]!.distanceMeters).toBe(0);
      expect(result.spots[1]!.distanceMeters).toBeCloseTo(111.19, 1);
    });

    it("applies the audience filter", () => {
      const { registry } = makeRegistry([near, makeSpot()]);
      expect(registry.nearby(CENTER, 500, "elevator").spots.map((s) => s.id)).toEqual(["near"]);
    });

    it("scores the area", () => {
      // ramp + elevator, both working: 10 + 30 + 10
      const { registry } = makeRegistry([far, near, makeSpot()]);

      expect(registry.score(CENTER, 500)).toEqual({
        center: CENTER,
        radiusMeters: 500,
        totalSpots: 2,
        workingSpots: 2,
        uniqueTypes: 2,
        quantityScore: 10,
        qualityScore: 30,
        varietyScore: 10,
        score: 50,
        category: "moderate",
        description: "Moderate accessibility",
      });
    });
  });
});
