import { describe, it, expect } from "vitest";
import { isAccessibilityFilter, type AccessibilitySpot, type SpotType } from "@openramp/types";
import { filterNearby, filterSpots, matchesFilter } from "./filters.js";

function spotOfType(type: SpotType): AccessibilitySpot {
  return {
    id: type,
    title: type,
    description: "",
    type,
    status: "working",
    coordinate: { lat: 0, lng: 0 },
    createdAt: new Date(0),
  };
}

describe("matchesFilter", () => {
  it("admits every type under 'all'", () => {
    expect(matchesFilter(spotOfType("accessible-toilet"), "all")).toBe(true);
  });

  it("admits ramps, elevators and entrances for wheelchairs", () => {
    expect(matchesFilter(spotOfType("ramp"), "wheelchair")).toBe(true);
    expect(matchesFilter(spotOfType("elevator"), "wheelchair")).toBe(true);
    expect(matchesFilter(spotOfType("accessible-entrance"), "wheelchair")).toBe(true);
    expect(matchesFilter(spotOfType("accessible-parking"), "wheelchair")).toBe(false);
  });

  it("admits ramps and step-free routes for strollers", () => {
    expect(matchesFilter(spotOfType("step-free-route"), "stroller")).toBe(true);
    expect(matchesFilter(spotOfType("elevator"), "stroller")).toBe(false);
  });
});

describe("filterSpots / filterNearby", () => {
  const spots = [spotOfType("ramp"), spotOfType("elevator"), spotOfType("accessible-toilet")];

  it("filters plain spots", () => {
    expect(filterSpots(spots, "elevator").map((s) => s.id)).toEqual(["elevator"]);
  });

  it("filters distance-annotated results and keeps their order", () => {
    const annotated = spots.map((spot, i) => ({ spot, distanceMeters: i * 10 }));
    expect(filterNearby(annotated, "wheelchair").map((r) => r.distanceMeters)).toEqual([0, 10]);
  });
});

describe("isAccessibilityFilter", () => {
  it("accepts known filters only", () => {
    expect(isAccessibilityFilter("stroller")).toBe(true);
    expect(isAccessibilityFilter("toString")).toBe(false);
    expect(isAccessibilityFilter(3)).toBe(false);
  });
});
