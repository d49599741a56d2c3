import { describe, it, expect } from "vitest";
import { KeywordTypeClassifier } from "./keyword-classifier.js";

describe("KeywordTypeClassifier", () => {
  const classifier = new KeywordTypeClassifier();

  it("returns null when no keyword matches", () => {
    expect(classifier.classify("lovely bakery with fresh bread")).toBeNull();
    expect(classifier.classify("")).toBeNull();
  });

  it("classifies a single clear hit with full confidence", () => {
    expect(classifier.classify("Public restroom behind the museum")).toEqual({
      type: "accessible-toilet",
      confidence: 1,
    });
  });

  it("is case-insensitive", () => {
    expect(classifier.classify("ELEVATOR to platform 2")?.type).toBe("elevator");
  });

  it("picks the type with the most hits and reports its share", () => {
    // ramp: "ramp", "slope" (2), entrance: "entrance" (1)
    expect(classifier.classify("Gentle slope and ramp at the side entrance")).toEqual({
      type: "ramp",
      confidence: 2 / 3,
    });
  });

  it("breaks ties in type order", () => {
    // ramp: "ramp" (1), elevator: "lift" (1)
    expect(classifier.classify("ramp next to the lift")).toEqual({
      type: "ramp",
      confidence: 0.5,
    });
  });

  it("accepts a custom keyword table", () => {
    const custom = new KeywordTypeClassifier({
      ramp: [],
      elevator: ["ascensor"],
      "accessible-entrance": [],
      "step-free-route": [],
      "accessible-parking": [],
      "accessible-toilet": [],
    });
    expect(custom.classify("Ascensor en la estación")?.type).toBe("elevator");
  });
});
