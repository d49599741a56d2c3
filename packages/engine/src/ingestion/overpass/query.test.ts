import { describe, it, expect, vi, beforeEach } from "vitest";
import { buildAccessibilityQuery, fetchAccessibilityElements, DEFAULT_ENDPOINT } from "./query.js";
import { ImportAbortedError, ImportFailedError } from "../errors.js";

vi.mock("overpass-ts", () => ({
  overpassJson: vi.fn(),
}));

import { overpassJson } from "overpass-ts";
import type { OverpassJson } from "overpass-ts";

const CENTER = { lat: 37.9755, lng: 23.7348 };

const EMPTY_RESPONSE: OverpassJson = {
  version: 0.6,
  generator: "test",
  osm3s: { timestamp_osm_base: "2025-01-01T00:00:00Z", copyright: "test" },
  elements: [],
};

describe("buildAccessibilityQuery", () => {
  it("requests JSON output with the given timeout", () => {
    const query = buildAccessibilityQuery(CENTER, 1000, 60);
    expect(query.startsWith("[out:json][timeout:60];")).toBe(true);
  });

  it("uses a default timeout of 25", () => {
    expect(buildAccessibilityQuery(CENTER, 1000)).toContain("[timeout:25]");
  });

  it("filters every statement by radius, lat, lon", () => {
    const query = buildAccessibilityQuery(CENTER, 750);
    const statements = query.split("\n").filter((l) => l.trim().startsWith("node") || l.trim().startsWith("way"));
    expect(statements).toHaveLength(8);
    for (const line of statements) {
      expect(line).toContain("(around:750,37.9755,23.7348);");
    }
  });

  it("covers each accessibility tag family", () => {
    const query = buildAccessibilityQuery(CENTER, 1000);
    expect(query).toContain('node["entrance"="yes"]["wheelchair"="yes"]');
    expect(query).toContain('way["highway"="steps"]["ramp:wheelchair"="yes"]');
    expect(query).toContain('node["highway"="elevator"]');
    expect(query).toContain('way["amenity"="parking"]["wheelchair"="yes"]');
    expect(query).toContain('node["amenity"="toilets"]["wheelchair"="yes"]');
    expect(query).toContain('node["tactile_paving"="yes"]');
  });

  it("asks for way centers", () => {
    expect(buildAccessibilityQuery(CENTER, 1000).endsWith("out center;")).toBe(true);
  });
});

describe("fetchAccessibilityElements", () => {
  const mockOverpass = vi.mocked(overpassJson);

  beforeEach(() => {
    mockOverpass.mockReset();
  });

  it("sends the built query to the default endpoint", async () => {
    mockOverpass.mockResolvedValue(EMPTY_RESPONSE);

    const data = await fetchAccessibilityElements(CENTER, 500);

    expect(data).toEqual(EMPTY_RESPONSE);
    expect(mockOverpass).toHaveBeenCalledWith(buildAccessibilityQuery(CENTER, 500), {
      endpoint: DEFAULT_ENDPOINT,
    });
  });

  it("passes a custom endpoint and user agent through", async () => {
    mockOverpass.mockResolvedValue(EMPTY_RESPONSE);

    await fetchAccessibilityElements(CENTER, 500, {
      endpoint: "http://localhost:12345/api/interpreter",
      userAgent: "openramp-test",
      timeout: 90,
    });

    expect(mockOverpass).toHaveBeenCalledWith(buildAccessibilityQuery(CENTER, 500, 90), {
      endpoint: "http://localhost:12345/api/interpreter",
      userAgent: "openramp-test",
    });
  });

  it("wraps transport failures in ImportFailedError", async () => {
    mockOverpass.mockRejectedValue(new Error("socket hang up"));

    await expect(fetchAccessibilityElements(CENTER, 500)).rejects.toThrow(ImportFailedError);
    await expect(fetchAccessibilityElements(CENTER, 500)).rejects.toThrow(
      "Overpass request failed: socket hang up",
    );
  });

  it("rejects immediately when the signal is already aborted", async () => {
    mockOverpass.mockResolvedValue(EMPTY_RESPONSE);
    const controller = new AbortController();
    controller.abort();

    await expect(
      fetchAccessibilityElements(CENTER, 500, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(ImportAbortedError);
  });

  it("rejects when aborted while the request is pending", async () => {
    mockOverpass.mockReturnValue(new Promise(() => {}));
    const controller = new AbortController();

    const pending = fetchAccessibilityElements(CENTER, 500, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(ImportAbortedError);
  });

  it("resolves normally when the signal never fires", async () => {
    mockOverpass.mockResolvedValue(EMPTY_RESPONSE);
    const controller = new AbortController();

    await expect(
      fetchAccessibilityElements(CENTER, 500, { signal: controller.signal }),
    ).resolves.toEqual(EMPTY_RESPONSE);
  });
});
