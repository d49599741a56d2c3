import { describe, it, expect, vi, afterEach } from "vitest";
import { BaseClient } from "./baseClient.js";
import { AreaClient } from "./areaClient.js";
import { HealthClient } from "./healthClient.js";

const CONFIG = { baseUrl: "http://localhost:3000" };

describe("AreaClient", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("requests the score around a point", async () => {
    const get = vi.spyOn(BaseClient.prototype, "get").mockResolvedValue({ score: 55 });

    const result = await new AreaClient(CONFIG).getScore({ lat: 37.9755, lng: 23.7348 }, 300);

    expect(get).toHaveBeenCalledWith({ path: "score", query: { lat: 37.9755, lng: 23.7348, radius: 300 } });
    expect(result.score).toBe(55);
  });

  it("omits the radius when not given", async () => {
    const get = vi.spyOn(BaseClient.prototype, "get").mockResolvedValue({ score: 0 });
    await new AreaClient(CONFIG).getScore({ lat: 0, lng: 0 });
    expect(get).toHaveBeenCalledWith({ path: "score", query: { lat: 0, lng: 0 } });
  });

  it("posts import requests", async () => {
    const post = vi
      .spyOn(BaseClient.prototype, "post")
      .mockResolvedValue({ added: [], fetchedCount: 0, duplicateCount: 0, importTimeMs: 3 });

    await new AreaClient(CONFIG).importAround({ lat: 1, lng: 2 });

    expect(post).toHaveBeenCalledWith({ body: { lat: 1, lng: 2 } });
  });
});

describe("HealthClient", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reads /health", async () => {
    const get = vi
      .spyOn(BaseClient.prototype, "get")
      .mockResolvedValue({ status: "ok", uptime: 1, spots: 0 });

    await expect(new HealthClient(CONFIG).getHealth()).resolves.toEqual({ status: "ok", uptime: 1, spots: 0 });
    expect(get).toHaveBeenCalledWith();
  });
});
