import { Controller, Get, Route, Tags } from "@tsoa/runtime";
import type { HealthResponse } from "../models/responses.js";
import { getSpotRegistry, type SpotRegistryService } from "../services/spot-registry.service.js";

@Route("health")
@Tags("Health")
export class HealthController extends Controller {
  constructor(private readonly registry: SpotRegistryService = getSpotRegistry()) {
    super();
  }

  /** Health check with the number of stored spots */
  @Get()
  public async getHealth(): Promise<HealthResponse> {
    return {
      status: "ok",
      uptime: process.uptime(),
      spots: this.registry.store.size,
    };
  }
}
