import { Controller, Get, Query, Response, Route, Tags } from "@tsoa/runtime";
import type { AreaScoreResponse, ErrorResponse } from "../models/responses.js";
import { DEFAULT_QUERY_RADIUS_METERS } from "../config.js";
import { getSpotRegistry, type SpotRegistryService } from "../services/spot-registry.service.js";

@Route("api/area")
@Tags("Area")
export class AreaController extends Controller {
  constructor(private readonly registry: SpotRegistryService = getSpotRegistry()) {
    super();
  }

  /**
   * Accessibility score (0-100) of the area within `radius` meters of a point
   * @param radius Search radius in meters (default: 500)
   * @minimum lat -90
   * @maximum lat 90
   * @minimum lng -180
   * @maximum lng 180
   * @minimum radius 1
   */
  @Get("score")
  @Response<ErrorResponse>(422, "Validation failed")
  public async getScore(
    @Query() lat: number,
    @Query() lng: number,
    @Query() radius?: number,
  ): Promise<AreaScoreResponse> {
    return this.registry.score({ lat, lng }, radius ?? DEFAULT_QUERY_RADIUS_METERS);
  }
}
