import {
  Body,
  Controller,
  Delete,
  Get,
  Path,
  Post,
  Put,
  Query,
  Response,
  Route,
  SuccessResponse,
  Tags,
} from "@tsoa/runtime";
import type { Coordinate } from "@openramp/types";
import type {
  AccessibilityFilterParam,
  CreateSpotRequest,
  UpdateSpotRequest,
} from "../models/requests.js";
import type {
  ErrorResponse,
  NearbySpotsResponse,
  SpotListResponse,
  SpotResponse,
  VoteResponse,
} from "../models/responses.js";
import { DEFAULT_QUERY_RADIUS_METERS } from "../config.js";
import { getSpotRegistry, type SpotRegistryService } from "../services/spot-registry.service.js";

@Route("api/spots")
@Tags("Spots")
export class SpotController extends Controller {
  constructor(private readonly registry: SpotRegistryService = getSpotRegistry()) {
    super();
  }

  /** All stored spots, in insertion order */
  @Get()
  public async listSpots(): Promise<SpotListResponse> {
    return { spots: this.registry.list() };
  }

  /**
   * Spots within `radius` meters of a point, nearest first.
   * @param radius Search radius in meters (default: 500)
   * @param filter Audience preset (default: all)
   * @minimum lat -90
   * @maximum lat 90
   * @minimum lng -180
   * @maximum lng 180
   * @minimum radius 1
   */
  @Get("nearby")
  @Response<ErrorResponse>(422, "Validation failed")
  public async getNearby(
    @Query() lat: number,
    @Query() lng: number,
    @Query() radius?: number,
    @Query() filter?: AccessibilityFilterParam,
  ): Promise<NearbySpotsResponse> {
    const center: Coordinate = { lat, lng };
    return this.registry.nearby(center, radius ?? DEFAULT_QUERY_RADIUS_METERS, filter ?? "all");
  }

  @Get("{id}")
  @Response<ErrorResponse>(404, "Spot not found")
  public async getSpot(@Path() id: string): Promise<SpotResponse> {
    return this.registry.get(id);
  }

  /**
   * Submit a spot; the type is inferred from the text when omitted.
   * Resubmitting an existing id replaces it and answers 200.
   */
  @Post()
  @SuccessResponse(201, "Created")
  @Response<SpotResponse>(200, "Replaced")
  @Response<ErrorResponse>(422, "Invalid body, or no type given and none could be inferred")
  public async createSpot(@Body() body: CreateSpotRequest): Promise<SpotResponse> {
    const { spot, created } = this.registry.create(body);
    this.setStatus(created ? 201 : 200);
    return spot;
  }

  /** Replace every field of a spot except its id and creation time */
  @Put("{id}")
  @Response<ErrorResponse>(404, "Spot not found")
  @Response<ErrorResponse>(422, "Validation failed")
  public async updateSpot(
    @Path() id: string,
    @Body() body: UpdateSpotRequest,
  ): Promise<SpotResponse> {
    return this.registry.update(id, body);
  }

  @Delete("{id}")
  @SuccessResponse(204, "Deleted")
  @Response<ErrorResponse>(404, "Spot not found")
  public async deleteSpot(@Path() id: string): Promise<void> {
    this.registry.remove(id);
    this.setStatus(204);
  }

  @Post("{id}/upvote")
  @Response<ErrorResponse>(404, "Spot not found")
  public async upvoteSpot(@Path() id: string): Promise<VoteResponse> {
    return this.registry.upvote(id);
  }

  @Post("{id}/downvote")
  @Response<ErrorResponse>(404, "Spot not found")
  public async downvoteSpot(@Path() id: string): Promise<VoteResponse> {
    return this.registry.downvote(id);
  }
}
