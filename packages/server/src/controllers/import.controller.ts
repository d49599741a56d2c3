import { Body, Controller, Post, Response, Route, Tags } from "@tsoa/runtime";
import type { ImportRequest } from "../models/requests.js";
import type { ErrorResponse, ImportResponse } from "../models/responses.js";
import { getImportService, type ImportService } from "../services/import.service.js";

@Route("api/imports")
@Tags("Imports")
export class ImportController extends Controller {
  constructor(private readonly imports: ImportService = getImportService()) {
    super();
  }

  /** Import OpenStreetMap accessibility features around a point */
  @Post()
  @Response<ErrorResponse>(422, "Validation failed")
  @Response<ErrorResponse>(409, "Superseded by a newer import")
  @Response<ErrorResponse>(502, "Overpass API request failed")
  public async importSpots(@Body() body: ImportRequest): Promise<ImportResponse> {
    return this.imports.run({ lat: body.lat, lng: body.lng }, body.radius);
  }
}
