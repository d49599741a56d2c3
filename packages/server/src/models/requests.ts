/**
 * Request models. tsoa validates bodies and query parameters against
 * these types and their JSDoc constraints before a controller runs.
 */

export type SpotTypeParam =
  | "ramp"
  | "elevator"
  | "accessible-entrance"
  | "step-free-route"
  | "accessible-parking"
  | "accessible-toilet";

export type SpotStatusParam = "working" | "not-working" | "under-maintenance";

export type AccessibilityFilterParam = "all" | "wheelchair" | "stroller" | "ramp" | "elevator";

export interface CreateSpotRequest {
  /**
   * Client-generated id; a new UUID is assigned when omitted.
   * Submitting an existing id replaces that spot's fields.
   * @minLength 1
   */
  id?: string;
  /** @minLength 1 */
  title: string;
  description: string;
  /** Classified from title and description when omitted */
  type?: SpotTypeParam;
  /** Defaults to "working" */
  status?: SpotStatusParam;
  /**
   * @minimum -90
   * @maximum 90
   */
  latitude: number;
  /**
   * @minimum -180
   * @maximum 180
   */
  longitude: number;
  /** Defaults to the time of the request; ignored when the id already exists */
  createdAt?: Date;
  photoReference?: string;
}

/** Full replacement of a spot's editable fields */
export interface UpdateSpotRequest {
  /** @minLength 1 */
  title: string;
  description: string;
  type: SpotTypeParam;
  status: SpotStatusParam;
  /**
   * @minimum -90
   * @maximum 90
   */
  latitude: number;
  /**
   * @minimum -180
   * @maximum 180
   */
  longitude: number;
  photoReference?: string;
}

export interface ImportRequest {
  /**
   * @minimum -90
   * @maximum 90
   */
  lat: number;
  /**
   * @minimum -180
   * @maximum 180
   */
  lng: number;
  /**
   * Search radius in meters (default: IMPORT_RADIUS_METERS)
   * @minimum 1
   */
  radius?: number;
}
