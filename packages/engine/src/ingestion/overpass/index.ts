/**
 * Overpass API ingestion module.
 *
 * Queries the Overpass API for accessibility-tagged features around a
 * point and turns them into spot candidates.
 */

export {
  buildAccessibilityQuery,
  fetchAccessibilityElements,
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT,
  type OverpassOptions,
} from "./query.js";
export {
  parseAccessibilityElements,
  DEFAULT_IMPORT_DESCRIPTION,
  type ParseOptions,
} from "./parser.js";
