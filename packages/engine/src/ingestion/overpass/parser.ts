/**
 * Overpass JSON response parser.
 *
 * Converts Overpass elements into spot candidates for reconciliation.
 * Nodes carry `lat`/`lon`; ways and relations carry a `center` when
 * the query ends in `out center;`. Elements with neither, or without
 * tags, are skipped.
 *
 * OpenStreetMap has no notion of a feature being out of order, so every
 * imported spot starts as working.
 */

import { randomUUID } from "node:crypto";
import type { AccessibilitySpot, Coordinate } from "@openramp/types";
import type { OverpassJson } from "overpass-ts";
import { classifyTags, type OsmTags, type TagRule, TAG_RULES } from "../../classify/tag-rules.js";

export const DEFAULT_IMPORT_DESCRIPTION = "Accessibility feature from OpenStreetMap";

export interface ParseOptions {
  /** Id generator (default: random UUID) */
  createId?: () => string;
  /** Timestamp stamped on every parsed spot (default: now) */
  now?: Date;
  /** Tag rule table (default: TAG_RULES) */
  rules?: readonly TagRule[];
}

type OverpassElement = OverpassJson["elements"][number];

function isLatLon(value: unknown): value is { lat: number; lon: number } {
  return (
    typeof value === "object" &&
    value !== null &&
    "lat" in value &&
    "lon" in value &&
    typeof value.lat === "number" &&
    typeof value.lon === "number"
  );
}

/** A node's own position, or the center Overpass computed for a way/relation */
function pointOf(element: OverpassElement): Coordinate | null {
  if (isLatLon(element)) {
    return { lat: element.lat, lng: element.lon };
  }
  if ("center" in element && isLatLon(element.center)) {
    return { lat: element.center.lat, lng: element.center.lon };
  }
  return null;
}

function tagsOf(element: OverpassElement): OsmTags | null {
  if (!("tags" in element)) return null;
  const raw: unknown = element.tags;
  if (typeof raw !== "object" || raw === null) return null;

  const tags: OsmTags = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string") tags[key] = value;
  }
  return tags;
}

/**
 * Parse an Overpass JSON response into spot candidates.
 *
 * @param response - Overpass JSON response from fetchAccessibilityElements()
 * @returns Candidates in response order
 */
export function parseAccessibilityElements(
  response: OverpassJson,
  options?: ParseOptions,
): AccessibilitySpot[] {
  const createId = options?.createId ?? randomUUID;
  const now = options?.now ?? new Date();
  const rules = options?.rules ?? TAG_RULES;
  const spots: AccessibilitySpot[] = [];

  for (const element of response.elements) {
    const coordinate = pointOf(element);
    const tags = tagsOf(element);
    if (!coordinate || !tags) continue;

    const { type, title } = classifyTags(tags, rules);

    spots.push({
      id: createId(),
      title,
      description: tags["description"] ?? tags["note"] ?? DEFAULT_IMPORT_DESCRIPTION,
      type,
      status: "working",
      coordinate,
      createdAt: now,
    });
  }

  return spots;
}
