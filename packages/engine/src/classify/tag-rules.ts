/**
 * Map OpenStreetMap tags to spot types.
 *
 * Rules are evaluated in order and the first match wins, so a node
 * tagged both as an elevator and as wheelchair-accessible parking is an
 * elevator. Extend the table to support new tag sources; the lookup
 * itself never changes.
 */

import type { SpotType } from "@openramp/types";

/** OSM tags as key-value pairs */
export type OsmTags = Record<string, string>;

export interface TagRule {
  /** Short identifier, for logs and tests */
  readonly name: string;
  readonly type: SpotType;
  /** Title used when the element has no `name` tag */
  readonly defaultTitle: string;
  matches(tags: OsmTags): boolean;
}

export interface TagClassification {
  type: SpotType;
  title: string;
  /** Name of the matching rule, or "default" */
  rule: string;
}

const isYes = (value: string | undefined): boolean => value === "yes";

export const TAG_RULES: readonly TagRule[] = [
  {
    name: "elevator",
    type: "elevator",
    defaultTitle: "Elevator",
    matches: (tags) => tags["highway"] === "elevator",
  },
  {
    name: "ramp",
    type: "ramp",
    defaultTitle: "Wheelchair Ramp",
    matches: (tags) => isYes(tags["ramp:wheelchair"]) || isYes(tags["ramp"]),
  },
  {
    name: "entrance",
    type: "accessible-entrance",
    defaultTitle: "Accessible Entrance",
    matches: (tags) => isYes(tags["entrance"]) && isYes(tags["wheelchair"]),
  },
  {
    name: "parking",
    type: "accessible-parking",
    defaultTitle: "Accessible Parking",
    matches: (tags) => tags["amenity"] === "parking" && isYes(tags["wheelchair"]),
  },
  {
    name: "toilets",
    type: "accessible-toilet",
    defaultTitle: "Accessible Toilet",
    matches: (tags) => tags["amenity"] === "toilets" && isYes(tags["wheelchair"]),
  },
  {
    name: "tactile-paving",
    type: "step-free-route",
    defaultTitle: "Step-free Route",
    matches: (tags) => isYes(tags["tactile_paving"]),
  },
];

const DEFAULT_TYPE: SpotType = "accessible-entrance";
const DEFAULT_TITLE = "Accessible Feature";

/**
 * Classify an element by its tags.
 *
 * @param tags - OSM tags object
 * @param rules - Rule table, in priority order (default: TAG_RULES)
 * @returns The spot type and a display title (the `name` tag if present)
 */
export function classifyTags(
  tags: OsmTags,
  rules: readonly TagRule[] = TAG_RULES,
): TagClassification {
  const name = tags["name"];
  for (const rule of rules) {
    if (rule.matches(tags)) {
      return { type: rule.type, title: name ?? rule.defaultTitle, rule: rule.name };
    }
  }
  return { type: DEFAULT_TYPE, title: name ?? DEFAULT_TITLE, rule: "default" };
}
