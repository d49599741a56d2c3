/**
 * Spot record codec.
 *
 * Converts spots to and from the serialized SpotRecord shape used by
 * local persistence and the remote API. Decoding is strict: a record
 * with an unknown type or status label, a missing field, or an
 * unparseable timestamp is rejected as a whole.
 */

import {
  SPOT_STATUSES,
  SPOT_STATUS_LABELS,
  SPOT_TYPES,
  SPOT_TYPE_LABELS,
  type AccessibilitySpot,
  type SpotRecord,
  type SpotStatus,
  type SpotType,
} from "./spot.js";

/** Thrown when a serialized record cannot be turned into a spot */
export class SpotDecodeError extends Error {
  constructor(
    message: string,
    readonly recordId?: string,
  ) {
    super(message);
    this.name = "SpotDecodeError";
  }
}

const TYPE_BY_LABEL = new Map<string, SpotType>(
  SPOT_TYPES.map((t) => [SPOT_TYPE_LABELS[t], t]),
);

const STATUS_BY_LABEL = new Map<string, SpotStatus>(
  SPOT_STATUSES.map((s) => [SPOT_STATUS_LABELS[s], s]),
);

/** Look up a spot type by its record label */
export function spotTypeFromLabel(label: string): SpotType | undefined {
  return TYPE_BY_LABEL.get(label);
}

/** Look up a spot status by its record label */
export function spotStatusFromLabel(label: string): SpotStatus | undefined {
  return STATUS_BY_LABEL.get(label);
}

export function encodeSpot(spot: AccessibilitySpot): SpotRecord {
  const record: SpotRecord = {
    id: spot.id,
    title: spot.title,
    description: spot.description,
    type: SPOT_TYPE_LABELS[spot.type],
    status: SPOT_STATUS_LABELS[spot.status],
    latitude: spot.coordinate.lat,
    longitude: spot.coordinate.lng,
    createdAt: spot.createdAt.toISOString(),
  };
  if (spot.photoReference) {
    record.photoReference = spot.photoReference;
  }
  return record;
}

function isRecordObject(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

function requireString(raw: Record<string, unknown>, key: string, id?: string): string {
  const value = raw[key];
  if (typeof value !== "string") {
    throw new SpotDecodeError(`missing or non-string field "${key}"`, id);
  }
  return value;
}

function requireNumber(raw: Record<string, unknown>, key: string, id?: string): number {
  const value = raw[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new SpotDecodeError(`missing or non-numeric field "${key}"`, id);
  }
  return value;
}

/**
 * Decode a single serialized record.
 *
 * Vote counters are not part of the spot and are ignored here.
 *
 * @throws SpotDecodeError if any required field is missing or invalid
 */
export function decodeSpotRecord(raw: unknown): AccessibilitySpot {
  if (!isRecordObject(raw)) {
    throw new SpotDecodeError("record is not an object");
  }

  const id = requireString(raw, "id");
  if (id.length === 0) {
    throw new SpotDecodeError('empty "id"');
  }

  const typeLabel = requireString(raw, "type", id);
  const type = spotTypeFromLabel(typeLabel);
  if (!type) {
    throw new SpotDecodeError(`unknown spot type "${typeLabel}"`, id);
  }

  const statusLabel = requireString(raw, "status", id);
  const status = spotStatusFromLabel(statusLabel);
  if (!status) {
    throw new SpotDecodeError(`unknown spot status "${statusLabel}"`, id);
  }

  const createdAt = new Date(requireString(raw, "createdAt", id));
  if (Number.isNaN(createdAt.getTime())) {
    throw new SpotDecodeError('unparseable "createdAt"', id);
  }

  const spot: AccessibilitySpot = {
    id,
    title: requireString(raw, "title", id),
    description: requireString(raw, "description", id),
    type,
    status,
    coordinate: {
      lat: requireNumber(raw, "latitude", id),
      lng: requireNumber(raw, "longitude", id),
    },
    createdAt,
  };

  const photoReference = raw["photoReference"];
  if (typeof photoReference === "string" && photoReference.length > 0) {
    spot.photoReference = photoReference;
  }

  return spot;
}

/**
 * Decode a batch of records, skipping any that fail.
 *
 * A malformed record never aborts the batch; rejected records are
 * logged with their id (when one could be read).
 */
export function decodeSpotRecords(raw: readonly unknown[]): AccessibilitySpot[] {
  const spots: AccessibilitySpot[] = [];
  let skipped = 0;

  for (const item of raw) {
    try {
      spots.push(decodeSpotRecord(item));
    } catch (err) {
      if (!(err instanceof SpotDecodeError)) throw err;
      skipped++;
      console.warn(`[codec] Skipping record ${err.recordId ?? "(no id)"}: ${err.message}`);
    }
  }

  if (skipped > 0) {
    console.warn(`[codec] Skipped ${skipped} of ${raw.length} record(s)`);
  }

  return spots;
}
