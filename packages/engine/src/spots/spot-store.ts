/**
 * In-memory store of accessibility spots.
 *
 * The store is the single owner of the session's spot collection. It
 * is not safe for concurrent writers; all mutation is expected to
 * happen from one logical owner (the event loop in practice).
 *
 * Every mutation writes the whole collection through the injected
 * persistence port. A failed write is logged and otherwise ignored, so
 * callers never see persistence errors.
 */

import type { AccessibilitySpot } from "@openramp/types";
import { MemorySpotPersistence, type SpotPersistence } from "./persistence.js";

export class SpotStore {
  /** id -> spot, in insertion order */
  private readonly spots = new Map<string, AccessibilitySpot>();

  constructor(
    private readonly persistence: SpotPersistence = new MemorySpotPersistence(),
    initial: readonly AccessibilitySpot[] = [],
  ) {
    for (const spot of initial) {
      this.spots.set(spot.id, spot);
    }
  }

  /** Build a store from whatever the persistence port currently holds */
  static open(persistence: SpotPersistence): SpotStore {
    return new SpotStore(persistence, persistence.load());
  }

  get size(): number {
    return this.spots.size;
  }

  /** All spots, in insertion order */
  all(): AccessibilitySpot[] {
    return [...this.spots.values()];
  }

  get(id: string): AccessibilitySpot | undefined {
    return this.spots.get(id);
  }

  has(id: string): boolean {
    return this.spots.has(id);
  }

  /**
   * Append a spot. No duplicate check is made against titles or
   * coordinates; callers dedup before adding.
   */
  add(spot: AccessibilitySpot): void {
    this.spots.set(spot.id, spot);
    this.persist();
  }

  /**
   * Remove the spot with the given id.
   *
   * @returns false (and does nothing) if no such spot exists
   */
  remove(id: string): boolean {
    if (!this.spots.delete(id)) return false;
    this.persist();
    return true;
  }

  /**
   * Replace the spot whose id matches `spot.id`.
   *
   * Every field is overwritten except `id` and `createdAt`, which keep
   * their stored values.
   *
   * @returns false (and does nothing) if no such spot exists
   */
  update(spot: AccessibilitySpot): boolean {
    const existing = this.spots.get(spot.id);
    if (!existing) return false;
    this.spots.set(spot.id, { ...spot, id: existing.id, createdAt: existing.createdAt });
    this.persist();
    return true;
  }

  private persist(): void {
    try {
      this.persistence.save(this.all());
    } catch (err) {
      console.warn(
        `[persist] Failed to save ${this.spots.size} spot(s): ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
