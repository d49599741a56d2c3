/**
 * SQLite-backed spot persistence.
 *
 * Uses a single key/value table. The whole collection is stored as one
 * JSON blob under SPOTS_STORAGE_KEY and replaced on every save.
 */

import Database from "better-sqlite3";
import type { AccessibilitySpot } from "@openramp/types";
import {
  SPOTS_STORAGE_KEY,
  deserializeSpots,
  serializeSpots,
  type SpotPersistence,
} from "./persistence.js";

export interface SqliteSpotPersistenceOptions {
  /** Path to the database file, or ":memory:" */
  filePath: string;
}

interface BlobRow {
  value: string;
}

export class SqliteSpotPersistence implements SpotPersistence {
  private readonly filePath: string;
  private db: Database.Database | null = null;

  constructor(options: SqliteSpotPersistenceOptions) {
    this.filePath = options.filePath;
  }

  load(): AccessibilitySpot[] {
    const row = this.open()
      .prepare("SELECT value FROM kv_store WHERE key = ?")
      .get(SPOTS_STORAGE_KEY) as BlobRow | undefined;

    if (!row) return [];

    try {
      return deserializeSpots(row.value);
    } catch (err) {
      console.warn(`[persist] Unreadable spot blob in ${this.filePath}: ${String(err)}`);
      return [];
    }
  }

  save(spots: readonly AccessibilitySpot[]): void {
    this.open()
      .prepare(
        `INSERT INTO kv_store (key, value) VALUES (?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
      )
      .run(SPOTS_STORAGE_KEY, serializeSpots(spots));
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }

  private open(): Database.Database {
    if (!this.db) {
      this.db = new Database(this.filePath);
      this.db.exec(
        "CREATE TABLE IF NOT EXISTS kv_store (key TEXT PRIMARY KEY, value TEXT NOT NULL)",
      );
    }
    return this.db;
  }
}
