export { SpotStore } from "./spot-store.js";
export {
  SPOTS_STORAGE_KEY,
  MemorySpotPersistence,
  serializeSpots,
  deserializeSpots,
  type SpotPersistence,
} from "./persistence.js";
export { SqliteSpotPersistence, type SqliteSpotPersistenceOptions } from "./sqlite-persistence.js";
export { matchesFilter, filterSpots, filterNearby } from "./filters.js";
