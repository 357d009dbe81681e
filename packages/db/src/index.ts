// ---------------------------------------------------------------------------
// @wayfarer/db — barrel export
// ---------------------------------------------------------------------------

// Schema tables
export {
  characterPreferences,
  entity,
  gameSession,
  journey,
  location,
  locationDiscovery,
  needAdaptation,
  needModifier,
  needValue,
  terrainZone,
  transportMode,
  zoneConnection,
  zoneDiscovery,
  type PendingCheckColumn,
} from "./schema/index.js";

// Client factory + types
export {
  createDb,
  DEFAULT_DATABASE_URL,
  type Database,
  type DbOptions,
  type Transaction,
} from "./client.js";

// Catalog upsert (shared by the seed script and the server bootstrap)
export { upsertTransportModes } from "./transport-catalog.js";
