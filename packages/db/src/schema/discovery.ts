import { DiscoveryMethod } from "@wayfarer/shared";
import {
  foreignKey,
  integer,
  pgTable,
  text,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";
import { location } from "./location.js";
import { terrainZone } from "./terrain-zone.js";

export const zoneDiscovery = pgTable(
  "zone_discovery",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    sessionId: uuid("session_id").notNull(),
    zoneKey: text("zone_key").notNull(),
    discoveredTurn: integer("discovered_turn").notNull(),
    method: text("method", { enum: DiscoveryMethod.options }).notNull(),
    sourceEntityKey: text("source_entity_key"),
    sourceMapKey: text("source_map_key"),
    sourceZoneKey: text("source_zone_key"),
  },
  (t) => [
    foreignKey({
      name: "zone_discovery_zone_fk",
      columns: [t.sessionId, t.zoneKey],
      foreignColumns: [terrainZone.sessionId, terrainZone.zoneKey],
    }).onDelete("cascade"),
    // First discovery wins
    uniqueIndex("zone_discovery_session_zone_uniq").on(t.sessionId, t.zoneKey),
  ],
);

export const locationDiscovery = pgTable(
  "location_discovery",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    sessionId: uuid("session_id").notNull(),
    locationKey: text("location_key").notNull(),
    discoveredTurn: integer("discovered_turn").notNull(),
    method: text("method", { enum: DiscoveryMethod.options }).notNull(),
    sourceEntityKey: text("source_entity_key"),
    sourceMapKey: text("source_map_key"),
    sourceZoneKey: text("source_zone_key"),
  },
  (t) => [
    foreignKey({
      name: "location_discovery_location_fk",
      columns: [t.sessionId, t.locationKey],
      foreignColumns: [location.sessionId, location.locationKey],
    }).onDelete("cascade"),
    uniqueIndex("location_discovery_session_location_uniq").on(
      t.sessionId,
      t.locationKey,
    ),
  ],
);
