import { ConnectionType } from "@wayfarer/shared";
import {
  boolean,
  foreignKey,
  index,
  integer,
  pgTable,
  text,
  uuid,
} from "drizzle-orm/pg-core";
import { terrainZone } from "./terrain-zone.js";

export const zoneConnection = pgTable(
  "zone_connection",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    sessionId: uuid("session_id").notNull(),
    fromZoneKey: text("from_zone_key").notNull(),
    toZoneKey: text("to_zone_key").notNull(),
    connectionType: text("connection_type", { enum: ConnectionType.options })
      .notNull()
      .default("open"),
    crossingMinutes: integer("crossing_minutes").notNull().default(0),
    requiresSkill: text("requires_skill"),
    skillDifficulty: integer("skill_difficulty"),
    isBidirectional: boolean("is_bidirectional").notNull().default(true),
    isPassable: boolean("is_passable").notNull().default(true),
    blockedReason: text("blocked_reason"),
    isVisible: boolean("is_visible").notNull().default(true),
    direction: text("direction"),
  },
  (t) => [
    foreignKey({
      name: "zone_connection_from_fk",
      columns: [t.sessionId, t.fromZoneKey],
      foreignColumns: [terrainZone.sessionId, terrainZone.zoneKey],
    }).onDelete("cascade"),
    foreignKey({
      name: "zone_connection_to_fk",
      columns: [t.sessionId, t.toZoneKey],
      foreignColumns: [terrainZone.sessionId, terrainZone.zoneKey],
    }).onDelete("cascade"),
    index("zone_connection_session_idx").on(t.sessionId),
  ],
);
