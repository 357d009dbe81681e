import {
  EncounterFrequency,
  FailureConsequence,
  TerrainType,
  VisibilityRange,
} from "@wayfarer/shared";
import {
  boolean,
  foreignKey,
  integer,
  pgTable,
  text,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";
import { gameSession } from "./game-session.js";

export const terrainZone = pgTable(
  "terrain_zone",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    sessionId: uuid("session_id")
      .notNull()
      .references(() => gameSession.id, { onDelete: "cascade" }),
    zoneKey: text("zone_key").notNull(),
    displayName: text("display_name").notNull(),
    terrain: text("terrain", { enum: TerrainType.options }).notNull(),
    parentZoneKey: text("parent_zone_key"),
    baseTravelCost: integer("base_travel_cost").notNull().default(10),
    mountedTravelCost: integer("mounted_travel_cost"),
    requiresSkill: text("requires_skill"),
    skillDifficulty: integer("skill_difficulty"),
    failureConsequence: text("failure_consequence", {
      enum: FailureConsequence.options,
    }),
    visibilityRange: text("visibility_range", {
      enum: VisibilityRange.options,
    })
      .notNull()
      .default("medium"),
    encounterFrequency: text("encounter_frequency", {
      enum: EncounterFrequency.options,
    })
      .notNull()
      .default("low"),
    isAccessible: boolean("is_accessible").notNull().default(true),
    blockedReason: text("blocked_reason"),
    description: text("description").notNull().default(""),
  },
  (t) => [
    uniqueIndex("terrain_zone_session_key_uniq").on(t.sessionId, t.zoneKey),
    // NO ACTION so a whole-session cascade can remove parents and children together
    foreignKey({
      name: "terrain_zone_parent_fk",
      columns: [t.sessionId, t.parentZoneKey],
      foreignColumns: [t.sessionId, t.zoneKey],
    }),
  ],
);
