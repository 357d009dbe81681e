import { type TerrainType, TransportType } from "@wayfarer/shared";
import {
  doublePrecision,
  jsonb,
  pgTable,
  text,
  uuid,
} from "drizzle-orm/pg-core";

// Global catalog — not scoped to a session
export const transportMode = pgTable("transport_mode", {
  id: uuid("id").defaultRandom().primaryKey(),
  modeKey: text("mode_key").notNull().unique(),
  displayName: text("display_name").notNull(),
  transportType: text("transport_type", { enum: TransportType.options }).notNull(),
  terrainCosts: jsonb("terrain_costs")
    .$type<Partial<Record<TerrainType, number>>>()
    .notNull(),
  requiresSkill: text("requires_skill"),
  requiresItem: text("requires_item"),
  fatigueRate: doublePrecision("fatigue_rate").notNull().default(1),
  encounterModifier: doublePrecision("encounter_modifier").notNull().default(1),
});
