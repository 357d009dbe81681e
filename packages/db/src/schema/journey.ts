import { FailureConsequence, JourneyStatus } from "@wayfarer/shared";
import {
  boolean,
  foreignKey,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from "drizzle-orm/pg-core";
import { entity } from "./entity.js";

export type PendingCheckColumn = {
  zoneKey: string;
  connectionId: string | null;
  skill: string;
  difficulty: number;
  consequence: FailureConsequence | null;
};

export const journey = pgTable(
  "journey",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    sessionId: uuid("session_id").notNull(),
    entityKey: text("entity_key").notNull(),
    originZoneKey: text("origin_zone_key").notNull(),
    destinationZoneKey: text("destination_zone_key").notNull(),
    transportModeKey: text("transport_mode_key").notNull(),
    path: jsonb("path").$type<string[]>().notNull(),
    // Connection used to enter path[i]; index 0 is always null
    connectionIds: jsonb("connection_ids").$type<(string | null)[]>().notNull(),
    positionIndex: integer("position_index").notNull().default(0),
    elapsedMinutes: integer("elapsed_minutes").notNull().default(0),
    estimatedTotalMinutes: integer("estimated_total_minutes").notNull(),
    preferRoads: boolean("prefer_roads").notNull().default(false),
    status: text("status", { enum: JourneyStatus.options })
      .notNull()
      .default("in_progress"),
    interruptReason: text("interrupt_reason"),
    pendingCheck: jsonb("pending_check").$type<PendingCheckColumn>(),
    visitedZoneKeys: jsonb("visited_zone_keys")
      .$type<string[]>()
      .notNull()
      .default([]),
    createdTurn: integer("created_turn").notNull(),
    updatedTurn: integer("updated_turn").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (t) => [
    foreignKey({
      name: "journey_entity_fk",
      columns: [t.sessionId, t.entityKey],
      foreignColumns: [entity.sessionId, entity.entityKey],
    }).onDelete("cascade"),
    index("journey_entity_status_idx").on(t.sessionId, t.entityKey, t.status),
  ],
);
