import { EntityKind } from "@wayfarer/shared";
import {
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";
import { gameSession } from "./game-session.js";

export const entity = pgTable(
  "entity",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    sessionId: uuid("session_id")
      .notNull()
      .references(() => gameSession.id, { onDelete: "cascade" }),
    entityKey: text("entity_key").notNull(),
    displayName: text("display_name").notNull(),
    kind: text("kind", { enum: EntityKind.options }).notNull(),
    // Not a foreign key: entities may be created before the map is built
    currentZoneKey: text("current_zone_key"),
    skills: jsonb("skills").$type<Record<string, number>>().notNull().default({}),
    attributes: jsonb("attributes")
      .$type<Record<string, number>>()
      .notNull()
      .default({}),
    extra: jsonb("extra").$type<Record<string, string>>().notNull().default({}),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (t) => [
    // Natural key — side tables reference (session_id, entity_key)
    uniqueIndex("entity_session_key_uniq").on(t.sessionId, t.entityKey),
  ],
);
