import { LocationVisibility } from "@wayfarer/shared";
import {
  foreignKey,
  pgTable,
  text,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";
import { terrainZone } from "./terrain-zone.js";

export const location = pgTable(
  "location",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    sessionId: uuid("session_id").notNull(),
    locationKey: text("location_key").notNull(),
    displayName: text("display_name").notNull(),
    zoneKey: text("zone_key").notNull(),
    visibility: text("visibility", { enum: LocationVisibility.options })
      .notNull()
      .default("visible_from_zone"),
    description: text("description").notNull().default(""),
  },
  (t) => [
    uniqueIndex("location_session_key_uniq").on(t.sessionId, t.locationKey),
    foreignKey({
      name: "location_zone_fk",
      columns: [t.sessionId, t.zoneKey],
      foreignColumns: [terrainZone.sessionId, terrainZone.zoneKey],
    }).onDelete("cascade"),
  ],
);
