import {
  AlcoholTolerance,
  DriveLevel,
  IntimacyStyle,
  SocialTendency,
  type TraitFlag,
} from "@wayfarer/shared";
import {
  foreignKey,
  integer,
  jsonb,
  pgTable,
  text,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";
import { entity } from "./entity.js";

export const characterPreferences = pgTable(
  "character_preferences",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    sessionId: uuid("session_id").notNull(),
    entityKey: text("entity_key").notNull(),
    favoriteFoods: jsonb("favorite_foods").$type<string[]>().notNull().default([]),
    favoriteDrinks: jsonb("favorite_drinks")
      .$type<string[]>()
      .notNull()
      .default([]),
    dislikedFoods: jsonb("disliked_foods").$type<string[]>().notNull().default([]),
    allergies: jsonb("allergies").$type<string[]>().notNull().default([]),
    dietaryFlags: jsonb("dietary_flags").$type<string[]>().notNull().default([]),
    alcoholTolerance: text("alcohol_tolerance", {
      enum: AlcoholTolerance.options,
    })
      .notNull()
      .default("moderate"),
    intimacyDrive: text("intimacy_drive", { enum: DriveLevel.options })
      .notNull()
      .default("moderate"),
    intimacyStyle: text("intimacy_style", { enum: IntimacyStyle.options })
      .notNull()
      .default("selective"),
    attraction: text("attraction"),
    socialTendency: text("social_tendency", { enum: SocialTendency.options })
      .notNull()
      .default("ambivert"),
    preferredGroupSize: integer("preferred_group_size").notNull().default(3),
    traits: jsonb("traits").$type<TraitFlag[]>().notNull().default([]),
    age: integer("age"),
  },
  (t) => [
    foreignKey({
      name: "character_preferences_entity_fk",
      columns: [t.sessionId, t.entityKey],
      foreignColumns: [entity.sessionId, entity.entityKey],
    }).onDelete("cascade"),
    uniqueIndex("character_preferences_entity_uniq").on(
      t.sessionId,
      t.entityKey,
    ),
  ],
);
