import { ModifierSource, NeedName } from "@wayfarer/shared";
import {
  boolean,
  doublePrecision,
  foreignKey,
  integer,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";
import { entity } from "./entity.js";

export const needModifier = pgTable(
  "need_modifier",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    sessionId: uuid("session_id").notNull(),
    entityKey: text("entity_key").notNull(),
    needName: text("need_name", { enum: NeedName.options }).notNull(),
    source: text("source", { enum: ModifierSource.options }).notNull(),
    // NOT NULL so the unique index below actually deduplicates
    sourceDetail: text("source_detail").notNull().default(""),
    decayRateMultiplier: doublePrecision("decay_rate_multiplier")
      .notNull()
      .default(1),
    satisfactionMultiplier: doublePrecision("satisfaction_multiplier")
      .notNull()
      .default(1),
    maxIntensityCap: integer("max_intensity_cap"),
    thresholdAdjustment: integer("threshold_adjustment").notNull().default(0),
    isActive: boolean("is_active").notNull().default(true),
    expiresAtTurn: integer("expires_at_turn"),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .defaultNow()
      .notNull()
      .$onUpdateFn(() => new Date()),
  },
  (t) => [
    foreignKey({
      name: "need_modifier_entity_fk",
      columns: [t.sessionId, t.entityKey],
      foreignColumns: [entity.sessionId, entity.entityKey],
    }).onDelete("cascade"),
    uniqueIndex("need_modifier_source_uniq").on(
      t.sessionId,
      t.entityKey,
      t.needName,
      t.source,
      t.sourceDetail,
    ),
  ],
);
