import { NeedName } from "@wayfarer/shared";
import {
  boolean,
  foreignKey,
  index,
  integer,
  pgTable,
  text,
  uuid,
} from "drizzle-orm/pg-core";
import { entity } from "./entity.js";

export const needAdaptation = pgTable(
  "need_adaptation",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    sessionId: uuid("session_id").notNull(),
    entityKey: text("entity_key").notNull(),
    needName: text("need_name", { enum: NeedName.options }).notNull(),
    delta: integer("delta").notNull(),
    reason: text("reason").notNull(),
    trigger: text("trigger").notNull(),
    startedTurn: integer("started_turn").notNull(),
    completedTurn: integer("completed_turn"),
    isGradual: boolean("is_gradual").notNull().default(false),
    durationDays: integer("duration_days"),
    isReversible: boolean("is_reversible").notNull().default(true),
    reversalTrigger: text("reversal_trigger"),
    reversedBy: uuid("reversed_by"),
  },
  (t) => [
    foreignKey({
      name: "need_adaptation_entity_fk",
      columns: [t.sessionId, t.entityKey],
      foreignColumns: [entity.sessionId, entity.entityKey],
    }).onDelete("cascade"),
    index("need_adaptation_entity_need_idx").on(
      t.sessionId,
      t.entityKey,
      t.needName,
    ),
  ],
);
