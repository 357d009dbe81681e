import { NeedName } from "@wayfarer/shared";
import {
  doublePrecision,
  foreignKey,
  integer,
  pgTable,
  text,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";
import { entity } from "./entity.js";

export const needValue = pgTable(
  "need_value",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    sessionId: uuid("session_id").notNull(),
    entityKey: text("entity_key").notNull(),
    needName: text("need_name", { enum: NeedName.options }).notNull(),
    value: doublePrecision("value").notNull(),
    craving: doublePrecision("craving").notNull().default(0),
    lastSatisfiedTurn: integer("last_satisfied_turn"),
    lastCommunicatedTurn: integer("last_communicated_turn"),
    lastCommunicatedValue: doublePrecision("last_communicated_value"),
  },
  (t) => [
    foreignKey({
      name: "need_value_entity_fk",
      columns: [t.sessionId, t.entityKey],
      foreignColumns: [entity.sessionId, entity.entityKey],
    }).onDelete("cascade"),
    uniqueIndex("need_value_entity_need_uniq").on(
      t.sessionId,
      t.entityKey,
      t.needName,
    ),
  ],
);
