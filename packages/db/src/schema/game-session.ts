import { integer, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const gameSession = pgTable("game_session", {
  id: uuid("id").defaultRandom().primaryKey(),
  name: text("name").notNull(),
  currentTurn: integer("current_turn").notNull().default(0),
  minutesPerTurn: integer("minutes_per_turn").notNull().default(5),
  createdAt: timestamp("created_at", { withTimezone: true })
    .defaultNow()
    .notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .defaultNow()
    .notNull()
    .$onUpdateFn(() => new Date()),
});
