import { index, jsonb, serial, uuid, varchar } from "drizzle-orm/pg-core";
import { createdAt, prodSchema } from "../schemaHelpers.js";
import { tournamentStatus, tournaments } from "./tournaments.js";

// Audit trail, one row per status change. `serial` keeps the order of changes
// made inside one transaction, which share a timestamp.
export const tournamentStatusHistory = prodSchema.table(
  "tournament_status_history",
  {
    id: serial("id").primaryKey(),
    tournamentId: uuid("tournament_id")
      .notNull()
      .references(() => tournaments.id, { onDelete: "cascade" }),
    oldStatus: varchar("old_status", { enum: tournamentStatus }),
    newStatus: varchar("new_status", { enum: tournamentStatus }).notNull(),
    reason: varchar({ length: 500 }),
    metadata: jsonb().$type<Record<string, unknown>>(),
    createdAt,
  },
  (table) => [
    index("tournament_status_history_tournament_idx").on(table.tournamentId),
  ],
);
