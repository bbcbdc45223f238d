import { integer, primaryKey, uuid, varchar } from "drizzle-orm/pg-core";
import { createdAt, prodSchema } from "../schemaHelpers.js";
import { tournaments } from "./tournaments.js";

export const participantStatus = ["pending", "confirmed", "cancelled"] as const;

export const tournamentParticipants = prodSchema.table(
  "tournament_participants",
  {
    tournamentId: uuid("tournament_id")
      .notNull()
      .references(() => tournaments.id, { onDelete: "cascade" }),
    participantId: varchar("participant_id", { length: 255 }).notNull(),
    status: varchar({ enum: participantStatus }).notNull().default("confirmed"),
    seed: integer(),
    placement: integer(),
    createdAt,
  },
  (table) => [
    primaryKey({ columns: [table.tournamentId, table.participantId] }),
  ],
);
