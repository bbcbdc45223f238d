import {
  doublePrecision,
  integer,
  primaryKey,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import { prodSchema, updatedAt } from "../schemaHelpers.js";
import { tournaments } from "./tournaments.js";

export const tournamentRankings = prodSchema.table(
  "tournament_rankings",
  {
    tournamentId: uuid("tournament_id")
      .notNull()
      .references(() => tournaments.id, { onDelete: "cascade" }),
    participantId: varchar("participant_id", { length: 255 }).notNull(),
    rank: integer().notNull(),
    points: doublePrecision().notNull().default(0),
    matchesPlayed: integer("matches_played").notNull().default(0),
    wins: integer().notNull().default(0),
    draws: integer().notNull().default(0),
    losses: integer().notNull().default(0),
    goalsFor: integer("goals_for").notNull().default(0),
    goalsAgainst: integer("goals_against").notNull().default(0),
    metricValue: doublePrecision("metric_value"),
    updatedAt,
  },
  (table) => [
    primaryKey({ columns: [table.tournamentId, table.participantId] }),
  ],
);
