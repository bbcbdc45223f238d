import {
  index,
  integer,
  jsonb,
  timestamp,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import { createdAt, prodSchema, updatedAt } from "../schemaHelpers.js";
import { tournaments } from "./tournaments.js";
import type { MatchOutcome } from "../../@types/match.js";

export const matchStatus = ["scheduled", "completed", "void"] as const;

export const matchStage = ["group", "knockout", "single"] as const;

export const bracketType = ["winners", "third_place"] as const;

export const matchSlot = ["player1", "player2"] as const;

export const matches = prodSchema.table(
  "matches",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    tournamentId: uuid("tournament_id")
      .notNull()
      .references(() => tournaments.id, { onDelete: "cascade" }),
    stage: varchar({ enum: matchStage }).notNull(),
    groupLabel: varchar("group_label", { length: 8 }),
    round: integer().notNull(),
    position: integer().notNull(),
    player1Id: varchar("player1_id", { length: 255 }),
    player2Id: varchar("player2_id", { length: 255 }),
    winnerId: varchar("winner_id", { length: 255 }),
    outcome: jsonb().$type<MatchOutcome>(),
    status: varchar({ enum: matchStatus }).notNull().default("scheduled"),
    bracketType: varchar("bracket_type", { enum: bracketType }),
    nextMatchId: uuid("next_match_id"),
    nextMatchSlot: varchar("next_match_slot", { enum: matchSlot }),
    loserNextMatchId: uuid("loser_next_match_id"),
    loserNextMatchSlot: varchar("loser_next_match_slot", { enum: matchSlot }),
    completedAt: timestamp("completed_at"),
    createdAt,
    updatedAt,
  },
  (table) => [index("matches_tournament_idx").on(table.tournamentId)],
);
