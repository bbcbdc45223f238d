import {
  doublePrecision,
  index,
  jsonb,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import { createdAt, prodSchema } from "../schemaHelpers.js";
import { tournaments } from "./tournaments.js";
import type { LedgerMetadata } from "../../@types/reward.js";

export const rewardKind = ["credit", "xp", "skill", "badge"] as const;

// Append-only. Rows outlive the tournament they reference.
export const rewardLedger = prodSchema.table(
  "reward_ledger",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    idempotencyKey: varchar("idempotency_key", { length: 512 })
      .notNull()
      .unique(),
    tournamentId: uuid("tournament_id")
      .notNull()
      .references(() => tournaments.id),
    participantId: varchar("participant_id", { length: 255 }).notNull(),
    kind: varchar({ enum: rewardKind }).notNull(),
    reason: varchar({ length: 128 }).notNull(),
    amount: doublePrecision().notNull(),
    metadata: jsonb().$type<LedgerMetadata>().notNull(),
    createdAt,
  },
  (table) => [
    index("reward_ledger_tournament_participant_idx").on(
      table.tournamentId,
      table.participantId,
    ),
  ],
);
