import {
  boolean,
  integer,
  jsonb,
  timestamp,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import { createdAt, prodSchema, updatedAt } from "../schemaHelpers.js";
import type { DistributionSummary } from "../../@types/reward.js";

export const tournamentStatus = [
  "draft",
  "active",
  "group_stage",
  "knockout_stage",
  "results_complete",
  "completed",
  "rewards_distributed",
  "cancelled",
] as const;

export const tournamentFormat = ["head_to_head", "individual_ranking"] as const;

export const headToHeadType = ["league", "knockout", "group_knockout"] as const;

export const metricKind = [
  "score",
  "time",
  "distance",
  "placement",
  "rounds",
] as const;

export const rankingDirection = ["asc", "desc"] as const;

export const roundAggregation = ["sum", "best"] as const;

export const tournaments = prodSchema.table("tournaments", {
  id: uuid("id").primaryKey().defaultRandom(),
  name: varchar({ length: 255 }).notNull(),
  format: varchar({ enum: tournamentFormat }).notNull(),
  headToHeadType: varchar("head_to_head_type", { enum: headToHeadType }),
  metricKind: varchar("metric_kind", { enum: metricKind }),
  rankingDirection: varchar("ranking_direction", { enum: rankingDirection }),
  roundCount: integer("round_count").notNull().default(1),
  aggregation: varchar({ enum: roundAggregation }).notNull().default("sum"),
  measurementUnit: varchar("measurement_unit", { length: 32 }),
  groupCount: integer("group_count"),
  qualifiersPerGroup: integer("qualifiers_per_group").notNull().default(2),
  thirdPlaceMatch: boolean("third_place_match").notNull().default(false),
  randomSeed: integer("random_seed"),
  status: varchar({ enum: tournamentStatus }).notNull().default("draft"),
  maxParticipants: integer("max_participants").notNull().default(16),
  sessionsGenerated: boolean("sessions_generated").notNull().default(false),
  sessionsGeneratedAt: timestamp("sessions_generated_at"),
  completedAt: timestamp("completed_at"),
  cancelledAt: timestamp("cancelled_at"),
  rewardsDistributedAt: timestamp("rewards_distributed_at"),
  rewardSummary: jsonb("reward_summary").$type<DistributionSummary>(),
  createdAt,
  updatedAt,
});
