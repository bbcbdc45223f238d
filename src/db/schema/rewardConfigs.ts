import { jsonb, uuid } from "drizzle-orm/pg-core";
import { prodSchema, updatedAt } from "../schemaHelpers.js";
import { tournaments } from "./tournaments.js";
import type { RewardConfig } from "../../@types/reward.js";

export const rewardConfigs = prodSchema.table("reward_configs", {
  tournamentId: uuid("tournament_id")
    .primaryKey()
    .references(() => tournaments.id, { onDelete: "cascade" }),
  config: jsonb().$type<RewardConfig>().notNull(),
  updatedAt,
});
