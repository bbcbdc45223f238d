import { jsonb, uuid } from "drizzle-orm/pg-core";
import { createdAt, prodSchema } from "../schemaHelpers.js";
import { tournaments } from "./tournaments.js";
import type { Qualifier } from "../../@types/tournament.js";

export const qualifierSnapshots = prodSchema.table("qualifier_snapshots", {
  tournamentId: uuid("tournament_id")
    .primaryKey()
    .references(() => tournaments.id, { onDelete: "cascade" }),
  qualifiers: jsonb().$type<Qualifier[]>().notNull(),
  createdAt,
});
