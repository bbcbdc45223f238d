import { pgSchema, timestamp } from "drizzle-orm/pg-core";
import { resolveDbSchema } from "../config.js";

export const prodSchema = pgSchema(resolveDbSchema());

export const createdAt = timestamp("created_at").notNull().defaultNow();
export const updatedAt = timestamp("updated_at").notNull().defaultNow();
