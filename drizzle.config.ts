import { defineConfig } from "drizzle-kit";

export default defineConfig({
  dialect: "postgresql",
  schema: "./src/db/schema.ts",
  schemaFilter: [process.env.DB_SCHEMA ?? "academy"],
  dbCredentials: {
    url: process.env.DATABASE_URL ?? "",
  },
});
