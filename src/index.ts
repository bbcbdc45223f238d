import { serve } from "@hono/node-server";
import { loadConfig } from "./config.js";
import { createDb } from "./db/db.js";
import { prodSchema } from "./db/schemaHelpers.js";
import { PostgresTournamentStore } from "./db/postgresStore.js";
import { JobQueue } from "./services/jobQueue.js";
import { createApiServer } from "./server/index.js";
import type { GenerationResult } from "./@types/tournament.js";

const config = loadConfig();
if (!config.databaseUrl) {
  throw new Error(
    "DATABASE_URL environment variable is not set. " +
      "Please add DATABASE_URL to your .env file",
  );
}

const db = createDb(config.databaseUrl);
const store = new PostgresTournamentStore(db);
const queue = new JobQueue<GenerationResult>({
  concurrency: config.workerConcurrency,
  maxRetries: config.generationMaxRetries,
  baseDelayMs: config.retryBaseDelayMs,
});

const app = createApiServer({
  store,
  queue,
  backgroundThreshold: config.backgroundGenerationThreshold,
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(
    `Tournament engine listening on port ${info.port} (schema ${prodSchema.schemaName})`,
  );
});

async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received, draining background jobs`);
  server.close();
  await queue.onIdle();
  await db.$client.end();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  });
}
