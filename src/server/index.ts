import { Hono } from "hono";
import type { StartDependencies } from "../services/tournamentStartService.js";
import {
  ConflictError,
  NotFoundError,
  ValidationError,
} from "../errors.js";
import { createTournamentsRouter } from "./routes/tournaments.js";
import { createMatchesRouter } from "./routes/matches.js";

export type ServerDependencies = StartDependencies;

export function statusForError(error: unknown): 400 | 404 | 409 | 500 {
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof ConflictError) return 409;
  return 500;
}

export function createApiServer(deps: ServerDependencies) {
  const app = new Hono();

  app.onError((error, c) => {
    const status = statusForError(error);
    if (status === 500) {
      console.error(`Unhandled error on ${c.req.method} ${c.req.path}:`, error);
      return c.json({ error: "Internal server error" }, 500);
    }
    return c.json({ error: error.message }, status);
  });

  // Health check
  app.get("/api/health", (c) => c.json({ ok: true }));

  app.route("/api/tournaments", createTournamentsRouter(deps));
  app.route("/api/matches", createMatchesRouter(deps));

  app.get("/api/jobs/:id", (c) => {
    const job = deps.queue.getJob(c.req.param("id"));
    if (!job) return c.json({ error: "Job not found" }, 404);
    return c.json({ data: job });
  });

  return app;
}

export type ApiAppType = ReturnType<typeof createApiServer>;
