import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import type { ServerDependencies } from "../index.js";
import {
  getMatch,
  outcomeInputSchema,
  submitResult,
} from "../../services/matchService.js";
import { validationHook } from "../validation.js";

export function createMatchesRouter({ store }: ServerDependencies) {
  const router = new Hono();

  // Get single match
  router.get("/:id", async (c) => {
    const match = await getMatch(store, c.req.param("id"));
    return c.json({ data: match });
  });

  // Submit a result
  router.post(
    "/:id/result",
    zValidator("json", outcomeInputSchema, validationHook),
    async (c) => {
      const match = await submitResult(store, c.req.param("id"), c.req.valid("json"));
      return c.json({ data: match });
    },
  );

  return router;
}
