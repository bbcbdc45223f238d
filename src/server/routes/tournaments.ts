import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { z } from "zod";
import type { ServerDependencies } from "../index.js";
import {
  cancelTournament,
  completeTournament,
  createTournament,
  createTournamentSchema,
  enroll,
  enrollmentInputSchema,
  getParticipants,
  getTournament,
} from "../../services/tournamentService.js";
import {
  canStartTournament,
  previewSessions,
  startTournament,
} from "../../services/tournamentStartService.js";
import { getStatusHistory } from "../../services/tournamentStateMachine.js";
import { finalizeGroupStage } from "../../services/groupStageService.js";
import { computeRankings, getRankings } from "../../services/rankingService.js";
import {
  getMatchStats,
  getTournamentMatches,
} from "../../services/matchService.js";
import {
  getRewardConfig,
  rewardConfigSchema,
  saveRewardConfig,
} from "../../services/rewardConfig.js";
import { distributeRewards, getLedger } from "../../services/rewardService.js";
import { validationHook } from "../validation.js";

export function createTournamentsRouter(deps: ServerDependencies) {
  const { store } = deps;
  const router = new Hono();

  // Create tournament
  router.post(
    "/",
    zValidator("json", createTournamentSchema, validationHook),
    async (c) => {
      const tournament = await createTournament(store, c.req.valid("json"));
      return c.json({ data: tournament }, 201);
    },
  );

  // Get single tournament
  router.get("/:id", async (c) => {
    const tournament = await getTournament(store, c.req.param("id"));
    return c.json({ data: tournament });
  });

  router.get("/:id/participants", async (c) => {
    const participants = await getParticipants(store, c.req.param("id"));
    return c.json({ data: participants });
  });

  router.post(
    "/:id/enroll",
    zValidator(
      "json",
      z.object({ participants: enrollmentInputSchema.min(1) }),
      validationHook,
    ),
    async (c) => {
      const result = await enroll(
        store,
        c.req.param("id"),
        c.req.valid("json").participants,
      );
      return c.json({ data: result });
    },
  );

  // Check whether the roster can start
  router.get("/:id/can-start", async (c) => {
    const check = await canStartTournament(store, c.req.param("id"));
    return c.json({ data: check });
  });

  // Dry run of session generation
  router.get("/:id/preview-sessions", async (c) => {
    const preview = await previewSessions(store, c.req.param("id"));
    return c.json({ data: preview });
  });

  // Start tournament: generate sessions once
  router.post("/:id/start", async (c) => {
    const result = await startTournament(deps, c.req.param("id"));
    return c.json({ data: result }, result.status === "queued" ? 202 : 200);
  });

  router.post("/:id/finalize-group-stage", async (c) => {
    const snapshot = await finalizeGroupStage(store, c.req.param("id"));
    return c.json({ data: snapshot });
  });

  router.post("/:id/complete", async (c) => {
    const tournament = await completeTournament(store, c.req.param("id"));
    return c.json({ data: tournament });
  });

  router.post(
    "/:id/cancel",
    zValidator(
      "json",
      z.object({ reason: z.string().trim().min(1).max(500).optional() }),
      validationHook,
    ),
    async (c) => {
      const tournament = await cancelTournament(
        store,
        c.req.param("id"),
        c.req.valid("json").reason,
      );
      return c.json({ data: tournament });
    },
  );

  // Audit trail, oldest first
  router.get("/:id/status-history", async (c) => {
    const history = await getStatusHistory(store, c.req.param("id"));
    return c.json({ data: history });
  });

  // Matches
  router.get("/:id/matches", async (c) => {
    const matches = await getTournamentMatches(store, c.req.param("id"));
    return c.json({ data: matches });
  });

  router.get("/:id/matches/stats", async (c) => {
    const stats = await getMatchStats(store, c.req.param("id"));
    return c.json({ data: stats });
  });

  // Rankings
  router.get("/:id/rankings", async (c) => {
    const rankings = await getRankings(store, c.req.param("id"));
    return c.json({ data: rankings });
  });

  router.post("/:id/rankings/compute", async (c) => {
    const rankings = await computeRankings(store, c.req.param("id"));
    return c.json({ data: rankings });
  });

  // Rewards
  router.get("/:id/reward-config", async (c) => {
    const config = await getRewardConfig(store, c.req.param("id"));
    return c.json({ data: config });
  });

  router.put(
    "/:id/reward-config",
    zValidator("json", rewardConfigSchema, validationHook),
    async (c) => {
      const config = await saveRewardConfig(
        store,
        c.req.param("id"),
        c.req.valid("json"),
      );
      return c.json({ data: config });
    },
  );

  router.post(
    "/:id/rewards/distribute",
    zValidator(
      "json",
      z.object({ config: rewardConfigSchema.optional() }),
      validationHook,
    ),
    async (c) => {
      const summary = await distributeRewards(
        store,
        c.req.param("id"),
        c.req.valid("json").config,
      );
      return c.json({ data: summary });
    },
  );

  router.get("/:id/rewards/ledger", async (c) => {
    const ledger = await getLedger(store, c.req.param("id"));
    return c.json({ data: ledger });
  });

  return router;
}
