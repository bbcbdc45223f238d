import { z } from "zod";
import type { TournamentStore } from "../db/store.js";
import type {
  Enrollment,
  NewEnrollment,
  Tournament,
} from "../@types/tournament.js";
import {
  headToHeadType,
  metricKind,
  rankingDirection,
  roundAggregation,
  tournamentFormat,
} from "../db/schema.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { defaultDirection, computeRankingsWith } from "./rankingService.js";
import {
  isTerminal,
  recordStatusChange,
  transitionTournament,
} from "./tournamentStateMachine.js";

export const createTournamentSchema = z
  .object({
    name: z.string().trim().min(1).max(255),
    format: z.enum(tournamentFormat),
    headToHeadType: z.enum(headToHeadType).optional(),
    metricKind: z.enum(metricKind).optional(),
    rankingDirection: z.enum(rankingDirection).optional(),
    roundCount: z.number().int().min(1).max(50).default(1),
    aggregation: z.enum(roundAggregation).default("sum"),
    measurementUnit: z.string().trim().min(1).max(32).optional(),
    maxParticipants: z.number().int().min(1).max(10000).default(16),
    groupCount: z.number().int().min(1).max(26).optional(),
    qualifiersPerGroup: z.number().int().min(1).max(16).default(2),
    thirdPlaceMatch: z.boolean().default(false),
    randomSeed: z.number().int().optional(),
  })
  .superRefine((value, ctx) => {
    if (value.format === "head_to_head") {
      if (!value.headToHeadType) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["headToHeadType"],
          message: "Required for head_to_head tournaments",
        });
      }
      if (value.metricKind || value.rankingDirection) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["metricKind"],
          message: "Scoring metadata only applies to individual_ranking tournaments",
        });
      }
      return;
    }

    if (value.headToHeadType) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["headToHeadType"],
        message: "Not allowed for individual_ranking tournaments",
      });
    }
    if (!value.metricKind) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["metricKind"],
        message: "Required for individual_ranking tournaments",
      });
    } else if (
      value.rankingDirection &&
      value.rankingDirection !== defaultDirection(value.metricKind)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["rankingDirection"],
        message: `${value.metricKind} is ranked ${defaultDirection(value.metricKind)}`,
      });
    }
  });

export type CreateTournamentInput = z.input<typeof createTournamentSchema>;

export const enrollmentInputSchema = z.array(
  z.union([
    z.string().trim().min(1).max(255),
    z.object({
      participantId: z.string().trim().min(1).max(255),
      seed: z.number().int().min(1).optional(),
    }),
  ]),
);

export type EnrollmentInput = z.input<typeof enrollmentInputSchema>;

function issues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
    .join("; ");
}

/**
 * Create a tournament in draft
 */
export async function createTournament(
  store: TournamentStore,
  input: unknown,
): Promise<Tournament> {
  const parsed = createTournamentSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid tournament config: ${issues(parsed.error)}`);
  }
  const config = parsed.data;

  const tournament = await store.transaction(async (tx) => {
    const created = await tx.insertTournament({
      ...config,
      rankingDirection:
        config.rankingDirection ??
        (config.metricKind ? defaultDirection(config.metricKind) : undefined),
      status: "draft",
    });
    await recordStatusChange(tx, created.id, null, "draft");
    return created;
  });

  console.log(
    `[Tournament ${tournament.id}] Created "${tournament.name}" (${tournament.format})`,
  );
  return tournament;
}

export async function getTournament(
  store: TournamentStore,
  tournamentId: string,
): Promise<Tournament> {
  const tournament = await store.getTournament(tournamentId);
  if (!tournament) {
    throw new NotFoundError(`Tournament ${tournamentId} not found`, { tournamentId });
  }
  return tournament;
}

/**
 * Get participants enrolled in a tournament
 */
export async function getParticipants(
  store: TournamentStore,
  tournamentId: string,
): Promise<Enrollment[]> {
  await getTournament(store, tournamentId);
  return store.listEnrollments(tournamentId);
}

/**
 * Enroll participants while the tournament is still a draft. Re-enrolling an
 * existing participant is a no-op.
 */
export async function enroll(
  store: TournamentStore,
  tournamentId: string,
  input: unknown,
): Promise<{ enrolled: number; total: number }> {
  const parsed = enrollmentInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid enrollment: ${issues(parsed.error)}`, {
      tournamentId,
    });
  }
  const entries = parsed.data.map((entry) =>
    typeof entry === "string"
      ? { participantId: entry, seed: null }
      : { participantId: entry.participantId, seed: entry.seed ?? null },
  );

  return store.transaction(async (tx) => {
    const tournament = await tx.lockTournament(tournamentId);
    if (!tournament) {
      throw new NotFoundError(`Tournament ${tournamentId} not found`, { tournamentId });
    }
    if (tournament.status !== "draft") {
      throw new ValidationError("Enrollment is closed once a tournament starts", {
        tournamentId,
      });
    }

    const existing = new Set(
      (await tx.listEnrollments(tournamentId)).map((e) => e.participantId),
    );
    const fresh = new Map<string, number | null>();
    for (const { participantId, seed } of entries) {
      if (!existing.has(participantId)) fresh.set(participantId, seed);
    }
    if (existing.size + fresh.size > tournament.maxParticipants) {
      throw new ValidationError(
        `Enrollment exceeds capacity of ${tournament.maxParticipants}`,
        { tournamentId, requested: existing.size + fresh.size },
      );
    }

    const enrolled = await tx.addEnrollments(
      [...fresh].map(([participantId, seed]): NewEnrollment => ({
        tournamentId,
        participantId,
        seed,
        status: "confirmed",
      })),
    );
    return { enrolled, total: existing.size + enrolled };
  });
}

/**
 * Close result collection, run the final ranking and record placements on the
 * enrollments. Calling it on a completed tournament returns it unchanged.
 */
export async function completeTournament(
  store: TournamentStore,
  tournamentId: string,
): Promise<Tournament> {
  return store.transaction(async (tx) => {
    let tournament = await tx.lockTournament(tournamentId);
    if (!tournament) {
      throw new NotFoundError(`Tournament ${tournamentId} not found`, { tournamentId });
    }
    if (tournament.status === "completed" || tournament.status === "rewards_distributed") {
      return tournament;
    }
    if (tournament.status === "group_stage") {
      throw new ValidationError("The group stage has to be finalized first", {
        tournamentId,
      });
    }

    if (tournament.status === "active" || tournament.status === "knockout_stage") {
      const open = (await tx.listMatches(tournamentId)).filter(
        (m) => m.status === "scheduled",
      );
      if (open.length > 0) {
        throw new ValidationError(`${open.length} matches are still open`, {
          tournamentId,
        });
      }
      tournament = await transitionTournament(tx, tournament, "results_complete");
    }

    if (tournament.status !== "results_complete") {
      throw new ValidationError(
        `Tournament cannot be completed while ${tournament.status}`,
        { tournamentId },
      );
    }

    const rankings = await computeRankingsWith(tx, tournament);
    await tx.setEnrollmentPlacements(
      tournamentId,
      rankings.map((row) => ({ participantId: row.participantId, placement: row.rank })),
    );

    return transitionTournament(
      tx,
      tournament,
      "completed",
      { completedAt: new Date() },
      { metadata: { rankedParticipants: rankings.length } },
    );
  });
}

/**
 * Cancel a tournament. Matches are kept for audit; those not yet played are
 * voided. The reason lands in the status history.
 */
export async function cancelTournament(
  store: TournamentStore,
  tournamentId: string,
  reason?: string,
): Promise<Tournament> {
  return store.transaction(async (tx) => {
    const tournament = await tx.lockTournament(tournamentId);
    if (!tournament) {
      throw new NotFoundError(`Tournament ${tournamentId} not found`, { tournamentId });
    }
    if (tournament.status === "cancelled") return tournament;
    if (isTerminal(tournament.status)) {
      throw new ValidationError(
        `Tournament is already ${tournament.status} and cannot be cancelled`,
        { tournamentId },
      );
    }

    const voided = await tx.voidOpenMatches(tournamentId);
    const cancelled = await transitionTournament(
      tx,
      tournament,
      "cancelled",
      { cancelledAt: new Date() },
      { reason: reason ?? null, metadata: { voidedMatches: voided } },
    );
    console.log(`[Tournament ${tournamentId}] Cancelled, ${voided} open matches voided`);
    return cancelled;
  });
}
