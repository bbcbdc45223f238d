import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { TournamentStore } from "../db/store.js";
import type { BracketMatch } from "./bracketGenerator.js";
import type {
  HeadToHeadOutcome,
  Match,
  MatchOutcome,
  MatchStats,
  NewMatch,
} from "../@types/match.js";
import type { Tournament } from "../@types/tournament.js";
import { ConflictError, NotFoundError, ValidationError } from "../errors.js";
import { computeRankingsWith } from "./rankingService.js";
import { RESULT_STATUSES, transitionTournament } from "./tournamentStateMachine.js";

export const headToHeadOutcomeSchema = z.object({
  kind: z.literal("head_to_head"),
  player1Score: z.number().int().min(0),
  player2Score: z.number().int().min(0),
});

export const individualOutcomeSchema = z.object({
  kind: z.literal("individual"),
  value: z.number().finite(),
  unit: z.string().trim().min(1).max(32).optional(),
});

export const outcomeInputSchema = z.discriminatedUnion("kind", [
  headToHeadOutcomeSchema,
  individualOutcomeSchema,
]);

export type OutcomeInput = z.infer<typeof outcomeInputSchema>;

/**
 * Turn generated bracket slots into insertable rows, resolving position links
 * into match ids.
 */
export function buildMatchRows(
  tournamentId: string,
  bracket: readonly BracketMatch[],
): NewMatch[] {
  const rowIds = bracket.map(() => randomUUID());
  const ids = new Map<number, string>();
  bracket.forEach((match, index) => {
    const id = rowIds[index];
    if (id && !ids.has(match.position)) ids.set(match.position, id);
  });

  return bracket.map((match, index): NewMatch => ({
    id: rowIds[index],
    tournamentId,
    stage: match.stage,
    groupLabel: match.groupLabel,
    round: match.round,
    position: match.position,
    player1Id: match.player1Id,
    player2Id: match.player2Id,
    bracketType: match.bracketType,
    status: "scheduled",
    nextMatchId:
      match.nextMatchPosition === undefined
        ? null
        : (ids.get(match.nextMatchPosition) ?? null),
    nextMatchSlot: match.nextMatchSlot ?? null,
    loserNextMatchId:
      match.loserNextMatchPosition === undefined
        ? null
        : (ids.get(match.loserNextMatchPosition) ?? null),
    loserNextMatchSlot: match.loserNextMatchSlot ?? null,
  }));
}

function headToHeadResult(
  player1Score: number,
  player2Score: number,
): HeadToHeadOutcome["result"] {
  if (player1Score === player2Score) return "draw";
  return player1Score > player2Score ? "player1" : "player2";
}

/**
 * Check the payload against the tournament's format and metric, and derive
 * the stored outcome. Without a declared unit, `recordedUnit` (the unit earlier
 * rounds were stored in) binds every later round.
 */
export function resolveOutcome(
  tournament: Tournament,
  match: Match,
  input: OutcomeInput,
  recordedUnit: string | null = null,
): MatchOutcome {
  const context = { tournamentId: tournament.id, matchId: match.id };

  if (tournament.format === "head_to_head") {
    if (input.kind !== "head_to_head") {
      throw new ValidationError("Head-to-head matches take two scores", context);
    }
    const result = headToHeadResult(input.player1Score, input.player2Score);
    if (result === "draw" && match.bracketType !== null) {
      throw new ValidationError("Knockout matches cannot end in a draw", context);
    }
    return {
      kind: "head_to_head",
      player1Score: input.player1Score,
      player2Score: input.player2Score,
      result,
    };
  }

  if (input.kind !== "individual") {
    throw new ValidationError("Ranking rounds take a single metric value", context);
  }

  switch (tournament.metricKind) {
    case "placement":
      if (!Number.isInteger(input.value) || input.value < 1) {
        throw new ValidationError("Placement must be a positive integer", context);
      }
      break;
    case "rounds":
      if (!Number.isInteger(input.value) || input.value < 0) {
        throw new ValidationError("Rounds must be a non-negative integer", context);
      }
      break;
    default:
      if (input.value < 0) {
        throw new ValidationError(
          `${tournament.metricKind ?? "Metric"} value cannot be negative`,
          context,
        );
      }
  }

  const expectedUnit = tournament.measurementUnit ?? recordedUnit;
  if (expectedUnit && input.unit && input.unit !== expectedUnit) {
    throw new ValidationError(
      `Expected unit ${expectedUnit}, got ${input.unit}`,
      context,
    );
  }

  return {
    kind: "individual",
    value: input.value,
    unit: input.unit ?? expectedUnit ?? null,
  };
}

function recordedUnitOf(matches: readonly Match[]): string | null {
  for (const match of matches) {
    if (match.status === "completed" && match.outcome?.kind === "individual") {
      if (match.outcome.unit) return match.outcome.unit;
    }
  }
  return null;
}

function sameOutcome(a: MatchOutcome | null, b: MatchOutcome): boolean {
  if (!a || a.kind !== b.kind) return false;
  if (a.kind === "head_to_head" && b.kind === "head_to_head") {
    return a.player1Score === b.player1Score && a.player2Score === b.player2Score;
  }
  if (a.kind === "individual" && b.kind === "individual") {
    return a.value === b.value && a.unit === b.unit;
  }
  return false;
}

function winnerOf(match: Match, outcome: MatchOutcome): string | null {
  if (outcome.kind !== "head_to_head" || outcome.result === "draw") return null;
  return outcome.result === "player1" ? match.player1Id : match.player2Id;
}

/**
 * Advance winner (and, into the playoff, the loser) to the linked matches
 */
async function advanceFromMatch(
  tx: TournamentStore,
  match: Match,
): Promise<void> {
  if (!match.winnerId) return;

  if (match.nextMatchId && match.nextMatchSlot) {
    await tx.assignMatchSlot(match.nextMatchId, match.nextMatchSlot, match.winnerId);
  }

  const loserId =
    match.player1Id === match.winnerId ? match.player2Id : match.player1Id;
  if (loserId && match.loserNextMatchId && match.loserNextMatchSlot) {
    await tx.assignMatchSlot(match.loserNextMatchId, match.loserNextMatchSlot, loserId);
  }
}

/**
 * Record a match or round outcome.
 *
 * Completion is monotonic: re-submitting the same outcome returns the stored
 * match, a different outcome for a completed match is a conflict.
 */
export async function submitResult(
  store: TournamentStore,
  matchId: string,
  payload: unknown,
): Promise<Match> {
  const parsed = outcomeInputSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ValidationError(`Invalid outcome: ${parsed.error.message}`, {
      matchId,
    });
  }

  return store.transaction(async (tx) => {
    const located = await tx.getMatch(matchId);
    if (!located) {
      throw new NotFoundError(`Match ${matchId} not found`, { matchId });
    }

    const tournament = await tx.lockTournament(located.tournamentId);
    if (!tournament) {
      throw new NotFoundError(`Tournament ${located.tournamentId} not found`, {
        matchId,
      });
    }
    const match = (await tx.getMatch(matchId)) ?? located;
    const context = { tournamentId: tournament.id, matchId };

    const outcome = resolveOutcome(
      tournament,
      match,
      parsed.data,
      tournament.format === "individual_ranking" && !tournament.measurementUnit
        ? recordedUnitOf(await tx.listMatches(tournament.id))
        : null,
    );

    if (match.status === "completed") {
      if (sameOutcome(match.outcome, outcome)) return match;
      throw new ConflictError("Match already has a different result", context);
    }
    if (match.status === "void") {
      throw new ValidationError("Match was voided", context);
    }
    if (!RESULT_STATUSES.includes(tournament.status)) {
      throw new ValidationError(
        `Results are not accepted while tournament is ${tournament.status}`,
        context,
      );
    }
    if (outcome.kind === "head_to_head" && (!match.player1Id || !match.player2Id)) {
      throw new ValidationError("Match is still waiting for its players", context);
    }

    const completed = await tx.completeMatch(matchId, {
      winnerId: winnerOf(match, outcome),
      outcome,
    });
    if (!completed) {
      throw new ConflictError("Match was completed concurrently", context);
    }

    await advanceFromMatch(tx, completed);
    await computeRankingsWith(tx, tournament);

    if (tournament.status !== "group_stage") {
      const open = (await tx.listMatches(tournament.id)).filter(
        (m) => m.status === "scheduled",
      );
      if (open.length === 0) {
        await transitionTournament(
          tx,
          tournament,
          "results_complete",
          {},
          { reason: "All matches completed", metadata: { lastMatchId: completed.id } },
        );
      }
    }

    return completed;
  });
}

/**
 * Get all matches for a tournament
 */
export async function getTournamentMatches(
  store: TournamentStore,
  tournamentId: string,
): Promise<Match[]> {
  const tournament = await store.getTournament(tournamentId);
  if (!tournament) {
    throw new NotFoundError(`Tournament ${tournamentId} not found`, { tournamentId });
  }
  return store.listMatches(tournamentId);
}

export async function getMatch(
  store: TournamentStore,
  matchId: string,
): Promise<Match> {
  const match = await store.getMatch(matchId);
  if (!match) {
    throw new NotFoundError(`Match ${matchId} not found`, { matchId });
  }
  return match;
}

export async function getMatchStats(
  store: TournamentStore,
  tournamentId: string,
): Promise<MatchStats> {
  const all = await getTournamentMatches(store, tournamentId);
  return {
    total: all.length,
    completed: all.filter((m) => m.status === "completed").length,
    scheduled: all.filter((m) => m.status === "scheduled").length,
    void: all.filter((m) => m.status === "void").length,
  };
}
