import type { TournamentStore } from "../db/store.js";
import type { BracketMatch } from "./bracketGenerator.js";
import type {
  Enrollment,
  GenerationResult,
  Tournament,
  TournamentStatus,
} from "../@types/tournament.js";
import { ConflictError, NotFoundError, ValidationError } from "../errors.js";
import { buildMatchRows } from "./matchService.js";
import { computeRankingsWith } from "./rankingService.js";
import { assertTransition, recordStatusChange } from "./tournamentStateMachine.js";

export type BracketFactory = (
  tournament: Tournament,
  enrollments: readonly Enrollment[],
) => BracketMatch[];

export interface GuardOptions {
  /** Status to move to in the same write that sets the generated flag */
  status?: TournamentStatus;
}

/**
 * Run `generate` at most once per tournament.
 *
 * Holds the tournament row lock while checking `sessions_generated`, inserts
 * the matches, then flips the flag with a conditional write. If that write
 * finds the flag already set, the transaction rolls back and the caller gets
 * the matches that are already stored.
 */
export async function ensureGeneratedOnce(
  store: TournamentStore,
  tournamentId: string,
  generate: BracketFactory,
  options: GuardOptions = {},
): Promise<GenerationResult> {
  try {
    return await store.transaction(async (tx): Promise<GenerationResult> => {
      const tournament = await tx.lockTournament(tournamentId);
      if (!tournament) {
        throw new NotFoundError(`Tournament ${tournamentId} not found`, {
          tournamentId,
        });
      }

      if (tournament.sessionsGenerated) {
        console.warn(
          `[Tournament ${tournamentId}] Sessions already generated, returning existing matches`,
        );
        return {
          status: "already_generated",
          tournamentId,
          matches: await tx.listMatches(tournamentId),
        };
      }

      if (tournament.status !== "active") {
        throw new ValidationError(
          `Sessions can only be generated for an active tournament (is ${tournament.status})`,
          { tournamentId },
        );
      }
      if (options.status) assertTransition(tournament, options.status);

      const enrollments = (await tx.listEnrollments(tournamentId)).filter(
        (e) => e.status !== "cancelled",
      );
      const bracket = generate(tournament, enrollments);
      await tx.insertMatches(buildMatchRows(tournamentId, bracket));

      const marked = await tx.markSessionsGenerated(tournamentId, options.status);
      if (!marked) {
        throw new ConflictError("Sessions were generated concurrently", {
          tournamentId,
        });
      }
      if (options.status) {
        await recordStatusChange(tx, tournamentId, tournament.status, options.status, {
          metadata: { matches: bracket.length },
        });
      }
      await computeRankingsWith(tx, marked);

      const matches = await tx.listMatches(tournamentId);
      console.log(
        `[Tournament ${tournamentId}] Generated ${matches.length} matches for ${enrollments.length} participants`,
      );
      return { status: "generated", tournamentId, matches };
    });
  } catch (error) {
    if (!(error instanceof ConflictError)) throw error;

    console.warn(
      `[Tournament ${tournamentId}] Lost generation race, returning existing matches`,
    );
    return {
      status: "already_generated",
      tournamentId,
      matches: await store.listMatches(tournamentId),
    };
  }
}
