import type { TournamentStore } from "../db/store.js";
import type {
  Enrollment,
  GenerationResult,
  Tournament,
  TournamentStatus,
} from "../@types/tournament.js";
import type { JobQueue } from "./jobQueue.js";
import { ValidationError } from "../errors.js";
import { createRng, hashString } from "../utils/random.js";
import type { BracketFormat, BracketMatch } from "./bracketGenerator.js";
import {
  bracketFormatOf,
  defaultGroupCount,
  generateBracket,
  getBracketStats,
  validateRoster,
} from "./bracketGenerator.js";
import { ensureGeneratedOnce } from "./generationGuard.js";
import { assertTransition, recordStatusChange } from "./tournamentStateMachine.js";
import { getTournament } from "./tournamentService.js";

export interface StartDependencies {
  store: TournamentStore;
  queue: JobQueue<GenerationResult>;
  /** Rosters at or above this size are generated in the background */
  backgroundThreshold: number;
}

export interface StartTournamentCheck {
  canStart: boolean;
  error?: string;
  participantsCount: number;
}

/**
 * Bracket for the tournament's current stage. Seeding is reproducible: the
 * shuffle is driven by the configured seed or, failing that, the tournament id.
 */
export function generateSessions(
  tournament: Tournament,
  enrollments: readonly Enrollment[],
): BracketMatch[] {
  const rng = createRng(tournament.randomSeed ?? hashString(tournament.id));
  return generateBracket(
    tournament,
    enrollments.map((e) => ({ participantId: e.participantId, seed: e.seed })),
    rng,
  );
}

/** Status a tournament enters once its first sessions exist */
export function statusAfterGeneration(
  tournament: Tournament,
): TournamentStatus | undefined {
  return tournament.headToHeadType === "group_knockout" ? "group_stage" : undefined;
}

async function activeEnrollments(
  store: TournamentStore,
  tournamentId: string,
): Promise<Enrollment[]> {
  return (await store.listEnrollments(tournamentId)).filter(
    (e) => e.status !== "cancelled",
  );
}

/**
 * Check if tournament can be started
 */
export async function canStartTournament(
  store: TournamentStore,
  tournamentId: string,
): Promise<StartTournamentCheck> {
  const tournament = await getTournament(store, tournamentId);
  const participantsCount = (await activeEnrollments(store, tournamentId)).length;

  if (tournament.status !== "draft" && tournament.status !== "active") {
    return {
      canStart: false,
      error: `Tournament is ${tournament.status}`,
      participantsCount,
    };
  }

  try {
    validateRoster(tournament, participantsCount);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    return { canStart: false, error: error.message, participantsCount };
  }

  return { canStart: true, participantsCount };
}

export interface SessionPreview {
  tournamentId: string;
  format: BracketFormat;
  participantsCount: number;
  totalMatches: number;
  totalRounds: number;
  /** Knockout matches that follow the group stage; 0 for other formats */
  knockoutMatches: number;
  sessionsGenerated: boolean;
  matches: BracketMatch[];
}

/**
 * Dry run of session generation: the bracket `startTournament` would store for
 * the current roster, without writing anything.
 */
export async function previewSessions(
  store: TournamentStore,
  tournamentId: string,
): Promise<SessionPreview> {
  const tournament = await getTournament(store, tournamentId);
  if (tournament.status !== "draft" && tournament.status !== "active") {
    throw new ValidationError(
      `Sessions cannot be previewed while ${tournament.status}`,
      { tournamentId },
    );
  }

  const enrollments = await activeEnrollments(store, tournamentId);
  const bracket = generateSessions(tournament, enrollments);
  const format = bracketFormatOf(tournament);
  const n = enrollments.length;
  const stats = getBracketStats(format, n, {
    roundCount: tournament.roundCount,
    groupCount: tournament.groupCount ?? undefined,
    thirdPlaceMatch: tournament.thirdPlaceMatch,
  });

  let knockoutMatches = 0;
  if (format === "group_knockout") {
    const qualifiers =
      (tournament.groupCount ?? defaultGroupCount(n)) * tournament.qualifiersPerGroup;
    knockoutMatches = getBracketStats("knockout", qualifiers, {
      thirdPlaceMatch: tournament.thirdPlaceMatch,
    }).totalMatches;
  }

  return {
    tournamentId,
    format,
    participantsCount: n,
    totalMatches: bracket.length,
    totalRounds: stats.totalRounds,
    knockoutMatches,
    sessionsGenerated: tournament.sessionsGenerated,
    matches: bracket,
  };
}

/**
 * Full tournament start orchestration:
 * 1. Validate the roster and move draft -> active
 * 2. Generate the first stage through the generation guard
 * 3. Hand large rosters to the background queue instead
 *
 * Repeated calls return the stored matches with `already_generated`.
 */
export async function startTournament(
  deps: StartDependencies,
  tournamentId: string,
): Promise<GenerationResult> {
  const { store, queue } = deps;
  const tournament = await getTournament(store, tournamentId);

  if (tournament.sessionsGenerated) {
    return {
      status: "already_generated",
      tournamentId,
      matches: await store.listMatches(tournamentId),
    };
  }

  const enrollments = await activeEnrollments(store, tournamentId);

  if (tournament.status === "draft") {
    validateRoster(tournament, enrollments.length);
    assertTransition(tournament, "active");
    // A concurrent start may already have activated it.
    await store.transaction(async (tx) => {
      const activated = await tx.updateTournament(
        tournamentId,
        { status: "active" },
        ["draft"],
      );
      if (activated) {
        await recordStatusChange(tx, tournamentId, "draft", "active", {
          metadata: { participants: enrollments.length },
        });
      }
    });
  } else if (tournament.status !== "active") {
    throw new ValidationError(
      `Tournament cannot be started while ${tournament.status}`,
      { tournamentId },
    );
  }

  const run = () =>
    ensureGeneratedOnce(store, tournamentId, generateSessions, {
      status: statusAfterGeneration(tournament),
    });

  if (enrollments.length >= deps.backgroundThreshold) {
    const job = queue.enqueue(`generate:${tournamentId}`, run, {
      tournamentId,
      stage: "generate_sessions",
    });
    console.log(
      `[Tournament ${tournamentId}] Queued generation for ${enrollments.length} participants (job ${job.id})`,
    );
    return { status: "queued", tournamentId, jobId: job.id };
  }

  return run();
}
