import type { TournamentStore } from "../db/store.js";
import type {
  StatusChange,
  Tournament,
  TournamentPatch,
  TournamentStatus,
} from "../@types/tournament.js";
import { ConflictError, NotFoundError, ValidationError } from "../errors.js";

export const TRANSITIONS: Record<TournamentStatus, readonly TournamentStatus[]> = {
  draft: ["active", "cancelled"],
  active: ["group_stage", "results_complete", "cancelled"],
  group_stage: ["knockout_stage", "cancelled"],
  knockout_stage: ["results_complete", "cancelled"],
  results_complete: ["completed", "cancelled"],
  completed: ["rewards_distributed", "cancelled"],
  rewards_distributed: [],
  cancelled: [],
};

/** Statuses in which match results are accepted */
export const RESULT_STATUSES: readonly TournamentStatus[] = [
  "active",
  "group_stage",
  "knockout_stage",
];

export function isTerminal(status: TournamentStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(
  from: TournamentStatus,
  to: TournamentStatus,
): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(
  tournament: Pick<Tournament, "id" | "status">,
  to: TournamentStatus,
): void {
  if (!canTransition(tournament.status, to)) {
    throw new ValidationError(
      `Tournament cannot move from ${tournament.status} to ${to}`,
      { tournamentId: tournament.id, from: tournament.status, to },
    );
  }
}

export interface StatusChangeNote {
  reason?: string | null;
  metadata?: Record<string, unknown> | null;
}

/**
 * Append a row to the status audit trail. Call it with the same store handle
 * that made the change so both commit or roll back together.
 */
export async function recordStatusChange(
  store: TournamentStore,
  tournamentId: string,
  from: TournamentStatus | null,
  to: TournamentStatus,
  note: StatusChangeNote = {},
): Promise<void> {
  await store.recordStatusChange({
    tournamentId,
    oldStatus: from,
    newStatus: to,
    reason: note.reason ?? null,
    metadata: note.metadata ?? null,
  });
  console.log(`[Tournament ${tournamentId}] ${from ?? "(new)"} -> ${to}`);
}

/**
 * Guarded status change written as a compare-and-swap on the status the caller
 * observed. Losing the race raises ConflictError.
 */
export async function transitionTournament(
  store: TournamentStore,
  tournament: Tournament,
  to: TournamentStatus,
  patch: TournamentPatch = {},
  note: StatusChangeNote = {},
): Promise<Tournament> {
  assertTransition(tournament, to);

  const updated = await store.updateTournament(
    tournament.id,
    { ...patch, status: to },
    [tournament.status],
  );
  if (!updated) {
    throw new ConflictError(
      `Tournament ${tournament.id} changed status concurrently`,
      { tournamentId: tournament.id, from: tournament.status, to },
    );
  }

  await recordStatusChange(store, tournament.id, tournament.status, to, note);
  return updated;
}

export async function getStatusHistory(
  store: TournamentStore,
  tournamentId: string,
): Promise<StatusChange[]> {
  const tournament = await store.getTournament(tournamentId);
  if (!tournament) {
    throw new NotFoundError(`Tournament ${tournamentId} not found`, { tournamentId });
  }
  return store.listStatusHistory(tournamentId);
}
