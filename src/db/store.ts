import type {
  Enrollment,
  NewEnrollment,
  NewRankingRow,
  NewStatusChange,
  NewTournament,
  QualifierSnapshot,
  RankingRow,
  StatusChange,
  Tournament,
  TournamentPatch,
  TournamentStatus,
} from "../@types/tournament.js";
import type {
  Match,
  MatchOutcome,
  MatchSlot,
  MatchStage,
  NewMatch,
} from "../@types/match.js";
import type {
  LedgerEntry,
  NewLedgerEntry,
  RewardConfig,
} from "../@types/reward.js";

export interface MatchCompletion {
  winnerId: string | null;
  outcome: MatchOutcome;
}

export interface PlacementUpdate {
  participantId: string;
  placement: number;
}

/**
 * Storage primitives the engine is built on. Every conditional method returns
 * `null` (or `false`) when its precondition no longer holds instead of throwing,
 * so callers decide whether a lost race is a conflict or a no-op.
 *
 * Inserts guarded by a unique key (`insertQualifierSnapshot`, `insertLedgerEntry`)
 * throw `UniqueViolationError` on collision.
 */
export interface TournamentStore {
  /** Runs `fn` atomically. Any thrown error rolls back every write made through `tx`. */
  transaction<T>(fn: (tx: TournamentStore) => Promise<T>): Promise<T>;

  insertTournament(values: NewTournament): Promise<Tournament>;
  getTournament(id: string): Promise<Tournament | null>;
  /** Reads the row and holds it exclusively until the surrounding transaction ends. */
  lockTournament(id: string): Promise<Tournament | null>;
  /** Compare-and-swap: applies `patch` only while status is one of `expected`. */
  updateTournament(
    id: string,
    patch: TournamentPatch,
    expected: readonly TournamentStatus[],
  ): Promise<Tournament | null>;
  /** Flips `sessions_generated` false → true, optionally moving status too. */
  markSessionsGenerated(
    id: string,
    status?: TournamentStatus,
  ): Promise<Tournament | null>;

  /** Appends to the audit trail. */
  recordStatusChange(entry: NewStatusChange): Promise<StatusChange>;
  /** Oldest first. */
  listStatusHistory(tournamentId: string): Promise<StatusChange[]>;

  /** Returns the number of new enrollments. Existing pairs are left untouched. */
  addEnrollments(rows: NewEnrollment[]): Promise<number>;
  listEnrollments(tournamentId: string): Promise<Enrollment[]>;
  setEnrollmentPlacements(
    tournamentId: string,
    placements: readonly PlacementUpdate[],
  ): Promise<void>;

  insertMatches(rows: NewMatch[]): Promise<Match[]>;
  getMatch(id: string): Promise<Match | null>;
  listMatches(tournamentId: string, stage?: MatchStage): Promise<Match[]>;
  /** Compare-and-swap on `scheduled`. */
  completeMatch(id: string, completion: MatchCompletion): Promise<Match | null>;
  assignMatchSlot(
    id: string,
    slot: MatchSlot,
    participantId: string,
  ): Promise<Match | null>;
  /** Voids every match that is still scheduled. Returns how many changed. */
  voidOpenMatches(tournamentId: string): Promise<number>;

  replaceRankings(
    tournamentId: string,
    rows: NewRankingRow[],
  ): Promise<RankingRow[]>;
  listRankings(tournamentId: string): Promise<RankingRow[]>;

  insertQualifierSnapshot(
    snapshot: Pick<QualifierSnapshot, "tournamentId" | "qualifiers">,
  ): Promise<QualifierSnapshot>;
  getQualifierSnapshot(tournamentId: string): Promise<QualifierSnapshot | null>;

  saveRewardConfig(tournamentId: string, config: RewardConfig): Promise<void>;
  getRewardConfig(tournamentId: string): Promise<RewardConfig | null>;

  insertLedgerEntry(entry: NewLedgerEntry): Promise<LedgerEntry>;
  getLedgerEntry(idempotencyKey: string): Promise<LedgerEntry | null>;
  listLedgerEntries(tournamentId: string): Promise<LedgerEntry[]>;
}
