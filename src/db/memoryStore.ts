import { randomUUID } from "node:crypto";
import type {
  MatchCompletion,
  PlacementUpdate,
  TournamentStore,
} from "./store.js";
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
  MatchSlot,
  MatchStage,
  NewMatch,
} from "../@types/match.js";
import type {
  LedgerEntry,
  NewLedgerEntry,
  RewardConfig,
} from "../@types/reward.js";
import { UniqueViolationError } from "../errors.js";
import { compareIds } from "../utils/compare.js";

export type StoreOperation = keyof TournamentStore;

interface MemoryState {
  tournaments: Map<string, Tournament>;
  statusHistory: StatusChange[];
  enrollments: Map<string, Enrollment>;
  matches: Map<string, Match>;
  rankings: Map<string, RankingRow[]>;
  snapshots: Map<string, QualifierSnapshot>;
  rewardConfigs: Map<string, RewardConfig>;
  ledger: Map<string, LedgerEntry>;
}

export interface MemoryShared {
  state: MemoryState;
  queue: Promise<void>;
  faults: Map<StoreOperation, Error[]>;
}

function emptyState(): MemoryState {
  return {
    tournaments: new Map(),
    statusHistory: [],
    enrollments: new Map(),
    matches: new Map(),
    rankings: new Map(),
    snapshots: new Map(),
    rewardConfigs: new Map(),
    ledger: new Map(),
  };
}

const enrollmentKey = (tournamentId: string, participantId: string) =>
  `${tournamentId}:${participantId}`;

const byRoundAndPosition = (a: Match, b: Match) =>
  a.round - b.round || a.position - b.position;

/**
 * In-process store with the same contract as the Postgres one. Transactions run
 * one at a time against a snapshot that is restored when they throw; calls made
 * outside a transaction queue behind the running one, like a row lock would.
 */
export class MemoryTournamentStore implements TournamentStore {
  private readonly shared: MemoryShared;
  private readonly scoped: boolean;

  constructor(shared?: MemoryShared, scoped = false) {
    this.shared = shared ?? {
      state: emptyState(),
      queue: Promise.resolve(),
      faults: new Map(),
    };
    this.scoped = scoped;
  }

  /** Makes the next call to `operation` reject with `error`. */
  failNext(operation: StoreOperation, error: Error): void {
    const queued = this.shared.faults.get(operation) ?? [];
    queued.push(error);
    this.shared.faults.set(operation, queued);
  }

  private get state(): MemoryState {
    return this.shared.state;
  }

  private takeFault(operation: StoreOperation): void {
    const fault = this.shared.faults.get(operation)?.shift();
    if (fault) throw fault;
  }

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const result = this.shared.queue.then(work);
    this.shared.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private run<T>(operation: StoreOperation, work: () => T): Promise<T> {
    const guarded = async () => {
      this.takeFault(operation);
      return structuredClone(work());
    };
    return this.scoped ? guarded() : this.exclusive(guarded);
  }

  transaction<T>(fn: (tx: TournamentStore) => Promise<T>): Promise<T> {
    const attempt = async () => {
      this.takeFault("transaction");
      const backup = structuredClone(this.shared.state);
      try {
        return await fn(new MemoryTournamentStore(this.shared, true));
      } catch (error) {
        this.shared.state = backup;
        throw error;
      }
    };
    return this.scoped ? attempt() : this.exclusive(attempt);
  }

  insertTournament(values: NewTournament): Promise<Tournament> {
    return this.run("insertTournament", () => {
      const now = new Date();
      const row: Tournament = {
        id: values.id ?? randomUUID(),
        name: values.name,
        format: values.format,
        headToHeadType: values.headToHeadType ?? null,
        metricKind: values.metricKind ?? null,
        rankingDirection: values.rankingDirection ?? null,
        roundCount: values.roundCount ?? 1,
        aggregation: values.aggregation ?? "sum",
        measurementUnit: values.measurementUnit ?? null,
        groupCount: values.groupCount ?? null,
        qualifiersPerGroup: values.qualifiersPerGroup ?? 2,
        thirdPlaceMatch: values.thirdPlaceMatch ?? false,
        randomSeed: values.randomSeed ?? null,
        status: values.status ?? "draft",
        maxParticipants: values.maxParticipants ?? 16,
        sessionsGenerated: values.sessionsGenerated ?? false,
        sessionsGeneratedAt: values.sessionsGeneratedAt ?? null,
        completedAt: values.completedAt ?? null,
        cancelledAt: values.cancelledAt ?? null,
        rewardsDistributedAt: values.rewardsDistributedAt ?? null,
        rewardSummary: values.rewardSummary ?? null,
        createdAt: values.createdAt ?? now,
        updatedAt: values.updatedAt ?? now,
      };
      if (this.state.tournaments.has(row.id)) {
        throw new UniqueViolationError("Duplicate tournament id", { id: row.id });
      }
      this.state.tournaments.set(row.id, row);
      return row;
    });
  }

  getTournament(id: string): Promise<Tournament | null> {
    return this.run("getTournament", () => this.state.tournaments.get(id) ?? null);
  }

  lockTournament(id: string): Promise<Tournament | null> {
    return this.run("lockTournament", () => this.state.tournaments.get(id) ?? null);
  }

  updateTournament(
    id: string,
    patch: TournamentPatch,
    expected: readonly TournamentStatus[],
  ): Promise<Tournament | null> {
    return this.run("updateTournament", () => {
      const current = this.state.tournaments.get(id);
      if (!current || !expected.includes(current.status)) return null;
      const next: Tournament = { ...current, ...patch, updatedAt: new Date() };
      this.state.tournaments.set(id, next);
      return next;
    });
  }

  markSessionsGenerated(
    id: string,
    status?: TournamentStatus,
  ): Promise<Tournament | null> {
    return this.run("markSessionsGenerated", () => {
      const current = this.state.tournaments.get(id);
      if (!current || current.sessionsGenerated) return null;
      const now = new Date();
      const next: Tournament = {
        ...current,
        sessionsGenerated: true,
        sessionsGeneratedAt: now,
        updatedAt: now,
        status: status ?? current.status,
      };
      this.state.tournaments.set(id, next);
      return next;
    });
  }

  recordStatusChange(entry: NewStatusChange): Promise<StatusChange> {
    return this.run("recordStatusChange", () => {
      if (!this.state.tournaments.has(entry.tournamentId)) {
        throw new Error(`Status history references unknown tournament ${entry.tournamentId}`);
      }
      const row: StatusChange = {
        id: entry.id ?? this.state.statusHistory.length + 1,
        tournamentId: entry.tournamentId,
        oldStatus: entry.oldStatus ?? null,
        newStatus: entry.newStatus,
        reason: entry.reason ?? null,
        metadata: entry.metadata ?? null,
        createdAt: entry.createdAt ?? new Date(),
      };
      this.state.statusHistory.push(row);
      return row;
    });
  }

  listStatusHistory(tournamentId: string): Promise<StatusChange[]> {
    return this.run("listStatusHistory", () =>
      this.state.statusHistory
        .filter((row) => row.tournamentId === tournamentId)
        .sort((a, b) => a.id - b.id),
    );
  }

  addEnrollments(rows: NewEnrollment[]): Promise<number> {
    return this.run("addEnrollments", () => {
      let inserted = 0;
      for (const row of rows) {
        const key = enrollmentKey(row.tournamentId, row.participantId);
        if (this.state.enrollments.has(key)) continue;
        this.state.enrollments.set(key, {
          tournamentId: row.tournamentId,
          participantId: row.participantId,
          status: row.status ?? "confirmed",
          seed: row.seed ?? null,
          placement: row.placement ?? null,
          createdAt: row.createdAt ?? new Date(),
        });
        inserted++;
      }
      return inserted;
    });
  }

  listEnrollments(tournamentId: string): Promise<Enrollment[]> {
    return this.run("listEnrollments", () =>
      [...this.state.enrollments.values()]
        .filter((row) => row.tournamentId === tournamentId)
        .sort((a, b) => compareIds(a.participantId, b.participantId)),
    );
  }

  setEnrollmentPlacements(
    tournamentId: string,
    placements: readonly PlacementUpdate[],
  ): Promise<void> {
    return this.run("setEnrollmentPlacements", () => {
      for (const { participantId, placement } of placements) {
        const key = enrollmentKey(tournamentId, participantId);
        const current = this.state.enrollments.get(key);
        if (current) this.state.enrollments.set(key, { ...current, placement });
      }
    });
  }

  insertMatches(rows: NewMatch[]): Promise<Match[]> {
    return this.run("insertMatches", () => {
      const now = new Date();
      const inserted = rows.map(
        (row): Match => ({
          id: row.id ?? randomUUID(),
          tournamentId: row.tournamentId,
          stage: row.stage,
          groupLabel: row.groupLabel ?? null,
          round: row.round,
          position: row.position,
          player1Id: row.player1Id ?? null,
          player2Id: row.player2Id ?? null,
          winnerId: row.winnerId ?? null,
          outcome: row.outcome ?? null,
          status: row.status ?? "scheduled",
          bracketType: row.bracketType ?? null,
          nextMatchId: row.nextMatchId ?? null,
          nextMatchSlot: row.nextMatchSlot ?? null,
          loserNextMatchId: row.loserNextMatchId ?? null,
          loserNextMatchSlot: row.loserNextMatchSlot ?? null,
          completedAt: row.completedAt ?? null,
          createdAt: row.createdAt ?? now,
          updatedAt: row.updatedAt ?? now,
        }),
      );
      for (const match of inserted) {
        if (this.state.matches.has(match.id)) {
          throw new UniqueViolationError("Duplicate match id", { id: match.id });
        }
      }
      for (const match of inserted) this.state.matches.set(match.id, match);
      return inserted;
    });
  }

  getMatch(id: string): Promise<Match | null> {
    return this.run("getMatch", () => this.state.matches.get(id) ?? null);
  }

  listMatches(tournamentId: string, stage?: MatchStage): Promise<Match[]> {
    return this.run("listMatches", () =>
      [...this.state.matches.values()]
        .filter(
          (match) =>
            match.tournamentId === tournamentId &&
            (stage === undefined || match.stage === stage),
        )
        .sort(byRoundAndPosition),
    );
  }

  completeMatch(id: string, completion: MatchCompletion): Promise<Match | null> {
    return this.run("completeMatch", () => {
      const current = this.state.matches.get(id);
      if (!current || current.status !== "scheduled") return null;
      const now = new Date();
      const next: Match = {
        ...current,
        status: "completed",
        winnerId: completion.winnerId,
        outcome: completion.outcome,
        completedAt: now,
        updatedAt: now,
      };
      this.state.matches.set(id, next);
      return next;
    });
  }

  assignMatchSlot(
    id: string,
    slot: MatchSlot,
    participantId: string,
  ): Promise<Match | null> {
    return this.run("assignMatchSlot", () => {
      const current = this.state.matches.get(id);
      if (!current) return null;
      const next: Match =
        slot === "player1"
          ? { ...current, player1Id: participantId, updatedAt: new Date() }
          : { ...current, player2Id: participantId, updatedAt: new Date() };
      this.state.matches.set(id, next);
      return next;
    });
  }

  voidOpenMatches(tournamentId: string): Promise<number> {
    return this.run("voidOpenMatches", () => {
      let voided = 0;
      for (const match of this.state.matches.values()) {
        if (match.tournamentId !== tournamentId || match.status !== "scheduled") {
          continue;
        }
        this.state.matches.set(match.id, {
          ...match,
          status: "void",
          updatedAt: new Date(),
        });
        voided++;
      }
      return voided;
    });
  }

  replaceRankings(
    tournamentId: string,
    rows: NewRankingRow[],
  ): Promise<RankingRow[]> {
    return this.run("replaceRankings", () => {
      const now = new Date();
      const seen = new Set<string>();
      const next = rows.map((row): RankingRow => {
        if (seen.has(row.participantId)) {
          throw new UniqueViolationError("Duplicate ranking row", {
            tournamentId,
            participantId: row.participantId,
          });
        }
        seen.add(row.participantId);
        return {
          tournamentId,
          participantId: row.participantId,
          rank: row.rank,
          points: row.points ?? 0,
          matchesPlayed: row.matchesPlayed ?? 0,
          wins: row.wins ?? 0,
          draws: row.draws ?? 0,
          losses: row.losses ?? 0,
          goalsFor: row.goalsFor ?? 0,
          goalsAgainst: row.goalsAgainst ?? 0,
          metricValue: row.metricValue ?? null,
          updatedAt: row.updatedAt ?? now,
        };
      });
      next.sort((a, b) => a.rank - b.rank);
      this.state.rankings.set(tournamentId, next);
      return next;
    });
  }

  listRankings(tournamentId: string): Promise<RankingRow[]> {
    return this.run("listRankings", () => this.state.rankings.get(tournamentId) ?? []);
  }

  insertQualifierSnapshot(
    snapshot: Pick<QualifierSnapshot, "tournamentId" | "qualifiers">,
  ): Promise<QualifierSnapshot> {
    return this.run("insertQualifierSnapshot", () => {
      if (this.state.snapshots.has(snapshot.tournamentId)) {
        throw new UniqueViolationError("Qualifier snapshot already exists", {
          tournamentId: snapshot.tournamentId,
        });
      }
      const row: QualifierSnapshot = { ...snapshot, createdAt: new Date() };
      this.state.snapshots.set(snapshot.tournamentId, row);
      return row;
    });
  }

  getQualifierSnapshot(tournamentId: string): Promise<QualifierSnapshot | null> {
    return this.run(
      "getQualifierSnapshot",
      () => this.state.snapshots.get(tournamentId) ?? null,
    );
  }

  saveRewardConfig(tournamentId: string, config: RewardConfig): Promise<void> {
    return this.run("saveRewardConfig", () => {
      this.state.rewardConfigs.set(tournamentId, config);
    });
  }

  getRewardConfig(tournamentId: string): Promise<RewardConfig | null> {
    return this.run(
      "getRewardConfig",
      () => this.state.rewardConfigs.get(tournamentId) ?? null,
    );
  }

  insertLedgerEntry(entry: NewLedgerEntry): Promise<LedgerEntry> {
    return this.run("insertLedgerEntry", () => {
      if (this.state.ledger.has(entry.idempotencyKey)) {
        throw new UniqueViolationError("Duplicate idempotency key", {
          idempotencyKey: entry.idempotencyKey,
        });
      }
      const row: LedgerEntry = {
        id: entry.id ?? randomUUID(),
        idempotencyKey: entry.idempotencyKey,
        tournamentId: entry.tournamentId,
        participantId: entry.participantId,
        kind: entry.kind,
        reason: entry.reason,
        amount: entry.amount,
        metadata: entry.metadata,
        createdAt: entry.createdAt ?? new Date(),
      };
      this.state.ledger.set(row.idempotencyKey, row);
      return row;
    });
  }

  getLedgerEntry(idempotencyKey: string): Promise<LedgerEntry | null> {
    return this.run(
      "getLedgerEntry",
      () => this.state.ledger.get(idempotencyKey) ?? null,
    );
  }

  listLedgerEntries(tournamentId: string): Promise<LedgerEntry[]> {
    return this.run("listLedgerEntries", () =>
      [...this.state.ledger.values()]
        .filter((entry) => entry.tournamentId === tournamentId)
        .sort(
          (a, b) =>
            compareIds(a.participantId, b.participantId) ||
            compareIds(a.idempotencyKey, b.idempotencyKey),
        ),
    );
  }
}
