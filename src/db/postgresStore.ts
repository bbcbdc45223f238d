import { and, asc, eq, inArray, sql } from "drizzle-orm";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import * as schema from "./schema.js";
import { chunkArray } from "./batch.js";
import {
  matches,
  qualifierSnapshots,
  rewardConfigs,
  rewardLedger,
  tournamentParticipants,
  tournamentRankings,
  tournamentStatusHistory,
  tournaments,
} from "./schema.js";
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
import {
  TournamentEngineError,
  TransientStorageError,
  UniqueViolationError,
  errorMessage,
} from "../errors.js";

type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

const UNIQUE_VIOLATION = "23505";

const TRANSIENT_CODES = new Set([
  "40001", // serialization_failure
  "40P01", // deadlock_detected
  "57P01", // admin_shutdown
  "08000",
  "08003",
  "08006",
  "53300", // too_many_connections
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("code" in error && typeof error.code === "string") return error.code;
  if ("cause" in error) return errorCode(error.cause);
  return undefined;
}

/**
 * Translate driver errors into the engine taxonomy. Engine errors pass through.
 */
export function toStorageError(error: unknown): unknown {
  if (error instanceof TournamentEngineError) return error;

  const code = errorCode(error);
  if (code === UNIQUE_VIOLATION) {
    return new UniqueViolationError(errorMessage(error), { code });
  }
  if (code !== undefined && TRANSIENT_CODES.has(code)) {
    return new TransientStorageError(errorMessage(error), { code });
  }
  return error;
}

function first<T>(rows: T[]): T | null {
  return rows[0] ?? null;
}

export class PostgresTournamentStore implements TournamentStore {
  constructor(private readonly db: Executor) {}

  private async run<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw toStorageError(error);
    }
  }

  transaction<T>(fn: (tx: TournamentStore) => Promise<T>): Promise<T> {
    return this.run(() =>
      this.db.transaction((tx) => fn(new PostgresTournamentStore(tx))),
    );
  }

  // Multi-statement writes share one transaction (a savepoint when already
  // inside one), so a failed batch leaves none of the earlier batches behind.
  private inBatches<T>(work: (db: Executor) => Promise<T>): Promise<T> {
    return this.run(() => this.db.transaction((tx) => work(tx)));
  }

  insertTournament(values: NewTournament): Promise<Tournament> {
    return this.run(async () => {
      const row = first(
        await this.db.insert(tournaments).values(values).returning(),
      );
      if (!row) throw new Error("Tournament insert returned no row");
      return row;
    });
  }

  getTournament(id: string): Promise<Tournament | null> {
    return this.run(async () =>
      first(
        await this.db.select().from(tournaments).where(eq(tournaments.id, id)),
      ),
    );
  }

  lockTournament(id: string): Promise<Tournament | null> {
    return this.run(async () =>
      first(
        await this.db
          .select()
          .from(tournaments)
          .where(eq(tournaments.id, id))
          .for("update"),
      ),
    );
  }

  updateTournament(
    id: string,
    patch: TournamentPatch,
    expected: readonly TournamentStatus[],
  ): Promise<Tournament | null> {
    return this.run(async () =>
      first(
        await this.db
          .update(tournaments)
          .set({ ...patch, updatedAt: new Date() })
          .where(
            and(
              eq(tournaments.id, id),
              inArray(tournaments.status, [...expected]),
            ),
          )
          .returning(),
      ),
    );
  }

  markSessionsGenerated(
    id: string,
    status?: TournamentStatus,
  ): Promise<Tournament | null> {
    return this.run(async () => {
      const now = new Date();
      return first(
        await this.db
          .update(tournaments)
          .set({
            sessionsGenerated: true,
            sessionsGeneratedAt: now,
            updatedAt: now,
            ...(status ? { status } : {}),
          })
          .where(
            and(
              eq(tournaments.id, id),
              eq(tournaments.sessionsGenerated, false),
            ),
          )
          .returning(),
      );
    });
  }

  recordStatusChange(entry: NewStatusChange): Promise<StatusChange> {
    return this.run(async () => {
      const row = first(
        await this.db.insert(tournamentStatusHistory).values(entry).returning(),
      );
      if (!row) throw new Error("Status history insert returned no row");
      return row;
    });
  }

  listStatusHistory(tournamentId: string): Promise<StatusChange[]> {
    return this.run(() =>
      this.db
        .select()
        .from(tournamentStatusHistory)
        .where(eq(tournamentStatusHistory.tournamentId, tournamentId))
        .orderBy(asc(tournamentStatusHistory.id)),
    );
  }

  addEnrollments(rows: NewEnrollment[]): Promise<number> {
    if (rows.length === 0) return Promise.resolve(0);
    return this.inBatches(async (db) => {
      let inserted = 0;
      for (const batch of chunkArray(rows)) {
        const written = await db
          .insert(tournamentParticipants)
          .values(batch)
          .onConflictDoNothing()
          .returning({ participantId: tournamentParticipants.participantId });
        inserted += written.length;
      }
      return inserted;
    });
  }

  listEnrollments(tournamentId: string): Promise<Enrollment[]> {
    return this.run(() =>
      this.db
        .select()
        .from(tournamentParticipants)
        .where(eq(tournamentParticipants.tournamentId, tournamentId))
        .orderBy(asc(tournamentParticipants.participantId)),
    );
  }

  setEnrollmentPlacements(
    tournamentId: string,
    placements: readonly PlacementUpdate[],
  ): Promise<void> {
    if (placements.length === 0) return Promise.resolve();
    const participantIds = placements.map((p) => p.participantId);
    const ranks = placements.map((p) => p.placement);
    // Two array parameters, whatever the roster size.
    return this.run(async () => {
      await this.db.execute(sql`
        update ${tournamentParticipants}
        set placement = v.placement
        from unnest(${sql.param(participantIds)}::varchar[], ${sql.param(ranks)}::integer[])
          as v(participant_id, placement)
        where ${tournamentParticipants.tournamentId} = ${tournamentId}
          and ${tournamentParticipants.participantId} = v.participant_id
      `);
    });
  }

  insertMatches(rows: NewMatch[]): Promise<Match[]> {
    if (rows.length === 0) return Promise.resolve([]);
    return this.inBatches(async (db) => {
      const inserted: Match[] = [];
      for (const batch of chunkArray(rows)) {
        inserted.push(...(await db.insert(matches).values(batch).returning()));
      }
      return inserted;
    });
  }

  getMatch(id: string): Promise<Match | null> {
    return this.run(async () =>
      first(await this.db.select().from(matches).where(eq(matches.id, id))),
    );
  }

  listMatches(tournamentId: string, stage?: MatchStage): Promise<Match[]> {
    return this.run(() =>
      this.db
        .select()
        .from(matches)
        .where(
          stage
            ? and(eq(matches.tournamentId, tournamentId), eq(matches.stage, stage))
            : eq(matches.tournamentId, tournamentId),
        )
        .orderBy(asc(matches.round), asc(matches.position)),
    );
  }

  completeMatch(id: string, completion: MatchCompletion): Promise<Match | null> {
    return this.run(async () => {
      const now = new Date();
      return first(
        await this.db
          .update(matches)
          .set({
            status: "completed",
            winnerId: completion.winnerId,
            outcome: completion.outcome,
            completedAt: now,
            updatedAt: now,
          })
          .where(and(eq(matches.id, id), eq(matches.status, "scheduled")))
          .returning(),
      );
    });
  }

  assignMatchSlot(
    id: string,
    slot: MatchSlot,
    participantId: string,
  ): Promise<Match | null> {
    return this.run(async () =>
      first(
        await this.db
          .update(matches)
          .set({
            ...(slot === "player1"
              ? { player1Id: participantId }
              : { player2Id: participantId }),
            updatedAt: new Date(),
          })
          .where(eq(matches.id, id))
          .returning(),
      ),
    );
  }

  voidOpenMatches(tournamentId: string): Promise<number> {
    return this.run(async () => {
      const voided = await this.db
        .update(matches)
        .set({ status: "void", updatedAt: new Date() })
        .where(
          and(
            eq(matches.tournamentId, tournamentId),
            eq(matches.status, "scheduled"),
          ),
        )
        .returning({ id: matches.id });
      return voided.length;
    });
  }

  replaceRankings(
    tournamentId: string,
    rows: NewRankingRow[],
  ): Promise<RankingRow[]> {
    return this.inBatches(async (db) => {
      await db
        .delete(tournamentRankings)
        .where(eq(tournamentRankings.tournamentId, tournamentId));
      const inserted: RankingRow[] = [];
      for (const batch of chunkArray(rows)) {
        inserted.push(
          ...(await db.insert(tournamentRankings).values(batch).returning()),
        );
      }
      return inserted.sort((a, b) => a.rank - b.rank);
    });
  }

  listRankings(tournamentId: string): Promise<RankingRow[]> {
    return this.run(() =>
      this.db
        .select()
        .from(tournamentRankings)
        .where(eq(tournamentRankings.tournamentId, tournamentId))
        .orderBy(asc(tournamentRankings.rank)),
    );
  }

  // Unique-guarded inserts run in a savepoint so a collision leaves the
  // surrounding transaction usable for the follow-up read.
  insertQualifierSnapshot(
    snapshot: Pick<QualifierSnapshot, "tournamentId" | "qualifiers">,
  ): Promise<QualifierSnapshot> {
    return this.run(() =>
      this.db.transaction(async (sp) => {
        const row = first(
          await sp.insert(qualifierSnapshots).values(snapshot).returning(),
        );
        if (!row) throw new Error("Qualifier snapshot insert returned no row");
        return row;
      }),
    );
  }

  getQualifierSnapshot(tournamentId: string): Promise<QualifierSnapshot | null> {
    return this.run(async () =>
      first(
        await this.db
          .select()
          .from(qualifierSnapshots)
          .where(eq(qualifierSnapshots.tournamentId, tournamentId)),
      ),
    );
  }

  saveRewardConfig(tournamentId: string, config: RewardConfig): Promise<void> {
    return this.run(async () => {
      await this.db
        .insert(rewardConfigs)
        .values({ tournamentId, config })
        .onConflictDoUpdate({
          target: rewardConfigs.tournamentId,
          set: { config, updatedAt: new Date() },
        });
    });
  }

  getRewardConfig(tournamentId: string): Promise<RewardConfig | null> {
    return this.run(async () => {
      const row = first(
        await this.db
          .select()
          .from(rewardConfigs)
          .where(eq(rewardConfigs.tournamentId, tournamentId)),
      );
      return row?.config ?? null;
    });
  }

  insertLedgerEntry(entry: NewLedgerEntry): Promise<LedgerEntry> {
    return this.run(() =>
      this.db.transaction(async (sp) => {
        const row = first(
          await sp.insert(rewardLedger).values(entry).returning(),
        );
        if (!row) throw new Error("Ledger insert returned no row");
        return row;
      }),
    );
  }

  getLedgerEntry(idempotencyKey: string): Promise<LedgerEntry | null> {
    return this.run(async () =>
      first(
        await this.db
          .select()
          .from(rewardLedger)
          .where(eq(rewardLedger.idempotencyKey, idempotencyKey)),
      ),
    );
  }

  listLedgerEntries(tournamentId: string): Promise<LedgerEntry[]> {
    return this.run(() =>
      this.db
        .select()
        .from(rewardLedger)
        .where(eq(rewardLedger.tournamentId, tournamentId))
        .orderBy(asc(rewardLedger.participantId), asc(rewardLedger.idempotencyKey)),
    );
  }
}
