import type { TournamentStore } from "../db/store.js";
import type {
  MetricKind,
  NewRankingRow,
  RankingDirection,
  RankingRow,
  RoundAggregation,
  Tournament,
} from "../@types/tournament.js";
import type { Match } from "../@types/match.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { compareIds } from "../utils/compare.js";

export const POINTS = { win: 3, draw: 1, loss: 0 } as const;

export interface RankingEntry {
  participantId: string;
  rank: number;
  points: number;
  matchesPlayed: number;
  wins: number;
  draws: number;
  losses: number;
  goalsFor: number;
  goalsAgainst: number;
  metricValue: number | null;
}

export interface Standing extends Omit<RankingEntry, "rank"> {
  /** Bracket progress, higher is further. 0 outside knockout brackets. */
  progress: number;
}

const FINAL_WIN = 1000;
const FINAL_LOSS = 999;
const THIRD_PLACE_WIN = 998;
const THIRD_PLACE_LOSS = 997;

/** Lower is better for these metrics */
const ASCENDING_METRICS: readonly MetricKind[] = ["time", "placement"];

export function defaultDirection(metricKind: MetricKind): RankingDirection {
  return ASCENDING_METRICS.includes(metricKind) ? "asc" : "desc";
}

function emptyStanding(participantId: string): Standing {
  return {
    participantId,
    points: 0,
    matchesPlayed: 0,
    wins: 0,
    draws: 0,
    losses: 0,
    goalsFor: 0,
    goalsAgainst: 0,
    metricValue: null,
    progress: 0,
  };
}

function withDenseRanks(sorted: Standing[]): RankingEntry[] {
  return sorted.map(({ progress: _progress, ...standing }, index) => ({
    ...standing,
    rank: index + 1,
  }));
}

/**
 * Progress inside a knockout bracket: podium finishes first, then the furthest
 * round reached in the winners bracket.
 */
function bracketProgress(participantId: string, matches: readonly Match[]): number {
  const bracket = matches.filter(
    (m) =>
      m.bracketType !== null &&
      m.status !== "void" &&
      (m.player1Id === participantId || m.player2Id === participantId),
  );
  let progress = 0;
  for (const match of bracket) {
    const decided = match.status === "completed" && match.winnerId !== null;
    const won = decided && match.winnerId === participantId;
    if (match.bracketType === "third_place") {
      if (decided) progress = Math.max(progress, won ? THIRD_PLACE_WIN : THIRD_PLACE_LOSS);
      continue;
    }
    if (match.nextMatchId === null && decided) {
      progress = Math.max(progress, won ? FINAL_WIN : FINAL_LOSS);
      continue;
    }
    progress = Math.max(progress, match.round);
  }
  return progress;
}

export function compareStandings(a: Standing, b: Standing): number {
  return (
    b.progress - a.progress ||
    b.points - a.points ||
    b.goalsFor - b.goalsAgainst - (a.goalsFor - a.goalsAgainst) ||
    b.goalsFor - a.goalsFor ||
    compareIds(a.participantId, b.participantId)
  );
}

/**
 * Head-to-head standings: 3/1/0 points, then goal difference, goals for and
 * participant id. Knockout brackets order by progress before points.
 */
export function rankHeadToHead(
  participantIds: readonly string[],
  matches: readonly Match[],
): RankingEntry[] {
  const table = new Map<string, Standing>();
  const standing = (id: string) => {
    let row = table.get(id);
    if (!row) {
      row = emptyStanding(id);
      table.set(id, row);
    }
    return row;
  };
  participantIds.forEach(standing);

  for (const match of matches) {
    const outcome = match.outcome;
    if (
      match.status !== "completed" ||
      outcome?.kind !== "head_to_head" ||
      !match.player1Id ||
      !match.player2Id
    ) {
      continue;
    }
    const home = standing(match.player1Id);
    const away = standing(match.player2Id);
    home.matchesPlayed++;
    away.matchesPlayed++;
    home.goalsFor += outcome.player1Score;
    home.goalsAgainst += outcome.player2Score;
    away.goalsFor += outcome.player2Score;
    away.goalsAgainst += outcome.player1Score;

    if (outcome.result === "draw") {
      home.draws++;
      away.draws++;
      home.points += POINTS.draw;
      away.points += POINTS.draw;
    } else {
      const winner = outcome.result === "player1" ? home : away;
      const loser = winner === home ? away : home;
      winner.wins++;
      loser.losses++;
      winner.points += POINTS.win;
      loser.points += POINTS.loss;
    }
  }

  for (const row of table.values()) {
    row.progress = bracketProgress(row.participantId, matches);
  }

  return withDenseRanks([...table.values()].sort(compareStandings));
}

/**
 * Individual ranking over completed round entries. Participants without a
 * completed round rank last; equal values fall back to participant id.
 */
export function rankIndividual(
  participantIds: readonly string[],
  matches: readonly Match[],
  options: { direction: RankingDirection; aggregation: RoundAggregation },
): RankingEntry[] {
  const values = new Map<string, number[]>();
  for (const id of participantIds) values.set(id, []);

  for (const match of matches) {
    if (
      match.status !== "completed" ||
      match.outcome?.kind !== "individual" ||
      !match.player1Id
    ) {
      continue;
    }
    const list = values.get(match.player1Id) ?? [];
    list.push(match.outcome.value);
    values.set(match.player1Id, list);
  }

  const ascending = options.direction === "asc";
  const standings = [...values.entries()].map(([participantId, list]) => {
    const row = emptyStanding(participantId);
    row.matchesPlayed = list.length;
    if (list.length > 0) {
      row.metricValue =
        options.aggregation === "best"
          ? ascending
            ? Math.min(...list)
            : Math.max(...list)
          : list.reduce((sum, v) => sum + v, 0);
      row.points = row.metricValue;
    }
    return row;
  });

  standings.sort((a, b) => {
    if (a.metricValue === null || b.metricValue === null) {
      if (a.metricValue !== b.metricValue) return a.metricValue === null ? 1 : -1;
    } else if (a.metricValue !== b.metricValue) {
      return ascending ? a.metricValue - b.metricValue : b.metricValue - a.metricValue;
    }
    return compareIds(a.participantId, b.participantId);
  });

  return withDenseRanks(standings);
}

export function rankingDirectionOf(tournament: Tournament): RankingDirection {
  if (tournament.rankingDirection) return tournament.rankingDirection;
  return defaultDirection(tournament.metricKind ?? "score");
}

/**
 * Rank every enrolled participant (plus anyone who appears in a match).
 */
export function rankTournament(
  tournament: Tournament,
  participantIds: readonly string[],
  matches: readonly Match[],
): RankingEntry[] {
  const ids = new Set(participantIds);
  for (const match of matches) {
    if (match.player1Id) ids.add(match.player1Id);
    if (match.player2Id) ids.add(match.player2Id);
  }
  const roster = [...ids];

  if (tournament.format === "individual_ranking") {
    return rankIndividual(roster, matches, {
      direction: rankingDirectionOf(tournament),
      aggregation: tournament.aggregation,
    });
  }
  return rankHeadToHead(roster, matches);
}

/**
 * Recompute and persist rankings inside an open transaction. The tournament
 * row must already be locked by the caller.
 */
export async function computeRankingsWith(
  tx: TournamentStore,
  tournament: Tournament,
): Promise<RankingRow[]> {
  const [enrollments, matches] = await Promise.all([
    tx.listEnrollments(tournament.id),
    tx.listMatches(tournament.id),
  ]);
  const entries = rankTournament(
    tournament,
    enrollments
      .filter((e) => e.status !== "cancelled")
      .map((e) => e.participantId),
    matches,
  );
  const rows: NewRankingRow[] = entries.map((entry) => ({
    tournamentId: tournament.id,
    ...entry,
  }));
  return tx.replaceRankings(tournament.id, rows);
}

/**
 * Full recomputation from every completed match, under the tournament lock.
 */
export async function computeRankings(
  store: TournamentStore,
  tournamentId: string,
): Promise<RankingRow[]> {
  return store.transaction(async (tx) => {
    const tournament = await tx.lockTournament(tournamentId);
    if (!tournament) {
      throw new NotFoundError(`Tournament ${tournamentId} not found`, { tournamentId });
    }
    if (tournament.status === "draft") {
      throw new ValidationError("Tournament has not started", { tournamentId });
    }
    return computeRankingsWith(tx, tournament);
  });
}

export async function getRankings(
  store: TournamentStore,
  tournamentId: string,
): Promise<RankingRow[]> {
  const tournament = await store.getTournament(tournamentId);
  if (!tournament) {
    throw new NotFoundError(`Tournament ${tournamentId} not found`, { tournamentId });
  }
  return store.listRankings(tournamentId);
}
