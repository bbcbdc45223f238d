import type { TournamentStore } from "../db/store.js";
import type {
  Enrollment,
  RankingRow,
  Tournament,
} from "../@types/tournament.js";
import type {
  BadgeConfig,
  BadgeSnapshot,
  DistributionSummary,
  DriftAlert,
  LedgerEntry,
  LedgerMetadata,
  NewLedgerEntry,
  ParticipantAward,
  RankSource,
  RewardConfig,
  RewardKind,
  RewardTier,
  SkillMapping,
  SkippedParticipant,
} from "../@types/reward.js";
import { DataDriftError, NotFoundError, ValidationError } from "../errors.js";
import { createOrFetch } from "../db/idempotent.js";
import { DEFAULT_XP_PER_SKILL_POINT, parseRewardConfig } from "./rewardConfig.js";
import { transitionTournament } from "./tournamentStateMachine.js";

export const BASE_XP: Record<RewardTier, number> = {
  firstPlace: 500,
  secondPlace: 300,
  thirdPlace: 200,
  top25Percent: 100,
  participation: 50,
};

/** Badge types that only make sense for one placement */
export const BADGE_EXPECTED_RANK: Record<string, number> = {
  CHAMPION: 1,
  RUNNER_UP: 2,
  THIRD_PLACE: 3,
};

export interface ResolvedRank {
  rank: number;
  source: RankSource;
}

export interface RankSources {
  rankings: ReadonlyMap<string, number>;
  placements: ReadonlyMap<string, number>;
  badgeSnapshots: ReadonlyMap<string, number>;
}

/**
 * Rank lookup in strict priority order: ranking row, enrollment placement,
 * rank recorded on a badge already in the ledger.
 */
export function resolveRank(
  participantId: string,
  sources: RankSources,
): ResolvedRank | null {
  const fromRanking = sources.rankings.get(participantId);
  if (fromRanking !== undefined) return { rank: fromRanking, source: "ranking" };

  const fromEnrollment = sources.placements.get(participantId);
  if (fromEnrollment !== undefined) {
    return { rank: fromEnrollment, source: "enrollment" };
  }

  const fromBadge = sources.badgeSnapshots.get(participantId);
  if (fromBadge !== undefined) return { rank: fromBadge, source: "badge_snapshot" };

  return null;
}

export function tierForRank(rank: number, participantCount: number): RewardTier {
  if (rank === 1) return "firstPlace";
  if (rank === 2) return "secondPlace";
  if (rank === 3) return "thirdPlace";
  if (rank <= Math.ceil(participantCount * 0.25)) return "top25Percent";
  return "participation";
}

export function placementSkillPoints(rank: number): number {
  if (rank === 1) return 10;
  if (rank === 2) return 7;
  if (rank === 3) return 5;
  return 1;
}

/**
 * Split the placement's skill points over the enabled skills by weight,
 * rounded to one decimal.
 */
export function distributeSkillPoints(
  rank: number,
  mappings: readonly SkillMapping[],
): Record<string, number> {
  const enabled = mappings.filter((m) => m.enabled);
  const totalWeight = enabled.reduce((sum, m) => sum + m.weight, 0);
  const base = placementSkillPoints(rank);

  const points: Record<string, number> = {};
  if (totalWeight <= 0) return points;
  for (const mapping of enabled) {
    points[mapping.skill] = Math.round(((base * mapping.weight) / totalWeight) * 10) / 10;
  }
  return points;
}

export function bonusXpFor(
  skillPoints: Record<string, number>,
  config: RewardConfig,
): number {
  let bonus = 0;
  for (const mapping of config.skillMappings) {
    const points = skillPoints[mapping.skill];
    if (points === undefined) continue;
    const rate = config.xpPerSkillPoint[mapping.category] ?? DEFAULT_XP_PER_SKILL_POINT;
    bonus += Math.floor(points * rate);
  }
  return bonus;
}

export function renderBadge(badge: BadgeConfig, tournamentName: string): BadgeSnapshot {
  return {
    badgeType: badge.badgeType,
    title: badge.title,
    icon: badge.icon,
    description: badge.description
      ? badge.description.replaceAll("{tournament_name}", tournamentName)
      : null,
    rarity: badge.rarity,
  };
}

/**
 * Ledger key for one award. Parts are JSON-encoded so ids and skill names
 * containing `:` cannot collide.
 */
export function idempotencyKey(
  tournamentId: string,
  participantId: string,
  kind: RewardKind,
  reason: string,
): string {
  return `reward:${JSON.stringify([tournamentId, participantId, kind, reason])}`;
}

interface PlannedAward {
  award: ParticipantAward;
  entries: NewLedgerEntry[];
  drift: DriftAlert[];
}

/**
 * Everything one participant receives, as ledger rows. Pure.
 */
export function planAward(
  tournament: Pick<Tournament, "id" | "name">,
  participantId: string,
  resolved: ResolvedRank,
  participantCount: number,
  config: RewardConfig,
): PlannedAward {
  const tier = tierForRank(resolved.rank, participantCount);
  const placement = config[tier];
  const credits = placement.credits;
  const xp = Math.floor(BASE_XP[tier] * placement.xpMultiplier);
  const skillPoints = distributeSkillPoints(resolved.rank, config.skillMappings);
  const bonusXp = bonusXpFor(skillPoints, config);
  const badges = placement.badges
    .filter((b) => b.enabled)
    .map((b) => renderBadge(b, tournament.name));

  const metadata: LedgerMetadata = {
    rank: resolved.rank,
    rankSource: resolved.source,
    tier,
  };
  const entry = (
    kind: RewardKind,
    reason: string,
    amount: number,
    extra: Partial<LedgerMetadata> = {},
  ): NewLedgerEntry => ({
    idempotencyKey: idempotencyKey(tournament.id, participantId, kind, reason),
    tournamentId: tournament.id,
    participantId,
    kind,
    reason,
    amount,
    metadata: { ...metadata, ...extra },
  });

  const entries: NewLedgerEntry[] = [];
  if (credits > 0) entries.push(entry("credit", "placement", credits));
  if (xp > 0) entries.push(entry("xp", "placement", xp));
  if (bonusXp > 0) entries.push(entry("xp", "skill_bonus", bonusXp));
  for (const mapping of config.skillMappings) {
    const points = skillPoints[mapping.skill];
    if (points !== undefined && points > 0) {
      entries.push(entry("skill", mapping.skill, points, { category: mapping.category }));
    }
  }
  for (const badge of badges) {
    entries.push(entry("badge", badge.badgeType, 1, { badge }));
  }

  const drift: DriftAlert[] = [];
  for (const badge of badges) {
    const expectedRank = BADGE_EXPECTED_RANK[badge.badgeType];
    if (expectedRank !== undefined && expectedRank !== resolved.rank) {
      drift.push({
        participantId,
        badgeType: badge.badgeType,
        expectedRank,
        resolvedRank: resolved.rank,
      });
    }
  }

  return {
    award: {
      participantId,
      rank: resolved.rank,
      rankSource: resolved.source,
      tier,
      credits,
      xp,
      bonusXp,
      skillPoints,
      badges: badges.map((b) => b.badgeType),
    },
    entries,
    drift,
  };
}

function rankSources(
  rankings: readonly RankingRow[],
  enrollments: readonly Enrollment[],
  ledger: readonly LedgerEntry[],
): RankSources {
  const placements = new Map<string, number>();
  for (const e of enrollments) {
    if (e.placement !== null) placements.set(e.participantId, e.placement);
  }
  const badgeSnapshots = new Map<string, number>();
  for (const entry of ledger) {
    if (entry.kind === "badge") badgeSnapshots.set(entry.participantId, entry.metadata.rank);
  }
  return {
    rankings: new Map(rankings.map((r) => [r.participantId, r.rank])),
    placements,
    badgeSnapshots,
  };
}

function reportDrift(tournamentId: string, alert: DriftAlert): void {
  const error = new DataDriftError(
    `${alert.badgeType} badge awarded at rank ${alert.resolvedRank}`,
    { tournamentId, ...alert },
  );
  console.error(`[ALERT] [Tournament ${tournamentId}] ${error.message}`, error.context);
}

function alreadyDistributed(
  tournament: Tournament,
  ledger: readonly LedgerEntry[],
): DistributionSummary {
  const prior = tournament.rewardSummary;
  const base: DistributionSummary = prior ?? {
    tournamentId: tournament.id,
    status: "distributed",
    awards: [],
    skipped: [],
    driftAlerts: [],
    totals: { participants: 0, credits: 0, xp: 0, badges: 0 },
    newEntriesCreated: 0,
    existingEntriesFound: 0,
    distributedAt: (tournament.rewardsDistributedAt ?? new Date()).toISOString(),
  };
  return {
    ...base,
    status: "already_distributed",
    newEntriesCreated: 0,
    existingEntriesFound: ledger.length,
  };
}

/**
 * Pay out placement rewards for a completed tournament, once.
 *
 * Runs under the tournament lock. Every ledger row is written through
 * `createOrFetch` on its idempotency key, and the status moves to
 * rewards_distributed in the same transaction. A repeated call returns the
 * stored summary flagged `already_distributed`.
 */
export async function distributeRewards(
  store: TournamentStore,
  tournamentId: string,
  configInput?: unknown,
): Promise<DistributionSummary> {
  const explicitConfig =
    configInput === undefined || configInput === null
      ? null
      : parseRewardConfig(configInput);

  return store.transaction(async (tx) => {
    const tournament = await tx.lockTournament(tournamentId);
    if (!tournament) {
      throw new NotFoundError(`Tournament ${tournamentId} not found`, { tournamentId });
    }

    const ledger = await tx.listLedgerEntries(tournamentId);
    if (tournament.status === "rewards_distributed") {
      console.warn(`[Tournament ${tournamentId}] Rewards already distributed`);
      return alreadyDistributed(tournament, ledger);
    }
    if (tournament.status === "cancelled") {
      throw new ValidationError("Rewards are never distributed for a cancelled tournament", {
        tournamentId,
      });
    }
    if (tournament.status !== "completed") {
      throw new ValidationError(
        `Rewards require a completed tournament (is ${tournament.status})`,
        { tournamentId },
      );
    }

    const config = explicitConfig ?? (await tx.getRewardConfig(tournamentId));
    if (!config) {
      throw new ValidationError("No reward config saved for this tournament", {
        tournamentId,
      });
    }
    if (explicitConfig) await tx.saveRewardConfig(tournamentId, explicitConfig);

    const [rankings, enrollments] = await Promise.all([
      tx.listRankings(tournamentId),
      tx.listEnrollments(tournamentId),
    ]);
    const sources = rankSources(rankings, enrollments, ledger);
    const participantIds = [
      ...new Set([
        ...rankings.map((r) => r.participantId),
        ...enrollments.filter((e) => e.status !== "cancelled").map((e) => e.participantId),
      ]),
    ].sort();

    const resolved = new Map<string, ResolvedRank>();
    const skipped: SkippedParticipant[] = [];
    for (const participantId of participantIds) {
      const rank = resolveRank(participantId, sources);
      if (rank) {
        resolved.set(participantId, rank);
      } else {
        skipped.push({ participantId, reason: "no rank in rankings, enrollment or badge history" });
        console.warn(
          `[Tournament ${tournamentId}] No rank for participant ${participantId}, rewards skipped`,
        );
      }
    }

    const awards: ParticipantAward[] = [];
    const driftAlerts: DriftAlert[] = [];
    let newEntriesCreated = 0;
    let existingEntriesFound = 0;

    for (const [participantId, rank] of resolved) {
      const plan = planAward(tournament, participantId, rank, resolved.size, config);
      plan.drift.forEach((alert) => reportDrift(tournamentId, alert));
      driftAlerts.push(...plan.drift);

      for (const entry of plan.entries) {
        const { created } = await createOrFetch(
          () => tx.insertLedgerEntry(entry),
          () => tx.getLedgerEntry(entry.idempotencyKey),
        );
        if (created) newEntriesCreated++;
        else existingEntriesFound++;
      }
      awards.push(plan.award);
    }

    const distributedAt = new Date();
    const summary: DistributionSummary = {
      tournamentId,
      status: "distributed",
      awards,
      skipped,
      driftAlerts,
      totals: {
        participants: awards.length,
        credits: awards.reduce((sum, a) => sum + a.credits, 0),
        xp: awards.reduce((sum, a) => sum + a.xp + a.bonusXp, 0),
        badges: awards.reduce((sum, a) => sum + a.badges.length, 0),
      },
      newEntriesCreated,
      existingEntriesFound,
      distributedAt: distributedAt.toISOString(),
    };

    await transitionTournament(
      tx,
      tournament,
      "rewards_distributed",
      { rewardSummary: summary, rewardsDistributedAt: distributedAt },
      { metadata: { participants: awards.length, newEntriesCreated, existingEntriesFound } },
    );
    console.log(
      `[Tournament ${tournamentId}] Rewards distributed to ${awards.length} participants (${newEntriesCreated} ledger entries)`,
    );
    return summary;
  });
}

export async function getLedger(
  store: TournamentStore,
  tournamentId: string,
): Promise<LedgerEntry[]> {
  const tournament = await store.getTournament(tournamentId);
  if (!tournament) {
    throw new NotFoundError(`Tournament ${tournamentId} not found`, { tournamentId });
  }
  return store.listLedgerEntries(tournamentId);
}
