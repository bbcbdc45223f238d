import type { TournamentStore } from "../db/store.js";
import type { Match } from "../@types/match.js";
import type { Qualifier, QualifierSnapshot } from "../@types/tournament.js";
import { NotFoundError, ValidationError } from "../errors.js";
import { createOrFetch } from "../db/idempotent.js";
import { generateSingleEliminationBracket } from "./bracketGenerator.js";
import { buildMatchRows } from "./matchService.js";
import { computeRankingsWith, rankHeadToHead } from "./rankingService.js";
import { transitionTournament } from "./tournamentStateMachine.js";

/**
 * Rank each group on its own matches and take the top `perGroup`.
 *
 * Seeds run group winners first (A1, B1, ...), then runners-up (A2, B2, ...),
 * so standard bracket placement keeps group winners apart.
 */
export function selectQualifiers(
  groupMatches: readonly Match[],
  perGroup: number,
): Qualifier[] {
  const groups = new Map<string, { members: Set<string>; matches: Match[] }>();
  for (const match of groupMatches) {
    if (!match.groupLabel) continue;
    let group = groups.get(match.groupLabel);
    if (!group) {
      group = { members: new Set(), matches: [] };
      groups.set(match.groupLabel, group);
    }
    group.matches.push(match);
    if (match.player1Id) group.members.add(match.player1Id);
    if (match.player2Id) group.members.add(match.player2Id);
  }

  const labels = [...groups.keys()].sort();
  const tables = labels.map((label) => {
    const group = groups.get(label);
    return group ? rankHeadToHead([...group.members], group.matches) : [];
  });

  const ordered: Omit<Qualifier, "seed">[] = [];
  for (let groupRank = 1; groupRank <= perGroup; groupRank++) {
    labels.forEach((groupLabel, index) => {
      const entry = tables[index]?.[groupRank - 1];
      if (entry) {
        ordered.push({ participantId: entry.participantId, groupLabel, groupRank });
      }
    });
  }

  return ordered.map((qualifier, index) => ({ ...qualifier, seed: index + 1 }));
}

/**
 * Close the group stage: snapshot the qualifiers, seed the knockout bracket and
 * move to the knockout stage. Once a snapshot exists it is returned as is.
 */
export async function finalizeGroupStage(
  store: TournamentStore,
  tournamentId: string,
): Promise<QualifierSnapshot> {
  return store.transaction(async (tx) => {
    const tournament = await tx.lockTournament(tournamentId);
    if (!tournament) {
      throw new NotFoundError(`Tournament ${tournamentId} not found`, { tournamentId });
    }

    const existing = await tx.getQualifierSnapshot(tournamentId);
    if (existing) {
      console.warn(`[Tournament ${tournamentId}] Group stage already finalized`);
      return existing;
    }

    if (tournament.headToHeadType !== "group_knockout") {
      throw new ValidationError("Only group + knockout tournaments have a group stage", {
        tournamentId,
      });
    }
    if (tournament.status !== "group_stage") {
      throw new ValidationError(
        `Group stage cannot be finalized while ${tournament.status}`,
        { tournamentId },
      );
    }

    const groupMatches = await tx.listMatches(tournamentId, "group");
    const open = groupMatches.filter((m) => m.status === "scheduled").length;
    if (open > 0) {
      throw new ValidationError(`${open} group matches are still open`, {
        tournamentId,
      });
    }

    const { row: snapshot, created } = await createOrFetch(
      () =>
        tx.insertQualifierSnapshot({
          tournamentId,
          qualifiers: selectQualifiers(groupMatches, tournament.qualifiersPerGroup),
        }),
      () => tx.getQualifierSnapshot(tournamentId),
    );
    if (!created) return snapshot;

    const seeded = [...snapshot.qualifiers]
      .sort((a, b) => a.seed - b.seed)
      .map((q) => q.participantId);
    const bracket = generateSingleEliminationBracket(seeded, {
      stage: "knockout",
      thirdPlaceMatch: tournament.thirdPlaceMatch,
    });
    await tx.insertMatches(buildMatchRows(tournamentId, bracket));

    const advanced = await transitionTournament(
      tx,
      tournament,
      "knockout_stage",
      {},
      { metadata: { qualifiers: seeded.length, knockoutMatches: bracket.length } },
    );
    await computeRankingsWith(tx, advanced);

    console.log(
      `[Tournament ${tournamentId}] ${seeded.length} qualifiers seeded into ${bracket.length} knockout matches`,
    );
    return snapshot;
  });
}
