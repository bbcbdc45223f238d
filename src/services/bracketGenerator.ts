import type { Tournament } from "../@types/tournament.js";
import type { BracketType, MatchSlot, MatchStage } from "../@types/match.js";
import type { Rng } from "../utils/random.js";
import { ValidationError } from "../errors.js";
import { compareIds } from "../utils/compare.js";

export interface BracketMatch {
  stage: MatchStage;
  groupLabel: string | null;
  round: number;
  position: number;
  player1Id: string | null;
  player2Id: string | null;
  bracketType: BracketType | null;
  nextMatchPosition?: number; // Position of next match (resolved to an id on insert)
  nextMatchSlot?: MatchSlot;
  loserNextMatchPosition?: number; // Third-place match for semifinal losers
  loserNextMatchSlot?: MatchSlot;
}

export interface Entrant {
  participantId: string;
  seed: number | null;
}

export interface KnockoutOptions {
  stage: MatchStage;
  thirdPlaceMatch: boolean;
}

export type BracketFormat = "league" | "knockout" | "group_knockout" | "individual";

export const MIN_PARTICIPANTS: Record<BracketFormat, number> = {
  league: 2,
  knockout: 2,
  group_knockout: 3,
  individual: 1,
};

export const GROUP_LABELS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";

/**
 * Get nearest power of 2 >= n
 */
export function getNextPowerOfTwo(n: number): number {
  let power = 1;
  while (power < n) {
    power *= 2;
  }
  return power;
}

/**
 * Calculate number of rounds needed for single elimination
 */
export function calculateRounds(bracketSize: number): number {
  return Math.log2(bracketSize);
}

/**
 * Fisher-Yates with an injected generator
 */
export function shuffleArray<T>(array: readonly T[], rng: Rng): T[] {
  const shuffled = [...array];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const a = shuffled[i];
    const b = shuffled[j];
    if (a === undefined || b === undefined) continue;
    shuffled[i] = b;
    shuffled[j] = a;
  }
  return shuffled;
}

/**
 * Generate standard seed positions for bracket
 * Seeds are placed so high seeds meet low seeds as late as possible
 * E.g., for 8 players: [1,8,4,5,2,7,3,6]
 */
export function generateSeedPositions(bracketSize: number): number[] {
  if (bracketSize <= 2) {
    return [1, 2];
  }

  const halfSize = bracketSize / 2;
  const topHalf = generateSeedPositions(halfSize);

  const result: number[] = [];
  for (const seed of topHalf) {
    result.push(seed);
    result.push(bracketSize + 1 - seed);
  }

  return result;
}

/**
 * Seeded entrants first (ascending seed), then the rest in shuffled order.
 * Returns participant ids where index 0 is seed 1.
 */
export function orderBySeed(entrants: readonly Entrant[], rng: Rng): string[] {
  const seeded = entrants
    .filter((e) => e.seed !== null)
    .sort(
      (a, b) =>
        (a.seed ?? 0) - (b.seed ?? 0) ||
        compareIds(a.participantId, b.participantId),
    );
  const unseeded = [...entrants.filter((e) => e.seed === null)].sort((a, b) =>
    compareIds(a.participantId, b.participantId),
  );
  return [
    ...seeded.map((e) => e.participantId),
    ...shuffleArray(unseeded, rng).map((e) => e.participantId),
  ];
}

/**
 * Single elimination over participants ordered by seed (index 0 = seed 1).
 *
 * Byes go to the top seeds. A first-round pairing with a bye is not emitted:
 * the seeded player is placed straight into round 2, so the bracket holds
 * exactly n - 1 matches (plus the third-place match when requested).
 */
export function generateSingleEliminationBracket(
  seededIds: readonly string[],
  options: KnockoutOptions = { stage: "knockout", thirdPlaceMatch: false },
): BracketMatch[] {
  const bracketSize = getNextPowerOfTwo(Math.max(seededIds.length, 2));
  const totalRounds = calculateRounds(bracketSize);
  const seedPositions = generateSeedPositions(bracketSize);

  const allSlots = seedPositions.map((seed) =>
    seed <= seededIds.length ? (seededIds[seed - 1] ?? null) : null,
  );

  const matches: BracketMatch[] = [];
  let roundStart = 1;
  let matchesInRound = bracketSize / 2;

  for (let round = 1; round <= totalRounds; round++) {
    const nextRoundStart = roundStart + matchesInRound;
    for (let i = 0; i < matchesInRound; i++) {
      const match: BracketMatch = {
        stage: options.stage,
        groupLabel: null,
        round,
        position: roundStart + i,
        player1Id: round === 1 ? (allSlots[i * 2] ?? null) : null,
        player2Id: round === 1 ? (allSlots[i * 2 + 1] ?? null) : null,
        bracketType: "winners",
      };
      if (round < totalRounds) {
        match.nextMatchPosition = nextRoundStart + Math.floor(i / 2);
        match.nextMatchSlot = i % 2 === 0 ? "player1" : "player2";
      }
      matches.push(match);
    }
    roundStart = nextRoundStart;
    matchesInRound /= 2;
  }

  if (options.thirdPlaceMatch && seededIds.length >= 4) {
    const thirdPlacePosition = roundStart;
    matches
      .filter((m) => m.round === totalRounds - 1)
      .forEach((semifinal, i) => {
        semifinal.loserNextMatchPosition = thirdPlacePosition;
        semifinal.loserNextMatchSlot = i === 0 ? "player1" : "player2";
      });
    matches.push({
      stage: options.stage,
      groupLabel: null,
      round: totalRounds,
      position: thirdPlacePosition,
      player1Id: null,
      player2Id: null,
      bracketType: "third_place",
    });
  }

  // Resolve byes: advance the lone player and drop the empty pairing
  const byeMatches = new Set<BracketMatch>();
  for (const match of matches) {
    if (match.round !== 1) continue;
    const lone =
      match.player1Id && !match.player2Id
        ? match.player1Id
        : !match.player1Id && match.player2Id
          ? match.player2Id
          : null;
    if (lone === null) continue;
    advanceToNextMatch(matches, match, lone);
    byeMatches.add(match);
  }

  return matches.filter((m) => !byeMatches.has(m));
}

/**
 * Helper to advance player to next match
 */
function advanceToNextMatch(
  matches: BracketMatch[],
  currentMatch: BracketMatch,
  playerId: string,
): void {
  if (currentMatch.nextMatchPosition === undefined) return;

  const nextMatch = matches.find(
    (m) => m.position === currentMatch.nextMatchPosition,
  );
  if (!nextMatch) return;

  if (currentMatch.nextMatchSlot === "player1") {
    nextMatch.player1Id = playerId;
  } else {
    nextMatch.player2Id = playerId;
  }
}

/**
 * Round robin (all vs all) via the circle method. Odd counts get a phantom
 * opponent whose pairings are skipped, so every pair still meets exactly once.
 */
export function generateRoundRobinMatches(
  participantIds: readonly string[],
  options: { stage: MatchStage; groupLabel: string | null; positionOffset: number } = {
    stage: "single",
    groupLabel: null,
    positionOffset: 0,
  },
): BracketMatch[] {
  const matches: BracketMatch[] = [];
  const players: (string | null)[] = [...participantIds];
  if (players.length % 2 === 1) {
    players.push(null);
  }

  const totalPlayers = players.length;
  const rounds = totalPlayers - 1;
  const matchesPerRound = totalPlayers / 2;

  let matchPosition = options.positionOffset + 1;

  for (let round = 1; round <= rounds; round++) {
    for (let i = 0; i < matchesPerRound; i++) {
      const home = players[i];
      const away = players[totalPlayers - 1 - i];

      if (!home || !away) {
        continue;
      }

      matches.push({
        stage: options.stage,
        groupLabel: options.groupLabel,
        round,
        position: matchPosition++,
        player1Id: home,
        player2Id: away,
        bracketType: null,
      });
    }

    // Rotate players (keep first player fixed)
    const lastPlayer = players.pop();
    if (lastPlayer !== undefined) players.splice(1, 0, lastPlayer);
  }

  return matches;
}

/**
 * Deal participants into groups one at a time so sizes differ by at most one.
 * 7 players over 2 groups → [4, 3].
 */
export function splitIntoGroups(
  participantIds: readonly string[],
  groupCount: number,
): string[][] {
  const groups: string[][] = Array.from({ length: groupCount }, () => []);
  participantIds.forEach((id, index) => {
    groups[index % groupCount]?.push(id);
  });
  return groups;
}

export function defaultGroupCount(participantCount: number): number {
  return Math.max(1, Math.ceil(participantCount / 4));
}

export function groupLabel(index: number): string {
  return GROUP_LABELS[index] ?? `G${index + 1}`;
}

/**
 * Group stage of a group + knockout tournament. Knockout matches are created
 * later from the qualifier snapshot.
 */
export function generateGroupStage(
  participantIds: readonly string[],
  groupCount: number,
): BracketMatch[] {
  const matches: BracketMatch[] = [];
  splitIntoGroups(participantIds, groupCount).forEach((members, index) => {
    matches.push(
      ...generateRoundRobinMatches(members, {
        stage: "group",
        groupLabel: groupLabel(index),
        positionOffset: matches.length,
      }),
    );
  });
  return matches;
}

/**
 * One entry per participant per round; each round is scored independently.
 */
export function generateIndividualRounds(
  participantIds: readonly string[],
  roundCount: number,
): BracketMatch[] {
  const matches: BracketMatch[] = [];
  for (let round = 1; round <= roundCount; round++) {
    participantIds.forEach((participantId, i) => {
      matches.push({
        stage: "single",
        groupLabel: null,
        round,
        position: (round - 1) * participantIds.length + i + 1,
        player1Id: participantId,
        player2Id: null,
        bracketType: null,
      });
    });
  }
  return matches;
}

export function bracketFormatOf(tournament: Tournament): BracketFormat {
  if (tournament.format === "individual_ranking") return "individual";
  if (!tournament.headToHeadType) {
    throw new ValidationError("Head-to-head tournament has no sub-type", {
      tournamentId: tournament.id,
    });
  }
  return tournament.headToHeadType;
}

/**
 * Check that the roster can produce a bracket for this tournament.
 */
export function validateRoster(
  tournament: Tournament,
  participantCount: number,
): void {
  const format = bracketFormatOf(tournament);
  const minimum = MIN_PARTICIPANTS[format];
  if (participantCount < minimum) {
    throw new ValidationError(
      `At least ${minimum} participants are required for ${format}, got ${participantCount}`,
      { tournamentId: tournament.id, participantCount },
    );
  }
  if (participantCount > tournament.maxParticipants) {
    throw new ValidationError(
      `Enrollment exceeds capacity of ${tournament.maxParticipants}`,
      { tournamentId: tournament.id, participantCount },
    );
  }

  if (format === "group_knockout") {
    const groupCount = tournament.groupCount ?? defaultGroupCount(participantCount);
    const smallestGroup = Math.floor(participantCount / groupCount);
    if (smallestGroup < 2) {
      throw new ValidationError(
        `${groupCount} groups leave a group with fewer than 2 participants`,
        { tournamentId: tournament.id, participantCount, groupCount },
      );
    }
    if (tournament.qualifiersPerGroup > smallestGroup) {
      throw new ValidationError(
        `Cannot qualify ${tournament.qualifiersPerGroup} per group from groups of ${smallestGroup}`,
        { tournamentId: tournament.id, participantCount, groupCount },
      );
    }
    if (tournament.qualifiersPerGroup * groupCount < 2) {
      throw new ValidationError("The knockout stage needs at least 2 qualifiers", {
        tournamentId: tournament.id,
      });
    }
  }
}

/**
 * Main bracket generation function: matches for the current stage only.
 */
export function generateBracket(
  tournament: Tournament,
  entrants: readonly Entrant[],
  rng: Rng,
): BracketMatch[] {
  validateRoster(tournament, entrants.length);
  const ordered = orderBySeed(entrants, rng);

  switch (bracketFormatOf(tournament)) {
    case "league":
      return generateRoundRobinMatches(ordered);
    case "knockout":
      return generateSingleEliminationBracket(ordered, {
        stage: "single",
        thirdPlaceMatch: tournament.thirdPlaceMatch,
      });
    case "group_knockout":
      return generateGroupStage(
        ordered,
        tournament.groupCount ?? defaultGroupCount(ordered.length),
      );
    case "individual":
      return generateIndividualRounds(ordered, tournament.roundCount);
  }
}

/**
 * Get bracket statistics
 */
export function getBracketStats(
  format: BracketFormat,
  participantsCount: number,
  options: { roundCount?: number; groupCount?: number; thirdPlaceMatch?: boolean } = {},
): { totalMatches: number; totalRounds: number } {
  const n = participantsCount;
  switch (format) {
    case "knockout":
      return {
        totalMatches: n - 1 + (options.thirdPlaceMatch && n >= 4 ? 1 : 0),
        totalRounds: calculateRounds(getNextPowerOfTwo(Math.max(n, 2))),
      };
    case "league":
      return {
        totalMatches: (n * (n - 1)) / 2,
        totalRounds: n % 2 === 0 ? n - 1 : n,
      };
    case "group_knockout": {
      const groups = splitIntoGroups(
        Array.from({ length: n }, (_, i) => String(i)),
        options.groupCount ?? defaultGroupCount(n),
      );
      return {
        totalMatches: groups.reduce(
          (sum, g) => sum + (g.length * (g.length - 1)) / 2,
          0,
        ),
        totalRounds: Math.max(
          ...groups.map((g) => (g.length % 2 === 0 ? g.length - 1 : g.length)),
        ),
      };
    }
    case "individual": {
      const rounds = options.roundCount ?? 1;
      return { totalMatches: n * rounds, totalRounds: rounds };
    }
  }
}
