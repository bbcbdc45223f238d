import { vi } from "vitest";
import { MemoryTournamentStore } from "../../db/memoryStore.js";
import { JobQueue } from "../jobQueue.js";
import { createTournament, enroll } from "../tournamentService.js";
import type { CreateTournamentInput, EnrollmentInput } from "../tournamentService.js";
import { submitResult } from "../matchService.js";
import { startTournament } from "../tournamentStartService.js";
import type { GenerationResult, Tournament } from "../../@types/tournament.js";
import type { Match } from "../../@types/match.js";

export interface TestDeps {
  store: MemoryTournamentStore;
  queue: JobQueue<GenerationResult>;
  backgroundThreshold: number;
}

export function createTestDeps(backgroundThreshold = 256): TestDeps {
  return {
    store: new MemoryTournamentStore(),
    queue: new JobQueue<GenerationResult>({
      concurrency: 2,
      maxRetries: 2,
      baseDelayMs: 0,
    }),
    backgroundThreshold,
  };
}

export function silenceConsole(): void {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
}

export async function setupTournament(
  deps: TestDeps,
  config: CreateTournamentInput,
  participants: EnrollmentInput,
): Promise<Tournament> {
  const tournament = await createTournament(deps.store, config);
  await enroll(deps.store, tournament.id, participants);
  return tournament;
}

export function findOpenMatch(
  matches: readonly Match[],
  a: string,
  b: string,
): Match | undefined {
  return matches.find(
    (m) =>
      m.status === "scheduled" &&
      ((m.player1Id === a && m.player2Id === b) ||
        (m.player1Id === b && m.player2Id === a)),
  );
}

/** Record `winner` beating `loser`, orienting scores to the match's slots */
export async function playPair(
  deps: TestDeps,
  tournamentId: string,
  winner: string,
  loser: string,
  winnerScore: number,
  loserScore: number,
): Promise<Match> {
  const match = findOpenMatch(
    await deps.store.listMatches(tournamentId),
    winner,
    loser,
  );
  if (!match) throw new Error(`No open match between ${winner} and ${loser}`);
  const winnerFirst = match.player1Id === winner;
  return submitResult(deps.store, match.id, {
    kind: "head_to_head",
    player1Score: winnerFirst ? winnerScore : loserScore,
    player2Score: winnerFirst ? loserScore : winnerScore,
  });
}

export const SCENARIO_A_RESULTS: ReadonlyArray<
  readonly [winner: string, loser: string, winnerScore: number, loserScore: number]
> = [
  ["A", "B", 3, 1],
  ["A", "C", 2, 0],
  ["A", "D", 1, 0],
  ["B", "C", 2, 1],
  ["D", "B", 1, 0],
  ["C", "D", 1, 0],
];

/** Four-player league with every result recorded */
export async function playScenarioA(deps: TestDeps): Promise<Tournament> {
  const tournament = await setupTournament(
    deps,
    { name: "Spring League", format: "head_to_head", headToHeadType: "league" },
    ["A", "B", "C", "D"],
  );
  await startTournament(deps, tournament.id);
  for (const [winner, loser, winnerScore, loserScore] of SCENARIO_A_RESULTS) {
    await playPair(deps, tournament.id, winner, loser, winnerScore, loserScore);
  }
  return tournament;
}
