import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  computeRankings,
  getRankings,
  rankHeadToHead,
  rankIndividual,
} from "../rankingService.js";
import { submitResult } from "../matchService.js";
import { startTournament } from "../tournamentStartService.js";
import { NotFoundError, ValidationError } from "../../errors.js";
import {
  createTestDeps,
  playPair,
  playScenarioA,
  setupTournament,
  silenceConsole,
} from "./fixtures.js";
import type { TestDeps } from "./fixtures.js";

async function recordRound(
  deps: TestDeps,
  tournamentId: string,
  participantId: string,
  round: number,
  value: number,
) {
  const entry = (await deps.store.listMatches(tournamentId)).find(
    (m) => m.player1Id === participantId && m.round === round,
  );
  if (!entry) throw new Error(`No round ${round} entry for ${participantId}`);
  return submitResult(deps.store, entry.id, { kind: "individual", value });
}

async function timeTrial(deps: TestDeps, aggregation: "sum" | "best") {
  const tournament = await setupTournament(
    deps,
    {
      name: "Sprint Trial",
      format: "individual_ranking",
      metricKind: "time",
      roundCount: 2,
      aggregation,
      measurementUnit: "s",
    },
    ["p1", "p2", "p3", "p4"],
  );
  await startTournament(deps, tournament.id);
  const times: Array<[string, number, number]> = [
    ["p1", 10, 12],
    ["p2", 11, 11],
    ["p3", 9, 15],
  ];
  for (const [participantId, first, second] of times) {
    await recordRound(deps, tournament.id, participantId, 1, first);
    await recordRound(deps, tournament.id, participantId, 2, second);
  }
  return tournament;
}

describe("head-to-head rankings", () => {
  beforeEach(() => silenceConsole());
  afterEach(() => vi.restoreAllMocks());

  it("orders a league by points, goal difference and goals for", async () => {
    const deps = createTestDeps();
    const tournament = await playScenarioA(deps);

    const rankings = await getRankings(deps.store, tournament.id);

    expect(rankings.map((r) => [r.participantId, r.rank, r.points])).toEqual([
      ["A", 1, 9],
      ["D", 2, 3],
      ["B", 3, 3],
      ["C", 4, 3],
    ]);
    expect(rankings[2]).toMatchObject({
      wins: 1,
      losses: 2,
      goalsFor: 3,
      goalsAgainst: 5,
      matchesPlayed: 3,
    });
  });

  it("gives the same ranks on every recomputation", async () => {
    const deps = createTestDeps();
    const tournament = await playScenarioA(deps);

    const first = await computeRankings(deps.store, tournament.id);
    const second = await computeRankings(deps.store, tournament.id);

    expect(second.map((r) => [r.participantId, r.rank])).toEqual(
      first.map((r) => [r.participantId, r.rank]),
    );
  });

  it("moves a fully played league to results_complete", async () => {
    const deps = createTestDeps();
    const tournament = await playScenarioA(deps);

    expect((await deps.store.getTournament(tournament.id))?.status).toBe(
      "results_complete",
    );
  });

  it("ranks a knockout by bracket progress", async () => {
    const deps = createTestDeps();
    const tournament = await setupTournament(
      deps,
      {
        name: "Cup",
        format: "head_to_head",
        headToHeadType: "knockout",
        thirdPlaceMatch: true,
      },
      [
        { participantId: "a", seed: 1 },
        { participantId: "b", seed: 2 },
        { participantId: "c", seed: 3 },
        { participantId: "d", seed: 4 },
      ],
    );
    await startTournament(deps, tournament.id);

    await playPair(deps, tournament.id, "a", "d", 2, 0);
    await playPair(deps, tournament.id, "c", "b", 2, 1);
    await playPair(deps, tournament.id, "c", "a", 3, 2);
    await playPair(deps, tournament.id, "d", "b", 1, 0);

    const rankings = await getRankings(deps.store, tournament.id);
    expect(rankings.map((r) => r.participantId)).toEqual(["c", "a", "d", "b"]);
    expect((await deps.store.getTournament(tournament.id))?.status).toBe(
      "results_complete",
    );
  });

  it("refuses to rank a draft tournament", async () => {
    const deps = createTestDeps();
    const tournament = await setupTournament(
      deps,
      { name: "Draft", format: "head_to_head", headToHeadType: "league" },
      ["a", "b"],
    );

    await expect(computeRankings(deps.store, tournament.id)).rejects.toThrow(
      ValidationError,
    );
  });

  it("reports unknown tournaments", async () => {
    const deps = createTestDeps();
    await expect(getRankings(deps.store, "missing")).rejects.toThrow(NotFoundError);
  });
});

describe("individual rankings", () => {
  beforeEach(() => silenceConsole());
  afterEach(() => vi.restoreAllMocks());

  it("sums rounds and breaks ties by participant id", async () => {
    const deps = createTestDeps();
    const tournament = await timeTrial(deps, "sum");

    const rankings = await getRankings(deps.store, tournament.id);

    expect(rankings.map((r) => [r.participantId, r.rank, r.metricValue])).toEqual([
      ["p1", 1, 22],
      ["p2", 2, 22],
      ["p3", 3, 24],
      ["p4", 4, null],
    ]);
  });

  it("takes the best round when configured", async () => {
    const deps = createTestDeps();
    const tournament = await timeTrial(deps, "best");

    const rankings = await getRankings(deps.store, tournament.id);

    expect(rankings.map((r) => [r.participantId, r.metricValue])).toEqual([
      ["p3", 9],
      ["p1", 10],
      ["p2", 11],
      ["p4", null],
    ]);
  });
});

describe("participant id tie-break", () => {
  it("orders tied head-to-head standings by code unit", () => {
    const ranked = rankHeadToHead(["b", "a", "B", "A", "a10", "a2"], []);
    expect(ranked.map((r) => r.participantId)).toEqual(["A", "B", "a", "a10", "a2", "b"]);
    expect(ranked.map((r) => r.rank)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("orders participants without results by code unit", () => {
    const ranked = rankIndividual(["e", "É", "Z"], [], {
      direction: "desc",
      aggregation: "sum",
    });
    expect(ranked.map((r) => r.participantId)).toEqual(["Z", "e", "É"]);
  });
});
