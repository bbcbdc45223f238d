import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  cancelTournament,
  completeTournament,
  createTournament,
  enroll,
  getParticipants,
} from "../tournamentService.js";
import {
  assertTransition,
  canTransition,
  getStatusHistory,
  isTerminal,
  transitionTournament,
} from "../tournamentStateMachine.js";
import { startTournament } from "../tournamentStartService.js";
import { submitResult } from "../matchService.js";
import { ConflictError, NotFoundError, ValidationError } from "../../errors.js";
import {
  createTestDeps,
  playScenarioA,
  setupTournament,
  silenceConsole,
} from "./fixtures.js";

const LEAGUE = { name: "League", format: "head_to_head", headToHeadType: "league" } as const;

describe("tournament state machine", () => {
  it("allows only the documented transitions", () => {
    expect(canTransition("draft", "active")).toBe(true);
    expect(canTransition("active", "group_stage")).toBe(true);
    expect(canTransition("completed", "rewards_distributed")).toBe(true);
    expect(canTransition("completed", "cancelled")).toBe(true);
    expect(canTransition("active", "completed")).toBe(false);
    expect(canTransition("draft", "results_complete")).toBe(false);
    expect(canTransition("cancelled", "active")).toBe(false);
  });

  it("treats cancelled and rewards_distributed as terminal", () => {
    expect(isTerminal("cancelled")).toBe(true);
    expect(isTerminal("rewards_distributed")).toBe(true);
    expect(isTerminal("completed")).toBe(false);
  });

  it("names both ends of a refused transition", () => {
    expect(() => assertTransition({ id: "t1", status: "draft" }, "completed")).toThrow(
      "Tournament cannot move from draft to completed",
    );
  });
});

describe("transitionTournament", () => {
  beforeEach(() => silenceConsole());
  afterEach(() => vi.restoreAllMocks());

  it("raises a conflict when the status changed underneath", async () => {
    const { store } = createTestDeps();
    const tournament = await createTournament(store, LEAGUE);
    await store.updateTournament(tournament.id, { status: "cancelled" }, ["draft"]);

    await expect(transitionTournament(store, tournament, "active")).rejects.toThrow(
      ConflictError,
    );
  });
});

describe("createTournament", () => {
  beforeEach(() => silenceConsole());
  afterEach(() => vi.restoreAllMocks());

  it("defaults the ranking direction from the metric", async () => {
    const { store } = createTestDeps();
    const timed = await createTournament(store, {
      name: "Sprint",
      format: "individual_ranking",
      metricKind: "time",
    });
    const scored = await createTournament(store, {
      name: "Long Jump",
      format: "individual_ranking",
      metricKind: "distance",
    });

    expect(timed.rankingDirection).toBe("asc");
    expect(scored.rankingDirection).toBe("desc");
    expect(timed.status).toBe("draft");
  });

  it("rejects a direction that contradicts the metric", async () => {
    const { store } = createTestDeps();
    await expect(
      createTournament(store, {
        name: "Sprint",
        format: "individual_ranking",
        metricKind: "time",
        rankingDirection: "desc",
      }),
    ).rejects.toThrow("rankingDirection: time is ranked asc");
  });

  it("rejects scoring metadata on head-to-head tournaments", async () => {
    const { store } = createTestDeps();
    await expect(
      createTournament(store, { ...LEAGUE, metricKind: "score" }),
    ).rejects.toThrow(ValidationError);
  });
});

describe("enroll", () => {
  beforeEach(() => silenceConsole());
  afterEach(() => vi.restoreAllMocks());

  it("ignores participants who are already enrolled", async () => {
    const deps = createTestDeps();
    const tournament = await setupTournament(deps, LEAGUE, ["a", "b"]);

    const result = await enroll(deps.store, tournament.id, [
      "b",
      { participantId: "c", seed: 1 },
    ]);

    expect(result).toEqual({ enrolled: 1, total: 3 });
    const participants = await getParticipants(deps.store, tournament.id);
    expect(participants.map((p) => [p.participantId, p.seed])).toEqual([
      ["a", null],
      ["b", null],
      ["c", 1],
    ]);
  });

  it("enforces the capacity", async () => {
    const deps = createTestDeps();
    const tournament = await createTournament(deps.store, { ...LEAGUE, maxParticipants: 2 });

    await expect(enroll(deps.store, tournament.id, ["a", "b", "c"])).rejects.toThrow(
      "Enrollment exceeds capacity of 2",
    );
    expect(await getParticipants(deps.store, tournament.id)).toEqual([]);
  });

  it("closes once the tournament starts", async () => {
    const deps = createTestDeps();
    const tournament = await setupTournament(deps, LEAGUE, ["a", "b"]);
    await startTournament(deps, tournament.id);

    await expect(enroll(deps.store, tournament.id, ["c"])).rejects.toThrow(
      "Enrollment is closed once a tournament starts",
    );
  });
});

describe("completeTournament", () => {
  beforeEach(() => silenceConsole());
  afterEach(() => vi.restoreAllMocks());

  it("refuses while matches are open", async () => {
    const deps = createTestDeps();
    const tournament = await setupTournament(deps, LEAGUE, ["a", "b", "c"]);
    await startTournament(deps, tournament.id);

    await expect(completeTournament(deps.store, tournament.id)).rejects.toThrow(
      "3 matches are still open",
    );
  });

  it("records final placements on the enrollments", async () => {
    const deps = createTestDeps();
    const tournament = await playScenarioA(deps);

    const completed = await completeTournament(deps.store, tournament.id);

    expect(completed.status).toBe("completed");
    expect(completed.completedAt).toBeInstanceOf(Date);
    const placements = (await getParticipants(deps.store, tournament.id)).map((p) => [
      p.participantId,
      p.placement,
    ]);
    expect(placements).toEqual([
      ["A", 1],
      ["B", 3],
      ["C", 4],
      ["D", 2],
    ]);
  });

  it("returns a completed tournament unchanged", async () => {
    const deps = createTestDeps();
    const tournament = await playScenarioA(deps);
    const first = await completeTournament(deps.store, tournament.id);

    expect(await completeTournament(deps.store, tournament.id)).toEqual(first);
  });
});

describe("cancelTournament", () => {
  beforeEach(() => silenceConsole());
  afterEach(() => vi.restoreAllMocks());

  it("voids open matches and keeps played ones", async () => {
    const deps = createTestDeps();
    const tournament = await setupTournament(deps, LEAGUE, ["a", "b", "c"]);
    await startTournament(deps, tournament.id);
    const [played] = await deps.store.listMatches(tournament.id);
    if (!played) throw new Error("league has no matches");
    await submitResult(deps.store, played.id, {
      kind: "head_to_head",
      player1Score: 1,
      player2Score: 0,
    });

    const cancelled = await cancelTournament(deps.store, tournament.id);

    expect(cancelled.status).toBe("cancelled");
    expect(cancelled.cancelledAt).toBeInstanceOf(Date);
    const statuses = (await deps.store.listMatches(tournament.id)).map((m) => m.status);
    expect(statuses.filter((s) => s === "completed")).toHaveLength(1);
    expect(statuses.filter((s) => s === "void")).toHaveLength(2);
  });

  it("records the cancellation reason", async () => {
    const deps = createTestDeps();
    const tournament = await setupTournament(deps, LEAGUE, ["a", "b", "c"]);
    await startTournament(deps, tournament.id);

    await cancelTournament(deps.store, tournament.id, "Venue unavailable");

    const history = await getStatusHistory(deps.store, tournament.id);
    expect(history.at(-1)).toMatchObject({
      oldStatus: "active",
      newStatus: "cancelled",
      reason: "Venue unavailable",
      metadata: { voidedMatches: 3 },
    });
  });

  it("is a no-op on a cancelled tournament", async () => {
    const deps = createTestDeps();
    const tournament = await createTournament(deps.store, LEAGUE);
    const first = await cancelTournament(deps.store, tournament.id);

    expect(await cancelTournament(deps.store, tournament.id)).toEqual(first);
  });

  it("refuses once rewards are distributed", async () => {
    const deps = createTestDeps();
    const tournament = await createTournament(deps.store, LEAGUE);
    await deps.store.updateTournament(tournament.id, { status: "rewards_distributed" }, [
      "draft",
    ]);

    await expect(cancelTournament(deps.store, tournament.id)).rejects.toThrow(
      "Tournament is already rewards_distributed and cannot be cancelled",
    );
  });
});

describe("getStatusHistory", () => {
  beforeEach(() => silenceConsole());
  afterEach(() => vi.restoreAllMocks());

  it("records every transition of a full run in order", async () => {
    const deps = createTestDeps();
    const tournament = await playScenarioA(deps);
    await completeTournament(deps.store, tournament.id);

    const history = await getStatusHistory(deps.store, tournament.id);

    expect(history.map((h) => [h.oldStatus, h.newStatus])).toEqual([
      [null, "draft"],
      ["draft", "active"],
      ["active", "results_complete"],
      ["results_complete", "completed"],
    ]);
    expect(history[1]?.metadata).toEqual({ participants: 4 });
    expect(history[2]?.reason).toBe("All matches completed");
    expect(history[3]?.metadata).toEqual({ rankedParticipants: 4 });
    expect(history.every((h) => h.tournamentId === tournament.id)).toBe(true);
  });

  it("adds nothing when a transition loses its race", async () => {
    const deps = createTestDeps();
    const tournament = await createTournament(deps.store, LEAGUE);
    await deps.store.updateTournament(tournament.id, { status: "cancelled" }, ["draft"]);

    await expect(
      deps.store.transaction((tx) => transitionTournament(tx, tournament, "active")),
    ).rejects.toThrow(ConflictError);
    expect(await getStatusHistory(deps.store, tournament.id)).toHaveLength(1);
  });

  it("rejects an unknown tournament", async () => {
    const deps = createTestDeps();
    await expect(getStatusHistory(deps.store, "missing")).rejects.toThrow(NotFoundError);
  });
});
