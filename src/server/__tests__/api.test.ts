import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApiServer } from "../index.js";
import { createTestDeps, silenceConsole } from "../../services/__tests__/fixtures.js";
import type { TestDeps } from "../../services/__tests__/fixtures.js";
import type { Match } from "../../@types/match.js";

interface DataBody<T> {
  data: T;
}

interface ErrorBody {
  error: string;
}

function send(app: ReturnType<typeof createApiServer>, method: string, path: string, body?: unknown) {
  return app.request(path, {
    method,
    headers: { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

async function createLeague(app: ReturnType<typeof createApiServer>, participants: string[]) {
  const created = await send(app, "POST", "/api/tournaments", {
    name: "API League",
    format: "head_to_head",
    headToHeadType: "league",
  });
  const { data }: DataBody<{ id: string; status: string }> = await created.json();
  await send(app, "POST", `/api/tournaments/${data.id}/enroll`, { participants });
  return data.id;
}

describe("tournament API", () => {
  let deps: TestDeps;
  let app: ReturnType<typeof createApiServer>;

  beforeEach(() => {
    silenceConsole();
    deps = createTestDeps();
    app = createApiServer(deps);
  });
  afterEach(() => vi.restoreAllMocks());

  it("answers the health check", async () => {
    const res = await app.request("/api/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  it("creates a tournament in draft", async () => {
    const res = await send(app, "POST", "/api/tournaments", {
      name: "API League",
      format: "head_to_head",
      headToHeadType: "league",
    });

    expect(res.status).toBe(201);
    const body: DataBody<{ status: string; sessionsGenerated: boolean }> = await res.json();
    expect(body.data.status).toBe("draft");
    expect(body.data.sessionsGenerated).toBe(false);
  });

  it("rejects an invalid tournament body with 400", async () => {
    const res = await send(app, "POST", "/api/tournaments", {
      name: "No type",
      format: "head_to_head",
    });

    expect(res.status).toBe(400);
    const body: ErrorBody = await res.json();
    expect(body.error).toBe("headToHeadType: Required for head_to_head tournaments");
  });

  it("returns 404 for unknown tournaments", async () => {
    const res = await app.request("/api/tournaments/missing");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Tournament missing not found" });
  });

  it("starts a tournament once", async () => {
    const id = await createLeague(app, ["a", "b", "c"]);

    const first = await send(app, "POST", `/api/tournaments/${id}/start`);
    const second = await send(app, "POST", `/api/tournaments/${id}/start`);

    expect(first.status).toBe(200);
    const firstBody: DataBody<{ status: string; matches: Match[] }> = await first.json();
    const secondBody: DataBody<{ status: string; matches: Match[] }> = await second.json();
    expect(firstBody.data.status).toBe("generated");
    expect(firstBody.data.matches).toHaveLength(3);
    expect(secondBody.data.status).toBe("already_generated");
    expect(secondBody.data.matches.map((m) => m.id)).toEqual(
      firstBody.data.matches.map((m) => m.id),
    );
  });

  it("answers 202 with a job id for background generation", async () => {
    deps = createTestDeps(2);
    app = createApiServer(deps);
    const id = await createLeague(app, ["a", "b", "c"]);

    const res = await send(app, "POST", `/api/tournaments/${id}/start`);
    expect(res.status).toBe(202);
    const body: DataBody<{ status: string; jobId: string }> = await res.json();
    await deps.queue.onIdle();

    const job = await app.request(`/api/jobs/${body.data.jobId}`);
    const jobBody: DataBody<{ state: string }> = await job.json();
    expect(jobBody.data.state).toBe("succeeded");
  });

  it("rejects starting an under-filled roster with 400", async () => {
    const id = await createLeague(app, ["a"]);

    const res = await send(app, "POST", `/api/tournaments/${id}/start`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "At least 2 participants are required for league, got 1",
    });
  });

  it("records results and maps conflicts to 409", async () => {
    const id = await createLeague(app, ["a", "b"]);
    await send(app, "POST", `/api/tournaments/${id}/start`);
    const matchesRes = await app.request(`/api/tournaments/${id}/matches`);
    const { data: matches }: DataBody<Match[]> = await matchesRes.json();
    const matchId = matches[0]?.id ?? "";

    const recorded = await send(app, "POST", `/api/matches/${matchId}/result`, {
      kind: "head_to_head",
      player1Score: 2,
      player2Score: 0,
    });
    const conflicting = await send(app, "POST", `/api/matches/${matchId}/result`, {
      kind: "head_to_head",
      player1Score: 0,
      player2Score: 2,
    });

    expect(recorded.status).toBe(200);
    expect(conflicting.status).toBe(409);
    expect(await conflicting.json()).toEqual({
      error: "Match already has a different result",
    });
  });

  it("validates result payloads", async () => {
    const res = await send(app, "POST", "/api/matches/any/result", { kind: "penalties" });
    expect(res.status).toBe(400);
  });

  it("refuses to distribute rewards before completion", async () => {
    const id = await createLeague(app, ["a", "b"]);

    const res = await send(app, "POST", `/api/tournaments/${id}/rewards/distribute`, {
      config: { skillMappings: [{ skill: "speed", enabled: true }] },
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Rewards require a completed tournament (is draft)",
    });
  });

  it("runs a tournament through to rewards", async () => {
    const id = await createLeague(app, ["a", "b"]);
    await send(app, "POST", `/api/tournaments/${id}/start`);
    const { data: matches }: DataBody<Match[]> = await (
      await app.request(`/api/tournaments/${id}/matches`)
    ).json();
    const [only] = matches;
    if (!only) throw new Error("no match generated");
    await send(app, "POST", `/api/matches/${only.id}/result`, {
      kind: "head_to_head",
      player1Score: 1,
      player2Score: 0,
    });

    const completed = await send(app, "POST", `/api/tournaments/${id}/complete`);
    expect(completed.status).toBe(200);

    const distributed = await send(app, "POST", `/api/tournaments/${id}/rewards/distribute`, {
      config: { skillMappings: [{ skill: "speed", enabled: true }], firstPlace: { credits: 50 } },
    });
    const summary: DataBody<{ status: string; totals: { participants: number; credits: number } }> =
      await distributed.json();
    expect(summary.data.status).toBe("distributed");
    expect(summary.data.totals).toMatchObject({ participants: 2, credits: 50 });

    const ledger: DataBody<unknown[]> = await (
      await app.request(`/api/tournaments/${id}/rewards/ledger`)
    ).json();
    // winner: credit, xp, bonus xp, skill; runner-up: xp, bonus xp, skill
    expect(ledger.data).toHaveLength(7);

    const history: DataBody<{ oldStatus: string | null; newStatus: string }[]> = await (
      await app.request(`/api/tournaments/${id}/status-history`)
    ).json();
    expect(history.data.map((h) => h.newStatus)).toEqual([
      "draft",
      "active",
      "results_complete",
      "completed",
      "rewards_distributed",
    ]);
  });

  it("previews sessions without starting", async () => {
    const id = await createLeague(app, ["a", "b", "c", "d"]);

    const res = await app.request(`/api/tournaments/${id}/preview-sessions`);

    expect(res.status).toBe(200);
    const body: DataBody<{ totalMatches: number; totalRounds: number }> = await res.json();
    expect(body.data).toMatchObject({ totalMatches: 6, totalRounds: 3 });
    const tournament: DataBody<{ status: string }> = await (
      await app.request(`/api/tournaments/${id}`)
    ).json();
    expect(tournament.data.status).toBe("draft");
  });

  it("cancels with a reason", async () => {
    const id = await createLeague(app, ["a", "b"]);

    const res = await send(app, "POST", `/api/tournaments/${id}/cancel`, {
      reason: "Coach unavailable",
    });
    expect(res.status).toBe(200);

    const history: DataBody<{ newStatus: string; reason: string | null }[]> = await (
      await app.request(`/api/tournaments/${id}/status-history`)
    ).json();
    expect(history.data.at(-1)).toEqual(
      expect.objectContaining({ newStatus: "cancelled", reason: "Coach unavailable" }),
    );
  });

  it("returns 404 for the history of an unknown tournament", async () => {
    const res = await app.request("/api/tournaments/missing/status-history");
    expect(res.status).toBe(404);
  });
});
