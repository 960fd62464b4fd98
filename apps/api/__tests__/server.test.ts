import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FastifyInstance, InjectOptions } from "fastify";
import { createServer } from "../src/server.js";

let app: FastifyInstance;

beforeEach(async () => {
  app = await createServer({ logLevel: "silent" });
});

afterEach(async () => {
  await app.close();
});

async function startNegotiation(body: InjectOptions["payload"]) {
  return app.inject({ method: "POST", url: "/negotiations", payload: body });
}

describe("GET /health", () => {
  it("reports ok", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok" });
  });
});

describe("POST /negotiations", () => {
  it("starts a negotiation in the opening phase", async () => {
    const res = await startNegotiation({ participants: ["alice", "bob"], max_rounds: 6 });
    expect(res.statusCode).toBe(201);
    const body = res.json();
    expect(typeof body.negotiation_id).toBe("string");
    expect(body.state).toMatchObject({
      negotiation_id: body.negotiation_id,
      participants: ["alice", "bob"],
      phase: "opening",
      round: 0,
      max_rounds: 6,
      history: [],
      agreement: null,
    });
  });

  it("rejects a single participant", async () => {
    const res = await startNegotiation({ participants: ["alice"] });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("Invalid request body");
  });

  it("rejects duplicate participants as a state conflict", async () => {
    const res = await startNegotiation({ participants: ["alice", "alice"] });
    expect(res.statusCode).toBe(409);
    expect(res.json().code).toBe("INVALID_PARTICIPANT");
  });
});

describe("POST /negotiations/:id/step", () => {
  it("runs rounds until an agreement", async () => {
    const { negotiation_id } = (await startNegotiation({ participants: ["alice", "bob"] })).json();

    const first = await app.inject({
      method: "POST",
      url: `/negotiations/${negotiation_id}/step`,
      payload: {
        action: { type: "offer", participant: "alice", recipient: "bob", terms: { price: 500 } },
      },
    });
    expect(first.statusCode).toBe(200);
    expect(first.json().result).toMatchObject({ round: 1, phase: "bargaining", concluded: false });

    const second = await app.inject({
      method: "POST",
      url: `/negotiations/${negotiation_id}/step`,
      payload: { action: { type: "accept", participant: "bob" } },
    });
    expect(second.json().result).toMatchObject({ round: 2, phase: "concluded", concluded: true });
    expect(second.json().state.agreement).toEqual({
      parties: ["alice", "bob"],
      terms: { price: 500 },
      round: 2,
    });
  });

  it("passes the round when no action is given", async () => {
    const { negotiation_id } = (await startNegotiation({ participants: ["alice", "bob"] })).json();
    const res = await app.inject({ method: "POST", url: `/negotiations/${negotiation_id}/step` });
    expect(res.statusCode).toBe(200);
    expect(res.json().result).toMatchObject({ round: 1, phase: "opening", action: null });
  });

  it("returns 409 when accepting without a pending offer", async () => {
    const { negotiation_id } = (await startNegotiation({ participants: ["alice", "bob"] })).json();
    const res = await app.inject({
      method: "POST",
      url: `/negotiations/${negotiation_id}/step`,
      payload: { action: { type: "accept", participant: "bob" } },
    });
    expect(res.statusCode).toBe(409);
    expect(res.json().code).toBe("NO_PENDING_OFFER");

    const snapshot = await app.inject({ method: "GET", url: `/negotiations/${negotiation_id}` });
    expect(snapshot.json().state.round).toBe(0);
  });

  it("rejects a malformed action", async () => {
    const { negotiation_id } = (await startNegotiation({ participants: ["alice", "bob"] })).json();
    const res = await app.inject({
      method: "POST",
      url: `/negotiations/${negotiation_id}/step`,
      payload: { action: { type: "bargain", participant: "bob" } },
    });
    expect(res.statusCode).toBe(400);
  });

  it("returns 404 for an unknown negotiation", async () => {
    const res = await app.inject({ method: "POST", url: "/negotiations/missing/step", payload: {} });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "Negotiation not found", negotiation_id: "missing" });
  });
});

describe("GET /negotiations/:id", () => {
  it("returns state and history", async () => {
    const { negotiation_id } = (await startNegotiation({ participants: ["alice", "bob"] })).json();
    await app.inject({
      method: "POST",
      url: `/negotiations/${negotiation_id}/step`,
      payload: {
        action: { type: "offer", participant: "alice", recipient: "bob", terms: { price: 500 } },
      },
    });

    const res = await app.inject({ method: "GET", url: `/negotiations/${negotiation_id}` });
    expect(res.statusCode).toBe(200);
    expect(res.json().history).toEqual([
      {
        kind: "offer",
        offer: { offerer: "alice", recipient: "bob", terms: { price: 500 }, offer_type: "initial", round: 1 },
      },
    ]);
  });
});

describe("POST /strategies/evolve", () => {
  const body = {
    style: "cooperative",
    reservation: 100,
    target: 200,
    counterpart: { style: "cooperative", opening: 80, limit: 160 },
    max_generations: 2,
    seed: 3,
    module_configs: { strategy_evolution: { population_size: 4 } },
  };

  it("returns the evolved strategy", async () => {
    const res = await app.inject({ method: "POST", url: "/strategies/evolve", payload: body });
    expect(res.statusCode).toBe(200);
    expect(res.json().strategy).toMatchObject({ style: "cooperative", reservation: 100, target: 200 });
  });

  it("maps an impossible counterpart to 400", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/strategies/evolve",
      payload: { ...body, counterpart: { style: "cooperative", opening: 160, limit: 80 } },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().code).toBe("INVALID_RANGE");
  });

  it("rejects an unknown style", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/strategies/evolve",
      payload: { ...body, style: "aggressive" },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("Invalid request body");
  });
});
