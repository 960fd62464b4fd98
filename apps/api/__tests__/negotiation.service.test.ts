import { describe, expect, it } from "vitest";
import { pino } from "pino";
import { nullOracle, type RoundAction } from "@parley/engine-session";
import { NegotiationService } from "../src/services/negotiation.service.js";

const logger = pino({ level: "silent" });

const offer = (participant: string, recipient: string, price: number): RoundAction => ({
  type: "offer",
  participant,
  recipient,
  terms: { price },
});

describe("NegotiationService.step", () => {
  it("gives concurrent steps on one negotiation their own action, in arrival order", async () => {
    const service = new NegotiationService(nullOracle, logger);
    const { negotiation_id } = service.start({ participants: ["alice", "bob"] });
    const first = offer("alice", "bob", 500);
    const second = offer("bob", "alice", 400);

    const [a, b] = await Promise.all([
      service.step(negotiation_id, first),
      service.step(negotiation_id, second),
    ]);

    expect(a?.result).toMatchObject({ round: 1, action: first });
    expect(b?.result).toMatchObject({ round: 2, action: second });
    expect(a?.state.history).toHaveLength(1);
    expect(service.get(negotiation_id)?.state.history).toHaveLength(2);
  });

  it("keeps serving steps after one is rejected", async () => {
    const service = new NegotiationService(nullOracle, logger);
    const { negotiation_id } = service.start({ participants: ["alice", "bob"] });

    const [rejected, accepted] = await Promise.allSettled([
      service.step(negotiation_id, { type: "accept", participant: "bob" }),
      service.step(negotiation_id, offer("alice", "bob", 500)),
    ]);

    expect(rejected.status).toBe("rejected");
    expect(accepted).toMatchObject({ status: "fulfilled", value: { result: { round: 1 } } });
  });
});

describe("NegotiationService.evolve", () => {
  it("returns a strategy within the gene ranges for the given bounds", async () => {
    const service = new NegotiationService(nullOracle, logger);
    const evolved = await service.evolve({
      style: "cooperative",
      reservation: 100,
      target: 200,
      counterpart: { style: "cooperative", opening: 80, limit: 160 },
      max_generations: 3,
      seed: 7,
      module_configs: { strategy_evolution: { population_size: 6 } },
    });

    expect(evolved.strategy).toMatchObject({ style: "cooperative", reservation: 100, target: 200 });
    expect(evolved.strategy.initial_concession).toBeGreaterThanOrEqual(0.05);
    expect(evolved.strategy.initial_concession).toBeLessThanOrEqual(0.5);
    expect(evolved.strategy.decay).toBeGreaterThanOrEqual(0.5);
    expect(evolved.strategy.decay).toBeLessThanOrEqual(0.95);
    expect(evolved.result.best.genes).toHaveLength(2);
    expect(evolved.description.split("\n")[0]).toBe("NEGOTIATION STRATEGY (cooperative):");
  });

  it("is reproducible for a fixed seed", async () => {
    const service = new NegotiationService(nullOracle, logger);
    const input = {
      style: "competitive" as const,
      reservation: 100,
      target: 200,
      counterpart: { style: "cooperative" as const, opening: 80, limit: 160 },
      max_generations: 2,
      seed: 11,
      module_configs: { strategy_evolution: { population_size: 5 } },
    };
    const [a, b] = [await service.evolve(input), await service.evolve(input)];
    expect(a.result.best).toEqual(b.result.best);
  });

  it("rejects bounds where the reservation is not below the target", async () => {
    const service = new NegotiationService(nullOracle, logger);
    await expect(
      service.evolve({
        style: "cooperative",
        reservation: 200,
        target: 100,
        counterpart: { style: "cooperative", opening: 80, limit: 160 },
      }),
    ).rejects.toThrow(/INVALID_RANGE/);
  });
});
