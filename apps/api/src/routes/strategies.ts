import type { FastifyInstance } from "fastify";
import { EngineFault } from "@parley/engine-core";
import type { NegotiationService } from "../services/negotiation.service.js";
import { evolveStrategySchema } from "../schemas.js";

/** Strategy evolution against a simulated counterpart. */
export function registerStrategyRoutes(app: FastifyInstance, service: NegotiationService) {
  // ─── POST /strategies/evolve - Evolve concession parameters ─
  app.post("/strategies/evolve", async (request, reply) => {
    const parsed = evolveStrategySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid request body", issues: parsed.error.issues });
    }
    try {
      return await service.evolve(parsed.data);
    } catch (err) {
      if (err instanceof EngineFault) {
        return reply.status(400).send({ error: err.message, code: err.code });
      }
      throw err;
    }
  });
}
