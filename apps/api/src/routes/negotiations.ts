import type { FastifyInstance, FastifyReply } from "fastify";
import { NegotiationStateError } from "@parley/engine-session";
import type { NegotiationService } from "../services/negotiation.service.js";
import { startNegotiationSchema, stepBodySchema } from "../schemas.js";

function stateConflict(reply: FastifyReply, err: NegotiationStateError) {
  return reply.status(409).send({ error: err.message, code: err.code });
}

/** REST surface over the in-memory negotiation service. */
export function registerNegotiationRoutes(app: FastifyInstance, service: NegotiationService) {
  // ─── POST /negotiations - Start a negotiation ─────────────
  app.post("/negotiations", async (request, reply) => {
    const parsed = startNegotiationSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid request body", issues: parsed.error.issues });
    }
    try {
      return reply.status(201).send(service.start(parsed.data));
    } catch (err) {
      if (err instanceof NegotiationStateError) return stateConflict(reply, err);
      throw err;
    }
  });

  // ─── POST /negotiations/:id/step - Run one round ──────────
  app.post<{ Params: { id: string } }>("/negotiations/:id/step", async (request, reply) => {
    const parsed = stepBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid request body", issues: parsed.error.issues });
    }
    try {
      const stepped = await service.step(request.params.id, parsed.data.action ?? null);
      if (!stepped) {
        return reply.status(404).send({ error: "Negotiation not found", negotiation_id: request.params.id });
      }
      return stepped;
    } catch (err) {
      if (err instanceof NegotiationStateError) return stateConflict(reply, err);
      throw err;
    }
  });

  // ─── GET /negotiations/:id - State and history ────────────
  app.get<{ Params: { id: string } }>("/negotiations/:id", async (request, reply) => {
    const snapshot = service.get(request.params.id);
    if (!snapshot) {
      return reply.status(404).send({ error: "Negotiation not found", negotiation_id: request.params.id });
    }
    return snapshot;
  });
}
