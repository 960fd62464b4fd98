import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { EngineFault } from "@parley/engine-core";
import { NegotiationStateError } from "@parley/engine-session";
import type { NegotiationService } from "../../services/negotiation.service.js";
import { evolveStrategyShape, roundActionSchema, startNegotiationShape } from "../../schemas.js";

function textResult(payload: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload) }],
  };
}

function errorResult(payload: unknown) {
  return { isError: true, ...textResult(payload) };
}

function notFound(negotiation_id: string) {
  return errorResult({ error: "Negotiation not found", negotiation_id });
}

/** Register all MCP tools with the server. */
export function registerTools(server: McpServer, service: NegotiationService) {
  // ─── parley_ping ─────────────────────────────────────────
  server.tool(
    "parley_ping",
    "Health check tool. Returns server status and timestamp. Use this to verify the negotiation MCP server is connected and responding.",
    {},
    async () =>
      textResult({
        status: "ok",
        message: "Negotiation MCP server is connected!",
        timestamp: new Date().toISOString(),
        version: "0.1.0",
      }),
  );

  // ─── parley_start_negotiation ────────────────────────────
  server.tool(
    "parley_start_negotiation",
    "Start a multi-party negotiation. Optionally choose analysis modules per participant, module configuration and participant cultures.",
    startNegotiationShape,
    async (input) => {
      try {
        return textResult(service.start(input));
      } catch (err) {
        if (err instanceof NegotiationStateError) return errorResult({ error: err.message, code: err.code });
        throw err;
      }
    },
  );

  // ─── parley_step ─────────────────────────────────────────
  server.tool(
    "parley_step",
    "Advance a negotiation by one round. Pass the round's action (offer, accept or withdraw), or omit it to pass. Returns each participant's observation text.",
    {
      negotiation_id: z.string(),
      action: roundActionSchema.optional(),
    },
    async ({ negotiation_id, action }) => {
      try {
        const stepped = await service.step(negotiation_id, action ?? null);
        return stepped ? textResult(stepped) : notFound(negotiation_id);
      } catch (err) {
        if (err instanceof NegotiationStateError) return errorResult({ error: err.message, code: err.code });
        throw err;
      }
    },
  );

  // ─── parley_get_negotiation ──────────────────────────────
  server.tool(
    "parley_get_negotiation",
    "Retrieve the current state and history of a negotiation by its ID.",
    { negotiation_id: z.string() },
    async ({ negotiation_id }) => {
      const snapshot = service.get(negotiation_id);
      return snapshot ? textResult({ negotiation_id, ...snapshot }) : notFound(negotiation_id);
    },
  );

  // ─── parley_evolve_strategy ──────────────────────────────
  server.tool(
    "parley_evolve_strategy",
    "Evolve concession parameters (initial concession, decay) for a seller with the given bounds by playing simulated episodes against a buyer. Returns the best strategy and per-generation fitness.",
    evolveStrategyShape,
    async (input) => {
      try {
        return textResult(await service.evolve(input));
      } catch (err) {
        if (err instanceof EngineFault) return errorResult({ error: err.message, code: err.code });
        throw err;
      }
    },
  );
}
