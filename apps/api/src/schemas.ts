import { z } from "zod";

const statement = z.string().max(2000).optional();

export const roundActionSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("offer"),
    participant: z.string().min(1),
    recipient: z.string().min(1),
    terms: z.record(z.string(), z.union([z.number(), z.string()])),
    offer_type: z.enum(["initial", "counter", "final"]).optional(),
    statement,
  }),
  z.object({ type: z.literal("accept"), participant: z.string().min(1), statement }),
  z.object({ type: z.literal("withdraw"), participant: z.string().min(1), statement }),
]);

export const startNegotiationShape = {
  participants: z.array(z.string().min(1)).min(2),
  max_rounds: z.number().int().positive().optional(),
  /** participant → module names. Defaults to every module for every participant. */
  modules: z.record(z.string(), z.array(z.string())).optional(),
  /** Raw configuration keyed by module name. */
  module_configs: z.record(z.string(), z.unknown()).optional(),
  /** participant → culture key */
  cultures: z.record(z.string(), z.string()).optional(),
};

export const startNegotiationSchema = z.object(startNegotiationShape);

export const stepBodySchema = z.object({
  action: roundActionSchema.nullable().optional(),
});

const style = z.enum(["competitive", "cooperative", "integrative"]);

export const evolveStrategyShape = {
  style,
  reservation: z.number(),
  target: z.number(),
  /** Simulated buyer the candidate strategies are trained against. */
  counterpart: z.object({
    style,
    opening: z.number(),
    limit: z.number(),
  }),
  max_rounds: z.number().int().positive().max(100).optional(),
  max_generations: z.number().int().positive().max(500).optional(),
  /** Seed for a reproducible run. */
  seed: z.number().int().optional(),
  /** Same blob as on start; `strategy_evolution` is read from it. */
  module_configs: z.record(z.string(), z.unknown()).optional(),
};

export const evolveStrategySchema = z.object(evolveStrategyShape);

export type StartNegotiationInput = z.infer<typeof startNegotiationSchema>;
export type EvolveStrategyInput = z.infer<typeof evolveStrategySchema>;
