import { randomUUID } from "node:crypto";
import {
  EngineFault,
  createSeededRandom,
  createStrategy,
  describeStrategy,
  strategyFromGenes,
  validateStrategy,
  type AgentStrategy,
  type EvolutionResult,
} from "@parley/engine-core";
import {
  CulturalAwarenessModule,
  MODULE_NAMES,
  NegotiationOrchestrator,
  createDefaultRegistry,
  episodeFitness,
  evolveStrategy,
  parseModuleConfigs,
  simulatedEpisode,
  type Logger,
  type NegotiationEvent,
  type NegotiationState,
  type Oracle,
  type RoundAction,
  type StepResult,
} from "@parley/engine-session";
import type { EvolveStrategyInput, StartNegotiationInput } from "../schemas.js";

const DEFAULT_GENERATIONS = 20;

interface NegotiationEntry {
  orchestrator: NegotiationOrchestrator;
  /** Action handed to the orchestrator on the next step. */
  slot: { action: RoundAction | null };
  /** Tail of this negotiation's step queue. */
  queue: Promise<unknown>;
}

export interface StepOutcome {
  result: StepResult;
  state: NegotiationState;
}

export interface EvolvedStrategy {
  strategy: AgentStrategy;
  description: string;
  result: EvolutionResult;
}

export interface NegotiationSnapshot {
  state: NegotiationState;
  history: readonly NegotiationEvent[];
}

/**
 * In-memory negotiations for the life of the process.
 * Each step is driven by the action the caller submits with it.
 */
export class NegotiationService {
  private readonly negotiations = new Map<string, NegotiationEntry>();

  constructor(
    private readonly oracle: Oracle,
    private readonly logger: Logger,
  ) {}

  /** Start a negotiation. Throws NegotiationStateError for an invalid participant list. */
  start(input: StartNegotiationInput): { negotiation_id: string; state: NegotiationState } {
    const negotiationId = randomUUID();
    const logger = this.logger.child({ negotiation_id: negotiationId });
    const configs = parseModuleConfigs(input.module_configs ?? {}, logger);
    const slot: NegotiationEntry["slot"] = { action: null };

    const activeModules =
      input.modules ??
      Object.fromEntries(input.participants.map((p) => [p, [...MODULE_NAMES]]));

    const orchestrator = new NegotiationOrchestrator({
      negotiation_id: negotiationId,
      participants: input.participants,
      registry: createDefaultRegistry({ oracle: this.oracle, configs, logger }),
      activeModules,
      config: {
        ...configs.orchestrator,
        max_rounds: input.max_rounds ?? configs.orchestrator.max_rounds,
      },
      logger,
      actionProvider: async () => {
        const { action } = slot;
        slot.action = null;
        return action;
      },
    });

    const cultural = orchestrator.getModule("cultural_awareness");
    if (cultural instanceof CulturalAwarenessModule) {
      for (const [participant, key] of Object.entries(input.cultures ?? {})) {
        cultural.setParticipantCulture(participant, key);
      }
    }

    this.negotiations.set(negotiationId, { orchestrator, slot, queue: Promise.resolve() });
    logger.info({ participants: input.participants }, "negotiation started");
    return { negotiation_id: negotiationId, state: orchestrator.getState() };
  }

  get(negotiationId: string): NegotiationSnapshot | null {
    const entry = this.negotiations.get(negotiationId);
    if (!entry) return null;
    return { state: entry.orchestrator.getState(), history: entry.orchestrator.getHistory() };
  }

  /**
   * Run one round with `action`. Returns null for an unknown negotiation.
   * Concurrent calls on one negotiation run in arrival order, each with its own action.
   */
  async step(negotiationId: string, action: RoundAction | null): Promise<StepOutcome | null> {
    const entry = this.negotiations.get(negotiationId);
    if (!entry) return null;
    const run = entry.queue.then(() => this.runStep(entry, action));
    // A failed step rejects its own caller; the queue moves on.
    entry.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * Evolve concession parameters against a simulated counterpart.
   * Throws EngineFault when the bounds can never form a valid strategy.
   */
  async evolve(input: EvolveStrategyInput): Promise<EvolvedStrategy> {
    const logger = this.logger.child({ operation: "evolve_strategy" });
    const base = createStrategy(input.style, { reservation: input.reservation, target: input.target });
    const invalid = validateStrategy(base);
    if (invalid) {
      throw new EngineFault(invalid, `reservation ${input.reservation} must be below target ${input.target}`);
    }

    const configs = parseModuleConfigs(input.module_configs ?? {}, logger);
    const runEpisode = simulatedEpisode(input.counterpart, input.max_rounds ?? configs.orchestrator.max_rounds);
    const result = await evolveStrategy(
      episodeFitness(base, runEpisode),
      input.max_generations ?? DEFAULT_GENERATIONS,
      {
        config: configs.strategy_evolution,
        random: input.seed === undefined ? undefined : createSeededRandom(input.seed),
        logger,
      },
    );

    const strategy = strategyFromGenes(result.best.genes, base);
    return { strategy, description: describeStrategy(strategy), result };
  }

  private async runStep(entry: NegotiationEntry, action: RoundAction | null): Promise<StepOutcome> {
    entry.slot.action = action;
    try {
      const result = await entry.orchestrator.step();
      return { result, state: entry.orchestrator.getState() };
    } finally {
      entry.slot.action = null;
    }
  }
}
