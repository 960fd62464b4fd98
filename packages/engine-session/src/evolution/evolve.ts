import {
  StrategyEvolution,
  scoreOutcome,
  strategyFromGenes,
  type AgentStrategy,
  type EvolutionResult,
  type FitnessEvaluator,
  type RandomSource,
} from '@parley/engine-core';
import type { Logger } from 'pino';
import { componentLogger } from '../logger.js';
import { parseModuleConfig, strategyEvolutionConfigSchema } from '../config.js';

export interface EvolveOptions {
  /** Raw strategy-evolution configuration. */
  config?: unknown;
  random?: RandomSource;
  seeds?: readonly (readonly number[])[];
  logger?: Logger;
}

/**
 * Plays one episode with the given strategy and returns the settled value,
 * or null when no deal was reached.
 */
export type EpisodeRunner = (strategy: AgentStrategy) => Promise<number | null>;

/** Fitness of a genome: the outcome score of one episode played with the strategy it encodes. */
export function episodeFitness(base: AgentStrategy, runEpisode: EpisodeRunner): FitnessEvaluator {
  return async (genes) => scoreOutcome(await runEpisode(strategyFromGenes(genes, base)), base);
}

export function createStrategyEvolution(
  evaluator: FitnessEvaluator,
  options: EvolveOptions = {},
): StrategyEvolution {
  const logger = componentLogger('strategy_evolution', options.logger);
  const config = parseModuleConfig(strategyEvolutionConfigSchema, options.config, logger);
  return new StrategyEvolution(config, evaluator, { random: options.random, seeds: options.seeds });
}

/** Evolve for up to `maxGenerations` and log the run. */
export async function evolveStrategy(
  evaluator: FitnessEvaluator,
  maxGenerations: number,
  options: EvolveOptions = {},
): Promise<EvolutionResult> {
  const logger = componentLogger('strategy_evolution', options.logger);
  const engine = createStrategyEvolution(evaluator, options);
  const result = await engine.run(maxGenerations);
  for (const stats of result.history) {
    logger.debug(stats, 'generation evaluated');
  }
  logger.info(
    { generations: result.generations, converged: result.converged, best_fitness: result.best.fitness },
    'strategy evolution finished',
  );
  return result;
}
