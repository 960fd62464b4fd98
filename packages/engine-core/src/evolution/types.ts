/** One candidate strategy-parameter vector. Fitness is null until evaluated. */
export interface StrategyGenome {
  genes: number[];
  fitness: number | null;
}

/**
 * Scores one genome, typically by simulating a negotiation episode with the
 * strategy the genes describe. Evaluations are independent of each other.
 */
export type FitnessEvaluator = (genes: readonly number[]) => number | Promise<number>;

/** Uniform random source on [0, 1). */
export type RandomSource = () => number;

export interface EvolutionConfig {
  population_size: number;
  mutation_rate: number;
  crossover_rate: number;
  learning_rate: number;
  gene_count: number;
  /** Fitness variance under which the population counts as converged. */
  convergence_epsilon: number;
}

export interface GenerationStats {
  generation: number;
  best_fitness: number;
  mean_fitness: number;
  variance: number;
}

export interface EvolutionResult {
  generations: number;
  converged: boolean;
  best: StrategyGenome;
  history: GenerationStats[];
}
