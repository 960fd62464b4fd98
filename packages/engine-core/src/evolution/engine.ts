import { EngineError, EngineFault } from '../types.js';
import { variance } from '../utils.js';
import { crossover, mutate, selectParent } from './operators.js';
import type {
  EvolutionConfig,
  EvolutionResult,
  FitnessEvaluator,
  GenerationStats,
  RandomSource,
  StrategyGenome,
} from './types.js';

export const DEFAULT_EVOLUTION_CONFIG: Readonly<EvolutionConfig> = {
  population_size: 20,
  mutation_rate: 0.1,
  crossover_rate: 0.7,
  learning_rate: 0.01,
  gene_count: 2,
  convergence_epsilon: 1e-6,
};

export interface EvolutionOptions {
  random?: RandomSource;
  /**
   * Initial gene vectors, each `gene_count` long. Missing members are filled
   * with random genomes.
   */
  seeds?: readonly (readonly number[])[];
}

function validateConfig(config: EvolutionConfig): void {
  if (!Number.isInteger(config.population_size) || config.population_size <= 0) {
    throw new EngineFault(EngineError.EMPTY_POPULATION, `population_size=${config.population_size}`);
  }
  for (const key of ['mutation_rate', 'crossover_rate'] as const) {
    if (config[key] < 0 || config[key] > 1) {
      throw new EngineFault(EngineError.INVALID_RATE, `${key}=${config[key]}`);
    }
  }
  if (config.learning_rate <= 0) {
    throw new EngineFault(EngineError.INVALID_RATE, `learning_rate=${config.learning_rate}`);
  }
}

/**
 * Genetic algorithm over strategy-parameter vectors.
 *
 * One generation:
 * 1. Evaluate every unevaluated genome (in parallel, all results awaited)
 * 2. Keep the best genome with its fitness (elitism)
 * 3. Fill the rest by roulette selection, crossover or cloning, then mutation
 *
 * The elite is never re-evaluated, so best fitness never regresses between generations.
 */
export class StrategyEvolution {
  private readonly config: EvolutionConfig;
  private readonly evaluator: FitnessEvaluator;
  private readonly random: RandomSource;
  private population: StrategyGenome[];
  private generation = 0;
  private readonly history: GenerationStats[] = [];

  constructor(
    config: Partial<EvolutionConfig>,
    evaluator: FitnessEvaluator,
    options: EvolutionOptions = {},
  ) {
    this.config = { ...DEFAULT_EVOLUTION_CONFIG, ...config };
    validateConfig(this.config);
    this.evaluator = evaluator;
    this.random = options.random ?? Math.random;
    this.population = this.initialPopulation(options.seeds ?? []);
  }

  private initialPopulation(seeds: readonly (readonly number[])[]): StrategyGenome[] {
    const population: StrategyGenome[] = [];
    seeds.forEach((seed, i) => {
      if (seed.length !== this.config.gene_count) {
        throw new EngineFault(
          EngineError.INVALID_SEED,
          `seed ${i} has ${seed.length} genes, expected ${this.config.gene_count}`,
        );
      }
    });
    for (let i = 0; i < this.config.population_size; i++) {
      const seed = seeds[i];
      const genes = seed
        ? [...seed]
        : Array.from({ length: this.config.gene_count }, () => this.random());
      population.push({ genes, fitness: null });
    }
    return population;
  }

  /** Snapshot of the current population. */
  getPopulation(): StrategyGenome[] {
    return this.population.map((g) => ({ genes: [...g.genes], fitness: g.fitness }));
  }

  getGeneration(): number {
    return this.generation;
  }

  getHistory(): GenerationStats[] {
    return [...this.history];
  }

  /** Best evaluated genome, or null before the first evaluation. */
  getBest(): StrategyGenome | null {
    let best: StrategyGenome | null = null;
    for (const genome of this.population) {
      if (genome.fitness === null) continue;
      if (best === null || best.fitness === null || genome.fitness > best.fitness) {
        best = genome;
      }
    }
    return best ? { genes: [...best.genes], fitness: best.fitness } : null;
  }

  /** Parameter vector of the best evaluated genome, for the strategy engine. */
  getBestGenes(): number[] | null {
    return this.getBest()?.genes ?? null;
  }

  /**
   * Evaluate all unevaluated genomes and record generation stats.
   * A non-finite score rejects the whole evaluation and leaves the population unevaluated.
   */
  async evaluate(): Promise<GenerationStats> {
    const pending = this.population.filter((g) => g.fitness === null);
    const scores = await Promise.all(pending.map((g) => this.evaluator(g.genes)));
    const invalid = scores.findIndex((score) => !Number.isFinite(score));
    if (invalid !== -1) {
      throw new EngineFault(
        EngineError.INVALID_FITNESS,
        `evaluator returned ${scores[invalid]} for genes [${pending[invalid].genes.join(', ')}]`,
      );
    }
    pending.forEach((genome, i) => {
      genome.fitness = scores[i];
    });

    const fitness = this.population.map((g) => g.fitness ?? 0);
    const stats: GenerationStats = {
      generation: this.generation,
      best_fitness: Math.max(...fitness),
      mean_fitness: fitness.reduce((sum, f) => sum + f, 0) / fitness.length,
      variance: variance(fitness),
    };
    this.history.push(stats);
    return stats;
  }

  /** Replace the population with the next generation. Requires a fully evaluated population. */
  breed(): void {
    if (this.population.some((g) => g.fitness === null)) {
      throw new EngineFault(EngineError.UNEVALUATED_POPULATION, 'evaluate() before breed()');
    }
    const elite = this.getBest();
    if (!elite) {
      throw new EngineFault(EngineError.EMPTY_POPULATION);
    }

    const { population_size, crossover_rate, mutation_rate, learning_rate } = this.config;
    const next: StrategyGenome[] = [elite];
    while (next.length < population_size) {
      const first = selectParent(this.population, this.random);
      let genes: number[];
      if (this.random() < crossover_rate) {
        const second = selectParent(this.population, this.random);
        genes = crossover(first.genes, second.genes, this.random);
      } else {
        genes = [...first.genes];
      }
      next.push({ genes: mutate(genes, mutation_rate, learning_rate, this.random), fitness: null });
    }

    this.population = next;
    this.generation += 1;
  }

  /**
   * Evolve for up to `maxGenerations` generations, stopping early once the
   * fitness variance falls below the convergence epsilon.
   */
  async run(maxGenerations: number): Promise<EvolutionResult> {
    let converged = false;
    for (let i = 0; i < maxGenerations; i++) {
      const stats = await this.evaluate();
      if (stats.variance < this.config.convergence_epsilon) {
        converged = true;
        break;
      }
      this.breed();
    }
    if (!converged) {
      const stats = await this.evaluate();
      converged = stats.variance < this.config.convergence_epsilon;
    }

    const best = this.getBest();
    if (!best) {
      throw new EngineFault(EngineError.EMPTY_POPULATION);
    }
    return {
      generations: this.generation + 1,
      converged,
      best,
      history: this.getHistory(),
    };
  }
}
