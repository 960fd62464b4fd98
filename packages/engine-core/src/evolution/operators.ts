import { EngineError, EngineFault } from '../types.js';
import { clamp } from '../utils.js';
import type { RandomSource, StrategyGenome } from './types.js';

/**
 * Fitness-proportional (roulette wheel) selection.
 * Negative fitness is shifted so the weakest genome weighs 0; when every
 * weight is 0 the pick is uniform.
 */
export function selectParent(
  population: readonly StrategyGenome[],
  random: RandomSource,
): StrategyGenome {
  if (population.length === 0) {
    throw new EngineFault(EngineError.EMPTY_POPULATION, 'cannot select from an empty population');
  }
  const fitness = population.map((g) => g.fitness ?? 0);
  const min = Math.min(...fitness);
  const weights = min < 0 ? fitness.map((f) => f - min) : fitness;
  const total = weights.reduce((sum, w) => sum + w, 0);

  if (total <= 0) {
    return population[Math.floor(random() * population.length)];
  }

  let remaining = random() * total;
  for (let i = 0; i < population.length; i++) {
    remaining -= weights[i];
    if (remaining < 0) {
      return population[i];
    }
  }
  return population[population.length - 1];
}

/** Gene-wise blend with an independent mixing weight per gene. */
export function crossover(
  a: readonly number[],
  b: readonly number[],
  random: RandomSource,
): number[] {
  return a.map((gene, i) => {
    const w = random();
    return w * gene + (1 - w) * (b[i] ?? gene);
  });
}

/**
 * Perturb each gene with probability `rate` by a zero-mean uniform offset in
 * [-scale, scale]. Genes stay in [0, 1].
 */
export function mutate(
  genes: readonly number[],
  rate: number,
  scale: number,
  random: RandomSource,
): number[] {
  return genes.map((gene) => {
    if (random() >= rate) return gene;
    const offset = (random() * 2 - 1) * scale;
    return clamp(gene + offset, 0, 1);
  });
}
