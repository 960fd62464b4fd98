import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { createSeededRandom, createStrategy } from '@parley/engine-core';
import { createStrategyEvolution, episodeFitness, evolveStrategy } from '../src/evolution/evolve.js';

const logger = pino({ level: 'silent' });
const base = createStrategy('cooperative', { reservation: 0, target: 100 });

describe('episodeFitness', () => {
  it('scores the episode played with the strategy the genes encode', async () => {
    const runEpisode = vi.fn(async (strategy: { decay: number }) => 100 * strategy.decay);
    const evaluate = episodeFitness(base, runEpisode);

    expect(await evaluate([0, 1])).toBeCloseTo(0.95);
    expect(await evaluate([0, 0])).toBeCloseTo(0.5);
    expect(runEpisode).toHaveBeenCalledTimes(2);
  });

  it('scores a failed episode as zero', async () => {
    const evaluate = episodeFitness(base, async () => null);
    expect(await evaluate([0.5, 0.5])).toBe(0);
  });
});

describe('createStrategyEvolution', () => {
  it('applies the parsed configuration', () => {
    const engine = createStrategyEvolution(() => 0, { config: { population_size: 7 }, logger });
    expect(engine.getPopulation()).toHaveLength(7);
  });

  it('falls back to defaults for an invalid configuration', () => {
    const engine = createStrategyEvolution(() => 0, { config: { population_size: -1 }, logger });
    expect(engine.getPopulation()).toHaveLength(20);
  });
});

describe('evolveStrategy', () => {
  it('never regresses the best fitness across generations', async () => {
    const evaluate = episodeFitness(base, async (strategy) => 100 * strategy.decay);
    const result = await evolveStrategy(evaluate, 5, {
      config: { population_size: 8 },
      random: createSeededRandom(7),
      logger,
    });

    expect(result.history.length).toBeGreaterThan(0);
    for (let i = 1; i < result.history.length; i++) {
      expect(result.history[i].best_fitness).toBeGreaterThanOrEqual(result.history[i - 1].best_fitness);
    }
    expect(result.best.fitness).toBe(result.history[result.history.length - 1].best_fitness);
  });
});
