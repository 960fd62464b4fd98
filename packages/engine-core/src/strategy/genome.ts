import { clamp } from '../utils.js';
import type { AgentStrategy } from './types.js';

const INITIAL_MIN = 0.05;
const INITIAL_SPAN = 0.45;
const DECAY_MIN = 0.5;
const DECAY_SPAN = 0.45;

/**
 * Map an evolved gene vector onto concession parameters.
 * genes[0] → initial_concession ∈ [0.05, 0.5], genes[1] → decay ∈ [0.5, 0.95].
 * Missing genes keep the base strategy's value.
 */
export function strategyFromGenes(genes: readonly number[], base: AgentStrategy): AgentStrategy {
  const [g0, g1] = genes;
  return {
    ...base,
    initial_concession:
      g0 === undefined ? base.initial_concession : INITIAL_MIN + INITIAL_SPAN * clamp(g0, 0, 1),
    decay: g1 === undefined ? base.decay : DECAY_MIN + DECAY_SPAN * clamp(g1, 0, 1),
  };
}
