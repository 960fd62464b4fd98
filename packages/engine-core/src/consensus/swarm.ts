import { EngineError, EngineFault } from '../types.js';
import type {
  SwarmConfig,
  SwarmDecision,
  SwarmRecommendation,
  SwarmRevision,
  SwarmTally,
} from './types.js';

export const DEFAULT_SWARM_CONFIG: Readonly<SwarmConfig> = {
  consensus_threshold: 0.7,
  max_iterations: 3,
};

/** Share of its own confidence a converted dissenter keeps. */
const CONVERSION_DAMPING = 0.9;

/**
 * Confidence-weighted tally. Ties go to the choice that appeared first.
 * With zero total weight every vote counts as 1.
 */
export function tallyVotes<C extends string>(
  recommendations: readonly SwarmRecommendation<C>[],
): SwarmTally<C> {
  if (recommendations.length === 0) {
    throw new EngineFault(EngineError.EMPTY_SWARM);
  }
  const totalConfidence = recommendations.reduce((sum, r) => sum + Math.max(0, r.confidence), 0);
  const weightOf = (r: SwarmRecommendation<C>) =>
    totalConfidence > 0 ? Math.max(0, r.confidence) : 1;

  const weights = new Map<C, number>();
  for (const rec of recommendations) {
    weights.set(rec.choice, (weights.get(rec.choice) ?? 0) + weightOf(rec));
  }

  let plurality = recommendations[0].choice;
  let best = -1;
  for (const [choice, weight] of weights) {
    if (weight > best) {
      best = weight;
      plurality = choice;
    }
  }
  const total = totalConfidence > 0 ? totalConfidence : recommendations.length;
  return { weights, total_weight: total, plurality, agreement: best / total };
}

/**
 * Default revision: a dissenter less confident than the plurality's
 * agreement share adopts the plurality choice at reduced confidence.
 */
export function conformToPlurality<C extends string>(
  recommendation: SwarmRecommendation<C>,
  tally: SwarmTally<C>,
): SwarmRecommendation<C> {
  if (recommendation.choice === tally.plurality || recommendation.confidence >= tally.agreement) {
    return recommendation;
  }
  return {
    ...recommendation,
    choice: tally.plurality,
    confidence: recommendation.confidence * CONVERSION_DAMPING,
  };
}

/**
 * Iterative weighted-voting aggregation.
 *
 * Each iteration tallies the votes and stops as soon as the plurality's
 * weighted agreement reaches the threshold; otherwise every sub-agent may
 * revise against the tally. Always returns a decision: after
 * `max_iterations` the final plurality wins unconverged.
 */
export function runSwarmConsensus<C extends string>(
  recommendations: readonly SwarmRecommendation<C>[],
  config: SwarmConfig = DEFAULT_SWARM_CONFIG,
  revise: SwarmRevision<C> = conformToPlurality,
): SwarmDecision<C> {
  if (recommendations.length === 0) {
    throw new EngineFault(EngineError.EMPTY_SWARM);
  }
  if (config.consensus_threshold <= 0 || config.consensus_threshold > 1) {
    throw new EngineFault(
      EngineError.INVALID_THRESHOLD,
      `consensus_threshold=${config.consensus_threshold}`,
    );
  }
  const maxIterations = Math.max(1, Math.floor(config.max_iterations));

  let current = [...recommendations];
  let tally = tallyVotes(current);
  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    tally = tallyVotes(current);
    if (tally.agreement >= config.consensus_threshold) {
      return {
        decision: tally.plurality,
        agreement: tally.agreement,
        iterations: iteration,
        converged: true,
        recommendations: current,
      };
    }
    if (iteration < maxIterations) {
      const snapshot = tally;
      current = current.map((rec) => revise(rec, snapshot));
    }
  }

  return {
    decision: tally.plurality,
    agreement: tally.agreement,
    iterations: maxIterations,
    converged: false,
    recommendations: current,
  };
}
