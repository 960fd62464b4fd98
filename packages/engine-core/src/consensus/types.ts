/** One sub-agent's vote: a discrete choice weighted by confidence. */
export interface SwarmRecommendation<C extends string = string> {
  agent_id: string;
  choice: C;
  /** Vote weight. Non-negative. */
  confidence: number;
  rationale?: string;
}

export interface SwarmConfig {
  /** Minimum weighted agreement fraction for early acceptance. (0, 1]. */
  consensus_threshold: number;
  max_iterations: number;
}

/** Aggregate of one iteration's votes. */
export interface SwarmTally<C extends string = string> {
  weights: Map<C, number>;
  total_weight: number;
  plurality: C;
  /** Weight share of the plurality choice. */
  agreement: number;
}

/**
 * Revision policy: how a sub-agent updates its recommendation given the
 * current aggregate. Returning the input unchanged keeps the vote.
 */
export type SwarmRevision<C extends string = string> = (
  recommendation: SwarmRecommendation<C>,
  tally: SwarmTally<C>,
) => SwarmRecommendation<C>;

export interface SwarmDecision<C extends string = string> {
  decision: C;
  agreement: number;
  iterations: number;
  converged: boolean;
  recommendations: SwarmRecommendation<C>[];
}
