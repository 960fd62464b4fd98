/** Negotiation style an agent opens with. */
export type NegotiationStyle = 'competitive' | 'cooperative' | 'integrative';

/** Qualitative verdict on an incoming offer. */
export type OfferEvaluation = 'excellent' | 'acceptable' | 'unacceptable';

/** Value bounds of one agent. Higher values are better for the agent. */
export interface ValueBounds {
  reservation: number;
  target: number;
}

/**
 * Concession schedule. Round r concedes
 * (target - reservation) * initial_concession * decay^r.
 */
export interface ConcessionParams extends ValueBounds {
  /** Fraction of the value range conceded in round 0. (0, 1]. */
  initial_concession: number;
  /** Geometric shrink factor per round. (0, 1). */
  decay: number;
}

/** Full per-agent strategy. */
export interface AgentStrategy extends ConcessionParams {
  style: NegotiationStyle;
}
