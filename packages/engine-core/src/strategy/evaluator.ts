import type { OfferEvaluation, ValueBounds } from './types.js';

/**
 * Classify an offer's value against the agent's bounds.
 *
 * - value >= target                   → excellent
 * - reservation <= value < target     → acceptable
 * - value < reservation               → unacceptable
 */
export function evaluateOffer(value: number, bounds: ValueBounds): OfferEvaluation {
  if (value >= bounds.target) {
    return 'excellent';
  }
  if (value >= bounds.reservation) {
    return 'acceptable';
  }
  return 'unacceptable';
}

/**
 * Reference fitness signal for an episode outcome.
 * No deal scores 0; otherwise (value - reservation) / (target - reservation), clamped to [-1, 1].
 */
export function scoreOutcome(value: number | null, bounds: ValueBounds): number {
  if (value === null) return 0;
  const range = bounds.target - bounds.reservation;
  if (range <= 0) return 0;
  const score = (value - bounds.reservation) / range;
  return Math.min(1, Math.max(-1, score));
}
