import type { ConcessionParams } from './types.js';

/**
 * Geometric concession schedule.
 * C(r) = (target - reservation) * initial_concession * decay^r for 0 <= r < maxRounds, 0 afterwards.
 *
 * Strictly positive and strictly decreasing before the final round when
 * target > reservation, 0 < initial_concession and 0 < decay < 1.
 */
export function concessionAmount(
  roundIndex: number,
  maxRounds: number,
  params: ConcessionParams,
): number {
  if (roundIndex < 0 || roundIndex >= maxRounds) {
    return 0;
  }
  const range = params.target - params.reservation;
  return range * params.initial_concession * params.decay ** roundIndex;
}

/**
 * Next value to propose: concede from the previous proposal, never below reservation.
 */
export function nextOffer(
  previous: number,
  roundIndex: number,
  maxRounds: number,
  params: ConcessionParams,
): number {
  const proposal = previous - concessionAmount(roundIndex, maxRounds, params);
  return Math.max(params.reservation, proposal);
}
