import {
  EngineError,
  EngineFault,
  createStrategy,
  nextOffer,
  type NegotiationStyle,
} from '@parley/engine-core';
import type { EpisodeRunner } from './evolve.js';

/**
 * Simulated buyer for training episodes. Opens at `opening` and concedes
 * upward on its style's schedule, never past `limit`.
 */
export interface SimulatedCounterpart {
  style: NegotiationStyle;
  opening: number;
  limit: number;
}

/**
 * Episode runner for a bilateral price negotiation against a simulated
 * counterpart. Each round the agent asks and the counterpart bids; once the
 * bid reaches the ask they settle at the midpoint. No overlap within
 * `maxRounds` rounds is no deal.
 *
 * The counterpart's schedule runs in mirrored value space (value = -price),
 * so both sides concede through the same `nextOffer`.
 */
export function simulatedEpisode(counterpart: SimulatedCounterpart, maxRounds: number): EpisodeRunner {
  if (counterpart.limit <= counterpart.opening) {
    throw new EngineFault(
      EngineError.INVALID_RANGE,
      `counterpart limit ${counterpart.limit} must exceed its opening ${counterpart.opening}`,
    );
  }
  if (!Number.isInteger(maxRounds) || maxRounds <= 0) {
    throw new EngineFault(EngineError.INVALID_ROUNDS, `maxRounds=${maxRounds}`);
  }
  const mirrored = createStrategy(counterpart.style, {
    reservation: -counterpart.limit,
    target: -counterpart.opening,
  });

  return async (strategy) => {
    let ask = strategy.target;
    let bid = counterpart.opening;
    for (let round = 0; round < maxRounds; round++) {
      if (bid >= ask) return (ask + bid) / 2;
      ask = nextOffer(ask, round, maxRounds, strategy);
      bid = -nextOffer(-bid, round, maxRounds, mirrored);
    }
    return null;
  };
}
