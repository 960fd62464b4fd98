import type { NegotiationPhase } from '../session/types.js';

/**
 * Snapshot handed to every module during one round.
 * Everything except `shared_data` is frozen.
 */
export interface RoundContext {
  readonly negotiation_id: string;
  readonly participants: readonly string[];
  readonly phase: NegotiationPhase;
  readonly round: number;
  readonly max_rounds: number;
  /** participant → names of the modules enabled for them */
  readonly active_modules: ReadonlyMap<string, ReadonlySet<string>>;
  /** Scratch space modules write during the round. Keyed by module name. */
  shared_data: Record<string, unknown>;
}
