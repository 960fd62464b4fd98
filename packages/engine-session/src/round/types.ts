import type { RoundContext } from '../context/types.js';
import type { NegotiationPhase, NegotiationState, RoundAction } from '../session/types.js';

/** Everything the scheduling harness sees when choosing the round's action. */
export interface TurnInput {
  state: NegotiationState;
  context: RoundContext;
  /** participant → aggregated observation text */
  observations: Readonly<Record<string, string>>;
}

/**
 * Supplies the round's action. Null means nobody acts this round.
 * Implemented by the turn-scheduling harness, outside this package.
 */
export type ActionProvider = (input: TurnInput) => Promise<RoundAction | null>;

/** Result of one orchestrator step. */
export interface StepResult {
  round: number;
  phase: NegotiationPhase;
  observations: Record<string, string>;
  action: RoundAction | null;
  concluded: boolean;
}
