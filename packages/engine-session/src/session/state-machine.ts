import type { NegotiationPhase } from './types.js';

/** Events that trigger phase transitions. */
export type PhaseEvent =
  | 'offer'
  | 'final_offer'
  | 'deadline_near'
  | 'agreement'
  | 'withdrawal'
  | 'round_limit';

/** Terminal phases do not accept any transitions. */
const TERMINAL_PHASES: ReadonlySet<NegotiationPhase> = new Set(['concluded']);

/**
 * Valid phase transitions.
 * Key: current phase → map of event → next phase.
 */
const TRANSITIONS: Record<NegotiationPhase, Partial<Record<PhaseEvent, NegotiationPhase>>> = {
  opening: {
    offer: 'bargaining',
    final_offer: 'closing',
    agreement: 'concluded',
    withdrawal: 'concluded',
    round_limit: 'concluded',
  },
  bargaining: {
    offer: 'bargaining',
    final_offer: 'closing',
    deadline_near: 'closing',
    agreement: 'concluded',
    withdrawal: 'concluded',
    round_limit: 'concluded',
  },
  closing: {
    offer: 'closing',
    final_offer: 'closing',
    agreement: 'concluded',
    withdrawal: 'concluded',
    round_limit: 'concluded',
  },
  concluded: {},
};

/**
 * Attempt a phase transition. Returns the new phase if valid, or null if the
 * transition is not allowed.
 */
export function transition(current: NegotiationPhase, event: PhaseEvent): NegotiationPhase | null {
  if (TERMINAL_PHASES.has(current)) {
    return null;
  }
  return TRANSITIONS[current][event] ?? null;
}
