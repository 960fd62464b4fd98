import type { NegotiationState } from '../session/types.js';
import type { RoundContext } from './types.js';

/** participant → module names, as the wiring layer supplies it */
export type ActiveModules = Readonly<Record<string, readonly string[]>>;

/**
 * Build a fresh round context from the current state.
 * Participants without an entry in `activeModules` get no modules.
 */
export function buildRoundContext(
  state: NegotiationState,
  activeModules: ActiveModules,
  sharedData: Record<string, unknown> = {},
): RoundContext {
  const active = new Map<string, ReadonlySet<string>>();
  for (const participant of state.participants) {
    active.set(participant, Object.freeze(new Set(activeModules[participant] ?? [])));
  }
  return Object.freeze({
    negotiation_id: state.negotiation_id,
    participants: Object.freeze([...state.participants]),
    phase: state.phase,
    round: state.round,
    max_rounds: state.max_rounds,
    active_modules: active,
    shared_data: sharedData,
  });
}

/** Module names active for `participant`, or an empty set. */
export function activeModulesFor(ctx: RoundContext, participant: string): ReadonlySet<string> {
  return ctx.active_modules.get(participant) ?? new Set<string>();
}

/** Counterparts of `participant` in context order. */
export function counterpartsOf(ctx: RoundContext, participant: string): string[] {
  return ctx.participants.filter((p) => p !== participant);
}
