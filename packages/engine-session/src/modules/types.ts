import type { Logger } from 'pino';
import type { RoundContext } from '../context/types.js';
import type { RoundAction } from '../session/types.js';
import type { Oracle } from '../oracle/types.js';

/** The closed set of analysis module kinds. */
export const MODULE_NAMES = [
  'social_intelligence',
  'cultural_awareness',
  'temporal_dynamics',
  'uncertainty_management',
  'collective_intelligence',
  'theory_of_mind',
] as const;

export type ModuleName = (typeof MODULE_NAMES)[number];

/**
 * Analysis module capability: observation text for a participant, plus an
 * optional hook to update private state after each accepted action.
 *
 * `signal` is aborted once the orchestrator has given up on the call. After
 * any await, a module must check it and leave its state and `shared_data`
 * alone when it is aborted.
 */
export interface NegotiationModule {
  readonly name: string;
  /** Observation text for `participant`. Empty string when there is nothing to say. */
  getObservationContext(participant: string, ctx: RoundContext, signal?: AbortSignal): Promise<string>;
  observeAction?(action: RoundAction, ctx: RoundContext, signal?: AbortSignal): Promise<void>;
}

export type ModuleFactory = () => NegotiationModule;

/** Constructor options shared by the analysis modules. */
export interface ModuleOptions {
  oracle?: Oracle;
  /** Raw configuration, validated against the module's schema. */
  config?: unknown;
  logger?: Logger;
}
