import type { Logger } from 'pino';
import { componentLogger } from '../logger.js';
import { orchestratorConfigSchema, parseModuleConfig, type OrchestratorConfig } from '../config.js';
import { buildRoundContext, type ActiveModules } from '../context/builder.js';
import type { RoundContext } from '../context/types.js';
import type { ModuleRegistry } from '../modules/registry.js';
import type { NegotiationModule } from '../modules/types.js';
import { NegotiationStateError, NegotiationStateErrorCode } from '../session/errors.js';
import {
  acceptOffer,
  advanceRound,
  concludeAtRoundLimit,
  createNegotiationState,
  enterClosing,
  recordOffer,
  recordWithdrawal,
} from '../session/state.js';
import type {
  Agreement,
  NegotiationEvent,
  NegotiationOutcome,
  NegotiationState,
  RoundAction,
} from '../session/types.js';
import { withTimeout } from './timeout.js';
import type { ActionProvider, StepResult } from './types.js';

export interface OrchestratorOptions {
  negotiation_id: string;
  participants: readonly string[];
  registry: ModuleRegistry;
  actionProvider: ActionProvider;
  /** participant → enabled module names */
  activeModules?: ActiveModules;
  /** Raw orchestrator configuration. */
  config?: unknown;
  logger?: Logger;
}

function applyAction(state: NegotiationState, action: RoundAction): NegotiationState {
  switch (action.type) {
    case 'offer':
      return recordOffer(state, {
        offerer: action.participant,
        recipient: action.recipient,
        terms: action.terms,
        offer_type: action.offer_type,
      });
    case 'accept':
      return acceptOffer(state, action.participant);
    case 'withdraw':
      return recordWithdrawal(state, action.participant);
  }
}

/**
 * Drives one negotiation round by round.
 *
 * Each step:
 * 1. Advance the round counter (bargaining turns into closing near the cap)
 * 2. Build the round context
 * 3. Collect each participant's observation text from their active modules
 * 4. Ask the action provider for the round's action and apply it
 * 5. Let every module observe the action
 * 6. Conclude at the round cap
 *
 * Module calls run under a timeout and fail open. State changes are
 * committed only when the whole step succeeds.
 */
export class NegotiationOrchestrator {
  private state: NegotiationState;
  private readonly config: OrchestratorConfig;
  private readonly logger: Logger;
  private readonly actionProvider: ActionProvider;
  private readonly activeModules: ActiveModules;
  /** Instantiated modules in registry enumeration order. */
  private readonly modules: [string, NegotiationModule][] = [];
  private readonly sharedData: Record<string, unknown> = {};
  /** Tail of the step queue. Steps run one at a time, in call order. */
  private inFlight: Promise<unknown> = Promise.resolve();

  constructor(options: OrchestratorOptions) {
    this.logger = componentLogger('orchestrator', options.logger).child({
      negotiation_id: options.negotiation_id,
    });
    this.config = parseModuleConfig(orchestratorConfigSchema, options.config, this.logger);
    this.actionProvider = options.actionProvider;
    this.activeModules = options.activeModules ?? {};
    this.state = createNegotiationState({
      negotiation_id: options.negotiation_id,
      participants: options.participants,
      max_rounds: this.config.max_rounds,
    });

    const requested = new Set(Object.values(this.activeModules).flat());
    for (const name of options.registry.listModules()) {
      if (!requested.has(name)) continue;
      const module = options.registry.create(name);
      if (module) this.modules.push([name, module]);
    }
    for (const name of requested) {
      if (!options.registry.has(name)) {
        this.logger.warn({ module: name }, 'module not found, skipping');
      }
    }
  }

  getState(): NegotiationState {
    return this.state;
  }

  /** Instantiated module by name, or null when it is not active in this negotiation. */
  getModule(name: string): NegotiationModule | null {
    return this.modules.find(([n]) => n === name)?.[1] ?? null;
  }

  isConcluded(): boolean {
    return this.state.phase === 'concluded';
  }

  /** The agreement, or null when the negotiation concluded without one. */
  getAgreement(): Agreement | null {
    if (!this.isConcluded()) {
      throw new NegotiationStateError(
        NegotiationStateErrorCode.NOT_CONCLUDED,
        `negotiation ${this.state.negotiation_id} has not concluded`,
      );
    }
    return this.state.agreement;
  }

  getOutcome(): NegotiationOutcome | null {
    return this.state.outcome;
  }

  getHistory(): readonly NegotiationEvent[] {
    return Object.freeze([...this.state.history]);
  }

  /**
   * Run one round. Overlapping calls are queued: each step starts from the
   * state the previous one committed.
   */
  step(): Promise<StepResult> {
    const run = this.inFlight.then(() => this.runStep());
    // A failed step rejects its own caller; the queue moves on.
    this.inFlight = run.catch(() => undefined);
    return run;
  }

  private async runStep(): Promise<StepResult> {
    if (this.isConcluded()) {
      return {
        round: this.state.round,
        phase: this.state.phase,
        observations: {},
        action: null,
        concluded: true,
      };
    }

    const previous = this.state;
    let next = advanceRound(previous, previous.round + 1);
    if (next.round >= next.max_rounds - this.config.closing_window) {
      next = enterClosing(next);
    }

    const ctx = buildRoundContext(next, this.activeModules, this.sharedData);
    const observations = await this.collectObservations(ctx);

    const action = await this.actionProvider({ state: next, context: ctx, observations });
    if (action) {
      next = applyAction(next, action);
      await this.notifyModules(action, ctx);
    }
    if (next.phase !== 'concluded' && next.round >= next.max_rounds) {
      next = concludeAtRoundLimit(next);
    }

    this.commit(previous, next);
    return {
      round: next.round,
      phase: next.phase,
      observations,
      action,
      concluded: next.phase === 'concluded',
    };
  }

  /** Step until the negotiation concludes. Bounded by the round cap. */
  async run(): Promise<NegotiationState> {
    while (!this.isConcluded()) {
      await this.step();
    }
    return this.state;
  }

  private commit(previous: NegotiationState, next: NegotiationState): void {
    this.state = next;
    if (previous.phase !== next.phase) {
      this.logger.info({ from: previous.phase, to: next.phase, round: next.round }, 'phase transition');
    }
    if (next.phase === 'concluded') {
      this.logger.info({ outcome: next.outcome, round: next.round }, 'negotiation concluded');
    }
  }

  private async collectObservations(ctx: RoundContext): Promise<Record<string, string>> {
    const observations: Record<string, string> = {};
    for (const participant of ctx.participants) {
      const active = ctx.active_modules.get(participant);
      const texts: string[] = [];
      for (const [name, module] of this.modules) {
        if (!active?.has(name)) continue;
        const text = await this.guarded(name, 'getObservationContext', (signal) =>
          module.getObservationContext(participant, ctx, signal),
        );
        if (text && text.trim().length > 0) texts.push(text.trim());
      }
      observations[participant] = texts.join('\n\n');
    }
    return observations;
  }

  private async notifyModules(action: RoundAction, ctx: RoundContext): Promise<void> {
    for (const [name, module] of this.modules) {
      const observe = module.observeAction;
      if (!observe) continue;
      await this.guarded(name, 'observeAction', (signal) => observe.call(module, action, ctx, signal));
    }
  }

  /**
   * Run a module call under the timeout. Failures and timeouts yield null;
   * a timed-out call sees its signal aborted.
   */
  private async guarded<T>(
    name: string,
    call: string,
    task: (signal: AbortSignal) => Promise<T>,
  ): Promise<T | null> {
    try {
      return await withTimeout(task, this.config.module_timeout_ms, `${name}.${call}`);
    } catch (err) {
      this.logger.warn({ err, module: name, call }, 'module call failed, contribution dropped');
      return null;
    }
  }
}
