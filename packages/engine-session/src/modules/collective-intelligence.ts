import { runSwarmConsensus, type SwarmDecision, type SwarmRecommendation } from '@parley/engine-core';
import type { Logger } from 'pino';
import { componentLogger } from '../logger.js';
import {
  collectiveIntelligenceConfigSchema,
  parseModuleConfig,
  type CollectiveIntelligenceConfig,
} from '../config.js';
import { counterpartsOf } from '../context/builder.js';
import type { RoundContext } from '../context/types.js';
import type { NegotiationPhase, RoundAction } from '../session/types.js';
import { socialSummarySchema } from './social-intelligence.js';
import type { ModuleOptions, NegotiationModule } from './types.js';

export type CollectiveChoice = 'accept' | 'counter' | 'hold' | 'walk_away';

/** What a specialist sees when forming its recommendation. */
export interface SpecialistView {
  phase: NegotiationPhase;
  /** round / max_rounds */
  pressure: number;
  /** An offer addressed to the participant is waiting for an answer. */
  has_pending_offer: boolean;
  /** Inconsistent claims flagged against the counterparts so far. */
  deception_flags: number;
}

export type Specialist = (view: SpecialistView) => Omit<SwarmRecommendation<CollectiveChoice>, 'agent_id'>;

export const SPECIALISTS: Readonly<Record<string, Specialist>> = {
  market_analyst: (v) => {
    if (!v.has_pending_offer) return { choice: 'counter', confidence: 0.5, rationale: 'no offer on the table' };
    return v.pressure >= 0.5
      ? { choice: 'accept', confidence: 0.6, rationale: 'offer is in hand late in the negotiation' }
      : { choice: 'counter', confidence: 0.7, rationale: 'early offers leave room to improve' };
  },
  relationship_keeper: (v) => {
    if (v.deception_flags > 0) return { choice: 'hold', confidence: 0.5, rationale: 'trust needs repair' };
    return v.has_pending_offer
      ? { choice: 'accept', confidence: 0.7, rationale: 'accepting builds goodwill' }
      : { choice: 'counter', confidence: 0.5, rationale: 'keep the dialogue moving' };
  },
  risk_assessor: (v) => {
    if (v.deception_flags > 0) {
      return v.pressure >= 0.8
        ? { choice: 'walk_away', confidence: 0.6, rationale: 'unreliable counterpart near the deadline' }
        : { choice: 'hold', confidence: 0.7, rationale: 'verify claims before committing' };
    }
    return v.has_pending_offer
      ? { choice: 'accept', confidence: 0.5, rationale: 'a firm offer lowers exposure' }
      : { choice: 'hold', confidence: 0.4, rationale: 'wait for a firm offer' };
  },
  deal_closer: (v) => {
    if (v.phase === 'closing' || v.pressure >= 0.8) {
      return v.has_pending_offer
        ? { choice: 'accept', confidence: 0.9, rationale: 'close before the deadline' }
        : { choice: 'counter', confidence: 0.8, rationale: 'table a closing offer' };
    }
    return { choice: 'counter', confidence: 0.6, rationale: 'keep momentum' };
  },
};

/** Runs the specialist panel through swarm consensus for each participant. */
export class CollectiveIntelligenceModule implements NegotiationModule {
  readonly name = 'collective_intelligence';

  private readonly config: CollectiveIntelligenceConfig;
  private readonly logger: Logger;
  /** recipient → offerer of the latest unanswered offer */
  private readonly pending = new Map<string, string>();

  constructor(options: ModuleOptions = {}) {
    this.logger = componentLogger(this.name, options.logger);
    this.config = parseModuleConfig(collectiveIntelligenceConfigSchema, options.config, this.logger);
  }

  async observeAction(action: RoundAction, _ctx: RoundContext): Promise<void> {
    if (action.type === 'offer') {
      this.pending.delete(action.participant);
      this.pending.set(action.recipient, action.participant);
    } else {
      this.pending.clear();
    }
  }

  viewFor(participant: string, ctx: RoundContext): SpecialistView {
    const summary = socialSummarySchema.safeParse(ctx.shared_data.social_intelligence);
    const flags = summary.success
      ? counterpartsOf(ctx, participant).reduce((sum, p) => sum + (summary.data.deception_flags[p] ?? 0), 0)
      : 0;
    return {
      phase: ctx.phase,
      pressure: ctx.max_rounds > 0 ? Math.min(1, ctx.round / ctx.max_rounds) : 1,
      has_pending_offer: this.pending.has(participant),
      deception_flags: flags,
    };
  }

  deliberate(view: SpecialistView): SwarmDecision<CollectiveChoice> {
    const recommendations = Object.entries(SPECIALISTS).map(([agent_id, specialist]) => ({
      agent_id,
      ...specialist(view),
    }));
    const decision = runSwarmConsensus(recommendations, this.config);
    this.logger.debug(
      { decision: decision.decision, agreement: decision.agreement, iterations: decision.iterations },
      'swarm deliberation',
    );
    return decision;
  }

  async getObservationContext(participant: string, ctx: RoundContext): Promise<string> {
    const result = this.deliberate(this.viewFor(participant, ctx));
    const votes = result.recommendations.map((r) => `${r.agent_id}=${r.choice}`).join(', ');
    return [
      'COLLECTIVE INTELLIGENCE:',
      `Specialist consensus: ${result.decision} ` +
        `(agreement ${result.agreement.toFixed(2)} after ${result.iterations} iteration(s)` +
        `${result.converged ? '' : ', not converged'}).`,
      `Votes: ${votes}.`,
    ].join('\n');
  }
}
