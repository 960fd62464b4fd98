import type { Logger } from 'pino';
import { componentLogger } from '../logger.js';
import { parseModuleConfig, temporalDynamicsConfigSchema, type TemporalDynamicsConfig } from '../config.js';
import type { RoundContext } from '../context/types.js';
import type { ModuleOptions, NegotiationModule } from './types.js';

export type PressureTier = 'low' | 'moderate' | 'high';

export interface TemporalAssessment {
  rounds_remaining: number;
  /** round / max_rounds, in [0, 1] */
  time_pressure: number;
  tier: PressureTier;
  /** discount_factor ^ rounds_remaining */
  continuation_value: number;
  relationship_focus: boolean;
}

const PRESSURE_GUIDANCE: Readonly<Record<PressureTier, string>> = {
  low: 'There is time to explore options before conceding.',
  moderate: 'Start converging: make concessions that signal movement.',
  high: 'The deadline is close. Move toward closing or make a final offer.',
};

export function pressureTier(pressure: number): PressureTier {
  if (pressure < 0.5) return 'low';
  if (pressure < 0.8) return 'moderate';
  return 'high';
}

/** Deadline pressure and the discounted value of continuing. Stateless. */
export class TemporalDynamicsModule implements NegotiationModule {
  readonly name = 'temporal_dynamics';

  private readonly config: TemporalDynamicsConfig;
  private readonly logger: Logger;

  constructor(options: ModuleOptions = {}) {
    this.logger = componentLogger(this.name, options.logger);
    this.config = parseModuleConfig(temporalDynamicsConfigSchema, options.config, this.logger);
  }

  assess(round: number, maxRounds: number): TemporalAssessment {
    const remaining = Math.max(0, maxRounds - round);
    const pressure = maxRounds > 0 ? Math.min(1, round / maxRounds) : 1;
    return {
      rounds_remaining: remaining,
      time_pressure: pressure,
      tier: pressureTier(pressure),
      continuation_value: this.config.discount_factor ** remaining,
      relationship_focus:
        this.config.reputation_weight >= this.config.relationship_investment_threshold * 0.5,
    };
  }

  async getObservationContext(_participant: string, ctx: RoundContext): Promise<string> {
    const a = this.assess(ctx.round, ctx.max_rounds);
    return [
      'TEMPORAL DYNAMICS:',
      `Round ${ctx.round} of ${ctx.max_rounds} (${a.rounds_remaining} remaining). ` +
        `Time pressure ${a.time_pressure.toFixed(2)} (${a.tier}).`,
      `A deal at the deadline is worth ${a.continuation_value.toFixed(2)} of the same deal today.`,
      PRESSURE_GUIDANCE[a.tier],
      a.relationship_focus
        ? 'Reputation matters here: prefer concessions that build the long-term relationship.'
        : "Weigh this deal's value above the long-term relationship.",
    ].join('\n');
  }
}
