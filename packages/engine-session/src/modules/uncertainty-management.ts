import type { Logger } from 'pino';
import { componentLogger } from '../logger.js';
import {
  parseModuleConfig,
  uncertaintyManagementConfigSchema,
  type UncertaintyManagementConfig,
} from '../config.js';
import { counterpartsOf } from '../context/builder.js';
import type { RoundContext } from '../context/types.js';
import type { RoundAction, Terms } from '../session/types.js';
import type { ModuleOptions, NegotiationModule } from './types.js';

export interface CounterpartEstimate {
  observations: number;
  low: number;
  high: number;
  mean: number;
  /** n / (n + 1) */
  confidence: number;
  /** (1 - risk_tolerance) * (high - low) */
  margin: number;
}

/** First numeric value among the terms, in key order. */
export function primaryValue(terms: Terms): number | null {
  for (const value of Object.values(terms)) {
    if (typeof value === 'number' && Number.isFinite(value)) return value;
  }
  return null;
}

/**
 * Estimates each counterpart's position from their offers. Confidence and
 * risk tolerance act independently: confidence decides whether to probe,
 * risk tolerance sizes the safety margin.
 */
export class UncertaintyManagementModule implements NegotiationModule {
  readonly name = 'uncertainty_management';

  private readonly config: UncertaintyManagementConfig;
  private readonly logger: Logger;
  private readonly offers = new Map<string, number[]>();

  constructor(options: ModuleOptions = {}) {
    this.logger = componentLogger(this.name, options.logger);
    this.config = parseModuleConfig(uncertaintyManagementConfigSchema, options.config, this.logger);
  }

  estimate(participant: string): CounterpartEstimate | null {
    const values = this.offers.get(participant);
    if (!values || values.length === 0) return null;
    const n = values.length;
    const low = Math.min(...values);
    const high = Math.max(...values);
    return {
      observations: n,
      low,
      high,
      mean: values.reduce((sum, v) => sum + v, 0) / n,
      confidence: n / (n + 1),
      margin: (1 - this.config.risk_tolerance) * (high - low),
    };
  }

  async observeAction(action: RoundAction, _ctx: RoundContext): Promise<void> {
    if (action.type !== 'offer') return;
    const value = primaryValue(action.terms);
    if (value === null) return;
    const values = this.offers.get(action.participant) ?? [];
    values.push(value);
    this.offers.set(action.participant, values);
  }

  async getObservationContext(participant: string, ctx: RoundContext): Promise<string> {
    const { confidence_threshold, information_gathering_budget } = this.config;
    const probe =
      `  Confidence is below ${confidence_threshold.toFixed(2)}: spend up to ` +
      `${Math.round(information_gathering_budget * 100)}% of the remaining rounds asking about their priorities.`;
    const lines = ['UNCERTAINTY ASSESSMENT:'];

    for (const other of counterpartsOf(ctx, participant)) {
      const est = this.estimate(other);
      if (!est) {
        lines.push(`- ${other}: no offers observed yet (confidence 0.00).`);
        if (confidence_threshold > 0) lines.push(probe);
        continue;
      }
      lines.push(
        `- ${other}: ${est.observations} offer(s) observed, range ${est.low} to ${est.high}, ` +
          `mean ${est.mean.toFixed(2)} (confidence ${est.confidence.toFixed(2)}).`,
      );
      if (est.confidence < confidence_threshold) lines.push(probe);
      lines.push(`  Keep a safety margin of ${est.margin.toFixed(2)} around this estimate.`);
    }
    return lines.join('\n');
  }
}
