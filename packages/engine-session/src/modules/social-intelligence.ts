import { z } from 'zod';
import {
  EMOTION_LABELS,
  emotionValence,
  parseNumericClaim,
  scoreIntensity,
  type ClaimTopic,
} from '@parley/engine-core';
import type { Logger } from 'pino';
import { componentLogger } from '../logger.js';
import { classify } from '../oracle/classify.js';
import { nullOracle, type Oracle } from '../oracle/types.js';
import { parseModuleConfig, socialIntelligenceConfigSchema, type SocialIntelligenceConfig } from '../config.js';
import { counterpartsOf } from '../context/builder.js';
import type { RoundContext } from '../context/types.js';
import type { EmotionalState } from '../mind/types.js';
import type { RoundAction } from '../session/types.js';
import type { ModuleOptions, NegotiationModule } from './types.js';

/** A numeric claim that contradicts an earlier claim on the same topic. */
export interface DeceptionIndicator {
  participant: string;
  indicator_type: 'inconsistent_claim';
  topic: ClaimTopic;
  description: string;
  previous_round: number;
  current_round: number;
  previous_value: number;
  current_value: number;
}

interface StoredClaim {
  value: number;
  round: number;
}

/** What this module publishes under `shared_data.social_intelligence`. */
export const socialSummarySchema = z.object({
  emotions: z.record(z.string(), z.string()),
  deception_flags: z.record(z.string(), z.number()),
});

export type SocialSummary = z.infer<typeof socialSummarySchema>;

export class SocialIntelligenceModule implements NegotiationModule {
  readonly name = 'social_intelligence';

  private readonly oracle: Oracle;
  private readonly config: SocialIntelligenceConfig;
  private readonly logger: Logger;
  /** participant → topic → last accepted claim */
  private readonly claims = new Map<string, Map<ClaimTopic, StoredClaim>>();
  private readonly emotions = new Map<string, EmotionalState>();
  private readonly indicators: DeceptionIndicator[] = [];

  constructor(options: ModuleOptions = {}) {
    this.oracle = options.oracle ?? nullOracle;
    this.logger = componentLogger(this.name, options.logger);
    this.config = parseModuleConfig(socialIntelligenceConfigSchema, options.config, this.logger);
  }

  /**
   * One oracle classification for the label; intensity and valence come
   * from the text. Null when the label is outside the enumerated set.
   */
  async detectEmotion(text: string, participant: string, round: number): Promise<EmotionalState | null> {
    const label = await classify(
      this.oracle,
      `Round ${round}. Classify the primary emotion ${participant} expresses in this statement:\n"${text}"`,
      EMOTION_LABELS,
      this.logger,
    );
    if (label === null) return null;
    const intensity = scoreIntensity(text);
    return {
      participant,
      primary_emotion: label,
      intensity,
      valence: emotionValence(label, intensity),
      context: [text],
    };
  }

  /**
   * Compare the statement's numeric claim with the participant's last claim
   * on the same topic. The first claim on a topic is stored and never flagged.
   * A flagged claim does not replace the stored one.
   */
  checkConsistency(
    participant: string,
    statement: string,
    round: number,
    topic?: ClaimTopic,
  ): DeceptionIndicator | null {
    const claim = parseNumericClaim(statement);
    if (!claim) return null;
    const key = topic ?? claim.topic;

    let byTopic = this.claims.get(participant);
    if (!byTopic) {
      byTopic = new Map();
      this.claims.set(participant, byTopic);
    }
    const prior = byTopic.get(key);
    if (prior) {
      const diff = Math.abs(claim.value - prior.value);
      const relative = prior.value === 0 ? diff : diff / Math.abs(prior.value);
      if (relative > this.config.consistency_tolerance) {
        return {
          participant,
          indicator_type: 'inconsistent_claim',
          topic: key,
          description:
            `${participant} claimed ${prior.value} on ${key} in round ${prior.round} ` +
            `but ${claim.value} in round ${round}`,
          previous_round: prior.round,
          current_round: round,
          previous_value: prior.value,
          current_value: claim.value,
        };
      }
    }
    byTopic.set(key, { value: claim.value, round });
    return null;
  }

  getLatestEmotion(participant: string): EmotionalState | null {
    return this.emotions.get(participant) ?? null;
  }

  getIndicators(participant?: string): DeceptionIndicator[] {
    return this.indicators.filter((i) => participant === undefined || i.participant === participant);
  }

  async observeAction(action: RoundAction, ctx: RoundContext, signal?: AbortSignal): Promise<void> {
    const statement = action.statement?.trim();
    if (!statement) return;

    const emotion = await this.detectEmotion(statement, action.participant, ctx.round);
    if (signal?.aborted) {
      this.logger.debug({ participant: action.participant, round: ctx.round }, 'late result dropped');
      return;
    }
    if (emotion) {
      this.emotions.set(action.participant, emotion);
    }
    const indicator = this.checkConsistency(action.participant, statement, ctx.round);
    if (indicator) {
      this.logger.info({ indicator }, 'inconsistent claim detected');
      this.indicators.push(indicator);
    }
    ctx.shared_data[this.name] = this.summary();
  }

  async getObservationContext(participant: string, ctx: RoundContext): Promise<string> {
    const lines: string[] = [];
    for (const other of counterpartsOf(ctx, participant)) {
      const emotion = this.emotions.get(other);
      if (emotion) {
        lines.push(
          `- ${other} appears ${emotion.primary_emotion} ` +
            `(intensity ${emotion.intensity.toFixed(2)}, valence ${emotion.valence.toFixed(2)}).`,
        );
      }
      const flagged = this.getIndicators(other);
      if (flagged.length > 0) {
        const latest = flagged[flagged.length - 1];
        lines.push(`- Caution: ${other} made ${flagged.length} inconsistent claim(s). Latest: ${latest.description}.`);
      }
    }
    if (lines.length === 0) return '';
    return ['SOCIAL INTELLIGENCE:', ...lines].join('\n');
  }

  private summary(): SocialSummary {
    const deception_flags: Record<string, number> = {};
    for (const indicator of this.indicators) {
      deception_flags[indicator.participant] = (deception_flags[indicator.participant] ?? 0) + 1;
    }
    const emotions: Record<string, string> = {};
    for (const [participant, emotion] of this.emotions) {
      emotions[participant] = emotion.primary_emotion;
    }
    return { emotions, deception_flags };
  }
}
