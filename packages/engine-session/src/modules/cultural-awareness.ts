import {
  CULTURAL_PROFILES,
  CULTURE_KEYS,
  culturalDistance,
  directnessTolerance,
  distanceTier,
  isCultureKey,
  scoreDirectness,
  type CultureKey,
  type DistanceTier,
} from '@parley/engine-core';
import type { Logger } from 'pino';
import { componentLogger } from '../logger.js';
import { classify } from '../oracle/classify.js';
import { nullOracle, type Oracle } from '../oracle/types.js';
import { culturalAwarenessConfigSchema, parseModuleConfig, type CulturalAwarenessConfig } from '../config.js';
import { counterpartsOf } from '../context/builder.js';
import type { RoundContext } from '../context/types.js';
import type { RoundAction } from '../session/types.js';
import type { ModuleOptions, NegotiationModule } from './types.js';

export type CultureSource = 'assigned' | 'detected' | 'default';

export interface CulturalViolation {
  speaker: string;
  listener: string;
  round: number;
  description: string;
}

/** Guidance per distance tier: explicit advice, then the informational variant. */
const TIER_GUIDANCE: Readonly<Record<DistanceTier, readonly [string, string]>> = {
  low: ['Styles are closely aligned; keep your usual approach.', 'Styles are closely aligned.'],
  medium: [
    'Adjust your directness and formality part of the way toward their style.',
    'There are noticeable differences in communication style.',
  ],
  high: [
    'Adapt strongly: mirror their level of formality and soften direct statements.',
    'Communication styles differ widely.',
  ],
};

export class CulturalAwarenessModule implements NegotiationModule {
  readonly name = 'cultural_awareness';

  private readonly oracle: Oracle;
  private readonly config: CulturalAwarenessConfig;
  private readonly logger: Logger;
  private readonly assigned = new Map<string, CultureKey>();
  private readonly detected = new Map<string, CultureKey>();
  private readonly violations: CulturalViolation[] = [];

  constructor(options: ModuleOptions = {}) {
    this.oracle = options.oracle ?? nullOracle;
    this.logger = componentLogger(this.name, options.logger);
    this.config = parseModuleConfig(culturalAwarenessConfigSchema, options.config, this.logger);
  }

  /** Assign a culture. Keys outside the catalogue leave the old assignment in place. */
  setParticipantCulture(participant: string, key: string): void {
    if (!isCultureKey(key)) {
      this.logger.warn({ participant, key }, 'unknown culture key, assignment unchanged');
      return;
    }
    this.assigned.set(participant, key);
  }

  /** Effective culture: assigned, else detected, else the configured own culture. */
  cultureOf(participant: string): { key: CultureKey; source: CultureSource } {
    const assigned = this.assigned.get(participant);
    if (assigned) return { key: assigned, source: 'assigned' };
    const detected = this.detected.get(participant);
    if (detected) return { key: detected, source: 'detected' };
    return { key: this.config.own_culture, source: 'default' };
  }

  /**
   * Oracle classification of a participant's culture from one statement.
   * A valid label is remembered unless `signal` was aborted meanwhile;
   * assignments still take precedence.
   */
  async detectCulture(participant: string, statement: string, signal?: AbortSignal): Promise<CultureKey | null> {
    if (!this.config.detect_culture) return null;
    const key = await classify(
      this.oracle,
      `Which negotiation culture does ${participant}'s communication style best match?\n"${statement}"`,
      CULTURE_KEYS,
      this.logger,
    );
    if (signal?.aborted) return null;
    if (key) {
      this.detected.set(participant, key);
    }
    return key;
  }

  /**
   * A statement violates the listener's norms when both the speaker's
   * cultural directness and the statement's lexical directness exceed what
   * the listener tolerates.
   */
  detectCulturalViolation(speaker: string, statement: string, listener: string): string | null {
    const speakerProfile = CULTURAL_PROFILES[this.cultureOf(speaker).key];
    const listenerProfile = CULTURAL_PROFILES[this.cultureOf(listener).key];
    const tolerance = directnessTolerance(listenerProfile);
    const directness = scoreDirectness(statement);
    if (speakerProfile.directness <= tolerance || directness <= tolerance) {
      return null;
    }
    return (
      `${speaker} (${speakerProfile.name}) was too direct for ${listener} (${listenerProfile.name}): ` +
      `directness ${directness.toFixed(2)} exceeds tolerance ${tolerance.toFixed(2)}`
    );
  }

  getViolations(): CulturalViolation[] {
    return [...this.violations];
  }

  async observeAction(action: RoundAction, ctx: RoundContext, signal?: AbortSignal): Promise<void> {
    const statement = action.statement?.trim();
    if (!statement) return;

    const speaker = action.participant;
    if (!this.assigned.has(speaker) && !this.detected.has(speaker)) {
      await this.detectCulture(speaker, statement, signal);
      if (signal?.aborted) return;
    }
    for (const listener of counterpartsOf(ctx, speaker)) {
      const description = this.detectCulturalViolation(speaker, statement, listener);
      if (description) {
        this.violations.push({ speaker, listener, round: ctx.round, description });
      }
    }
    ctx.shared_data[this.name] = { violations: this.getViolations() };
  }

  async getObservationContext(participant: string, ctx: RoundContext): Promise<string> {
    const own = this.cultureOf(participant);
    const ownProfile = CULTURAL_PROFILES[own.key];
    const explicit = this.config.adaptation_level >= 0.5;
    const lines = ['CULTURAL ADAPTATION:', `Your culture: ${ownProfile.name}.`];

    for (const other of counterpartsOf(ctx, participant)) {
      const theirs = this.cultureOf(other);
      const profile = CULTURAL_PROFILES[theirs.key];
      const distance = culturalDistance(ownProfile, profile);
      const tier = distanceTier(distance);
      const [advice, info] = TIER_GUIDANCE[tier];
      lines.push(
        `- ${other}: ${profile.name} (${theirs.source}), distance ${distance.toFixed(2)} (${tier}). ` +
          (explicit ? advice : info),
      );
    }

    const ownViolations = this.violations.filter((v) => v.speaker === participant);
    if (ownViolations.length > 0) {
      lines.push(`Note: ${ownViolations[ownViolations.length - 1].description}.`);
    }
    return lines.join('\n');
  }
}
