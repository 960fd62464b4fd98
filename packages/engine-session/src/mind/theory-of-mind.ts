import { EMOTION_LABELS, emotionValence, scoreIntensity } from '@parley/engine-core';
import type { Logger } from 'pino';
import { componentLogger } from '../logger.js';
import { ask, classify } from '../oracle/classify.js';
import { nullOracle, type Oracle } from '../oracle/types.js';
import { parseModuleConfig, theoryOfMindConfigSchema, type TheoryOfMindConfig } from '../config.js';
import type { BeliefNode, EmotionalState } from './types.js';

export interface TheoryOfMindOptions {
  oracle?: Oracle;
  config?: unknown;
  logger?: Logger;
}

type Attitude = 'believes' | 'intends';

/** Wrap an inner inference in one more level of "X believes that Y …". */
export function nestFrame(holder: string, about: string, attitude: Attitude, inner: string): string {
  return `${holder} believes that ${about} ${attitude} that ${inner}`;
}

function warmth(empathyLevel: number): string {
  if (empathyLevel >= 0.7) return 'warm and validating';
  if (empathyLevel >= 0.4) return 'measured and respectful';
  return 'brief and businesslike';
}

/**
 * Depth-bounded recursive inference over mental states.
 *
 * Every inference issues one oracle call per level, levels 0 through
 * `max_recursion_depth`. Level 0 reads the literal statement; each deeper
 * level nests the previous answer in another belief frame. The chain is
 * built with an explicit frame stack and stops at the first failed level,
 * returning the deepest level that succeeded.
 */
export class TheoryOfMind {
  private readonly oracle: Oracle;
  private readonly config: TheoryOfMindConfig;
  private readonly logger: Logger;

  constructor(options: TheoryOfMindOptions = {}) {
    this.oracle = options.oracle ?? nullOracle;
    this.logger = componentLogger('theory_of_mind', options.logger);
    this.config = parseModuleConfig(theoryOfMindConfigSchema, options.config, this.logger);
  }

  /** Levels of inference performed per call: depths 0..max_recursion_depth. */
  get levels(): number {
    return this.config.max_recursion_depth + 1;
  }

  private async chain(
    holder: string,
    about: string,
    attitude: Attitude,
    literalPrompt: string,
  ): Promise<BeliefNode[]> {
    const frames: BeliefNode[] = [];
    for (let depth = 0; depth < this.levels; depth++) {
      const previous = frames[frames.length - 1];
      const prompt = previous
        ? `${nestFrame(holder, about, attitude, previous.content)}.\n` +
          `Reason one level deeper: what does ${about} think ${holder} expects? Answer in one sentence.`
        : literalPrompt;
      const content = await ask(this.oracle, prompt, this.logger);
      if (content === null) {
        this.logger.debug({ holder, about, depth }, 'inference chain truncated');
        break;
      }
      frames.push({ holder, about, content, depth });
    }
    return frames;
  }

  /** Deepest belief `holder` can attribute to `about`, or null when level 0 fails. */
  async inferBelief(holder: string, about: string, statement: string): Promise<BeliefNode | null> {
    const frames = await this.chain(
      holder,
      about,
      'believes',
      `${about} said to ${holder}: "${statement}"\nWhat does ${about} believe? Answer in one sentence.`,
    );
    return frames[frames.length - 1] ?? null;
  }

  async predictIntention(participant: string, statement: string, observer = 'their counterpart'): Promise<BeliefNode | null> {
    const frames = await this.chain(
      observer,
      participant,
      'intends',
      `${participant} said: "${statement}"\nWhat does ${participant} intend to do next? Answer in one sentence.`,
    );
    return frames[frames.length - 1] ?? null;
  }

  /**
   * Level 0 classifies the label; deeper levels collect what triggered it.
   * Emotions below `1 - emotion_sensitivity` in intensity are not reported.
   */
  async detectEmotion(text: string, participant: string): Promise<EmotionalState | null> {
    const label = await classify(
      this.oracle,
      `Classify the primary emotion ${participant} expresses in this statement:\n"${text}"`,
      EMOTION_LABELS,
      this.logger,
    );
    if (label === null) return null;

    const intensity = scoreIntensity(text);
    if (intensity < 1 - this.config.emotion_sensitivity) {
      return null;
    }

    const context = [text];
    for (let depth = 1; depth < this.levels; depth++) {
      const trigger = await ask(
        this.oracle,
        `${participant} feels ${label}. Known triggers so far:\n` +
          context.map((c) => `- ${c}`).join('\n') +
          `\nWhat earlier cause lies behind the most recent trigger? Answer in one sentence.`,
        this.logger,
      );
      if (trigger === null) break;
      context.push(trigger);
    }

    return {
      participant,
      primary_emotion: label,
      intensity,
      valence: emotionValence(label, intensity),
      context,
    };
  }

  /** One oracle call. Empty string when the oracle fails. */
  async generateEmpathicResponse(emotion: EmotionalState): Promise<string> {
    const response = await ask(
      this.oracle,
      `${emotion.participant} is feeling ${emotion.primary_emotion} ` +
        `(intensity ${emotion.intensity.toFixed(2)}). ` +
        `Write one ${warmth(this.config.empathy_level)} sentence acknowledging this before continuing the negotiation.`,
      this.logger,
    );
    return response ?? '';
  }
}
