import type { Logger } from 'pino';
import { componentLogger } from '../logger.js';
import { counterpartsOf } from '../context/builder.js';
import type { RoundContext } from '../context/types.js';
import { TheoryOfMind } from '../mind/theory-of-mind.js';
import type { BeliefNode, EmotionalState } from '../mind/types.js';
import type { RoundAction } from '../session/types.js';
import type { ModuleOptions, NegotiationModule } from './types.js';

/** What the module last inferred about a speaker. */
export interface MindReading {
  round: number;
  intention: BeliefNode | null;
  emotion: EmotionalState | null;
  /** Empathic acknowledgement for the emotion. Empty when none was produced. */
  empathic_note: string;
}

/**
 * Runs the theory-of-mind engine over every statement: the speaker's likely
 * intention, their emotional state and a suggested acknowledgement. Readings
 * are shown to the speaker's counterparts.
 */
export class TheoryOfMindModule implements NegotiationModule {
  readonly name = 'theory_of_mind';

  private readonly engine: TheoryOfMind;
  private readonly logger: Logger;
  private readonly readings = new Map<string, MindReading>();

  constructor(options: ModuleOptions = {}) {
    this.logger = componentLogger(this.name, options.logger);
    this.engine = new TheoryOfMind({ oracle: options.oracle, config: options.config, logger: options.logger });
  }

  getReading(participant: string): MindReading | null {
    return this.readings.get(participant) ?? null;
  }

  async observeAction(action: RoundAction, ctx: RoundContext, signal?: AbortSignal): Promise<void> {
    const statement = action.statement?.trim();
    if (!statement) return;
    const speaker = action.participant;

    const intention = await this.engine.predictIntention(speaker, statement);
    if (signal?.aborted) return;
    const emotion = await this.engine.detectEmotion(statement, speaker);
    if (signal?.aborted) return;
    const empathic_note = emotion ? await this.engine.generateEmpathicResponse(emotion) : '';
    if (signal?.aborted) return;

    if (!intention && !emotion) {
      this.logger.debug({ speaker, round: ctx.round }, 'nothing inferred');
      return;
    }
    this.readings.set(speaker, { round: ctx.round, intention, emotion, empathic_note });
  }

  async getObservationContext(participant: string, ctx: RoundContext): Promise<string> {
    const lines: string[] = [];
    for (const other of counterpartsOf(ctx, participant)) {
      const reading = this.readings.get(other);
      if (!reading) continue;
      if (reading.intention) {
        lines.push(
          `- ${other}'s likely intention after round ${reading.round} ` +
            `(${reading.intention.depth + 1} level(s) of reasoning): ${reading.intention.content}`,
        );
      }
      if (reading.emotion) {
        lines.push(
          `- ${other} feels ${reading.emotion.primary_emotion} ` +
            `(intensity ${reading.emotion.intensity.toFixed(2)}).`,
        );
        if (reading.empathic_note) {
          lines.push(`  Suggested acknowledgement: ${reading.empathic_note}`);
        }
      }
    }
    if (lines.length === 0) return '';
    return ['THEORY OF MIND:', ...lines].join('\n');
  }
}
