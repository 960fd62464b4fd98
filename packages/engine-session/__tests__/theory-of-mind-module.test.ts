import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { TheoryOfMindModule } from '../src/modules/theory-of-mind.js';
import type { RoundContext } from '../src/context/types.js';
import type { RoundAction } from '../src/session/types.js';

const logger = pino({ level: 'silent' });

function makeContext(round: number): RoundContext {
  return {
    negotiation_id: 'neg-1',
    participants: ['alice', 'bob'],
    phase: 'bargaining',
    round,
    max_rounds: 10,
    active_modules: new Map(),
    shared_data: {},
  };
}

const statement: RoundAction = {
  type: 'offer',
  participant: 'bob',
  recipient: 'alice',
  terms: { price: 450 },
  // one '!', "really" and "best": 0.4 + 0.15 + 0.2
  statement: 'This is really the best I can do!',
};

function scriptedOracle(...answers: string[]) {
  const oracle = vi.fn(async (_prompt: string) => '');
  for (const answer of answers) oracle.mockResolvedValueOnce(answer);
  return oracle;
}

// depth 0: one intention call, one emotion label, one empathic response
const config = { max_recursion_depth: 0, emotion_sensitivity: 1, empathy_level: 0.8 };

describe('TheoryOfMindModule', () => {
  it('shows intention, emotion and an acknowledgement to the counterpart', async () => {
    const oracle = scriptedOracle(
      'They want to close the deal this round.',
      'Frustrated.',
      'I can see this has been a long process.',
    );
    const module = new TheoryOfMindModule({ oracle, logger, config });

    await module.observeAction(statement, makeContext(3));

    expect(oracle).toHaveBeenCalledTimes(3);
    expect(oracle.mock.calls[2][0]).toContain('warm and validating');
    expect(await module.getObservationContext('alice', makeContext(4))).toBe(
      [
        'THEORY OF MIND:',
        "- bob's likely intention after round 3 (1 level(s) of reasoning): They want to close the deal this round.",
        '- bob feels frustrated (intensity 0.75).',
        '  Suggested acknowledgement: I can see this has been a long process.',
      ].join('\n'),
    );
    expect(await module.getObservationContext('bob', makeContext(4))).toBe('');
  });

  it('records nothing when the oracle has nothing to say', async () => {
    const module = new TheoryOfMindModule({ oracle: async () => '', logger, config });
    await module.observeAction(statement, makeContext(1));
    expect(module.getReading('bob')).toBeNull();
    expect(await module.getObservationContext('alice', makeContext(2))).toBe('');
  });

  it('ignores actions without a statement', async () => {
    const oracle = scriptedOracle();
    const module = new TheoryOfMindModule({ oracle, logger, config });
    await module.observeAction({ type: 'accept', participant: 'bob' }, makeContext(1));
    expect(oracle).not.toHaveBeenCalled();
  });

  it('stops and keeps nothing once its call is abandoned', async () => {
    const oracle = scriptedOracle('They want to close the deal this round.', 'frustrated', 'Noted.');
    const module = new TheoryOfMindModule({ oracle, logger, config });
    const controller = new AbortController();
    controller.abort();

    await module.observeAction(statement, makeContext(1), controller.signal);

    expect(oracle).toHaveBeenCalledTimes(1);
    expect(module.getReading('bob')).toBeNull();
  });
});
