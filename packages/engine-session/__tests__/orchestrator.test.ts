import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { NegotiationOrchestrator, type OrchestratorOptions } from '../src/round/orchestrator.js';
import { ModuleRegistry } from '../src/modules/registry.js';
import { createDefaultRegistry } from '../src/modules/defaults.js';
import { SocialIntelligenceModule } from '../src/modules/social-intelligence.js';
import { NegotiationStateError, NegotiationStateErrorCode } from '../src/session/errors.js';
import type { NegotiationModule } from '../src/modules/types.js';
import type { ActionProvider } from '../src/round/types.js';
import type { RoundContext } from '../src/context/types.js';
import type { RoundAction } from '../src/session/types.js';

const logger = pino({ level: 'silent' });

function scripted(actions: (RoundAction | null)[]): ActionProvider {
  let i = 0;
  return async () => actions[i++] ?? null;
}

function textModule(name: string, text: string): NegotiationModule {
  return { name, getObservationContext: async () => text };
}

function textModuleFrom(name: string, render: (ctx: RoundContext) => string): NegotiationModule {
  return { name, getObservationContext: async (_participant, ctx) => render(ctx) };
}

function makeOrchestrator(overrides: Partial<OrchestratorOptions> = {}): NegotiationOrchestrator {
  return new NegotiationOrchestrator({
    negotiation_id: 'neg-1',
    participants: ['alice', 'bob'],
    registry: new ModuleRegistry(),
    actionProvider: scripted([]),
    logger,
    ...overrides,
  });
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const offer = (participant: string, recipient: string, price: number, statement?: string): RoundAction => ({
  type: 'offer',
  participant,
  recipient,
  terms: { price },
  statement,
});

describe('NegotiationOrchestrator: conclusion', () => {
  it('concludes on agreement and ignores later steps', async () => {
    const orchestrator = makeOrchestrator({
      actionProvider: scripted([offer('alice', 'bob', 500), { type: 'accept', participant: 'bob' }]),
    });

    await orchestrator.step();
    const second = await orchestrator.step();
    expect(second.concluded).toBe(true);
    expect(orchestrator.getAgreement()).toEqual({ parties: ['alice', 'bob'], terms: { price: 500 }, round: 2 });
    expect(orchestrator.getOutcome()).toBe('agreement');

    const history = orchestrator.getHistory();
    const third = await orchestrator.step();
    expect(third).toEqual({ round: 2, phase: 'concluded', observations: {}, action: null, concluded: true });
    expect(orchestrator.getHistory()).toEqual(history);
    expect(orchestrator.isConcluded()).toBe(true);
  });

  it('concludes at the round cap without an agreement', async () => {
    const orchestrator = makeOrchestrator({ config: { max_rounds: 3 } });

    await orchestrator.step();
    await orchestrator.step();
    expect(orchestrator.isConcluded()).toBe(false);
    const last = await orchestrator.step();
    expect(last).toMatchObject({ round: 3, phase: 'concluded', concluded: true });
    expect(orchestrator.getOutcome()).toBe('round_limit');
    expect(orchestrator.getAgreement()).toBeNull();
  });

  it('concludes on withdrawal', async () => {
    const orchestrator = makeOrchestrator({
      actionProvider: scripted([{ type: 'withdraw', participant: 'bob' }]),
    });
    await orchestrator.step();
    expect(orchestrator.getState()).toMatchObject({ phase: 'concluded', outcome: 'withdrawal', withdrawn_by: 'bob' });
  });

  it('getAgreement throws before conclusion', () => {
    const orchestrator = makeOrchestrator();
    expect(() => orchestrator.getAgreement()).toThrow(NegotiationStateError);
  });

  it('run() always terminates at the cap', async () => {
    const orchestrator = makeOrchestrator({ config: { max_rounds: 4 } });
    const state = await orchestrator.run();
    expect(state.round).toBe(4);
    expect(state.outcome).toBe('round_limit');
  });
});

describe('NegotiationOrchestrator: phases', () => {
  it('moves bargaining to closing inside the closing window', async () => {
    const phases: string[] = [];
    const actions = [offer('alice', 'bob', 500), offer('bob', 'alice', 400), offer('alice', 'bob', 450)];
    let i = 0;
    const orchestrator = makeOrchestrator({
      config: { max_rounds: 5, closing_window: 2 },
      actionProvider: async ({ context }) => {
        phases.push(context.phase);
        return actions[i++] ?? null;
      },
    });

    const results = [await orchestrator.step(), await orchestrator.step(), await orchestrator.step()];
    expect(phases).toEqual(['opening', 'bargaining', 'closing']);
    expect(results.map((r) => r.phase)).toEqual(['bargaining', 'bargaining', 'closing']);
  });

  it('rejects an invalid action and leaves the state unchanged', async () => {
    const orchestrator = makeOrchestrator({
      actionProvider: scripted([{ type: 'accept', participant: 'bob' }]),
    });
    const before = orchestrator.getState();

    await expect(orchestrator.step()).rejects.toMatchObject({ code: NegotiationStateErrorCode.NO_PENDING_OFFER });
    expect(orchestrator.getState()).toBe(before);
    expect(orchestrator.getState().round).toBe(0);
  });
});

describe('NegotiationOrchestrator: modules', () => {
  it('joins observations in registry enumeration order', async () => {
    const registry = new ModuleRegistry();
    registry.register('second', () => textModule('second', 'B'));
    registry.register('first', () => textModule('first', 'A'));
    registry.register('quiet', () => textModule('quiet', ''));

    const orchestrator = makeOrchestrator({
      registry,
      activeModules: { alice: ['first', 'quiet', 'second'] },
    });
    const result = await orchestrator.step();
    expect(result.observations).toEqual({ alice: 'B\n\nA', bob: '' });
  });

  it('drops modules that time out or fail', async () => {
    const registry = new ModuleRegistry();
    registry.register('slow', () => ({
      name: 'slow',
      getObservationContext: () => new Promise<string>(() => undefined),
    }));
    registry.register('broken', () => ({
      name: 'broken',
      getObservationContext: async () => {
        throw new Error('boom');
      },
    }));
    registry.register('ok', () => textModule('ok', 'fine'));

    const orchestrator = makeOrchestrator({
      registry,
      config: { module_timeout_ms: 20 },
      activeModules: { alice: ['slow', 'broken', 'ok'] },
    });
    const result = await orchestrator.step();
    expect(result.observations.alice).toBe('fine');
  });

  it('skips unknown module names', async () => {
    const orchestrator = makeOrchestrator({ activeModules: { alice: ['does_not_exist'] } });
    const result = await orchestrator.step();
    expect(result.observations.alice).toBe('');
  });

  it('lets every instantiated module observe accepted actions', async () => {
    const observeAction = vi.fn(async () => undefined);
    const registry = new ModuleRegistry();
    registry.register('watcher', () => ({ ...textModule('watcher', ''), observeAction }));
    const action = offer('alice', 'bob', 500, 'I can pay $500');

    const orchestrator = makeOrchestrator({
      registry,
      activeModules: { bob: ['watcher'] },
      actionProvider: scripted([action]),
    });
    await orchestrator.step();
    await orchestrator.step();

    expect(observeAction).toHaveBeenCalledTimes(1);
    expect(observeAction.mock.calls[0]).toEqual([action, expect.objectContaining({ round: 1 })]);
  });

  it('carries shared data across rounds', async () => {
    const registry = new ModuleRegistry();
    registry.register('counter', () => ({
      name: 'counter',
      getObservationContext: async (_participant, ctx) => `seen ${String(ctx.shared_data.counter ?? 0)}`,
      observeAction: async (_action, ctx) => {
        const seen = typeof ctx.shared_data.counter === 'number' ? ctx.shared_data.counter : 0;
        ctx.shared_data.counter = seen + 1;
      },
    }));
    const orchestrator = makeOrchestrator({
      registry,
      activeModules: { alice: ['counter'] },
      actionProvider: scripted([offer('alice', 'bob', 1), offer('bob', 'alice', 2)]),
    });

    expect((await orchestrator.step()).observations.alice).toBe('seen 0');
    expect((await orchestrator.step()).observations.alice).toBe('seen 1');
    expect((await orchestrator.step()).observations.alice).toBe('seen 2');
  });

  it('surfaces social signals from the default modules', async () => {
    const orchestrator = makeOrchestrator({
      registry: createDefaultRegistry({ oracle: async () => 'neutral', logger }),
      activeModules: { alice: ['social_intelligence'] },
      actionProvider: scripted([
        offer('bob', 'alice', 500, 'My budget is $500'),
        offer('bob', 'alice', 300, 'My budget is $300'),
      ]),
    });

    await orchestrator.step();
    await orchestrator.step();
    const third = await orchestrator.step();
    expect(third.observations.alice).toBe(
      [
        'SOCIAL INTELLIGENCE:',
        '- bob appears neutral (intensity 0.40, valence 0.00).',
        '- Caution: bob made 1 inconsistent claim(s). Latest: bob claimed 500 on price in round 1 but 300 in round 2.',
      ].join('\n'),
    );
  });
});

describe('NegotiationOrchestrator: overlapping steps', () => {
  it('runs overlapping steps one after another without losing history', async () => {
    const registry = new ModuleRegistry();
    registry.register('slow', () => ({
      name: 'slow',
      getObservationContext: async () => {
        await sleep(10);
        return '';
      },
    }));
    const orchestrator = makeOrchestrator({
      registry,
      activeModules: { alice: ['slow'] },
      actionProvider: scripted([offer('alice', 'bob', 500), offer('bob', 'alice', 400)]),
    });

    const results = await Promise.all([orchestrator.step(), orchestrator.step()]);

    expect(results.map((r) => r.round)).toEqual([1, 2]);
    expect(orchestrator.getState().round).toBe(2);
    expect(orchestrator.getHistory()).toHaveLength(2);
  });

  it('keeps the queue moving after a failed step', async () => {
    const orchestrator = makeOrchestrator({
      actionProvider: scripted([{ type: 'accept', participant: 'bob' }, offer('alice', 'bob', 500)]),
    });

    const [first, second] = await Promise.allSettled([orchestrator.step(), orchestrator.step()]);

    expect(first.status).toBe('rejected');
    expect(second).toMatchObject({ status: 'fulfilled', value: { round: 1 } });
    expect(orchestrator.getHistory()).toHaveLength(1);
  });
});

describe('NegotiationOrchestrator: abandoned module calls', () => {
  it('drops the late result of a timed-out observeAction', async () => {
    const oracle = () => new Promise<string>((resolve) => setTimeout(() => resolve('angry'), 60));
    const registry = new ModuleRegistry();
    registry.register('social_intelligence', () => new SocialIntelligenceModule({ oracle, logger }));
    registry.register('reader', () =>
      textModuleFrom('reader', (ctx) => (ctx.shared_data.social_intelligence === undefined ? 'none' : 'seen')),
    );
    const orchestrator = makeOrchestrator({
      registry,
      config: { module_timeout_ms: 20 },
      activeModules: { bob: ['social_intelligence', 'reader'] },
      actionProvider: scripted([offer('alice', 'bob', 500, 'This is outrageous!')]),
    });

    await orchestrator.step();
    await sleep(100);

    const social = orchestrator.getModule('social_intelligence');
    expect(social).toBeInstanceOf(SocialIntelligenceModule);
    if (social instanceof SocialIntelligenceModule) {
      expect(social.getLatestEmotion('alice')).toBeNull();
    }
    expect((await orchestrator.step()).observations.bob).toBe('none');
  });
});
