import type { AgentStrategy, NegotiationStyle, ValueBounds } from './types.js';

/** Concession shape per style. Competitive concedes little and stops early. */
export const STYLE_PRESETS: Readonly<
  Record<NegotiationStyle, { initial_concession: number; decay: number }>
> = {
  competitive: { initial_concession: 0.1, decay: 0.7 },
  cooperative: { initial_concession: 0.25, decay: 0.85 },
  integrative: { initial_concession: 0.18, decay: 0.8 },
};

const STYLE_GUIDANCE: Readonly<Record<NegotiationStyle, string>> = {
  competitive:
    'Adopt a competitive approach: maximize your own value, anchor high and concede slowly.',
  cooperative:
    'Adopt a cooperative approach: seek mutual benefit, share information and reciprocate concessions.',
  integrative:
    'Adopt an integrative approach: expand the value on the table by trading across issues.',
};

/** Build a strategy from a style preset and the agent's bounds. */
export function createStrategy(style: NegotiationStyle, bounds: ValueBounds): AgentStrategy {
  return { style, ...bounds, ...STYLE_PRESETS[style] };
}

/** Render the strategic context text for an agent. */
export function describeStrategy(strategy: AgentStrategy): string {
  return [
    `NEGOTIATION STRATEGY (${strategy.style}):`,
    STYLE_GUIDANCE[strategy.style],
    `Target value: ${strategy.target}. Reservation value: ${strategy.reservation}.`,
    `Never accept below ${strategy.reservation}.`,
  ].join('\n');
}
