import { tokenize } from './lexicon.js';

export type ClaimTopic = 'price' | 'quantity' | 'timeline' | 'percentage' | 'general';

export interface NumericClaim {
  topic: ClaimTopic;
  value: number;
}

/** Topic keyword classes, checked in order. */
const TOPIC_KEYWORDS: readonly [ClaimTopic, ReadonlySet<string>][] = [
  ['percentage', new Set(['percent', 'percentage', 'discount', 'margin'])],
  ['timeline', new Set(['day', 'days', 'week', 'weeks', 'month', 'months', 'deadline', 'delivery'])],
  ['quantity', new Set(['unit', 'units', 'item', 'items', 'pieces', 'quantity', 'volume'])],
  ['price', new Set(['pay', 'price', 'cost', 'budget', 'offer', 'dollars', 'spend', 'sell', 'buy'])],
];

const NUMBER_PATTERN = /(\$)?\s?(\d[\d,]*(?:\.\d+)?)\s?(k|m)?\b(%)?/i;

const SCALE: Readonly<Record<string, number>> = { k: 1_000, m: 1_000_000 };

/** Topic of a statement from its keywords; currency or percent signs decide first. */
export function detectTopic(statement: string): ClaimTopic {
  if (statement.includes('%')) return 'percentage';
  const tokens = new Set(tokenize(statement));
  for (const [topic, keywords] of TOPIC_KEYWORDS) {
    for (const keyword of keywords) {
      if (tokens.has(keyword)) return topic;
    }
  }
  if (statement.includes('$')) return 'price';
  return 'general';
}

/**
 * First numeric claim in a statement ("$500", "1,200 units", "2.5k", "15%").
 * Returns null when the statement carries no number.
 */
export function parseNumericClaim(statement: string): NumericClaim | null {
  const match = NUMBER_PATTERN.exec(statement);
  if (!match) return null;
  const [, , digits, suffix] = match;
  const base = Number.parseFloat(digits.replace(/,/g, ''));
  if (!Number.isFinite(base)) return null;
  const multiplier = suffix ? SCALE[suffix.toLowerCase()] ?? 1 : 1;
  return { topic: detectTopic(statement), value: base * multiplier };
}
