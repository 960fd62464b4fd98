import { clamp } from '../utils.js';
import { countMarkers } from '../signals/lexicon.js';
import type { CulturalProfile } from './profiles.js';

export const DIRECT_MARKERS: ReadonlySet<string> = new Set([
  'wrong',
  'must',
  'unacceptable',
  'demand',
  'refuse',
  'never',
  'immediately',
  'ridiculous',
  'obviously',
  'final',
  'nonnegotiable',
]);

export const SOFTENING_MARKERS: ReadonlySet<string> = new Set([
  'perhaps',
  'might',
  'please',
  'could',
  'would',
  'consider',
  'respectfully',
  'kindly',
  'humbly',
  'humble',
  'appreciate',
  'possibly',
]);

const BASE_DIRECTNESS = 0.3;
const DIRECT_WEIGHT = 0.2;
const SOFTENER_WEIGHT = 0.15;

/** Lexical directness: 0.3 + 0.2 per direct marker - 0.15 per softener, in [0, 1]. */
export function scoreDirectness(statement: string): number {
  const direct = countMarkers(statement, DIRECT_MARKERS);
  const soft = countMarkers(statement, SOFTENING_MARKERS);
  return clamp(BASE_DIRECTNESS + DIRECT_WEIGHT * direct - SOFTENER_WEIGHT * soft, 0, 1);
}

/**
 * How much directness a listener tolerates.
 * 0.3 + 0.4 * (1 - formality) + 0.3 * directness
 */
export function directnessTolerance(listener: CulturalProfile): number {
  return 0.3 + 0.4 * (1 - listener.formality) + 0.3 * listener.directness;
}
