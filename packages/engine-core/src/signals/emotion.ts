import { clamp } from '../utils.js';
import { tokenize } from './lexicon.js';

export const EMOTION_LABELS = [
  'happy',
  'satisfied',
  'hopeful',
  'neutral',
  'anxious',
  'suspicious',
  'disappointed',
  'frustrated',
  'angry',
] as const;

export type EmotionLabel = (typeof EMOTION_LABELS)[number];

/** Signed baseline valence per label, before intensity scaling. */
export const EMOTION_VALENCE: Readonly<Record<EmotionLabel, number>> = {
  happy: 0.8,
  satisfied: 0.6,
  hopeful: 0.5,
  neutral: 0,
  anxious: -0.4,
  suspicious: -0.3,
  disappointed: -0.5,
  frustrated: -0.6,
  angry: -0.8,
};

export const EMPHASIS_MARKERS: ReadonlySet<string> = new Set([
  'very',
  'really',
  'extremely',
  'completely',
  'absolutely',
  'totally',
  'incredibly',
  'utterly',
  'so',
]);

export const SUPERLATIVE_MARKERS: ReadonlySet<string> = new Set([
  'best',
  'worst',
  'most',
  'least',
  'never',
  'always',
  'ever',
]);

const BASE_INTENSITY = 0.4;
const EXCLAMATION_WEIGHT = 0.15;
const MAX_COUNTED_EXCLAMATIONS = 3;
const MARKER_WEIGHT = 0.1;

export function isEmotionLabel(label: string): label is EmotionLabel {
  return EMOTION_LABELS.some((l) => l === label);
}

/**
 * Lexical intensity in [0.4, 1]:
 * +0.15 per '!' (at most three), +0.1 per emphasis word, superlative or
 * all-caps word of three or more letters.
 */
export function scoreIntensity(text: string): number {
  const exclamations = Math.min(MAX_COUNTED_EXCLAMATIONS, (text.match(/!/g) ?? []).length);
  const tokens = tokenize(text);
  const emphasis = tokens.filter((t) => EMPHASIS_MARKERS.has(t)).length;
  const superlatives = tokens.filter((t) => SUPERLATIVE_MARKERS.has(t)).length;
  const shouted = (text.match(/\b[A-Z]{3,}\b/g) ?? []).length;

  const score =
    BASE_INTENSITY +
    EXCLAMATION_WEIGHT * exclamations +
    MARKER_WEIGHT * (emphasis + superlatives + shouted);
  return clamp(score, 0, 1);
}

/** Valence of a label at a given intensity, in [-1, 1]. */
export function emotionValence(label: EmotionLabel, intensity: number): number {
  return clamp(EMOTION_VALENCE[label] * intensity, -1, 1);
}
