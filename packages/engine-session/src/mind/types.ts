import type { EmotionLabel } from '@parley/engine-core';

/** Detected affect of a participant at one moment. Not merged across detections. */
export interface EmotionalState {
  participant: string;
  primary_emotion: EmotionLabel;
  /** [0, 1] */
  intensity: number;
  /** [-1, 1] */
  valence: number;
  /** Triggering strings, oldest first. */
  context: string[];
}

/** One level of recursive mental-state inference. Depth 0 is the literal statement. */
export interface BeliefNode {
  holder: string;
  about: string;
  content: string;
  depth: number;
}
