// Types
export { EngineError, EngineFault } from './types.js';

// Strategy engine
export type {
  NegotiationStyle,
  OfferEvaluation,
  ValueBounds,
  ConcessionParams,
  AgentStrategy,
} from './strategy/types.js';
export { evaluateOffer, scoreOutcome } from './strategy/evaluator.js';
export { concessionAmount, nextOffer } from './strategy/concession.js';
export { STYLE_PRESETS, createStrategy, describeStrategy } from './strategy/styles.js';
export { strategyFromGenes } from './strategy/genome.js';
export { validateStrategy } from './strategy/validation.js';

// Strategy evolution
export type {
  StrategyGenome,
  FitnessEvaluator,
  RandomSource,
  EvolutionConfig,
  GenerationStats,
  EvolutionResult,
} from './evolution/types.js';
export { StrategyEvolution, DEFAULT_EVOLUTION_CONFIG } from './evolution/engine.js';
export type { EvolutionOptions } from './evolution/engine.js';
export { selectParent, crossover, mutate } from './evolution/operators.js';
export { createSeededRandom } from './evolution/random.js';

// Swarm consensus
export type {
  SwarmRecommendation,
  SwarmConfig,
  SwarmTally,
  SwarmRevision,
  SwarmDecision,
} from './consensus/types.js';
export {
  runSwarmConsensus,
  tallyVotes,
  conformToPlurality,
  DEFAULT_SWARM_CONFIG,
} from './consensus/swarm.js';

// Culture
export type { CulturalProfile, CultureKey, DistanceTier } from './culture/profiles.js';
export {
  CULTURAL_PROFILES,
  CULTURE_KEYS,
  DEFAULT_CULTURE,
  isCultureKey,
  getCulturalProfile,
  culturalDistance,
  distanceTier,
} from './culture/profiles.js';
export {
  scoreDirectness,
  directnessTolerance,
  DIRECT_MARKERS,
  SOFTENING_MARKERS,
} from './culture/directness.js';

// Signals
export type { EmotionLabel } from './signals/emotion.js';
export {
  EMOTION_LABELS,
  EMOTION_VALENCE,
  isEmotionLabel,
  scoreIntensity,
  emotionValence,
} from './signals/emotion.js';
export type { ClaimTopic, NumericClaim } from './signals/claims.js';
export { parseNumericClaim, detectTopic } from './signals/claims.js';
export { tokenize, countMarkers } from './signals/lexicon.js';

// Utils
export { clamp, variance } from './utils.js';
