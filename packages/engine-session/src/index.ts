// Session types + state machine
export type {
  NegotiationPhase,
  NegotiationOutcome,
  OfferType,
  Terms,
  Offer,
  Agreement,
  NegotiationEvent,
  NegotiationState,
  RoundAction,
} from './session/types.js';
export { transition } from './session/state-machine.js';
export type { PhaseEvent } from './session/state-machine.js';
export { NegotiationStateError, NegotiationStateErrorCode } from './session/errors.js';
export {
  createNegotiationState,
  advanceRound,
  enterClosing,
  recordOffer,
  recordAgreement,
  acceptOffer,
  recordWithdrawal,
  concludeAtRoundLimit,
  pendingOfferFor,
} from './session/state.js';
export type { NegotiationInit, OfferInput } from './session/state.js';

// Round context
export type { RoundContext } from './context/types.js';
export type { ActiveModules } from './context/builder.js';
export { buildRoundContext, activeModulesFor, counterpartsOf } from './context/builder.js';

// Modules
export { MODULE_NAMES } from './modules/types.js';
export type { ModuleName, NegotiationModule, ModuleFactory, ModuleOptions } from './modules/types.js';
export { ModuleRegistry } from './modules/registry.js';
export { createDefaultRegistry } from './modules/defaults.js';
export type { DefaultRegistryDeps } from './modules/defaults.js';
export { SocialIntelligenceModule, socialSummarySchema } from './modules/social-intelligence.js';
export type { DeceptionIndicator, SocialSummary } from './modules/social-intelligence.js';
export { CulturalAwarenessModule } from './modules/cultural-awareness.js';
export type { CultureSource, CulturalViolation } from './modules/cultural-awareness.js';
export { TemporalDynamicsModule, pressureTier } from './modules/temporal-dynamics.js';
export type { PressureTier, TemporalAssessment } from './modules/temporal-dynamics.js';
export { UncertaintyManagementModule, primaryValue } from './modules/uncertainty-management.js';
export type { CounterpartEstimate } from './modules/uncertainty-management.js';
export { CollectiveIntelligenceModule, SPECIALISTS } from './modules/collective-intelligence.js';
export type { CollectiveChoice, Specialist, SpecialistView } from './modules/collective-intelligence.js';
export { TheoryOfMindModule } from './modules/theory-of-mind.js';
export type { MindReading } from './modules/theory-of-mind.js';

// Theory of mind
export type { EmotionalState, BeliefNode } from './mind/types.js';
export { TheoryOfMind, nestFrame } from './mind/theory-of-mind.js';
export type { TheoryOfMindOptions } from './mind/theory-of-mind.js';

// Orchestrator
export type { ActionProvider, TurnInput, StepResult } from './round/types.js';
export { NegotiationOrchestrator } from './round/orchestrator.js';
export type { OrchestratorOptions } from './round/orchestrator.js';
export { withTimeout, TimeoutError } from './round/timeout.js';

// Oracle
export type { Oracle } from './oracle/types.js';
export { nullOracle } from './oracle/types.js';
export { ask, classify, normalizeLabel } from './oracle/classify.js';

// Configuration + logging
export {
  parseModuleConfig,
  parseModuleConfigs,
  socialIntelligenceConfigSchema,
  culturalAwarenessConfigSchema,
  temporalDynamicsConfigSchema,
  uncertaintyManagementConfigSchema,
  collectiveIntelligenceConfigSchema,
  strategyEvolutionConfigSchema,
  theoryOfMindConfigSchema,
  orchestratorConfigSchema,
} from './config.js';
export type {
  ModuleConfigs,
  SocialIntelligenceConfig,
  CulturalAwarenessConfig,
  TemporalDynamicsConfig,
  UncertaintyManagementConfig,
  CollectiveIntelligenceConfig,
  StrategyEvolutionConfig,
  TheoryOfMindConfig,
  OrchestratorConfig,
} from './config.js';
export { createLogger, componentLogger } from './logger.js';
export type { Logger } from './logger.js';

// Strategy evolution
export { createStrategyEvolution, evolveStrategy, episodeFitness } from './evolution/evolve.js';
export type { EvolveOptions, EpisodeRunner } from './evolution/evolve.js';
export { simulatedEpisode } from './evolution/episode.js';
export type { SimulatedCounterpart } from './evolution/episode.js';
