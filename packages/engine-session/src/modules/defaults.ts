import type { Logger } from 'pino';
import type { Oracle } from '../oracle/types.js';
import { CollectiveIntelligenceModule } from './collective-intelligence.js';
import { CulturalAwarenessModule } from './cultural-awareness.js';
import { ModuleRegistry } from './registry.js';
import { SocialIntelligenceModule } from './social-intelligence.js';
import { TemporalDynamicsModule } from './temporal-dynamics.js';
import { TheoryOfMindModule } from './theory-of-mind.js';
import type { ModuleName, NegotiationModule } from './types.js';
import { UncertaintyManagementModule } from './uncertainty-management.js';

export interface DefaultRegistryDeps {
  oracle?: Oracle;
  /** Raw per-module configuration keyed by module name. */
  configs?: Partial<Record<ModuleName, unknown>>;
  logger?: Logger;
}

/** Registry holding every built-in module kind, in a fixed enumeration order. */
export function createDefaultRegistry(deps: DefaultRegistryDeps = {}): ModuleRegistry {
  const { oracle, logger } = deps;
  const configs: Partial<Record<ModuleName, unknown>> = deps.configs ?? {};
  const table: Record<ModuleName, () => NegotiationModule> = {
    social_intelligence: () =>
      new SocialIntelligenceModule({ oracle, logger, config: configs.social_intelligence }),
    cultural_awareness: () =>
      new CulturalAwarenessModule({ oracle, logger, config: configs.cultural_awareness }),
    temporal_dynamics: () => new TemporalDynamicsModule({ logger, config: configs.temporal_dynamics }),
    uncertainty_management: () =>
      new UncertaintyManagementModule({ logger, config: configs.uncertainty_management }),
    collective_intelligence: () =>
      new CollectiveIntelligenceModule({ logger, config: configs.collective_intelligence }),
    theory_of_mind: () => new TheoryOfMindModule({ oracle, logger, config: configs.theory_of_mind }),
  };

  const registry = new ModuleRegistry();
  for (const [name, factory] of Object.entries(table)) {
    registry.register(name, factory);
  }
  return registry;
}
