import { z } from 'zod';
import { CULTURE_KEYS, DEFAULT_CULTURE } from '@parley/engine-core';
import type { Logger } from 'pino';

const unit = () => z.number().min(0).max(1);

export const socialIntelligenceConfigSchema = z.object({
  consistency_tolerance: z.number().min(0).default(0.05),
});

export const culturalAwarenessConfigSchema = z.object({
  own_culture: z.enum(CULTURE_KEYS).default(DEFAULT_CULTURE),
  adaptation_level: unit().default(0.7),
  detect_culture: z.boolean().default(true),
});

export const temporalDynamicsConfigSchema = z.object({
  discount_factor: z.number().gt(0).max(1).default(0.9),
  reputation_weight: unit().default(0.3),
  relationship_investment_threshold: unit().default(0.6),
});

export const uncertaintyManagementConfigSchema = z.object({
  confidence_threshold: unit().default(0.7),
  risk_tolerance: unit().default(0.3),
  information_gathering_budget: unit().default(0.1),
});

export const collectiveIntelligenceConfigSchema = z.object({
  consensus_threshold: z.number().gt(0).max(1).default(0.7),
  max_iterations: z.number().int().positive().default(3),
});

export const strategyEvolutionConfigSchema = z.object({
  population_size: z.number().int().positive().default(20),
  mutation_rate: unit().default(0.1),
  crossover_rate: unit().default(0.7),
  learning_rate: z.number().positive().default(0.01),
  gene_count: z.number().int().positive().default(2),
  convergence_epsilon: z.number().min(0).default(1e-6),
});

export const theoryOfMindConfigSchema = z.object({
  max_recursion_depth: z.number().int().min(0).default(3),
  emotion_sensitivity: unit().default(0.7),
  empathy_level: unit().default(0.8),
});

export const orchestratorConfigSchema = z.object({
  max_rounds: z.number().int().positive().default(10),
  /** Rounds before the cap in which bargaining turns into closing. */
  closing_window: z.number().int().min(0).default(2),
  module_timeout_ms: z.number().int().positive().default(5000),
});

export type SocialIntelligenceConfig = z.output<typeof socialIntelligenceConfigSchema>;
export type CulturalAwarenessConfig = z.output<typeof culturalAwarenessConfigSchema>;
export type TemporalDynamicsConfig = z.output<typeof temporalDynamicsConfigSchema>;
export type UncertaintyManagementConfig = z.output<typeof uncertaintyManagementConfigSchema>;
export type CollectiveIntelligenceConfig = z.output<typeof collectiveIntelligenceConfigSchema>;
export type StrategyEvolutionConfig = z.output<typeof strategyEvolutionConfigSchema>;
export type TheoryOfMindConfig = z.output<typeof theoryOfMindConfigSchema>;
export type OrchestratorConfig = z.output<typeof orchestratorConfigSchema>;

/** Per-module configuration, keyed the way the wiring layer names the modules. */
export interface ModuleConfigs {
  social_intelligence: SocialIntelligenceConfig;
  cultural_awareness: CulturalAwarenessConfig;
  temporal_dynamics: TemporalDynamicsConfig;
  uncertainty_management: UncertaintyManagementConfig;
  collective_intelligence: CollectiveIntelligenceConfig;
  strategy_evolution: StrategyEvolutionConfig;
  theory_of_mind: TheoryOfMindConfig;
  orchestrator: OrchestratorConfig;
}

const MODULE_CONFIG_SCHEMAS = {
  social_intelligence: socialIntelligenceConfigSchema,
  cultural_awareness: culturalAwarenessConfigSchema,
  temporal_dynamics: temporalDynamicsConfigSchema,
  uncertainty_management: uncertaintyManagementConfigSchema,
  collective_intelligence: collectiveIntelligenceConfigSchema,
  strategy_evolution: strategyEvolutionConfigSchema,
  theory_of_mind: theoryOfMindConfigSchema,
  orchestrator: orchestratorConfigSchema,
} as const;

/**
 * Parse one module's configuration. Unknown keys are dropped and missing
 * keys take their defaults. An invalid configuration falls back to all
 * defaults; the negotiation proceeds rather than aborting.
 */
export function parseModuleConfig<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  logger?: Logger,
): z.output<S> {
  const result = schema.safeParse(raw ?? {});
  if (result.success) {
    return result.data;
  }
  logger?.warn({ issues: result.error.issues }, 'invalid module configuration, using defaults');
  return schema.parse({});
}

function asRecord(raw: unknown, logger?: Logger): Record<string, unknown> {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch (err) {
      logger?.warn({ err }, 'module configuration is not valid JSON, using defaults');
      return {};
    }
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    if (value !== undefined && value !== null) {
      logger?.warn('module configuration is not an object, using defaults');
    }
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Parse configuration for every module from an object or a JSON string
 * keyed by module name.
 */
export function parseModuleConfigs(raw: unknown, logger?: Logger): ModuleConfigs {
  const record = asRecord(raw, logger);
  const parse = <K extends keyof ModuleConfigs>(key: K) =>
    parseModuleConfig(MODULE_CONFIG_SCHEMAS[key], record[key], logger?.child({ module: key }));
  return {
    social_intelligence: parse('social_intelligence'),
    cultural_awareness: parse('cultural_awareness'),
    temporal_dynamics: parse('temporal_dynamics'),
    uncertainty_management: parse('uncertainty_management'),
    collective_intelligence: parse('collective_intelligence'),
    strategy_evolution: parse('strategy_evolution'),
    theory_of_mind: parse('theory_of_mind'),
    orchestrator: parse('orchestrator'),
  };
}
