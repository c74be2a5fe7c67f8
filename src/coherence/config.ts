import { DEFAULT_RICHNESS } from './richness'
import { EngineConfig } from './types'

// Rule sets normally come from config/engine.json; the built-in default has none
export const defaultConfig: EngineConfig = {
  ruleSet: [],
  weights: {
    structural: { compliance: 0.6, richness: 0.2, concept: 0.2 },
    fusion: { structural: 0.8, sentiment: 0.2 }
  },
  richness: { ...DEFAULT_RICHNESS },
  // No calibrated value exists for K; five concepts count as "dense"
  concept: { normalizationConstant: 5 },
  persistence: {
    retryDelayMs: 500,
    maxAttempts: 3,
    relationshipStrengthDelta: 1
  }
}

export interface ConfigOverrides {
  ruleSet?: EngineConfig['ruleSet']
  weights?: {
    structural?: Partial<EngineConfig['weights']['structural']>
    fusion?: Partial<EngineConfig['weights']['fusion']>
  }
  richness?: Partial<EngineConfig['richness']>
  concept?: Partial<EngineConfig['concept']>
  persistence?: Partial<EngineConfig['persistence']>
}

/** Layers overrides onto `base` section by section. The result still needs validating. */
export function mergeConfig(base: EngineConfig, partial?: ConfigOverrides): EngineConfig {
  if (!partial) return base
  return {
    ruleSet: partial.ruleSet ?? base.ruleSet,
    weights: {
      structural: { ...base.weights.structural, ...partial.weights?.structural },
      fusion: { ...base.weights.fusion, ...partial.weights?.fusion }
    },
    richness: { ...base.richness, ...partial.richness },
    concept: { ...base.concept, ...partial.concept },
    persistence: { ...base.persistence, ...partial.persistence }
  }
}

export default defaultConfig
