export * from './coherence/types'
export * from './coherence/errors'
export { matches, findMatch } from './coherence/morphology'
export { evaluate, findPosSequence, scanLemmas } from './coherence/rules'
export { scoreRichness, posDiversity, DEFAULT_RICHNESS } from './coherence/richness'
export { fuse, conceptScore, structuralScore, rebalanceFusionWeights } from './coherence/fusion'
export { categorizeEntity, conceptsForPersistence } from './coherence/concepts'
export { defaultConfig, mergeConfig } from './coherence/config'
export type { ConfigOverrides } from './coherence/config'
export { ConfigStore } from './coherence/configStore'
export { parseAnalysisInput, parseEngineConfig } from './coherence/schema'
export { CoherenceEngine } from './coherence/engine'
export type { PersistenceAdapter } from './coherence/persistence/adapter'
export { MemoryStore } from './coherence/persistence/memoryStore'
export { JsonFileStore } from './coherence/persistence/jsonFileStore'
export { PersistenceDispatcher, persistenceJobs } from './coherence/persistence/dispatcher'
export { createEngine } from './bootstrap'
