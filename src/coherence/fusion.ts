import { clamp01, deepFreeze } from '../utils'
import {
  ComplianceResult,
  ConceptSettings,
  Concept,
  Entity,
  FusionResult,
  FusionWeights,
  InteractionContext,
  LinguisticBundle,
  Relationship,
  Sentiment,
  StructuralWeights
} from './types'

export interface FusionInput {
  compliance: ComplianceResult
  richness: number
  conceptCount: number
  sentiment?: Sentiment | null
  interaction?: InteractionContext | null
  passthrough: {
    bundle: LinguisticBundle
    entities: Entity[]
    concepts: Concept[]
    relationships: Relationship[]
  }
}

export interface FusionSettings {
  weights: { structural: StructuralWeights; fusion: FusionWeights }
  concept: ConceptSettings
}

export interface RebalanceOptions {
  learningRate: number
  min: number
  max: number
}

export const DEFAULT_REBALANCE: RebalanceOptions = { learningRate: 0.05, min: 0.1, max: 0.9 }

export function conceptScore(conceptCount: number, settings: ConceptSettings) {
  return Math.min(1, Math.max(0, conceptCount) / settings.normalizationConstant)
}

export function structuralScore(compliant: boolean, richness: number, concepts: number, w: StructuralWeights) {
  const complianceTerm = compliant ? 1 : 0
  return complianceTerm * w.compliance + richness * w.richness + concepts * w.concept
}

function selectWeights(settings: FusionSettings, sentiment: Sentiment | null): Record<string, number> {
  const { structural, fusion } = settings.weights
  const blend = sentiment ? fusion : { structural: 1, sentiment: 0 }
  return {
    compliance: structural.compliance,
    richness: structural.richness,
    concept: structural.concept,
    structural: blend.structural,
    sentiment: blend.sentiment
  }
}

function firstViolationReason(compliance: ComplianceResult): string | null {
  const first = compliance.violations[0]
  if (!first) return null
  return `Ethical violation: ${first.reason}`
}

/**
 * Combines the compliance verdict, richness and concept density into one
 * coherence score and assembles the response record. Pure: equal inputs give
 * an equal (and frozen) result.
 */
export function fuse(input: FusionInput, settings: FusionSettings): FusionResult {
  const { compliance, passthrough } = input
  const sentiment = input.sentiment ?? null
  const concepts = conceptScore(input.conceptCount, settings.concept)
  const structural = structuralScore(compliance.compliant, input.richness, concepts, settings.weights.structural)
  const weightsUsed = selectWeights(settings, sentiment)
  const blended = sentiment
    ? structural * weightsUsed.structural + sentiment.confidence * weightsUsed.sentiment
    : structural

  const result: FusionResult = {
    success: compliance.compliant,
    reason: firstViolationReason(compliance),
    coherence: clamp01(blended),
    structuralScore: structural,
    richness: input.richness,
    conceptScore: concepts,
    sentiment,
    concepts: passthrough.concepts,
    entities: passthrough.entities,
    relationships: passthrough.relationships,
    linguisticFeatures: passthrough.bundle,
    compliance,
    weightsUsed,
    summary: {
      conceptCount: input.conceptCount,
      entityCount: passthrough.entities.length,
      relationshipCount: passthrough.relationships.length,
      sentenceCount: passthrough.bundle.sentenceCount,
      violationCount: compliance.violations.length,
      warningCount: compliance.warnings.length,
      requiredValueCount: compliance.requiredValuesPresent.length,
      priorInteractions: input.interaction?.priorInteractions ?? 0
    }
  }
  // frozen copy; the caller's compliance and passthrough objects stay mutable
  return deepFreeze(structuredClone(result))
}

/**
 * Nudges fusion weights by caller feedback (positive = trust the signal more).
 * Adjusted weights are clipped to [min, max], then all weights renormalised to sum 1.
 */
export function rebalanceFusionWeights(
  weights: FusionWeights,
  feedback: Partial<FusionWeights>,
  opts: RebalanceOptions = DEFAULT_REBALANCE
): FusionWeights {
  const next: FusionWeights = { ...weights }
  for (const key of ['structural', 'sentiment'] as const) {
    const delta = feedback[key]
    if (delta === undefined) continue
    next[key] = Math.max(opts.min, Math.min(opts.max, next[key] + delta * opts.learningRate))
  }
  const total = next.structural + next.sentiment
  return { structural: next.structural / total, sentiment: next.sentiment / total }
}
