// Data contracts shared by the rule engine, scorers and persistence layer

export type Severity = 'warning' | 'violation'

export interface Token {
  text: string
  lemma: string
  pos: string
  tag: string
  dep: string
  sentence: number // 0-based sentence index
}

export interface LinguisticBundle {
  tokenCount: number
  posDistribution: Record<string, number>
  keyLemmas: string[] // discovery order, may repeat
  sentences: string[]
  sentenceCount: number
  dependencyTypes: string[]
  avgTokenLength: number
  tokens: Token[]
}

export interface Entity {
  text: string
  label: string
  lemma: string
  rootPos: string
  rootDep: string
}

export interface Concept {
  name: string
  lemma: string
  entityType: string
  posTag: string
  category: string
  frequency: number
}

export interface Relationship {
  subject: string
  predicate: string
  predicateLemma: string
  object: string
  dependencyType: string
  verbTense: string
  strength: number
}

export type EmotionVector = Record<string, number>

export interface Sentiment {
  label: string
  confidence: number // [0,1]
}

export interface InteractionContext {
  priorInteractions: number
  sessionId?: string
}

export interface AnalysisInput {
  bundle: LinguisticBundle
  entities: Entity[]
  concepts: Concept[]
  relationships: Relationship[]
  emotions: EmotionVector
  sentiment?: Sentiment | null
  interaction?: InteractionContext | null
}

interface RuleBase {
  id?: string
}

export interface ProhibitedConceptRule extends RuleBase {
  kind: 'prohibited-concept'
  lemmas: string[]
}

export interface RequiredVirtueRule extends RuleBase {
  kind: 'required-virtue'
  lemmas: string[]
}

export interface EmotionThresholdRule extends RuleBase {
  kind: 'emotion-threshold'
  emotion: string
  threshold: number
  severity: Severity
}

export interface EmotionCombinationRule extends RuleBase {
  kind: 'emotion-combination'
  emotions: string[]
  jointThreshold: number
  severity: Severity
}

export interface RelationshipPatternRule extends RuleBase {
  kind: 'relationship-pattern'
  predicateLemmas: string[]
  severity: Severity
}

export interface PosStepPattern {
  pos: string | string[]
  tag?: string[] // fine-grained tags the token must also carry, e.g. VB, VBP
}

// A step is one POS tag, a list of acceptable alternatives, or a POS + tag constraint
export type PosStep = string | string[] | PosStepPattern

export interface CommandPatternRule extends RuleBase {
  kind: 'command-pattern'
  posSequence: PosStep[]
  severity: Severity
  requireNoSubject: boolean
}

export type Rule =
  | ProhibitedConceptRule
  | RequiredVirtueRule
  | EmotionThresholdRule
  | EmotionCombinationRule
  | RelationshipPatternRule
  | CommandPatternRule

export type RuleKind = Rule['kind']

export type RuleSet = Rule[]

export interface Finding {
  ruleKind: RuleKind
  ruleId: string | null
  severity: Severity
  matchedText: string
  matchedLemma: string
  reason: string
}

export interface PatternCounts {
  ethical: number
  harm: number
  command: number
}

export interface ComplianceResult {
  compliant: boolean
  violations: Finding[]
  warnings: Finding[]
  requiredValuesPresent: string[] // deduplicated, discovery order
  patternCounts: PatternCounts
}

export interface StructuralWeights {
  compliance: number
  richness: number
  concept: number
}

export interface FusionWeights {
  structural: number
  sentiment: number
}

export interface RichnessSettings {
  tokenNorm: number
  posNorm: number
}

export interface ConceptSettings {
  normalizationConstant: number
}

export interface PersistenceSettings {
  retryDelayMs: number
  maxAttempts: number
  relationshipStrengthDelta: number
}

export interface EngineConfig {
  ruleSet: RuleSet
  weights: {
    structural: StructuralWeights
    fusion: FusionWeights
  }
  richness: RichnessSettings
  concept: ConceptSettings
  persistence: PersistenceSettings
}

export interface FusionSummary {
  conceptCount: number
  entityCount: number
  relationshipCount: number
  sentenceCount: number
  violationCount: number
  warningCount: number
  requiredValueCount: number
  priorInteractions: number
}

export interface FusionResult {
  success: boolean
  reason: string | null
  coherence: number
  structuralScore: number
  richness: number
  conceptScore: number
  sentiment: Sentiment | null
  concepts: Concept[]
  entities: Entity[]
  relationships: Relationship[]
  linguisticFeatures: LinguisticBundle
  compliance: ComplianceResult
  weightsUsed: Record<string, number>
  summary: FusionSummary
}
