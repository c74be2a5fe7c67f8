import { z, ZodError } from 'zod'
import { ConfigOverrides } from './config'
import { InvalidConfigurationError, MalformedInputError } from './errors'
import { AnalysisInput, EngineConfig } from './types'

const WEIGHT_TOLERANCE = 1e-6

const lemma = z.string().min(1)
const unit = z.number().min(0).max(1)
const count = z.number().int().min(0)

// ---- analyzer input ---------------------------------------------------------

export const tokenSchema = z.object({
  text: z.string(),
  lemma: z.string(),
  pos: z.string(),
  tag: z.string().default(''),
  dep: z.string().default(''),
  sentence: count.default(0)
})

export const linguisticBundleSchema = z.object({
  tokenCount: count,
  posDistribution: z.record(count),
  keyLemmas: z.array(z.string()),
  sentences: z.array(z.string()),
  sentenceCount: count,
  dependencyTypes: z.array(z.string()),
  avgTokenLength: z.number().min(0),
  tokens: z.array(tokenSchema).default([])
})

export const entitySchema = z.object({
  text: z.string(),
  label: z.string(),
  lemma: z.string(),
  rootPos: z.string(),
  rootDep: z.string()
})

export const conceptSchema = z.object({
  name: z.string().min(1),
  lemma: z.string(),
  entityType: z.string(),
  posTag: z.string(),
  category: z.string(),
  frequency: z.number().int().min(1).default(1)
})

export const relationshipSchema = z.object({
  subject: z.string(),
  predicate: z.string(),
  predicateLemma: z.string(),
  object: z.string(),
  dependencyType: z.string(),
  verbTense: z.string(),
  strength: z.number().default(1)
})

export const analysisInputSchema = z.object({
  bundle: linguisticBundleSchema,
  entities: z.array(entitySchema),
  concepts: z.array(conceptSchema),
  relationships: z.array(relationshipSchema),
  emotions: z.record(unit),
  sentiment: z.object({ label: z.string(), confidence: unit }).nullish(),
  interaction: z.object({ priorInteractions: count, sessionId: z.string().optional() }).nullish()
})

// ---- configuration ----------------------------------------------------------

const severity = z.enum(['warning', 'violation'])
const ruleId = z.string().min(1).optional()
const posAlternatives = z.union([lemma, z.array(lemma).min(1)])
const posStep = z.union([
  posAlternatives,
  z.object({ pos: posAlternatives, tag: z.array(lemma).min(1).optional() }).strict()
])

export const ruleSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('prohibited-concept'), id: ruleId, lemmas: z.array(lemma).min(1) }),
  z.object({ kind: z.literal('required-virtue'), id: ruleId, lemmas: z.array(lemma).min(1) }),
  z.object({ kind: z.literal('emotion-threshold'), id: ruleId, emotion: lemma, threshold: unit, severity }),
  z.object({
    kind: z.literal('emotion-combination'),
    id: ruleId,
    emotions: z.array(lemma).min(1),
    jointThreshold: unit,
    severity
  }),
  z.object({ kind: z.literal('relationship-pattern'), id: ruleId, predicateLemmas: z.array(lemma).min(1), severity }),
  z.object({
    kind: z.literal('command-pattern'),
    id: ruleId,
    posSequence: z.array(posStep).min(1),
    severity: severity.default('warning'),
    requireNoSubject: z.boolean().default(true)
  })
])

function sumsToOne(values: number[]) {
  const total = values.reduce((a, b) => a + b, 0)
  return Math.abs(total - 1) <= WEIGHT_TOLERANCE
}

export const structuralWeightsSchema = z
  .object({ compliance: unit, richness: unit, concept: unit })
  .refine((w) => sumsToOne([w.compliance, w.richness, w.concept]), {
    message: 'structural weights must sum to 1'
  })

export const fusionWeightsSchema = z
  .object({ structural: unit, sentiment: unit })
  .refine((w) => sumsToOne([w.structural, w.sentiment]), { message: 'fusion weights must sum to 1' })

export const engineConfigSchema = z.object({
  ruleSet: z.array(ruleSchema),
  weights: z.object({ structural: structuralWeightsSchema, fusion: fusionWeightsSchema }),
  richness: z.object({ tokenNorm: z.number().positive(), posNorm: z.number().positive() }),
  concept: z.object({ normalizationConstant: z.number().positive() }),
  persistence: z.object({
    retryDelayMs: z.number().int().min(0),
    maxAttempts: z.number().int().min(1),
    relationshipStrengthDelta: z.number()
  })
})

// Shape of a configuration file: any section may be omitted and falls back to defaults
export const configOverridesSchema = z
  .object({
    ruleSet: z.array(ruleSchema).optional(),
    weights: z
      .object({
        structural: z.object({ compliance: unit, richness: unit, concept: unit }).partial().optional(),
        fusion: z.object({ structural: unit, sentiment: unit }).partial().optional()
      })
      .optional(),
    richness: z.object({ tokenNorm: z.number(), posNorm: z.number() }).partial().optional(),
    concept: z.object({ normalizationConstant: z.number() }).partial().optional(),
    persistence: z
      .object({ retryDelayMs: z.number(), maxAttempts: z.number(), relationshipStrengthDelta: z.number() })
      .partial()
      .optional()
  })
  .strict()

export function formatIssues(err: ZodError): string[] {
  return err.issues.map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`)
}

/** Validates one request; nothing is defaulted for a missing bundle or emotion vector. */
export function parseAnalysisInput(raw: unknown): AnalysisInput {
  const parsed = analysisInputSchema.safeParse(raw)
  if (!parsed.success) {
    const details = formatIssues(parsed.error)
    throw new MalformedInputError(`Malformed analysis input: ${details[0]}`, details)
  }
  return parsed.data
}

export function parseConfigOverrides(raw: unknown): ConfigOverrides {
  const parsed = configOverridesSchema.safeParse(raw)
  if (!parsed.success) {
    const details = formatIssues(parsed.error)
    throw new InvalidConfigurationError(`Invalid engine configuration: ${details[0]}`, details)
  }
  return parsed.data
}

export function parseEngineConfig(raw: unknown): EngineConfig {
  const parsed = engineConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const details = formatIssues(parsed.error)
    throw new InvalidConfigurationError(`Invalid engine configuration: ${details[0]}`, details)
  }
  return parsed.data
}
