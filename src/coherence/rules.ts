import { findMatch, matches } from './morphology'
import {
  AnalysisInput,
  CommandPatternRule,
  ComplianceResult,
  EmotionCombinationRule,
  EmotionThresholdRule,
  Finding,
  PatternCounts,
  PosStep,
  ProhibitedConceptRule,
  RelationshipPatternRule,
  RequiredVirtueRule,
  Rule,
  RuleSet,
  Token
} from './types'

export type EvaluationInput = Pick<AnalysisInput, 'bundle' | 'concepts' | 'relationships' | 'emotions'>

type LemmaSource = 'key lemma' | 'concept' | 'predicate' | 'relationship object'

interface ScannedLemma {
  text: string
  source: LemmaSource
}

interface EvaluationState {
  violations: Finding[]
  warnings: Finding[]
  requiredValues: string[]
  counts: PatternCounts
}

const SUBJECT_DEPS = new Set(['nsubj', 'nsubjpass', 'csubj', 'expl'])

/**
 * Every lemma a lemma-based rule looks at, in scan order: key lemmas, concept
 * lemmas, then each relationship's predicate lemma and object.
 */
export function scanLemmas(input: EvaluationInput): ScannedLemma[] {
  const out: ScannedLemma[] = []
  const push = (text: string, source: LemmaSource) => {
    if (text) out.push({ text, source })
  }
  for (const l of input.bundle.keyLemmas) push(l, 'key lemma')
  for (const c of input.concepts) push(c.lemma, 'concept')
  for (const r of input.relationships) {
    push(r.predicateLemma, 'predicate')
    push(r.object, 'relationship object')
  }
  return out
}

function record(state: EvaluationState, finding: Finding) {
  if (finding.severity === 'violation') state.violations.push(finding)
  else state.warnings.push(finding)
}

// (scanned, configured) pairs, one hit each regardless of how often the lemma recurs
function lemmaHits(scanned: ScannedLemma[], configured: string[]) {
  const seen = new Set<string>()
  const hits: Array<{ scanned: ScannedLemma; lemma: string }> = []
  for (const s of scanned) {
    for (const lemma of configured) {
      if (!matches(s.text, lemma)) continue
      const key = `${s.text.toLowerCase()}\u0000${lemma.toLowerCase()}`
      if (seen.has(key)) continue
      seen.add(key)
      hits.push({ scanned: s, lemma })
    }
  }
  return hits
}

function applyProhibitedConcept(rule: ProhibitedConceptRule, scanned: ScannedLemma[], state: EvaluationState) {
  for (const { scanned: s, lemma } of lemmaHits(scanned, rule.lemmas)) {
    state.counts.harm++
    record(state, {
      ruleKind: rule.kind,
      ruleId: rule.id ?? null,
      severity: 'violation',
      matchedText: s.text,
      matchedLemma: lemma,
      reason: `Prohibited concept "${lemma}" matched ${s.source} "${s.text}"`
    })
  }
}

function applyRequiredVirtue(rule: RequiredVirtueRule, scanned: ScannedLemma[], state: EvaluationState) {
  for (const { lemma } of lemmaHits(scanned, rule.lemmas)) {
    state.counts.ethical++
    if (!state.requiredValues.includes(lemma)) state.requiredValues.push(lemma)
  }
}

function applyEmotionThreshold(rule: EmotionThresholdRule, input: EvaluationInput, state: EvaluationState) {
  const score = input.emotions[rule.emotion]
  // strictly greater: a score sitting exactly on the threshold does not fire
  if (score === undefined || !(score > rule.threshold)) return
  record(state, {
    ruleKind: rule.kind,
    ruleId: rule.id ?? null,
    severity: rule.severity,
    matchedText: rule.emotion,
    matchedLemma: rule.emotion,
    reason: `Emotion "${rule.emotion}" scored ${score} above threshold ${rule.threshold}`
  })
}

function applyEmotionCombination(rule: EmotionCombinationRule, input: EvaluationInput, state: EvaluationState) {
  if (rule.emotions.length === 0) return
  const allAbove = rule.emotions.every((e) => {
    const score = input.emotions[e]
    return score !== undefined && score > rule.jointThreshold
  })
  if (!allAbove) return
  const joined = rule.emotions.join('+')
  record(state, {
    ruleKind: rule.kind,
    ruleId: rule.id ?? null,
    severity: rule.severity,
    matchedText: joined,
    matchedLemma: joined,
    reason: `Emotions ${rule.emotions.join(', ')} all exceeded joint threshold ${rule.jointThreshold}`
  })
}

function applyRelationshipPattern(rule: RelationshipPatternRule, input: EvaluationInput, state: EvaluationState) {
  for (const rel of input.relationships) {
    const lemma = findMatch(rel.predicateLemma, rule.predicateLemmas)
    if (!lemma) continue
    state.counts.harm++
    record(state, {
      ruleKind: rule.kind,
      ruleId: rule.id ?? null,
      severity: rule.severity,
      matchedText: `${rel.subject} ${rel.predicate} ${rel.object}`,
      matchedLemma: lemma,
      reason: `Predicate "${rel.predicateLemma}" matched pattern "${lemma}" (subject: ${rel.subject}, object: ${rel.object})`
    })
  }
}

const alternatives = (v: string | string[]) => (typeof v === 'string' ? [v] : v)

function oneOf(wanted: string[], value: string) {
  const v = value.toUpperCase()
  return wanted.some((w) => w.toUpperCase() === v)
}

function stepAccepts(step: PosStep, token: Token) {
  if (typeof step === 'string' || Array.isArray(step)) return oneOf(alternatives(step), token.pos)
  if (!oneOf(alternatives(step.pos), token.pos)) return false
  return !step.tag || oneOf(step.tag, token.tag)
}

function describeStep(step: PosStep) {
  if (typeof step === 'string' || Array.isArray(step)) return alternatives(step).join('|')
  const pos = alternatives(step.pos).join('|')
  return step.tag ? `${pos}(${step.tag.join('|')})` : pos
}

function describeSequence(seq: PosStep[]) {
  return seq.map(describeStep).join(' ')
}

function hasPrecedingSubject(tokens: Token[], index: number) {
  const sentence = tokens[index].sentence
  for (let i = index - 1; i >= 0 && tokens[i].sentence === sentence; i--) {
    if (SUBJECT_DEPS.has(tokens[i].dep)) return true
  }
  return false
}

/** Start indices of every window of `tokens` that satisfies the POS sequence within one sentence. */
export function findPosSequence(tokens: Token[], seq: PosStep[], requireNoSubject = true): number[] {
  const starts: number[] = []
  if (seq.length === 0) return starts
  for (let i = 0; i + seq.length <= tokens.length; i++) {
    const sentence = tokens[i].sentence
    let ok = true
    for (let j = 0; j < seq.length; j++) {
      const t = tokens[i + j]
      if (t.sentence !== sentence || !stepAccepts(seq[j], t)) {
        ok = false
        break
      }
    }
    if (!ok) continue
    if (requireNoSubject && hasPrecedingSubject(tokens, i)) continue
    starts.push(i)
  }
  return starts
}

function applyCommandPattern(rule: CommandPatternRule, input: EvaluationInput, state: EvaluationState) {
  const tokens = input.bundle.tokens
  const pattern = describeSequence(rule.posSequence)
  for (const start of findPosSequence(tokens, rule.posSequence, rule.requireNoSubject)) {
    const window = tokens.slice(start, start + rule.posSequence.length)
    state.counts.command++
    record(state, {
      ruleKind: rule.kind,
      ruleId: rule.id ?? null,
      severity: rule.severity,
      matchedText: window.map((t) => t.text).join(' '),
      matchedLemma: window[0].lemma,
      reason: `Imperative pattern ${pattern} matched at token ${start} of sentence ${window[0].sentence}`
    })
  }
}

function applyRule(rule: Rule, input: EvaluationInput, scanned: ScannedLemma[], state: EvaluationState) {
  switch (rule.kind) {
    case 'prohibited-concept':
      return applyProhibitedConcept(rule, scanned, state)
    case 'required-virtue':
      return applyRequiredVirtue(rule, scanned, state)
    case 'emotion-threshold':
      return applyEmotionThreshold(rule, input, state)
    case 'emotion-combination':
      return applyEmotionCombination(rule, input, state)
    case 'relationship-pattern':
      return applyRelationshipPattern(rule, input, state)
    case 'command-pattern':
      return applyCommandPattern(rule, input, state)
    default: {
      const unreachable: never = rule
      throw new Error(`Unhandled rule kind: ${JSON.stringify(unreachable)}`)
    }
  }
}

/**
 * Runs each rule independently against the full feature set. Findings keep
 * rule-set order, then scan order within a rule.
 */
export function evaluate(input: EvaluationInput, ruleSet: RuleSet): ComplianceResult {
  const state: EvaluationState = {
    violations: [],
    warnings: [],
    requiredValues: [],
    counts: { ethical: 0, harm: 0, command: 0 }
  }
  const scanned = scanLemmas(input)
  for (const rule of ruleSet) applyRule(rule, input, scanned, state)

  return {
    compliant: state.violations.length === 0,
    violations: state.violations,
    warnings: state.warnings,
    requiredValuesPresent: state.requiredValues,
    patternCounts: state.counts
  }
}
