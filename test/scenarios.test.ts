import path from 'node:path'
import { describe, it, expect, vi } from 'vitest'
import { concept, makeBundle, makeInput, tokens } from './fixtures'
import { ConfigStore } from '../src/coherence/configStore'
import { CoherenceEngine } from '../src/coherence/engine'

vi.spyOn(console, 'info').mockImplementation(() => {})

describe('end-to-end scenarios', () => {
  it('blocks "manipulate" under a prohibition on "manipulation"', () => {
    const config = new ConfigStore()
    config.load({ ruleSet: [{ kind: 'prohibited-concept', lemmas: ['manipulation'] }] })
    const result = new CoherenceEngine({ config }).analyze(
      makeInput({ bundle: makeBundle({ keyLemmas: ['manipulate'] }) })
    )

    expect(result.compliance.compliant).toBe(false)
    expect(result.success).toBe(false)
    expect(result.compliance.violations).toHaveLength(1)
    expect(result.compliance.violations[0]).toMatchObject({
      severity: 'violation',
      matchedText: 'manipulate',
      matchedLemma: 'manipulation'
    })
  })

  it('scores a virtuous, compliant utterance', () => {
    const config = new ConfigStore()
    config.load({
      ruleSet: [{ kind: 'required-virtue', lemmas: ['respect', 'fairness'] }],
      concept: { normalizationConstant: 5 }
    })
    const bundle = makeBundle({
      tokenCount: 14,
      posDistribution: { NOUN: 5, VERB: 4, ADJ: 3, DET: 2 },
      keyLemmas: ['respect', 'fairness'],
      sentences: ['We value respect and fairness in every exchange.'],
      sentenceCount: 1
    })
    const result = new CoherenceEngine({ config }).analyze(
      makeInput({ bundle, concepts: [concept('Respect'), concept('Fairness'), concept('Exchange')] })
    )

    expect(result.compliance.compliant).toBe(true)
    expect(result.compliance.requiredValuesPresent).toEqual(['respect', 'fairness'])
    expect(result.richness).toBeCloseTo(0.56, 10)
    expect(result.conceptScore).toBe(0.6)
    expect(result.structuralScore).toBeCloseTo(0.832, 10)
    expect(result.coherence).toBeCloseTo(0.832, 10)
    expect(result.summary).toEqual({
      conceptCount: 3,
      entityCount: 0,
      relationshipCount: 0,
      sentenceCount: 1,
      violationCount: 0,
      warningCount: 0,
      requiredValueCount: 2,
      priorInteractions: 0
    })
  })

  it('gives the same coherence for the same request twice', () => {
    const engine = new CoherenceEngine()
    const input = makeInput({ bundle: makeBundle({ tokenCount: 9, posDistribution: { NOUN: 3, VERB: 6 } }) })
    expect(engine.analyze(input).coherence).toBe(engine.analyze(input).coherence)
  })

  it('warns on a bare imperative but not on a past-tense statement under the shipped rules', async () => {
    const config = new ConfigStore()
    await config.loadFile(path.resolve(__dirname, '../config/engine.json'))
    const engine = new CoherenceEngine({ config })
    const analyze = (line: string) =>
      engine.analyze(makeInput({ bundle: makeBundle({ tokens: tokens(line) }) })).compliance.warnings

    expect(analyze('Played/play/VERB/ROOT/VBD games/game/NOUN/dobj/NNS')).toEqual([])
    expect(analyze('Play/play/VERB/ROOT/VB games/game/NOUN/dobj/NNS').map((w) => w.matchedText)).toEqual(['Play games'])
  })
})
