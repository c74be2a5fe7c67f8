import { AnalysisInput, Concept, LinguisticBundle, Relationship, Token } from '../src/coherence/types'

export function makeBundle(overrides: Partial<LinguisticBundle> = {}): LinguisticBundle {
  return {
    tokenCount: 0,
    posDistribution: {},
    keyLemmas: [],
    sentences: [],
    sentenceCount: 0,
    dependencyTypes: [],
    avgTokenLength: 0,
    tokens: [],
    ...overrides
  }
}

export function makeInput(overrides: Partial<AnalysisInput> = {}): AnalysisInput {
  return {
    bundle: makeBundle(),
    entities: [],
    concepts: [],
    relationships: [],
    emotions: {},
    ...overrides
  }
}

export function concept(name: string, lemma = name.toLowerCase(), entityType = 'LEMMA'): Concept {
  return { name, lemma, entityType, posTag: 'NOUN', category: 'concept', frequency: 1 }
}

export function relationship(subject: string, predicateLemma: string, object: string, predicate = predicateLemma): Relationship {
  return {
    subject,
    predicate,
    predicateLemma,
    object,
    dependencyType: 'nsubj-dobj',
    verbTense: 'VBD',
    strength: 1
  }
}

// "text/lemma/POS/dep[/TAG]" per token, all in one sentence
export function tokens(line: string, sentence = 0): Token[] {
  return line.split(' ').map((part) => {
    const [text, lemma, pos, dep, tag = ''] = part.split('/')
    return { text, lemma, pos, tag, dep, sentence }
  })
}
