import { describe, it, expect } from 'vitest'
import { findMatch, matches } from './morphology'

describe('morphology.matches', () => {
  it('tolerates regular suffix inflection', () => {
    expect(matches('manipulate', 'manipulation')).toBe(true)
    expect(matches('deceive', 'deceiving')).toBe(true)
  })

  it('requires an exact match when either word is shorter than four characters', () => {
    expect(matches('act', 'art')).toBe(false)
    expect(matches('Run', 'run')).toBe(true)
    expect(matches('cat', 'dog')).toBe(false)
    expect(matches('hurt', 'hut')).toBe(false)
  })

  it('derives the compared prefix from the shorter word', () => {
    // four-character words leave a one-character prefix
    expect(matches('harm', 'help')).toBe(true)
    expect(matches('harm', 'charm')).toBe(false)
    expect(matches('violence', 'violent')).toBe(true)
    expect(matches('violence', 'vintage')).toBe(false)
  })

  it('never matches empty strings', () => {
    expect(matches('', '')).toBe(false)
    expect(matches('', 'abc')).toBe(false)
  })

  it('is commutative', () => {
    const words = ['manipulate', 'manipulation', 'act', 'art', 'Run', 'run', 'harm', 'help', '', 'abuse', 'ABUSED']
    for (const a of words) {
      for (const b of words) {
        expect(matches(a, b)).toBe(matches(b, a))
      }
    }
  })
})

describe('morphology.findMatch', () => {
  it('returns the first configured lemma that matches', () => {
    expect(findMatch('attacking', ['kill', 'attack', 'attacker'])).toBe('attack')
    expect(findMatch('tea', ['team', 'tease'])).toBeUndefined()
  })
})
