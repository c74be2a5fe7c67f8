import path from 'node:path'
import { describe, it, expect, vi } from 'vitest'
import { createEngine } from '../src/bootstrap'
import { MemoryStore } from '../src/coherence/persistence/memoryStore'
import { makeBundle, makeInput, tokens } from './fixtures'

describe('createEngine', () => {
  it('wires the shipped configuration to the given store', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    const store = new MemoryStore()
    const runtime = await createEngine({
      configFile: path.resolve(__dirname, '../config/engine.json'),
      store,
      watch: false
    })

    const result = runtime.engine.analyze(
      makeInput({
        bundle: makeBundle({
          keyLemmas: ['justice'],
          tokens: tokens('Show/show/VERB/ROOT/VB mercy/mercy/NOUN/dobj/NN')
        }),
        entities: [{ text: 'Geneva', label: 'GPE', lemma: 'Geneva', rootPos: 'PROPN', rootDep: 'pobj' }],
        emotions: { anger: 0.2 }
      })
    )
    await runtime.close()

    expect(result.compliance.compliant).toBe(true)
    expect(result.compliance.requiredValuesPresent).toEqual(['justice'])
    expect(result.compliance.warnings.map((w) => w.ruleId)).toEqual(['imperative'])
    expect(await store.topConcepts()).toEqual([
      { name: 'Geneva', lemma: 'Geneva', entityType: 'GPE', posTag: 'PROPN', category: 'location', frequency: 1 }
    ])
  })
})
