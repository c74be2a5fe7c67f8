import { describe, it, expect } from 'vitest'
import { concept, relationship } from '../../../test/fixtures'
import { MemoryStore } from './memoryStore'

describe('MemoryStore', () => {
  it('counts repeated sightings of the same (name, entityType)', async () => {
    const store = new MemoryStore()
    await store.upsertConcept(concept('Justice'))
    await store.upsertConcept({ ...concept('Justice'), frequency: 9 })
    await store.upsertConcept(concept('Justice', 'justice', 'LAW'))
    await store.upsertConcept(concept('Respect'))
    expect(await store.conceptCount()).toBe(3)
    const top = await store.topConcepts(2)
    expect(top.map((c) => [c.name, c.entityType, c.frequency])).toEqual([
      ['Justice', 'LEMMA', 2],
      ['Justice', 'LAW', 1]
    ])
  })

  it('breaks frequency ties by code-unit order of the name', async () => {
    const store = new MemoryStore()
    for (const name of ['émile', 'Zeno', 'apple', 'Ada']) await store.upsertConcept(concept(name))
    expect((await store.topConcepts()).map((c) => c.name)).toEqual(['Ada', 'Zeno', 'apple', 'émile'])
  })

  it('accumulates relationship strength', async () => {
    const store = new MemoryStore()
    const rel = relationship('we', 'build', 'bridges')
    await store.upsertRelationship(rel, 0.5)
    await store.upsertRelationship(rel, 0.5)
    await store.upsertRelationship(relationship('we', 'build', 'roads'), 0.5)
    const rels = await store.listRelationships()
    expect(rels.map((r) => [r.object, r.strength])).toEqual([
      ['bridges', 1.5],
      ['roads', 1]
    ])
  })
})
