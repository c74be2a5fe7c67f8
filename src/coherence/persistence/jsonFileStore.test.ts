import fsp from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { concept, relationship } from '../../../test/fixtures'
import { PersistenceUnavailableError } from '../errors'
import { JsonFileStore } from './jsonFileStore'

describe('JsonFileStore', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'coherence-store-'))
  })

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true })
  })

  it('treats a missing file as an empty store', async () => {
    const store = new JsonFileStore(path.join(dir, 'store.json'))
    expect(await store.conceptCount()).toBe(0)
    expect(await store.topConcepts()).toEqual([])
  })

  it('serialises concurrent upserts and persists them', async () => {
    const file = path.join(dir, 'nested', 'store.json')
    const store = new JsonFileStore(file)
    await Promise.all([
      store.upsertConcept(concept('Justice')),
      store.upsertConcept(concept('Justice')),
      store.upsertConcept(concept('Justice')),
      store.upsertRelationship(relationship('we', 'seek', 'justice'), 1),
      store.upsertRelationship(relationship('we', 'seek', 'justice'), 1)
    ])

    const reopened = new JsonFileStore(file)
    expect(await reopened.conceptCount()).toBe(1)
    expect((await reopened.topConcepts())[0].frequency).toBe(3)
    expect((await reopened.listRelationships())[0].strength).toBe(2)
  })

  it('reports a corrupt file as unavailable', async () => {
    const file = path.join(dir, 'store.json')
    await fsp.writeFile(file, 'not json', 'utf8')
    const store = new JsonFileStore(file)
    await expect(store.upsertConcept(concept('Justice'))).rejects.toBeInstanceOf(PersistenceUnavailableError)
    // the queue keeps working after a failed operation
    await fsp.writeFile(file, JSON.stringify({ concepts: [], relationships: [] }), 'utf8')
    await store.upsertConcept(concept('Justice'))
    expect(await store.conceptCount()).toBe(1)
  })
})
