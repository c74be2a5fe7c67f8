import fsp from 'node:fs/promises'
import { z } from 'zod'
import { debug, describeError } from '../../logger'
import { atomicWriteJson } from '../../utils'
import { PersistenceUnavailableError } from '../errors'
import { conceptSchema, relationshipSchema } from '../schema'
import { Concept, Relationship } from '../types'
import { PersistenceAdapter, conceptKey, rankConcepts, relationshipKey } from './adapter'

const documentSchema = z.object({
  concepts: z.array(conceptSchema),
  relationships: z.array(relationshipSchema)
})

interface StoreDocument {
  concepts: Concept[]
  relationships: Relationship[]
}

function isMissingFile(err: unknown) {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Keeps every concept and relationship in one JSON document. Mutations are
 * serialised through a promise chain and each one rewrites the file atomically.
 */
export class JsonFileStore implements PersistenceAdapter {
  private queue: Promise<unknown> = Promise.resolve()

  constructor(readonly filePath: string) {}

  upsertConcept(concept: Concept): Promise<void> {
    return this.mutate((doc) => {
      const key = conceptKey(concept)
      const existing = doc.concepts.find((c) => conceptKey(c) === key)
      if (existing) existing.frequency += 1
      else doc.concepts.push({ ...concept, frequency: 1 })
    })
  }

  upsertRelationship(relationship: Relationship, strengthDelta: number): Promise<void> {
    return this.mutate((doc) => {
      const key = relationshipKey(relationship)
      const existing = doc.relationships.find((r) => relationshipKey(r) === key)
      if (existing) existing.strength += strengthDelta
      else doc.relationships.push({ ...relationship })
    })
  }

  async conceptCount(): Promise<number> {
    const doc = await this.enqueue(() => this.read())
    return doc.concepts.length
  }

  async topConcepts(limit = 10): Promise<Concept[]> {
    const doc = await this.enqueue(() => this.read())
    return rankConcepts(doc.concepts, limit)
  }

  async listRelationships(): Promise<Relationship[]> {
    const doc = await this.enqueue(() => this.read())
    return doc.relationships
  }

  private mutate(fn: (doc: StoreDocument) => void): Promise<void> {
    return this.enqueue(async () => {
      const doc = await this.read()
      fn(doc)
      try {
        await atomicWriteJson(this.filePath, doc)
      } catch (err) {
        throw new PersistenceUnavailableError(`Cannot write store ${this.filePath}: ${describeError(err)}`, err)
      }
      debug('Store updated', this.filePath, `${doc.concepts.length} concepts`)
    })
  }

  // Runs after every earlier operation settles, whether it succeeded or not
  private enqueue<T>(op: () => Promise<T>): Promise<T> {
    const next = this.queue.then(op, op)
    this.queue = next.catch(() => undefined)
    return next
  }

  private async read(): Promise<StoreDocument> {
    let text: string
    try {
      text = await fsp.readFile(this.filePath, 'utf8')
    } catch (err) {
      if (isMissingFile(err)) return { concepts: [], relationships: [] }
      throw new PersistenceUnavailableError(`Cannot read store ${this.filePath}: ${describeError(err)}`, err)
    }
    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (err) {
      throw new PersistenceUnavailableError(`Store ${this.filePath} is not valid JSON`, err)
    }
    const parsed = documentSchema.safeParse(raw)
    if (!parsed.success) {
      throw new PersistenceUnavailableError(`Store ${this.filePath} has an unexpected shape`, parsed.error)
    }
    return parsed.data
  }
}
