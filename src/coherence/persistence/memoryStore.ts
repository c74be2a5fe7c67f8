import { Concept, Relationship } from '../types'
import { PersistenceAdapter, conceptKey, rankConcepts, relationshipKey } from './adapter'

export class MemoryStore implements PersistenceAdapter {
  private concepts = new Map<string, Concept>()
  private relationships = new Map<string, Relationship>()

  async upsertConcept(concept: Concept): Promise<void> {
    const key = conceptKey(concept)
    const existing = this.concepts.get(key)
    if (existing) existing.frequency += 1
    else this.concepts.set(key, { ...concept, frequency: 1 })
  }

  async upsertRelationship(relationship: Relationship, strengthDelta: number): Promise<void> {
    const key = relationshipKey(relationship)
    const existing = this.relationships.get(key)
    if (existing) existing.strength += strengthDelta
    else this.relationships.set(key, { ...relationship })
  }

  async conceptCount(): Promise<number> {
    return this.concepts.size
  }

  async topConcepts(limit = 10): Promise<Concept[]> {
    return rankConcepts(this.concepts.values(), limit)
  }

  async listRelationships(): Promise<Relationship[]> {
    return Array.from(this.relationships.values(), (r) => ({ ...r }))
  }
}
