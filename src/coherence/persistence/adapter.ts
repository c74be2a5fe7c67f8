import { Concept, Relationship } from '../types'

/**
 * Durable store for deduplicated concepts and relationships. Concepts are keyed
 * by (name, entityType); relationships by (subject, predicateLemma, object, dependencyType).
 * Implementations raise PersistenceUnavailableError when the backing store cannot be reached.
 */
export interface PersistenceAdapter {
  /** Inserts with frequency 1, or bumps the stored frequency by one. */
  upsertConcept(concept: Concept): Promise<void>
  /** Inserts with the relationship's own strength, or adds `strengthDelta` to the stored one. */
  upsertRelationship(relationship: Relationship, strengthDelta: number): Promise<void>
  conceptCount(): Promise<number>
  /** Most frequent first; ties broken by name. */
  topConcepts(limit?: number): Promise<Concept[]>
  listRelationships(): Promise<Relationship[]>
}

export function conceptKey(c: Pick<Concept, 'name' | 'entityType'>) {
  return `${c.name}\u0000${c.entityType}`
}

export function relationshipKey(r: Pick<Relationship, 'subject' | 'predicateLemma' | 'object' | 'dependencyType'>) {
  return [r.subject, r.predicateLemma, r.object, r.dependencyType].join('\u0000')
}

// Code-unit order, independent of the host locale
const byName = (a: Concept, b: Concept) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)

export function rankConcepts(concepts: Iterable<Concept>, limit: number): Concept[] {
  return Array.from(concepts)
    .sort((a, b) => b.frequency - a.frequency || byName(a, b))
    .slice(0, Math.max(0, limit))
    .map((c) => ({ ...c }))
}
