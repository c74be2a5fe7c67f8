import { Concept, Entity } from './types'

const CATEGORY_BY_LABEL: Record<string, string> = {
  PERSON: 'agent',
  ORG: 'organization',
  GPE: 'location',
  LOC: 'location',
  DATE: 'temporal',
  TIME: 'temporal',
  MONEY: 'value',
  PERCENT: 'value',
  PRODUCT: 'artifact',
  EVENT: 'event',
  WORK_OF_ART: 'artifact',
  LAW: 'concept',
  LANGUAGE: 'concept',
  NORP: 'group'
}

export function categorizeEntity(label: string): string {
  return CATEGORY_BY_LABEL[label.toUpperCase()] ?? 'general'
}

export function conceptFromEntity(entity: Entity): Concept {
  return {
    name: entity.text,
    lemma: entity.lemma || entity.text,
    entityType: entity.label,
    posTag: entity.rootPos || 'UNKNOWN',
    category: categorizeEntity(entity.label),
    frequency: 1
  }
}

/**
 * Concepts to upsert for one request: the analyzer's concepts, then any entity
 * whose surface text is not already among them.
 */
export function conceptsForPersistence(entities: Entity[], concepts: Concept[]): Concept[] {
  const seen = new Set(concepts.map((c) => c.name.toLowerCase()))
  const out = [...concepts]
  for (const e of entities) {
    const key = e.text.toLowerCase()
    if (!key || seen.has(key)) continue
    seen.add(key)
    out.push(conceptFromEntity(e))
  }
  return out
}
