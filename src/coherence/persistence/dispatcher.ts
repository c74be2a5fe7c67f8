import { debug, describeError, error, warn } from '../../logger'
import { conceptsForPersistence } from '../concepts'
import { Concept, FusionResult, PersistenceSettings, Relationship } from '../types'
import { PersistenceAdapter } from './adapter'

export type PersistenceJob =
  | { kind: 'concept'; concept: Concept }
  | { kind: 'relationship'; relationship: Relationship; strengthDelta: number }

type SettingsSource = PersistenceSettings | (() => PersistenceSettings)

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

type Persistable = Pick<FusionResult, 'entities' | 'concepts' | 'relationships'>

export function persistenceJobs(result: Persistable, strengthDelta: number) {
  const jobs: PersistenceJob[] = []
  for (const concept of conceptsForPersistence(result.entities, result.concepts)) {
    jobs.push({ kind: 'concept', concept })
  }
  for (const relationship of result.relationships) {
    jobs.push({ kind: 'relationship', relationship, strengthDelta })
  }
  return jobs
}

/**
 * Fire-and-forget writer in front of a PersistenceAdapter. `dispatch` returns
 * immediately; failed writes are retried with a linear backoff and dropped
 * (with an error log) once `maxAttempts` is spent. Nothing is ever rethrown
 * to the caller.
 */
export class PersistenceDispatcher {
  private inflight = new Set<Promise<void>>()
  private dropped = 0

  constructor(
    private readonly adapter: PersistenceAdapter,
    private readonly settings: SettingsSource
  ) {}

  get pending() {
    return this.inflight.size
  }

  get droppedJobs() {
    return this.dropped
  }

  /** Queues the concepts and relationships of one analysis, using the current strength delta. */
  persist(result: Persistable): void {
    this.dispatch(persistenceJobs(result, this.resolveSettings().relationshipStrengthDelta))
  }

  dispatch(jobs: PersistenceJob[]): void {
    for (const job of jobs) {
      const p: Promise<void> = this.run(job).finally(() => {
        this.inflight.delete(p)
      })
      this.inflight.add(p)
    }
  }

  /** Resolves once every dispatched job (including retries) has settled. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(Array.from(this.inflight))
    }
  }

  private resolveSettings(): PersistenceSettings {
    return typeof this.settings === 'function' ? this.settings() : this.settings
  }

  private write(job: PersistenceJob): Promise<void> {
    switch (job.kind) {
      case 'concept':
        return this.adapter.upsertConcept(job.concept)
      case 'relationship':
        return this.adapter.upsertRelationship(job.relationship, job.strengthDelta)
    }
  }

  private async run(job: PersistenceJob): Promise<void> {
    const { maxAttempts, retryDelayMs } = this.resolveSettings()
    for (let attempt = 1; ; attempt++) {
      try {
        await this.write(job)
        return
      } catch (err) {
        if (attempt >= maxAttempts) {
          this.dropped++
          error(`Dropping ${job.kind} write after ${attempt} attempts:`, describeError(err))
          return
        }
        warn(`Persistence ${job.kind} write failed (attempt ${attempt}/${maxAttempts}), retrying:`, describeError(err))
        await sleep(retryDelayMs * attempt)
        debug('Retrying', job.kind, 'write')
      }
    }
  }
}
