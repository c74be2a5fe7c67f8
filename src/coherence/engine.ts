import { debug, info } from '../logger'
import { ConfigStore } from './configStore'
import { fuse } from './fusion'
import { PersistenceDispatcher } from './persistence/dispatcher'
import { scoreRichness } from './richness'
import { evaluate } from './rules'
import { parseAnalysisInput } from './schema'
import { FusionResult } from './types'

export interface EngineOptions {
  config?: ConfigStore
  persistence?: PersistenceDispatcher
}

/**
 * Validates one analyzer bundle, evaluates the active rule set against it and
 * fuses the verdict into a coherence score. Persistence writes are handed to
 * the dispatcher and never awaited here.
 */
export class CoherenceEngine {
  readonly config: ConfigStore
  private readonly persistence?: PersistenceDispatcher

  constructor(opts: EngineOptions = {}) {
    this.config = opts.config ?? new ConfigStore()
    this.persistence = opts.persistence
  }

  analyze(raw: unknown): FusionResult {
    const input = parseAnalysisInput(raw)
    // one snapshot for the whole request, even if a reload lands midway
    const cfg = this.config.snapshot

    const compliance = evaluate(input, cfg.ruleSet)
    const richness = scoreRichness(input.bundle, cfg.richness)
    const result = fuse(
      {
        compliance,
        richness,
        conceptCount: input.concepts.length,
        sentiment: input.sentiment,
        interaction: input.interaction,
        passthrough: {
          bundle: input.bundle,
          entities: input.entities,
          concepts: input.concepts,
          relationships: input.relationships
        }
      },
      cfg
    )

    if (!compliance.compliant) {
      info(`Compliance failed with ${compliance.violations.length} violation(s):`, compliance.violations[0].reason)
    }
    debug('Fusion complete', { coherence: result.coherence.toFixed(3), warnings: compliance.warnings.length })

    this.persistence?.persist(result)
    return result
  }
}
