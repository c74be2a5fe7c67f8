import fs from 'node:fs'
import fsp from 'node:fs/promises'
import { debug, describeError, info, warn } from '../logger'
import { deepFreeze } from '../utils'
import { ConfigOverrides, defaultConfig, mergeConfig } from './config'
import { InvalidConfigurationError } from './errors'
import { DEFAULT_REBALANCE, RebalanceOptions, rebalanceFusionWeights } from './fusion'
import { parseConfigOverrides, parseEngineConfig } from './schema'
import { EngineConfig, FusionWeights } from './types'

type Listener = (config: EngineConfig) => void

/**
 * Holds the active engine configuration. Every publish swaps in a new frozen
 * snapshot; readers keep whichever snapshot they grabbed, so a reload never
 * shows up half-applied. A candidate that fails validation is rejected and the
 * current snapshot stays in place.
 */
export class ConfigStore {
  private current: EngineConfig
  private version = 0
  private listeners = new Set<Listener>()

  constructor(initial: EngineConfig = defaultConfig) {
    this.current = deepFreeze(parseEngineConfig(structuredClone(initial)))
  }

  get snapshot(): EngineConfig {
    return this.current
  }

  get revision() {
    return this.version
  }

  /** Replaces the configuration with `raw` layered over the built-in defaults. */
  load(raw: unknown): EngineConfig {
    const overrides = parseConfigOverrides(raw)
    return this.publish(mergeConfig(defaultConfig, overrides))
  }

  /** Layers `overrides` over the active configuration. */
  update(overrides: ConfigOverrides): EngineConfig {
    return this.publish(mergeConfig(this.current, parseConfigOverrides(overrides)))
  }

  async loadFile(filePath: string): Promise<EngineConfig> {
    let text: string
    try {
      text = await fsp.readFile(filePath, 'utf8')
    } catch (err) {
      throw new InvalidConfigurationError(`Cannot read configuration ${filePath}: ${describeError(err)}`)
    }
    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (err) {
      throw new InvalidConfigurationError(`Configuration ${filePath} is not valid JSON: ${describeError(err)}`)
    }
    const cfg = this.load(raw)
    info('Loaded engine configuration', filePath, `(${cfg.ruleSet.length} rules, revision ${this.version})`)
    return cfg
  }

  /**
   * Reloads `filePath` whenever it changes. Failed reloads are logged and the
   * active configuration is kept. Returns a function that stops watching.
   */
  watch(filePath: string): () => void {
    // reloads run one after another, so the newest file contents always land last
    let reloading: Promise<void> = Promise.resolve()
    const reload = () => {
      reloading = reloading.then(() =>
        this.loadFile(filePath).then(
          () => undefined,
          (err: unknown) => {
            warn('Configuration reload rejected; keeping revision', this.version, describeError(err))
          }
        )
      )
    }
    const watcher = fs.watch(filePath, { persistent: false }, reload)
    watcher.on('error', (err) => {
      warn('Configuration watcher failed for', filePath, describeError(err))
    })
    return () => watcher.close()
  }

  /** Applies caller feedback to the fusion weights and publishes the result. */
  rebalance(feedback: Partial<FusionWeights>, opts: RebalanceOptions = DEFAULT_REBALANCE): EngineConfig {
    const fusion = rebalanceFusionWeights(this.current.weights.fusion, feedback, opts)
    debug('Rebalanced fusion weights', fusion)
    return this.publish(mergeConfig(this.current, { weights: { fusion } }))
  }

  onChange(listener: Listener): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  private publish(candidate: EngineConfig): EngineConfig {
    const next = deepFreeze(parseEngineConfig(structuredClone(candidate)))
    this.current = next
    this.version++
    for (const listener of this.listeners) listener(next)
    return next
  }
}
