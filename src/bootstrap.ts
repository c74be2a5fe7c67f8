import { configPath, loadEnv, storePath, watchConfigEnabled } from './env'
import { info } from './logger'
import { ConfigStore } from './coherence/configStore'
import { CoherenceEngine } from './coherence/engine'
import { PersistenceAdapter } from './coherence/persistence/adapter'
import { PersistenceDispatcher } from './coherence/persistence/dispatcher'
import { JsonFileStore } from './coherence/persistence/jsonFileStore'

export interface BootstrapOptions {
  configFile?: string
  store?: PersistenceAdapter
  watch?: boolean
}

export interface EngineRuntime {
  engine: CoherenceEngine
  config: ConfigStore
  store: PersistenceAdapter
  dispatcher: PersistenceDispatcher
  /** Stops the config watcher and waits for queued writes. */
  close(): Promise<void>
}

/**
 * Loads `.env*`, reads the engine configuration file and wires the engine to a
 * JSON-file store (or the given adapter). A configuration file that fails
 * validation aborts startup.
 */
export async function createEngine(opts: BootstrapOptions = {}): Promise<EngineRuntime> {
  loadEnv()
  const file = opts.configFile ?? configPath()
  const config = new ConfigStore()
  await config.loadFile(file)

  const store = opts.store ?? new JsonFileStore(storePath())
  const dispatcher = new PersistenceDispatcher(store, () => config.snapshot.persistence)
  const engine = new CoherenceEngine({ config, persistence: dispatcher })

  const stopWatching = (opts.watch ?? watchConfigEnabled()) ? config.watch(file) : undefined
  info('Coherence engine ready')

  return {
    engine,
    config,
    store,
    dispatcher,
    async close() {
      stopWatching?.()
      await dispatcher.drain()
    }
  }
}
