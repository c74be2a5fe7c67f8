import appRootPath from 'app-root-path'
import { config as loadDotenvFiles } from 'dotenv-flow'
import path from 'node:path'

let loaded = false

export const DEFAULT_CONFIG_FILE = path.join('config', 'engine.json')
export const DEFAULT_STORE_FILE = path.join('.tmp', 'coherence-store.json')

export function loadEnv() {
  if (loaded) return
  loadDotenvFiles({ path: path.resolve(appRootPath.path), silent: true })
  loaded = true
}

export function resolveFromRoot(p: string) {
  return path.isAbsolute(p) ? p : path.resolve(appRootPath.path, p)
}

export function configPath() {
  return resolveFromRoot(process.env.COHERENCE_CONFIG_PATH || DEFAULT_CONFIG_FILE)
}

export function storePath() {
  return resolveFromRoot(process.env.COHERENCE_STORE_PATH || DEFAULT_STORE_FILE)
}

export function watchConfigEnabled() {
  const v = process.env.COHERENCE_WATCH_CONFIG
  return v === '1' || v === 'true'
}
