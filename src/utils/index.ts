export { atomicWrite, atomicWriteJson } from '../interfaces/atomicWrite'

export function clamp01(x: number) {
  if (Number.isNaN(x)) return 0
  return Math.max(0, Math.min(1, x))
}

export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) return value
  for (const child of Object.values(value)) deepFreeze(child)
  Object.freeze(value)
  return value
}
