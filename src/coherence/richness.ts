import { LinguisticBundle, RichnessSettings } from './types'

export const DEFAULT_RICHNESS: RichnessSettings = { tokenNorm: 20, posNorm: 5 }

export function posDiversity(bundle: Pick<LinguisticBundle, 'posDistribution'>) {
  return Object.values(bundle.posDistribution).filter((count) => count > 0).length
}

// Volume and grammatical variety both count; either one at zero gives zero
export function scoreRichness(bundle: LinguisticBundle, settings: RichnessSettings = DEFAULT_RICHNESS): number {
  const volume = bundle.tokenCount / settings.tokenNorm
  const variety = posDiversity(bundle) / settings.posNorm
  return Math.max(0, Math.min(1, volume * variety))
}
