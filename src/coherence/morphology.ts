// Minimum length before prefix comparison kicks in; shorter words need an exact match
const MIN_STEM_LENGTH = 4
// Characters of inflectional suffix tolerated at the end of the shorter word
const SUFFIX_SLACK = 3

/**
 * Tolerant lemma comparison: exact (case-insensitive) equality, or a shared
 * prefix of `min(len) - 3` characters when both words have at least 4 characters.
 * `matches('manipulate', 'manipulation') === true`, `matches('act', 'art') === false`.
 */
export function matches(a: string, b: string): boolean {
  if (!a || !b) return false
  const x = a.toLowerCase()
  const y = b.toLowerCase()
  if (x === y) return true
  if (x.length < MIN_STEM_LENGTH || y.length < MIN_STEM_LENGTH) return false
  const m = Math.min(x.length, y.length) - SUFFIX_SLACK
  if (m < 1) return false
  return x.slice(0, m) === y.slice(0, m)
}

/** First entry of `lemmas` that matches `candidate`, in configured order. */
export function findMatch(candidate: string, lemmas: readonly string[]): string | undefined {
  return lemmas.find((l) => matches(candidate, l))
}
