import type { ArbitrationRecord } from './types.js'

/** Enumerate candidates from 0 as `--- OPTION i ---` blocks. */
export function formatOptions<T>(
  candidates: T[],
  render: (candidate: T) => string = (candidate) => JSON.stringify(candidate),
): string {
  return candidates
    .map((candidate, index) => `--- OPTION ${index} ---\n${render(candidate)}`)
    .join('\n\n')
}

/**
 * Read the first integer in an arbitration reply. Anything unusable, or an
 * index outside `[0, count)`, falls back to 0.
 */
export function parseChoice(raw: string, count: number): ArbitrationRecord {
  const match = /\d+/.exec(raw)
  if (!match) {
    return { raw, index: 0, fallback: true, reason: 'no integer in reply' }
  }

  const index = Number.parseInt(match[0], 10)
  if (!Number.isSafeInteger(index) || index >= count) {
    return { raw, index: 0, fallback: true, reason: `index ${match[0]} out of range` }
  }

  return { raw, index, fallback: false }
}
