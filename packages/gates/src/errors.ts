import type { DraftRecord } from './types.js'

export class CandidateParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CandidateParseError'
  }
}

export class NoValidCandidateError extends Error {
  readonly drafts: DraftRecord[]

  constructor(drafts: DraftRecord[]) {
    const attempts = drafts.length
    const reasons = drafts
      .map((d) => `#${d.index}: ${d.reason ?? 'invalid'}`)
      .join('; ')
    super(
      `No valid candidate after ${attempts} attempt${attempts === 1 ? '' : 's'}. ` +
      `Rejected: ${reasons || 'none'}`,
    )
    this.name = 'NoValidCandidateError'
    this.drafts = drafts
  }
}

export class TimeoutError extends Error {
  readonly label: string
  readonly timeoutMs: number

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`)
    this.name = 'TimeoutError'
    this.label = label
    this.timeoutMs = timeoutMs
  }
}
