export const VERSION = '0.1.0'

// Candidate selection
export { selectCandidate } from './select.js'
export { formatOptions, parseChoice } from './arbitration.js'

// Retry engine
export { runWithRetries, delayForAttempt } from './retry.js'
export type {
  AttemptOutcome,
  AttemptRecord,
  Backoff,
  RetryConfig,
  RetryContext,
  RetryEngineOptions,
  RetryEngineResult,
} from './retry.js'

// Utilities
export { extractBlock, parseOutput } from './utils/parse-output.js'
export { withTimeout, sleep } from './utils/timeout.js'

// Errors
export { CandidateParseError, NoValidCandidateError, TimeoutError } from './errors.js'

// Types
export type {
  Arbitrate,
  ArbitrationRecord,
  DraftRecord,
  Generate,
  SelectOptions,
  SelectResult,
  SelectTimeouts,
} from './types.js'
