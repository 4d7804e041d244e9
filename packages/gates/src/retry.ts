import { sleep } from './utils/timeout.js'

export type Backoff = 'none' | 'linear' | 'exponential'

export interface RetryConfig {
  max: number
  delay_ms?: number
  backoff?: Backoff
}

export interface RetryContext {
  /** 1-based. */
  attempt: number
  /** Corrective feedback from the previous attempt, if it asked for a retry. */
  feedback?: string
}

export type AttemptOutcome<T> =
  | { status: 'done'; value: T }
  | { status: 'retry'; value: T; feedback: string }
  | { status: 'terminal'; value: T }

export interface AttemptRecord<T> {
  attempt: number
  outcome: AttemptOutcome<T>
  feedback_sent?: string
  duration_ms: number
}

export interface RetryEngineOptions<T> {
  run: (context: RetryContext) => Promise<AttemptOutcome<T>>
  retry: RetryConfig
  onAttempt?: (record: AttemptRecord<T>) => void | Promise<void>
  /** Checked before every attempt after the first; false stops the loop. */
  shouldContinue?: () => boolean
}

export interface RetryEngineResult<T> {
  status: 'done' | 'terminal' | 'exhausted' | 'stopped'
  /** Value of the last attempt made. */
  value?: T
  history: AttemptRecord<T>[]
  attempts: number
  lastFeedback?: string
}

export function delayForAttempt(retry: RetryConfig, attempt: number): number {
  const base = retry.delay_ms ?? 0
  const backoff = retry.backoff ?? 'none'

  if (backoff === 'linear') return base * attempt
  if (backoff === 'exponential') return base * (2 ** (attempt - 1))
  return base
}

export async function runWithRetries<T>(options: RetryEngineOptions<T>): Promise<RetryEngineResult<T>> {
  const history: AttemptRecord<T>[] = []
  const maxAttempts = Math.max(1, options.retry.max)

  let feedback: string | undefined
  let value: T | undefined

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    if (attempt > 1 && options.shouldContinue && !options.shouldContinue()) {
      return { status: 'stopped', value, history, attempts: history.length, lastFeedback: feedback }
    }

    const started = Date.now()
    const outcome = await options.run({ attempt, feedback })
    value = outcome.value

    const record: AttemptRecord<T> = {
      attempt,
      outcome,
      feedback_sent: feedback,
      duration_ms: Date.now() - started,
    }
    history.push(record)
    await options.onAttempt?.(record)

    if (outcome.status === 'done' || outcome.status === 'terminal') {
      return { status: outcome.status, value, history, attempts: attempt, lastFeedback: feedback }
    }

    feedback = outcome.feedback

    if (attempt < maxAttempts) {
      const waitMs = delayForAttempt(options.retry, attempt)
      if (waitMs > 0) await sleep(waitMs)
    }
  }

  return { status: 'exhausted', value, history, attempts: history.length, lastFeedback: feedback }
}
