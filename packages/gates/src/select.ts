import { parseChoice } from './arbitration.js'
import { NoValidCandidateError } from './errors.js'
import { parseOutput } from './utils/parse-output.js'
import { withTimeout } from './utils/timeout.js'
import type {
  ArbitrationRecord,
  DraftRecord,
  SelectOptions,
  SelectResult,
} from './types.js'

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Best-of-K selection over a black-box generator.
 *
 * Calls `generate` exactly `k` times; `k` below 1 is a RangeError. A draft
 * that fails to generate, times out, or does not extract and parse is dropped
 * as-is (no repair). One survivor is returned directly; several go to
 * `arbitrate`, whose reply is read as an index with a fallback to 0.
 */
export async function selectCandidate<T>(options: SelectOptions<T>): Promise<SelectResult<T>> {
  const started = Date.now()
  const k = options.k
  if (!Number.isInteger(k) || k < 1) {
    throw new RangeError(`k must be a positive integer, got ${k}`)
  }
  const drafts: DraftRecord[] = []
  const candidates: T[] = []

  for (let index = 0; index < k; index += 1) {
    const draftStarted = Date.now()
    let raw: string | undefined

    try {
      raw = await withTimeout(options.generate(options.prompt), options.timeouts?.generate_ms, 'generate')
      candidates.push(options.parse(parseOutput(raw)))
      drafts.push({ index, valid: true, raw, duration_ms: Date.now() - draftStarted })
    } catch (err) {
      drafts.push({
        index,
        valid: false,
        reason: errorMessage(err),
        raw,
        duration_ms: Date.now() - draftStarted,
      })
    }

    options.onDraft?.(drafts[drafts.length - 1])
  }

  if (candidates.length === 0) {
    throw new NoValidCandidateError(drafts)
  }

  if (candidates.length === 1) {
    return {
      value: candidates[0],
      chosen: 0,
      candidates,
      drafts,
      duration_ms: Date.now() - started,
    }
  }

  let arbitration: ArbitrationRecord
  try {
    const reply = await withTimeout(options.arbitrate(candidates), options.timeouts?.arbitrate_ms, 'arbitrate')
    arbitration = parseChoice(reply, candidates.length)
  } catch (err) {
    arbitration = { index: 0, fallback: true, reason: errorMessage(err) }
  }

  return {
    value: candidates[arbitration.index],
    chosen: arbitration.index,
    candidates,
    drafts,
    arbitration,
    duration_ms: Date.now() - started,
  }
}
