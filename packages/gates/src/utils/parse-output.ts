import { CandidateParseError } from '../errors.js'

const JSON_FENCE = /```json\s*([\s\S]*?)```/i
const ANY_FENCE = /```[^\n`]*\n([\s\S]*?)```/g

/**
 * Pull the single structured block out of raw generator text. A ```json fence
 * wins; then the first other fence whose body opens with `{`; otherwise
 * everything from the first `{` to the last `}`.
 */
export function extractBlock(raw: string): string {
  const tagged = JSON_FENCE.exec(raw)
  if (tagged) {
    const body = tagged[1].trim()
    if (body.length > 0) return body
  }

  for (const fence of raw.matchAll(ANY_FENCE)) {
    const body = fence[1].trim()
    if (body.startsWith('{')) return body
  }

  const start = raw.indexOf('{')
  const end = raw.lastIndexOf('}')
  if (start < 0 || end < start) {
    throw new CandidateParseError('No structured block found in output')
  }

  return raw.slice(start, end + 1)
}

/** Extract and decode the block. Malformed blocks are rejected, never repaired. */
export function parseOutput(raw: string): unknown {
  const block = extractBlock(raw)
  try {
    return JSON.parse(block)
  } catch (err) {
    throw new CandidateParseError(
      `Invalid JSON in structured block: ${err instanceof Error ? err.message : String(err)}`,
    )
  }
}
