// ═══ Collaborators ═══

/** Black-box text generator. May be non-deterministic. */
export type Generate = (prompt: string) => Promise<string>

/** Picks among valid candidates; the reply should contain one integer index. */
export type Arbitrate<T> = (candidates: T[]) => Promise<string>

// ═══ Records ═══

export interface DraftRecord {
  /** 0-based position in generation order. */
  index: number
  valid: boolean
  reason?: string
  raw?: string
  duration_ms: number
}

export interface ArbitrationRecord {
  raw?: string
  index: number
  /** True when the reply was unusable and the first candidate was taken. */
  fallback: boolean
  reason?: string
}

// ═══ Selection ═══

export interface SelectTimeouts {
  generate_ms?: number
  arbitrate_ms?: number
}

export interface SelectOptions<T> {
  prompt: string
  k: number
  generate: Generate
  arbitrate: Arbitrate<T>
  parse: (value: unknown) => T
  timeouts?: SelectTimeouts
  onDraft?: (draft: DraftRecord) => void
}

export interface SelectResult<T> {
  value: T
  /** Index into `candidates`. */
  chosen: number
  candidates: T[]
  drafts: DraftRecord[]
  arbitration?: ArbitrationRecord
  duration_ms: number
}
