import type Database from 'better-sqlite3'

export interface TrajectoryInput {
  cycleId: string
  attempt: number
  outcome: string
  prompt: string
  transcript: string
  diagnostic?: string
  /** Null for attempts that were cancelled before they could be scored. */
  score: number | null
  scoreLabel?: string
}

export interface TrajectoryEntry extends TrajectoryInput {
  id: number
  created_at: string
}

/** Receives every repair attempt. Fire-and-forget from the loop's point of view. */
export interface TrajectorySink {
  record(entry: TrajectoryInput): void | Promise<void>
}

interface TrajectoryRow {
  id: number
  cycle_id: string
  attempt: number
  outcome: string
  prompt: string
  transcript: string
  diagnostic: string | null
  score: number | null
  score_label: string | null
  created_at: string
}

interface ListOptions {
  cycle_id?: string
  limit?: number
}

function deserializeRow(row: TrajectoryRow): TrajectoryEntry {
  return {
    id: row.id,
    cycleId: row.cycle_id,
    attempt: row.attempt,
    outcome: row.outcome,
    prompt: row.prompt,
    transcript: row.transcript,
    diagnostic: row.diagnostic ?? undefined,
    score: row.score,
    scoreLabel: row.score_label ?? undefined,
    created_at: row.created_at,
  }
}

export class TrajectoryLog implements TrajectorySink {
  private db: Database.Database

  constructor(db: Database.Database) {
    this.db = db
  }

  record(input: TrajectoryInput): void {
    this.db.prepare(`
      INSERT INTO trajectories (cycle_id, attempt, outcome, prompt, transcript, diagnostic, score, score_label, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      input.cycleId,
      input.attempt,
      input.outcome,
      input.prompt,
      input.transcript,
      input.diagnostic ?? null,
      input.score,
      input.scoreLabel ?? null,
      new Date().toISOString(),
    )
  }

  /** Newest first. */
  list(opts: ListOptions = {}): TrajectoryEntry[] {
    const conditions: string[] = []
    const params: (string | number)[] = []

    if (opts.cycle_id) {
      conditions.push('cycle_id = ?')
      params.push(opts.cycle_id)
    }

    let sql = 'SELECT * FROM trajectories'
    if (conditions.length) {
      sql += ' WHERE ' + conditions.join(' AND ')
    }
    sql += ' ORDER BY id DESC'

    if (opts.limit) {
      sql += ' LIMIT ?'
      params.push(opts.limit)
    }

    const rows = this.db.prepare<(string | number)[], TrajectoryRow>(sql).all(...params)
    return rows.map(deserializeRow)
  }

  getCycle(cycleId: string): TrajectoryEntry[] {
    return this.list({ cycle_id: cycleId }).reverse()
  }

  close(): void {
    this.db.close()
  }
}
