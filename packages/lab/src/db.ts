import Database from 'better-sqlite3'

export function createDatabase(path: string): Database.Database {
  const db = new Database(path)

  // WAL lets `simforge history` read while a run is writing
  db.pragma('journal_mode = WAL')

  db.exec(SCHEMA)

  return db
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS trajectories (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    cycle_id    TEXT NOT NULL,
    attempt     INTEGER NOT NULL,
    outcome     TEXT NOT NULL,
    prompt      TEXT NOT NULL,
    transcript  TEXT NOT NULL,
    diagnostic  TEXT,
    score       REAL,
    score_label TEXT,
    created_at  TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_trajectory_cycle
    ON trajectories (cycle_id, attempt);
`
