import chalk from 'chalk'
import { loadConfig, resolvePaths } from '../config.js'
import { createDatabase } from '../db.js'
import { TrajectoryLog, type TrajectoryEntry } from '../trajectory-log.js'

export interface HistoryOpts {
  config?: string
  limit?: number
  cycle?: string
}

export async function historyCommand(opts: HistoryOpts = {}): Promise<TrajectoryEntry[]> {
  const config = loadConfig(opts.config)
  const log = new TrajectoryLog(createDatabase(resolvePaths(config).dbPath))

  try {
    const entries = opts.cycle
      ? log.getCycle(opts.cycle)
      : log.list({ limit: opts.limit ?? 20 })

    if (entries.length === 0) {
      console.log(chalk.dim('No trajectories recorded.'))
      return entries
    }

    for (const e of entries) {
      const score = e.score === null ? chalk.gray('—') : `${e.score}${e.scoreLabel ? ` ${e.scoreLabel}` : ''}`
      console.log(
        `${chalk.dim(e.created_at)} ${chalk.bold(e.cycleId)} #${e.attempt} ${chalk.cyan(e.outcome.padEnd(16))} ${score}`,
      )
    }
    return entries
  } finally {
    log.close()
  }
}
