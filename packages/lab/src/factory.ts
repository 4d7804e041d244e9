import type Database from 'better-sqlite3'
import { loadLibrary, type PatternLibrary } from '@simforge/patterns'
import {
  ChatCompletionsClient,
  ScriptRunner,
  type RoleCaller,
  type RoleSettings,
} from '@simforge/adapters'
import { createDatabase } from './db.js'
import { TrajectoryLog } from './trajectory-log.js'
import { DEFAULT_ROLE_SETTINGS } from './prompts.js'
import { RepairLoop, type RepairLoopOptions, type ScriptExecutor } from './repair-loop.js'
import { resolvePaths, type LabConfig, type LabPaths } from './config.js'

export type LabHooks = Pick<RepairLoopOptions, 'onAttempt' | 'onPhase' | 'onError' | 'createId'>

export interface LabOverrides extends LabHooks {
  /** Replaces the configured chat client, e.g. with a ScriptedRoleCaller. */
  roles?: RoleCaller
  runner?: ScriptExecutor
  library?: PatternLibrary
}

export interface Lab {
  db: Database.Database
  loop: RepairLoop
  log: TrajectoryLog
  library: PatternLibrary
  roles: RoleCaller
  runner: ScriptExecutor
  paths: LabPaths
  /** Collisions found while loading the library. */
  warnings: string[]
  close(): void
}

export function roleSettingsFor(config: LabConfig): Record<string, RoleSettings> {
  const merged: Record<string, RoleSettings> = { ...DEFAULT_ROLE_SETTINGS }
  for (const [roleId, settings] of Object.entries(config.llm.roles)) {
    merged[roleId] = { ...merged[roleId], ...settings }
  }
  return merged
}

export function createLab(config: LabConfig, overrides: LabOverrides = {}): Lab {
  const paths = resolvePaths(config)

  const library = overrides.library ?? loadLibrary(config.backend, {
    dir: paths.librariesDir,
    rejectCollisions: config.reject_collisions,
  })
  const warnings = library.collisions.map((c) =>
    `Pattern '${c.typeName}' is defined in both ${c.winner} and ${c.shadowed}; ${c.winner} wins`,
  )

  const runner = overrides.runner ?? new ScriptRunner({
    interpreter: config.execution.interpreter,
    interpreterArgs: config.execution.interpreter_args,
    cwd: paths.workdir,
    isolate: config.execution.isolate,
    runtime: config.execution.runtime,
    image: config.execution.image,
    artifactPath: paths.artifactPath,
  })

  const roles = overrides.roles ?? new ChatCompletionsClient({
    baseUrl: config.llm.base_url,
    apiKey: config.llm.api_key,
    model: config.llm.model,
    timeoutMs: config.llm.timeout_ms,
    roles: roleSettingsFor(config),
  })

  const db = createDatabase(paths.dbPath)
  const log = new TrajectoryLog(db)

  const loop = new RepairLoop({
    backendId: config.backend,
    library,
    roles,
    runner,
    scriptPath: paths.scriptPath,
    artifactPath: paths.artifactPath,
    scoring: config.scoring,
    maxAttempts: config.max_attempts,
    candidates: config.candidates,
    isolate: config.execution.isolate,
    timeouts: config.timeouts,
    workflow: {
      approvalMarker: config.workflow.approval_marker,
      clarificationMarkers: config.workflow.clarification_markers,
      maxRounds: config.workflow.max_rounds,
    },
    retryOnMissingMetric: config.retry_on_missing_metric,
    sink: log,
    onAttempt: overrides.onAttempt,
    onPhase: overrides.onPhase,
    onError: overrides.onError,
    createId: overrides.createId,
  })

  return {
    db,
    loop,
    log,
    library,
    roles,
    runner,
    paths,
    warnings,
    close() {
      log.close()
    },
  }
}
