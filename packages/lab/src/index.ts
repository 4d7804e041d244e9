export const VERSION = '0.1.0'

// Workflow
export {
  WorkflowState,
  WORKFLOW_TRANSITIONS,
  ROLE_FOR_STATE,
  DEFAULT_APPROVAL_MARKER,
  DEFAULT_CLARIFICATION_MARKERS,
  DEFAULT_MAX_ROUNDS,
  runWorkflow,
  validateTransition,
  canTransition,
  getValidTransitions,
  needsClarification,
  isApproved,
  matchRole,
} from './workflow.js'
export type { TranscriptEntry, TransitionOptions, WorkflowOptions, WorkflowResult } from './workflow.js'

// Roles and prompts
export {
  CREATIVE_ROLES,
  PLANNER_ROLE,
  DISPATCHER_ROLE,
  ARBITER_ROLE,
  DEFAULT_ROLE_SETTINGS,
  buildPlannerPrompt,
  buildArbitrationPrompt,
} from './prompts.js'
export type { CreativeRole, RoleId } from './prompts.js'

// Repair loop
export { RepairLoop, renderTranscript } from './repair-loop.js'
export type {
  AttemptOutcomeKind,
  CycleResult,
  CycleStatus,
  PlanPreview,
  RepairAttempt,
  RepairLoopOptions,
  RepairPhase,
  RepairTimeouts,
  RunCycleOptions,
  RunCyclesOptions,
  ScriptExecutor,
  WorkflowSettings,
} from './repair-loop.js'

// Scoring and results
export { DEFAULT_SCORING, scoreMetric, crashScore } from './scoring.js'
export type { FixedBand, Score, ScoreBand, ScoringPolicy } from './scoring.js'
export { parseCsvLine, lastRow, readMetric } from './results.js'

// Trajectory log
export { createDatabase } from './db.js'
export { TrajectoryLog } from './trajectory-log.js'
export type { TrajectoryEntry, TrajectoryInput, TrajectorySink } from './trajectory-log.js'

// Config and wiring
export {
  configSchema,
  loadConfig,
  parseConfig,
  resolvePaths,
  substituteEnvVars,
  generateTemplate,
  DEFAULT_CONFIG_FILE,
  DEFAULT_GOAL,
} from './config.js'
export type { LabConfig, LabConfigDocument, LabPaths } from './config.js'
export { createLab, roleSettingsFor } from './factory.js'
export type { Lab, LabHooks, LabOverrides } from './factory.js'
export { createDryRunRoles, examplePlanPath, EXAMPLES_DIR } from './dry-run.js'

// Errors
export { TransitionError, WorkflowExhaustedError } from './errors.js'
