export const VERSION = '0.1.0'

// Script execution
export { ScriptRunner, TIMEOUT_EXIT_CODE, CANCELLED_EXIT_CODE } from './script-runner.js'

// Role callers
export { ChatCompletionsClient } from './chat-client.js'
export { ScriptedRoleCaller } from './scripted.js'
export type { ScriptedResponse, RecordedCall } from './scripted.js'

// Utilities
export { classifyFailure } from './utils/classify-failure.js'
export { buildRolePrompt } from './utils/prompt-builder.js'

// Errors
export { InfrastructureError, RoleCallError } from './errors.js'

// Types
export type {
  ChatClientConfig,
  ContextEntry,
  ExecutionResult,
  FailureCode,
  FetchFn,
  RoleCaller,
  RoleSettings,
  RunOptions,
  ScriptRunnerConfig,
  SpawnCommand,
} from './types.js'
