// ── Script execution ──

export interface ExecutionResult {
  exitCode: number
  stdout: string
  stderr: string
  /** Killed after exceeding the run timeout; exit code is 124. */
  timedOut: boolean
  /** Killed through the caller's AbortSignal; exit code is 130. */
  cancelled: boolean
  duration_ms: number
  resultArtifactPath?: string
}

export interface RunOptions {
  /** Overrides the runner's configured isolation for this run. */
  isolate?: boolean
  timeoutMs?: number
  signal?: AbortSignal
}

export interface ScriptRunnerConfig {
  /** Defaults to python3. */
  interpreter?: string
  interpreterArgs?: string[]
  /** Working directory, also the directory mounted into the container. */
  cwd?: string
  env?: Record<string, string>
  isolate?: boolean
  /** Container runtime binary. Defaults to docker. */
  runtime?: string
  image?: string
  artifactPath?: string
  killGraceMs?: number
}

export interface SpawnCommand {
  command: string
  args: string[]
  cwd: string
}

export type FailureCode =
  | 'timeout'
  | 'missing_module'
  | 'license_unavailable'
  | 'syntax_error'
  | 'solver_error'
  | 'unknown'

// ── Role calls ──

export interface ContextEntry {
  label: string
  content: string
}

/**
 * A stateless call to one upstream role. Everything the role should know about
 * earlier turns arrives in `context`; nothing is remembered between calls.
 */
export interface RoleCaller {
  call(roleId: string, prompt: string, context?: ContextEntry[], signal?: AbortSignal): Promise<string>
}

export interface RoleSettings {
  system?: string
  model?: string
  temperature?: number
}

export interface ChatClientConfig {
  /** Base URL of an OpenAI-compatible API, e.g. http://localhost:11434/v1 */
  baseUrl: string
  apiKey?: string
  model: string
  timeoutMs?: number
  maxRetries?: number
  roles?: Record<string, RoleSettings>
}

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>
