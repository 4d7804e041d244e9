import { RoleCallError } from './errors.js'
import { buildRolePrompt } from './utils/prompt-builder.js'
import type {
  ChatClientConfig,
  ContextEntry,
  FetchFn,
  RoleCaller,
  RoleSettings,
} from './types.js'

const DEFAULT_TIMEOUT_MS = 120000
const DEFAULT_MAX_RETRIES = 3

interface ChatMessage {
  role: 'system' | 'user'
  content: string
}

/**
 * Role caller backed by an OpenAI-compatible `/chat/completions` endpoint.
 * Each call is a fresh two-message conversation: the role's system prompt and
 * the user prompt with its context appended.
 */
export class ChatCompletionsClient implements RoleCaller {
  protected config: ChatClientConfig
  protected fetchFn: FetchFn

  constructor(config: ChatClientConfig, fetchFn?: FetchFn) {
    this.config = config
    this.fetchFn = fetchFn ?? ((url, init) => globalThis.fetch(url, init))
  }

  get url(): string {
    return `${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`
  }

  roleSettings(roleId: string): RoleSettings {
    return this.config.roles?.[roleId] ?? {}
  }

  buildRequestBody(roleId: string, prompt: string, context?: ContextEntry[]): unknown {
    const settings = this.roleSettings(roleId)
    const messages: ChatMessage[] = []
    if (settings.system) {
      messages.push({ role: 'system', content: settings.system })
    }
    messages.push({ role: 'user', content: buildRolePrompt(prompt, context) })

    return {
      model: settings.model ?? this.config.model,
      messages,
      ...(settings.temperature !== undefined ? { temperature: settings.temperature } : {}),
    }
  }

  async call(roleId: string, prompt: string, context?: ContextEntry[], signal?: AbortSignal): Promise<string> {
    const controller = new AbortController()
    const timeoutMs = this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS
    let timedOut = false
    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    const onAbort = () => controller.abort()
    signal?.addEventListener('abort', onAbort, { once: true })

    const headers: Record<string, string> = { 'content-type': 'application/json' }
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`
    }

    try {
      const response = await this.fetchWithRetry(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify(this.buildRequestBody(roleId, prompt, context)),
        signal: controller.signal,
      })

      if (!response.ok) {
        const text = await response.text().catch(() => '')
        throw new RoleCallError(roleId, text || `HTTP ${response.status}`, { status: response.status })
      }

      return extractContent(roleId, await response.json())
    } catch (err) {
      if (err instanceof RoleCallError) throw err
      if (timedOut) {
        throw new RoleCallError(roleId, `request timed out after ${timeoutMs}ms`, { timedOut: true })
      }
      throw new RoleCallError(roleId, err instanceof Error ? err.message : String(err))
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }
  }

  protected async fetchWithRetry(url: string, init: RequestInit): Promise<Response> {
    const maxRetries = this.config.maxRetries ?? DEFAULT_MAX_RETRIES

    for (let attempt = 0; ; attempt++) {
      const response = await this.fetchFn(url, init)

      if (response.status !== 429 || attempt >= maxRetries) {
        return response
      }

      // Retry-After may also be an HTTP date; only the seconds form is honoured
      const retryAfter = Number.parseInt(response.headers.get('retry-after') ?? '', 10)
      const delayMs = Number.isFinite(retryAfter) && retryAfter >= 0
        ? Math.min(retryAfter * 1000, 30000)
        : Math.min(2 ** attempt * 1000, 10000)

      await this.delay(delayMs)
    }
  }

  protected delay(ms: number): Promise<void> {
    return new Promise(r => setTimeout(r, ms))
  }
}

function extractContent(roleId: string, data: unknown): string {
  if (typeof data === 'object' && data !== null && 'choices' in data && Array.isArray(data.choices)) {
    const first: unknown = data.choices[0]
    if (typeof first === 'object' && first !== null && 'message' in first) {
      const message: unknown = first.message
      if (typeof message === 'object' && message !== null && 'content' in message && typeof message.content === 'string') {
        return message.content
      }
    }
  }
  throw new RoleCallError(roleId, 'response has no choices[0].message.content')
}
