import type { ContextEntry, RoleCaller } from './types.js'

export type ScriptedResponse =
  | string
  | string[]
  | ((prompt: string, context: ContextEntry[]) => string)

export interface RecordedCall {
  roleId: string
  prompt: string
  context: ContextEntry[]
}

/**
 * Replays canned replies per role. A list is consumed in order and its last
 * entry repeats once exhausted.
 */
export class ScriptedRoleCaller implements RoleCaller {
  readonly calls: RecordedCall[] = []

  private responses: Record<string, ScriptedResponse>
  private cursors = new Map<string, number>()

  constructor(responses: Record<string, ScriptedResponse>) {
    this.responses = responses
  }

  async call(roleId: string, prompt: string, context: ContextEntry[] = []): Promise<string> {
    this.calls.push({ roleId, prompt, context })

    const response = this.responses[roleId]
    if (response === undefined) {
      throw new Error(`No scripted response for role '${roleId}'`)
    }
    if (typeof response === 'string') return response
    if (typeof response === 'function') return response(prompt, context)
    if (response.length === 0) {
      throw new Error(`No scripted response for role '${roleId}'`)
    }

    const cursor = this.cursors.get(roleId) ?? 0
    this.cursors.set(roleId, cursor + 1)
    return response[Math.min(cursor, response.length - 1)]
  }

  callsFor(roleId: string): RecordedCall[] {
    return this.calls.filter((c) => c.roleId === roleId)
  }
}
