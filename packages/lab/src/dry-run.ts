import * as fs from 'node:fs'
import * as path from 'node:path'
import { fileURLToPath } from 'node:url'
import { ConfigError } from '@simforge/patterns'
import { ScriptedRoleCaller, type ScriptedResponse } from '@simforge/adapters'
import { ARBITER_ROLE, CREATIVE_ROLES, DISPATCHER_ROLE, PLANNER_ROLE } from './prompts.js'

export const EXAMPLES_DIR = fileURLToPath(new URL('../examples/', import.meta.url))

export function examplePlanPath(backendId: string, dir = EXAMPLES_DIR): string {
  return path.join(dir, `${backendId.toLowerCase()}-plan.json`)
}

/**
 * Offline role caller: every creative role answers with a stock line, the
 * critic approves and the planner returns the backend's example plan.
 */
export function createDryRunRoles(backendId: string, approvalMarker = 'APPROVE'): ScriptedRoleCaller {
  const planPath = examplePlanPath(backendId)
  if (!fs.existsSync(planPath)) {
    throw new ConfigError(`No example plan for backend '${backendId}' (${planPath})`, backendId)
  }
  const plan = fs.readFileSync(planPath, 'utf-8')

  const responses: Record<string, ScriptedResponse> = {}
  for (const role of CREATIVE_ROLES) {
    responses[role] = `[dry run] ${role} output`
  }
  // The critic also arbitrates between plan candidates
  responses[ARBITER_ROLE] = (prompt) => (prompt.includes('--- OPTION') ? '0' : approvalMarker)
  responses[PLANNER_ROLE] = '```json\n' + plan.trim() + '\n```'
  responses[DISPATCHER_ROLE] = 'proposer'

  return new ScriptedRoleCaller(responses)
}
