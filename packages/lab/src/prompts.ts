import { formatOptions } from '@simforge/gates'
import { toPlanDocument, type PatternLibrary, type Plan } from '@simforge/patterns'
import type { RoleSettings } from '@simforge/adapters'

// ═══ Roles ═══

export const CREATIVE_ROLES = ['proposer', 'materials', 'circuit', 'critic'] as const
export type CreativeRole = (typeof CREATIVE_ROLES)[number]

export const PLANNER_ROLE = 'planner'
export const DISPATCHER_ROLE = 'dispatcher'
/** Arbitration between valid plan candidates is the critic's call. */
export const ARBITER_ROLE: CreativeRole = 'critic'

export type RoleId = CreativeRole | typeof PLANNER_ROLE | typeof DISPATCHER_ROLE

export const DEFAULT_ROLE_SETTINGS: Record<RoleId, RoleSettings> = {
  proposer: {
    system: 'You are a research physicist. Propose one concrete, testable hypothesis for an electromagnetic experiment that can be simulated.',
    temperature: 0.7,
  },
  materials: {
    system: 'You are a condensed matter physicist. Choose core materials and geometry for the proposed experiment and give their key properties.',
    temperature: 0.7,
  },
  circuit: {
    system: 'You are a pulse power engineer. Design the drive circuit: waveform, pulse width, duty cycle and voltage levels.',
    temperature: 0.7,
  },
  critic: {
    system: 'You are a skeptical reviewer. Check the design for physical consistency and for anything that cannot be simulated.',
    temperature: 0.7,
  },
  planner: {
    system: 'You are a simulation architect. You answer with a single JSON simulation plan and nothing else.',
    temperature: 0.2,
  },
  dispatcher: {
    system: 'You route a design discussion. You answer with the name of exactly one role.',
    temperature: 0,
  },
}

// ═══ Stage prompts ═══

export function proposalPrompt(goal: string): string {
  return `Goal: ${goal}\n\nPropose a concise hypothesis for this experiment.`
}

export function materialsPrompt(): string {
  return 'Select the core materials and geometry for the hypothesis. Give numeric specifications.'
}

export function circuitPrompt(): string {
  return 'Design the drive circuit for this hypothesis and these materials. Give numeric values.'
}

export function critiquePrompt(approvalMarker: string): string {
  return (
    'Review the proposed experiment as a whole.\n' +
    `If it is sound and ready to simulate, reply with ${approvalMarker}. ` +
    'Otherwise explain what must change.'
  )
}

export function dispatchPrompt(fromRole: string, message: string): string {
  return (
    `The ${fromRole} role asked for more information:\n${message}\n\n` +
    `Which role should answer next? Choose one of: ${CREATIVE_ROLES.join(', ')}.\n` +
    'Reply with the role name only.'
  )
}

/** Planner prompt: plan document rules plus the pattern names the library accepts. */
export function buildPlannerPrompt(backendId: string, library: PatternLibrary): string {
  const patterns = Object.entries(library.describe())
    .map(([category, names]) => `  ${category}: ${names.join(', ')}`)
    .join('\n')

  return [
    `Generate the simulation plan for the ${backendId} backend.`,
    '',
    'Rules:',
    '1. Output exactly one JSON object inside a ```json fence.',
    `2. Top-level keys: "backendId" (always "${backendId}"), "modelName", and "stages".`,
    '3. "stages" may contain structure, materials, physics, setup, analyze and results.',
    '   Each stage is one item or a list of items.',
    '4. An item is {"type": <pattern name>, "params": {<name>: <value>}}. Use only the pattern names below',
    '   and give a value for every placeholder the pattern needs.',
    '5. Compute numeric values yourself. Do not write expressions such as "2 * pi".',
    '6. No comments inside the JSON.',
    '',
    'Available patterns:',
    patterns,
  ].join('\n')
}

export function buildArbitrationPrompt(candidates: Plan[]): string {
  const options = formatOptions(candidates, (plan) => JSON.stringify(toPlanDocument(plan)))
  return [
    `Review these ${candidates.length} simulation plans and pick the best one.`,
    'Judge them on correct use of the pattern library and on consistency with the design.',
    'Reply with the integer number of the best option only, e.g. "0" or "1".',
    '',
    options,
  ].join('\n')
}
