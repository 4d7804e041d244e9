import { withTimeout } from '@simforge/gates'
import type { ContextEntry, RoleCaller } from '@simforge/adapters'
import { TransitionError, WorkflowExhaustedError } from './errors.js'
import {
  CREATIVE_ROLES,
  DISPATCHER_ROLE,
  circuitPrompt,
  critiquePrompt,
  dispatchPrompt,
  materialsPrompt,
  proposalPrompt,
  type CreativeRole,
} from './prompts.js'

export enum WorkflowState {
  PROPOSAL = 'PROPOSAL',
  MATERIAL_SELECTION = 'MATERIAL_SELECTION',
  CIRCUIT_DESIGN = 'CIRCUIT_DESIGN',
  CRITIQUE = 'CRITIQUE',
  PLAN_EMISSION = 'PLAN_EMISSION',
  DONE = 'DONE',
}

// Fixed edges: from → [possible targets]
export const WORKFLOW_TRANSITIONS: Record<WorkflowState, WorkflowState[]> = {
  [WorkflowState.PROPOSAL]: [WorkflowState.MATERIAL_SELECTION],
  [WorkflowState.MATERIAL_SELECTION]: [WorkflowState.CIRCUIT_DESIGN],
  [WorkflowState.CIRCUIT_DESIGN]: [WorkflowState.CRITIQUE],
  [WorkflowState.CRITIQUE]: [WorkflowState.PLAN_EMISSION, WorkflowState.PROPOSAL],
  [WorkflowState.PLAN_EMISSION]: [WorkflowState.DONE],
  [WorkflowState.DONE]: [],
}

export const ROLE_FOR_STATE: Record<CreativeRole, WorkflowState> = {
  proposer: WorkflowState.PROPOSAL,
  materials: WorkflowState.MATERIAL_SELECTION,
  circuit: WorkflowState.CIRCUIT_DESIGN,
  critic: WorkflowState.CRITIQUE,
}

const CREATIVE_STATES: WorkflowState[] = Object.values(ROLE_FOR_STATE)

const STATE_LABELS: Partial<Record<WorkflowState, string>> = {
  [WorkflowState.PROPOSAL]: 'Hypothesis',
  [WorkflowState.MATERIAL_SELECTION]: 'Materials',
  [WorkflowState.CIRCUIT_DESIGN]: 'Circuit',
  [WorkflowState.CRITIQUE]: 'Critique',
}

export const DEFAULT_APPROVAL_MARKER = 'APPROVE'
export const DEFAULT_CLARIFICATION_MARKERS = ['CLARIFY:', 'QUESTION:', 'NEED MORE INFORMATION']
export const DEFAULT_MAX_ROUNDS = 12

export interface TranscriptEntry {
  state: WorkflowState
  role: string
  content: string
}

export interface TransitionOptions {
  /** The move was chosen by the dispatcher rather than a fixed edge. */
  override?: boolean
}

export function getValidTransitions(from: WorkflowState): WorkflowState[] {
  return WORKFLOW_TRANSITIONS[from] ?? []
}

export function validateTransition(
  from: WorkflowState,
  to: WorkflowState,
  options: TransitionOptions = {},
): void {
  if (WORKFLOW_TRANSITIONS[from].includes(to)) return

  if (options.override) {
    if (CREATIVE_STATES.includes(from) && CREATIVE_STATES.includes(to)) return
    throw new TransitionError(from, to, 'dispatch may only move between creative stages')
  }

  throw new TransitionError(from, to, `transition ${from} → ${to} is not allowed`)
}

export function canTransition(from: WorkflowState, to: WorkflowState, options?: TransitionOptions): boolean {
  try {
    validateTransition(from, to, options)
    return true
  } catch {
    return false
  }
}

/** Override predicate: does this reply ask for more information? */
export function needsClarification(text: string, markers: string[] = DEFAULT_CLARIFICATION_MARKERS): boolean {
  const upper = text.toUpperCase()
  return markers.some((marker) => upper.includes(marker.toUpperCase()))
}

/** The marker must start a word, so DISAPPROVE does not count as APPROVE. */
export function isApproved(text: string, marker: string = DEFAULT_APPROVAL_MARKER): boolean {
  const escaped = marker.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
  return new RegExp(`(^|[^A-Za-z])${escaped}`).test(text)
}

/** First creative role named in the dispatcher's reply, by position. */
export function matchRole(reply: string): CreativeRole | undefined {
  const lower = reply.toLowerCase()
  let best: { role: CreativeRole; at: number } | undefined
  for (const role of CREATIVE_ROLES) {
    const at = lower.search(new RegExp(`\\b${role}\\b`))
    if (at !== -1 && (!best || at < best.at)) best = { role, at }
  }
  return best?.role
}

// ═══ Runner ═══

export interface WorkflowOptions<T> {
  roles: RoleCaller
  goal: string
  /** Corrective feedback from the previous repair attempt. */
  diagnostic?: string
  /** PLAN_EMISSION: turns the design packet into the cycle's plan. */
  emit: (packet: ContextEntry[], transcript: TranscriptEntry[]) => Promise<T>
  approvalMarker?: string
  clarificationMarkers?: string[]
  maxRounds?: number
  roleTimeoutMs?: number
  signal?: AbortSignal
  onTransition?: (from: WorkflowState, to: WorkflowState, override: boolean) => void
  onMessage?: (entry: TranscriptEntry) => void
}

export interface WorkflowResult<T> {
  value: T
  packet: ContextEntry[]
  transcript: TranscriptEntry[]
  rounds: number
}

interface PendingQuestion {
  from: string
  text: string
}

/**
 * Sequence the creative roles into a design packet and hand it to `emit`.
 *
 * Each role call is stateless: prior outputs travel as explicit context. A
 * critique without approval restarts at PROPOSAL with the earlier creative
 * outputs dropped and the critique kept as context.
 */
export async function runWorkflow<T>(options: WorkflowOptions<T>): Promise<WorkflowResult<T>> {
  const approvalMarker = options.approvalMarker ?? DEFAULT_APPROVAL_MARKER
  const markers = options.clarificationMarkers ?? DEFAULT_CLARIFICATION_MARKERS
  const maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS

  const outputs = new Map<WorkflowState, string>()
  const transcript: TranscriptEntry[] = []
  let rejectedCritique: string | undefined
  let pending: PendingQuestion | undefined
  let state = WorkflowState.PROPOSAL
  let rounds = 0

  const ask = async (role: string, prompt: string, context: ContextEntry[]): Promise<string> => {
    if (rounds >= maxRounds) throw new WorkflowExhaustedError(maxRounds, state)
    rounds += 1
    return withTimeout(options.roles.call(role, prompt, context, options.signal), options.roleTimeoutMs, role)
  }

  const record = (entry: TranscriptEntry) => {
    transcript.push(entry)
    options.onMessage?.(entry)
  }

  const move = (to: WorkflowState, override: boolean) => {
    validateTransition(state, to, { override })
    options.onTransition?.(state, to, override)
    state = to
  }

  while (state !== WorkflowState.PLAN_EMISSION) {
    const role = roleFor(state)
    const context = stageContext(state, options, outputs, rejectedCritique, pending)
    pending = undefined

    const reply = await ask(role, stagePrompt(state, options.goal, approvalMarker), context)
    outputs.set(state, reply)
    record({ state, role, content: reply })

    if (needsClarification(reply, markers)) {
      const answer = await ask(DISPATCHER_ROLE, dispatchPrompt(role, reply), [])
      record({ state, role: DISPATCHER_ROLE, content: answer })

      const target = matchRole(answer)
      if (target) {
        pending = { from: role, text: reply }
        move(ROLE_FOR_STATE[target], true)
        continue
      }
    }

    if (state === WorkflowState.CRITIQUE) {
      if (isApproved(reply, approvalMarker)) {
        move(WorkflowState.PLAN_EMISSION, false)
      } else {
        rejectedCritique = reply
        outputs.clear()
        move(WorkflowState.PROPOSAL, false)
      }
      continue
    }

    move(getValidTransitions(state)[0], false)
  }

  const packet = designPacket(options, outputs)
  const value = await options.emit(packet, transcript)
  move(WorkflowState.DONE, false)

  return { value, packet, transcript, rounds }
}

function roleFor(state: WorkflowState): CreativeRole {
  const match = CREATIVE_ROLES.find((role) => ROLE_FOR_STATE[role] === state)
  if (!match) throw new TransitionError(state, state, 'no role speaks in this state')
  return match
}

function stagePrompt(state: WorkflowState, goal: string, approvalMarker: string): string {
  switch (state) {
    case WorkflowState.PROPOSAL:
      return proposalPrompt(goal)
    case WorkflowState.MATERIAL_SELECTION:
      return materialsPrompt()
    case WorkflowState.CIRCUIT_DESIGN:
      return circuitPrompt()
    default:
      return critiquePrompt(approvalMarker)
  }
}

function stageContext(
  state: WorkflowState,
  options: WorkflowOptions<unknown>,
  outputs: Map<WorkflowState, string>,
  rejectedCritique: string | undefined,
  pending: PendingQuestion | undefined,
): ContextEntry[] {
  const context: ContextEntry[] = []

  if (state === WorkflowState.PROPOSAL) {
    if (options.diagnostic) context.push({ label: 'Previous attempt failed', content: options.diagnostic })
    if (rejectedCritique) context.push({ label: 'Critique of the previous design', content: rejectedCritique })
  } else {
    context.push({ label: 'Goal', content: options.goal })
  }

  for (const creative of CREATIVE_STATES) {
    if (creative === state) continue
    const output = outputs.get(creative)
    if (output !== undefined) context.push({ label: STATE_LABELS[creative] ?? creative, content: output })
  }

  if (pending) context.push({ label: `Question from ${pending.from}`, content: pending.text })
  return context
}

function designPacket(options: WorkflowOptions<unknown>, outputs: Map<WorkflowState, string>): ContextEntry[] {
  const packet: ContextEntry[] = [{ label: 'Goal', content: options.goal }]
  for (const creative of CREATIVE_STATES) {
    const output = outputs.get(creative)
    if (output !== undefined) packet.push({ label: STATE_LABELS[creative] ?? creative, content: output })
  }
  if (options.diagnostic) packet.push({ label: 'Previous attempt failed', content: options.diagnostic })
  return packet
}
