export class TransitionError extends Error {
  readonly from: string
  readonly to: string
  readonly reason: string

  constructor(from: string, to: string, reason: string) {
    super(`Invalid transition ${from} → ${to}: ${reason}`)
    this.name = 'TransitionError'
    this.from = from
    this.to = to
    this.reason = reason
  }
}

export class WorkflowExhaustedError extends Error {
  readonly maxRounds: number
  readonly state: string

  constructor(maxRounds: number, state: string) {
    super(`Workflow did not reach plan emission within ${maxRounds} role calls (stopped in ${state})`)
    this.name = 'WorkflowExhaustedError'
    this.maxRounds = maxRounds
    this.state = state
  }
}
