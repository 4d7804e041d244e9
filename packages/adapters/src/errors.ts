/** The script could not be started at all: missing interpreter or container runtime. */
export class InfrastructureError extends Error {
  readonly command: string
  readonly code?: string

  constructor(message: string, command: string, code?: string) {
    super(message)
    this.name = 'InfrastructureError'
    this.command = command
    this.code = code
  }
}

export class RoleCallError extends Error {
  readonly roleId: string
  readonly status?: number
  readonly timedOut: boolean

  constructor(roleId: string, message: string, options: { status?: number; timedOut?: boolean } = {}) {
    super(`Role '${roleId}' failed: ${message}`)
    this.name = 'RoleCallError'
    this.roleId = roleId
    this.status = options.status
    this.timedOut = options.timedOut ?? false
  }
}
