import { ZodError } from 'zod'

export class PlannerError extends Error {
  readonly code: string

  constructor(message: string, code = 'planner_error') {
    super(message)
    this.name = 'PlannerError'
    this.code = code
  }
}

// Rejected before any planning work starts: bad day key, unknown zone, schema failures
export class PlannerInputError extends PlannerError {
  readonly path: string

  constructor(message: string, path = '') {
    super(message, 'invalid_input')
    this.name = 'PlannerInputError'
    this.path = path
  }
}

export function isPlannerError(error: unknown): error is PlannerError {
  return error instanceof PlannerError
}

export function safeErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message
  }
  return 'unexpected error'
}

export function toPlannerError(error: unknown): PlannerError {
  if (error instanceof ZodError) {
    const issue = error.issues[0]
    const path = issue ? issue.path.join('.') : ''
    const message = issue?.message ?? 'invalid input'
    return new PlannerInputError(path ? `${path}: ${message}` : message, path)
  }
  if (isPlannerError(error)) return error
  return new PlannerError(safeErrorMessage(error))
}
