/**
 * Error taxonomy for request-facing operations. Each class carries the HTTP
 * status the error handler answers with; background units catch these at
 * their boundary and persist the message instead.
 */

export abstract class StudioError extends Error {
  abstract readonly statusCode: number
  abstract readonly code: string
}

/** A precondition did not hold. Nothing was mutated. */
export class ValidationError extends StudioError {
  readonly statusCode = 400
  readonly code = "validation_error"

  constructor(message: string) {
    super(message)
    this.name = "ValidationError"
  }
}

export class NotFoundError extends StudioError {
  readonly statusCode = 404
  readonly code = "not_found"

  constructor(resource: string, id: number | string) {
    super(`${resource} ${String(id)} not found`)
    this.name = "NotFoundError"
  }
}

/** A collaborator is missing credentials or setup. */
export class ConfigurationError extends StudioError {
  readonly statusCode = 400
  readonly code = "configuration_error"

  constructor(message: string) {
    super(message)
    this.name = "ConfigurationError"
  }
}

/** A renderer, writer or publisher call threw. */
export class CollaboratorError extends StudioError {
  readonly statusCode = 502
  readonly code = "collaborator_error"
  readonly collaborator: string

  constructor(collaborator: string, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause })
    this.name = "CollaboratorError"
    this.collaborator = collaborator
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
