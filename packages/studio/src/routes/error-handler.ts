import type { FastifyInstance } from "fastify"
import { ZodError } from "zod"

import { InvalidTransitionError } from "../content/state-machine.js"
import { StudioError } from "../errors.js"

export interface ErrorBody {
  error: string
  message: string
}

export function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ")
}

/**
 * Maps domain errors to `{ error, message }` bodies. Anything unrecognised
 * is logged and answered with 500.
 */
export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler<Error>((err, request, reply) => {
    if (err instanceof StudioError) {
      if (err.statusCode >= 500) {
        request.log.warn({ err }, "Collaborator call failed")
      }
      return reply.status(err.statusCode).send({ error: err.code, message: err.message } satisfies ErrorBody)
    }
    if (err instanceof ZodError) {
      return reply
        .status(400)
        .send({ error: "validation_error", message: formatZodError(err) } satisfies ErrorBody)
    }
    if (err instanceof InvalidTransitionError) {
      return reply
        .status(409)
        .send({ error: "invalid_transition", message: err.message } satisfies ErrorBody)
    }
    // Fastify's own client errors (bad JSON, unsupported media type)
    if ("statusCode" in err && typeof err.statusCode === "number" && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: "bad_request", message: err.message } satisfies ErrorBody)
    }

    request.log.error({ err }, "Unhandled error")
    return reply.status(500).send({ error: "internal_error", message: "Internal server error" } satisfies ErrorBody)
  })
}

/** Path ids arrive as strings; anything but a positive integer is a 404 target. */
export function parseId(raw: string): number | undefined {
  if (!/^\d+$/.test(raw)) return undefined
  const id = parseInt(raw, 10)
  return id > 0 && Number.isSafeInteger(id) ? id : undefined
}
