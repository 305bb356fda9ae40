/**
 * Error classification for collaborator calls (renderer, script writer,
 * platform publisher). The category is recorded on logs and spans; no
 * caller retries on it, since every failure here is terminal.
 *
 * Classification categories:
 * - TRANSIENT: HTTP 429/5xx, connection resets, DNS hiccups
 * - PERMANENT: HTTP 4xx auth and validation failures, missing files
 * - TIMEOUT: aborted or timed-out calls
 * - RESOURCE: out of memory, disk full, rate limits
 * - UNKNOWN: anything else
 */

import { CollaboratorError } from "../errors.js"

export type ErrorCategory = "TRANSIENT" | "PERMANENT" | "TIMEOUT" | "RESOURCE" | "UNKNOWN"

export interface ErrorClassification {
  category: ErrorCategory
  message: string
}

const TRANSIENT_HTTP_CODES = new Set([502, 503, 529])

const PERMANENT_HTTP_CODES = new Set([400, 401, 403, 404, 405, 409, 413, 422])

const TRANSIENT_NODE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "ETIMEDOUT",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
])

const RESOURCE_NODE_CODES = new Set(["ENOMEM", "ENOSPC", "EMFILE", "ENFILE"])

function classifyHttpStatus(status: number): ErrorClassification {
  if (status === 429) {
    return { category: "RESOURCE", message: "HTTP 429 (rate limited)" }
  }
  if (TRANSIENT_HTTP_CODES.has(status)) {
    return { category: "TRANSIENT", message: `HTTP ${status} (transient)` }
  }
  if (PERMANENT_HTTP_CODES.has(status)) {
    return { category: "PERMANENT", message: `HTTP ${status} (permanent)` }
  }
  if (status === 408 || status === 504) {
    return { category: "TIMEOUT", message: `HTTP ${status} (timeout)` }
  }
  if (status >= 500) {
    return { category: "TRANSIENT", message: `HTTP ${status} (server error)` }
  }
  return { category: "PERMANENT", message: `HTTP ${status} (client error)` }
}

function classifyNodeError(code: string): ErrorClassification {
  if (TRANSIENT_NODE_CODES.has(code)) {
    return { category: "TRANSIENT", message: `Node error: ${code}` }
  }
  if (RESOURCE_NODE_CODES.has(code)) {
    return { category: "RESOURCE", message: `Resource error: ${code}` }
  }
  if (code === "ENOTFOUND" || code === "EACCES" || code === "ENOENT") {
    return { category: "PERMANENT", message: `Node error: ${code}` }
  }
  return { category: "UNKNOWN", message: `Unknown node error: ${code}` }
}

/**
 * Classify an error from any collaborator. A CollaboratorError is
 * classified by its cause.
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof CollaboratorError && error.cause !== undefined) {
    return classifyError(error.cause)
  }

  if (!(error instanceof Error)) {
    return { category: "UNKNOWN", message: String(error) }
  }

  if (error.name === "AbortError") {
    return { category: "TIMEOUT", message: "Operation aborted" }
  }

  // Anthropic SDK errors carry `status`; twitter-api-v2 response errors carry a numeric `code`
  if ("status" in error && typeof error.status === "number") {
    return classifyHttpStatus(error.status)
  }
  if ("code" in error && typeof error.code === "number") {
    return classifyHttpStatus(error.code)
  }

  const ctorName = error.constructor.name
  if (ctorName === "RateLimitError") {
    return { category: "RESOURCE", message: "Rate limit exceeded" }
  }
  if (ctorName === "APIConnectionError") {
    return { category: "TRANSIENT", message: "API connection error" }
  }
  if (ctorName === "APIConnectionTimeoutError") {
    return { category: "TIMEOUT", message: "API connection timeout" }
  }

  // Node.js system errors
  if ("code" in error && typeof error.code === "string") {
    return classifyNodeError(error.code)
  }

  if (error.message.toLowerCase().includes("timeout")) {
    return { category: "TIMEOUT", message: error.message }
  }

  if (error.message.includes("out of memory") || error.message.includes("ENOMEM")) {
    return { category: "RESOURCE", message: error.message }
  }

  return { category: "UNKNOWN", message: error.message }
}
