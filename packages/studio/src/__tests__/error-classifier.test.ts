import { describe, expect, it } from "vitest"

import { CollaboratorError } from "../errors.js"
import { classifyError } from "../worker/error-classifier.js"

describe("classifyError", () => {
  describe("HTTP status codes", () => {
    it("classifies 429 as RESOURCE (rate limited)", () => {
      const error = Object.assign(new Error("Too Many Requests"), { status: 429 })
      expect(classifyError(error)).toEqual({
        category: "RESOURCE",
        message: "HTTP 429 (rate limited)",
      })
    })

    it("classifies 503 as TRANSIENT", () => {
      const error = Object.assign(new Error("Service Unavailable"), { status: 503 })
      expect(classifyError(error).category).toBe("TRANSIENT")
    })

    it("classifies 401 as PERMANENT", () => {
      const error = Object.assign(new Error("Unauthorized"), { status: 401 })
      const result = classifyError(error)
      expect(result.category).toBe("PERMANENT")
    })

    it("classifies 504 as TIMEOUT", () => {
      const error = Object.assign(new Error("Gateway Timeout"), { status: 504 })
      expect(classifyError(error).category).toBe("TIMEOUT")
    })

    it("classifies other 5xx as TRANSIENT server errors", () => {
      const error = Object.assign(new Error("Internal"), { status: 500 })
      expect(classifyError(error).message).toBe("HTTP 500 (server error)")
    })

    it("reads a numeric code as an HTTP status", () => {
      const error = Object.assign(new Error("Forbidden"), { code: 403 })
      expect(classifyError(error).category).toBe("PERMANENT")
    })
  })

  describe("Node.js errors", () => {
    it("classifies ECONNRESET as TRANSIENT", () => {
      const error = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" })
      expect(classifyError(error)).toEqual({
        category: "TRANSIENT",
        message: "Node error: ECONNRESET",
      })
    })

    it("classifies ENOSPC as RESOURCE", () => {
      const error = Object.assign(new Error("no space left"), { code: "ENOSPC" })
      expect(classifyError(error).category).toBe("RESOURCE")
    })

    it("classifies ENOENT as PERMANENT", () => {
      const error = Object.assign(new Error("no such file"), { code: "ENOENT" })
      expect(classifyError(error).category).toBe("PERMANENT")
    })
  })

  it("classifies AbortError as TIMEOUT", () => {
    const error = new Error("The operation was aborted")
    error.name = "AbortError"
    expect(classifyError(error).category).toBe("TIMEOUT")
  })

  it("classifies timeout messages as TIMEOUT", () => {
    expect(classifyError(new Error("Request timeout after 30s")).category).toBe("TIMEOUT")
  })

  it("classifies a CollaboratorError by its cause", () => {
    const cause = Object.assign(new Error("Bad Gateway"), { status: 502 })
    expect(classifyError(new CollaboratorError("twitter", cause)).category).toBe("TRANSIENT")
  })

  it("falls back to UNKNOWN for plain errors and non-errors", () => {
    expect(classifyError(new Error("odd"))).toEqual({
      category: "UNKNOWN",
      message: "odd",
    })
    expect(classifyError("string failure").message).toBe("string failure")
  })
})
