import type { ScriptPayload } from "@reelsmith/shared"
import type { GenerateRequest, ScenarioPool } from "@reelsmith/shared/scenarios"
import type { Logger } from "@reelsmith/shared/tracing"

import { CollaboratorError, errorMessage } from "../errors.js"

/** Fallback author of scripts, consulted only when the template pool throws. */
export interface ScriptWriter {
  writeScript(request: GenerateRequest): Promise<ScriptPayload>
}

export interface ScriptSynthesizerDeps {
  pool: Pick<ScenarioPool, "generate">
  writer?: ScriptWriter
  logger: Logger
}

export class ScriptSynthesizer {
  constructor(private readonly deps: ScriptSynthesizerDeps) {}

  async synthesize(request: GenerateRequest): Promise<ScriptPayload> {
    try {
      return this.deps.pool.generate(request)
    } catch (poolError) {
      const { writer, logger } = this.deps
      if (!writer) throw poolError

      logger.warn("Template pool failed, falling back to script writer", {
        topic: request.topic,
        error: errorMessage(poolError),
      })
      try {
        return await writer.writeScript(request)
      } catch (err) {
        throw new CollaboratorError("script-writer", err)
      }
    }
  }
}

/** Flat narration text: hook followed by every step, space separated. */
export function buildScriptText(script: Pick<ScriptPayload, "hook_text" | "content_steps">): string {
  return [script.hook_text, ...script.content_steps.map((step) => step.text)].join(" ")
}
