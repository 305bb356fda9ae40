/**
 * Script writer backed by the Anthropic Messages API. Used only as the
 * fallback when no template fits a request; the reply must be a JSON script
 * payload and is validated before it is persisted.
 */

import Anthropic from "@anthropic-ai/sdk"
import { type ScriptPayload, ScriptPayloadSchema } from "@reelsmith/shared"
import type { GenerateRequest } from "@reelsmith/shared/scenarios"
import { z } from "zod"

import type { ScriptWriter } from "./script-synthesizer.js"

export const AI_TEMPLATE_ID = "ai_generated"

const AiScriptSchema = ScriptPayloadSchema.omit({ template_id: true, tweet_text: true }).extend({
  tweet_text: z.string().optional(),
})

export function buildScriptPrompt(request: GenerateRequest): string {
  const context = request.description ? `\nAdditional context: ${request.description}` : ""
  return `You are writing a short-form educational quiz post about ${request.category ?? "engineering"}.

Topic: ${request.topic ?? "general engineering"}${context}

Write a problem that:
1. Opens with a hook such as "Can you solve this?"
2. States a concrete problem with specific numbers, solvable in about 30 seconds
3. Offers 4 answer options labelled A to D, exactly one correct
4. Asks viewers to comment their answer

Reply with ONLY a JSON object of this shape, no markdown:
{
  "type": "problem",
  "hook_text": "Can you solve this beam problem?",
  "diagram_description": "structure type, supports and positions, loads with values and positions, dimensions",
  "content_steps": [
    {"text": "Given: the setup with numbers", "highlight": "what to emphasize"},
    {"text": "Find: what to calculate", "highlight": "target variable"}
  ],
  "answer_options": ["A: 5 kN", "B: 10 kN", "C: 15 kN", "D: 20 kN"],
  "correct_answer": "A",
  "explanation": "why A is correct",
  "cta_text": "Comment A, B, C, or D!"
}`
}

/** Accepts raw JSON or JSON wrapped in a markdown code fence. */
export function parseScriptResponse(text: string): ScriptPayload {
  let cleaned = text.trim()
  const fenceMatch = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/m.exec(cleaned)
  if (fenceMatch?.[1]) {
    cleaned = fenceMatch[1].trim()
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(cleaned)
  } catch (err) {
    throw new Error(
      `Script writer reply is not JSON: ${err instanceof Error ? err.message : String(err)}`,
    )
  }

  const script = AiScriptSchema.parse(parsed)
  return { ...script, tweet_text: script.tweet_text ?? "", template_id: AI_TEMPLATE_ID }
}

/**
 * LLM caller abstraction: takes a prompt, returns the reply text.
 * Injected for testability.
 */
export type LLMCaller = (prompt: string) => Promise<string>

export interface AnthropicCallerOptions {
  apiKey: string
  model: string
  maxTokens?: number
}

export function createAnthropicCaller(options: AnthropicCallerOptions): LLMCaller {
  const client = new Anthropic({ apiKey: options.apiKey })
  return async (prompt) => {
    const response = await client.messages.create({
      model: options.model,
      max_tokens: options.maxTokens ?? 1024,
      messages: [{ role: "user", content: prompt }],
    })
    return response.content.flatMap((block) => (block.type === "text" ? [block.text] : [])).join("")
  }
}

export class AiScriptWriter implements ScriptWriter {
  constructor(private readonly llmCall: LLMCaller) {}

  async writeScript(request: GenerateRequest): Promise<ScriptPayload> {
    return parseScriptResponse(await this.llmCall(buildScriptPrompt(request)))
  }
}
