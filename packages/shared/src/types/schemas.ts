import { z } from "zod"

// ──────────────────────────────────────────────────
// Script payload: the structured output of synthesis,
// persisted as content.script_data
// ──────────────────────────────────────────────────

export const ScriptTypeSchema = z.enum(["problem", "identify", "true_false", "infographic"])

export type ScriptType = z.infer<typeof ScriptTypeSchema>

export const ContentStepSchema = z.object({
  text: z.string(),
  highlight: z.string(),
})

export type ContentStep = z.infer<typeof ContentStepSchema>

export const ScriptPayloadSchema = z.object({
  type: ScriptTypeSchema,
  hook_text: z.string().min(1),
  diagram_description: z.string(),
  content_steps: z.array(ContentStepSchema),
  answer_options: z.array(z.string()).optional(),
  correct_answer: z.string().optional(),
  explanation: z.string(),
  cta_text: z.string(),
  tweet_text: z.string(),
  template_id: z.string(),
  key_facts: z.array(z.string()).optional(),
  formula: z.string().optional(),
  statement: z.string().optional(),
})

export type ScriptPayload = z.infer<typeof ScriptPayloadSchema>

// ──────────────────────────────────────────────────
// Publish job: the body of a publish queue message
// ──────────────────────────────────────────────────

export const PublishJobPayloadSchema = z.object({
  content_id: z.number().int().positive(),
  schedule_id: z.number().int().positive().optional(),
  platform: z.string().min(1),
  caption: z.string(),
  image_path: z.string().min(1),
  scheduled_at: z.string().datetime({ offset: true }).nullable(),
  enqueued_at: z.string().datetime({ offset: true }),
})

export type PublishJobPayload = z.infer<typeof PublishJobPayloadSchema>
