/**
 * Template Pool: produces a structured script payload for a topic without
 * calling an external model.
 *
 * Selection is freshness-first: templates absent from the recency list are
 * preferred, and when every candidate was used recently the least recently
 * used one wins, so the whole candidate set is covered before any repeat.
 */

import { defaultRandom, pickOne, shuffle, type RandomSource } from "../random/index.js"
import type { ScriptPayload } from "../types/schemas.js"
import type { CaptionPools } from "./captions.js"
import { sampleParameters } from "./params.js"
import type { ParamValues, ScenarioTemplate } from "./types.js"

const OPTION_LETTERS = ["A", "B", "C", "D"] as const

export const CTA_TEXT = {
  quiz_abcd: "Comment A, B, C, or D!",
  identify: "Comment your answer!",
  true_false: "Comment TRUE or FALSE!",
  infographic: "Save this for your exam!",
} as const

export interface GenerateRequest {
  topic?: string
  category?: string
  description?: string
  /** Template ids of recent content, most recent first. */
  recentTemplateIds?: readonly string[]
}

export type EngagementFields = Pick<
  ScriptPayload,
  "type" | "cta_text" | "answer_options" | "correct_answer" | "statement" | "key_facts" | "formula"
>

// ──────────────────────────────────────────────────
// Matching and selection
// ──────────────────────────────────────────────────

/**
 * Score every template by how many of its tags occur in the topic text and
 * keep the top-scoring subset. No match at all means every template.
 */
export function matchCandidates(
  templates: readonly ScenarioTemplate[],
  topic: string,
  category: string,
  description: string,
): readonly ScenarioTemplate[] {
  const text = `${topic} ${category} ${description}`.toLowerCase()

  let best = 0
  let matched: ScenarioTemplate[] = []
  for (const template of templates) {
    const score = template.tags.filter((tag) => text.includes(tag.toLowerCase())).length
    if (score === 0 || score < best) continue
    if (score > best) {
      best = score
      matched = []
    }
    matched.push(template)
  }
  return matched.length > 0 ? matched : templates
}

export function selectTemplate(
  candidates: readonly ScenarioTemplate[],
  recentIds: readonly string[],
  random: RandomSource = defaultRandom,
): ScenarioTemplate {
  if (recentIds.length === 0) {
    return pickOne(random, candidates)
  }

  const recent = new Set(recentIds)
  const fresh = candidates.filter((t) => !recent.has(t.id))
  if (fresh.length > 0) {
    return pickOne(random, fresh)
  }

  // Every candidate appears in the list; the one whose latest use sits
  // deepest in it is the least recently used.
  let lru: ScenarioTemplate | undefined
  let lruIndex = -1
  for (const candidate of candidates) {
    const index = recentIds.indexOf(candidate.id)
    if (index > lruIndex) {
      lru = candidate
      lruIndex = index
    }
  }
  if (!lru) {
    throw new Error("Cannot select from an empty candidate set")
  }
  return lru
}

// ──────────────────────────────────────────────────
// Engagement formatting
// ──────────────────────────────────────────────────

/**
 * Keep the first three candidates that differ from the correct text and
 * from each other. Fewer than three is a template defect.
 */
export function pickDistractors(correct: string, candidates: readonly string[]): [string, string, string] {
  const kept: string[] = []
  for (const candidate of candidates) {
    if (candidate === correct || kept.includes(candidate)) continue
    kept.push(candidate)
    if (kept.length === 3) break
  }
  const [a, b, c] = kept
  if (a === undefined || b === undefined || c === undefined) {
    throw new Error(`Only ${kept.length} distinct distractors for answer "${correct}"`)
  }
  return [a, b, c]
}

function letterOptions(
  correct: string,
  distractors: readonly string[],
  random: RandomSource,
): { answer_options: string[]; correct_answer: string } {
  const shuffled = shuffle(random, [correct, ...pickDistractors(correct, distractors)])
  const correctIndex = shuffled.indexOf(correct)
  return {
    answer_options: shuffled.map((option, i) => `${OPTION_LETTERS[i]}: ${option}`),
    correct_answer: OPTION_LETTERS[correctIndex] ?? "A",
  }
}

export function buildEngagement(
  template: ScenarioTemplate,
  params: ParamValues,
  solved: unknown,
  random: RandomSource = defaultRandom,
): EngagementFields {
  const engagement = template.engagement
  switch (engagement.kind) {
    case "quiz_abcd": {
      const { correct, distractors } = engagement.options(params, solved)
      return { type: "problem", cta_text: CTA_TEXT.quiz_abcd, ...letterOptions(correct, distractors, random) }
    }
    case "identify": {
      const { correct, labels } = engagement.identify(params, solved)
      return { type: "identify", cta_text: CTA_TEXT.identify, ...letterOptions(correct, labels, random) }
    }
    case "true_false": {
      const { statement, isTrue } = engagement.statement(params, solved)
      return {
        type: "true_false",
        cta_text: CTA_TEXT.true_false,
        statement,
        answer_options: ["True", "False"],
        correct_answer: isTrue ? "True" : "False",
      }
    }
    case "infographic":
      return {
        type: "infographic",
        cta_text: CTA_TEXT.infographic,
        key_facts: engagement.keyFacts(params, solved),
        formula: engagement.formula(params, solved),
      }
    default: {
      const unhandled: never = engagement
      throw new Error(`Unhandled engagement format: ${JSON.stringify(unhandled)}`)
    }
  }
}

// ──────────────────────────────────────────────────
// Pool
// ──────────────────────────────────────────────────

export interface ScenarioPoolOptions {
  templates: readonly ScenarioTemplate[]
  captions: CaptionPools
  random?: RandomSource
}

export class ScenarioPool {
  readonly templates: readonly ScenarioTemplate[]
  private readonly captions: CaptionPools
  private readonly random: RandomSource

  constructor(options: ScenarioPoolOptions) {
    if (options.templates.length === 0) {
      throw new Error("ScenarioPool needs at least one template")
    }
    this.templates = options.templates
    this.captions = options.captions
    this.random = options.random ?? defaultRandom
  }

  /** Template errors propagate to the caller unchanged. */
  generate(request: GenerateRequest = {}): ScriptPayload {
    const candidates = matchCandidates(
      this.templates,
      request.topic ?? "",
      request.category ?? "",
      request.description ?? "",
    )
    const template = selectTemplate(candidates, request.recentTemplateIds ?? [], this.random)
    const params = sampleParameters(template, this.random)
    const solved = template.solve(params)
    const engagement = buildEngagement(template, params, solved, this.random)

    const tweetText = template.formatCaption
      ? template.formatCaption(params, solved)
      : pickOne(this.random, this.captions[template.engagement.kind])

    return {
      ...engagement,
      hook_text: template.formatHook(params),
      diagram_description: template.formatDiagramDescription(params),
      content_steps: template.formatSteps(params),
      explanation: template.formatExplanation(params, solved),
      tweet_text: tweetText,
      template_id: template.id,
    }
  }
}
