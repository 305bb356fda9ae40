import type { ContentStep } from "../types/schemas.js"

// ──────────────────────────────────────────────────
// Parameters
// ──────────────────────────────────────────────────

/** A continuous range sampled on a grid of `step`, both ends inclusive. */
export interface RangeParam {
  kind: "range"
  min: number
  max: number
  step: number
  unit: string
}

/** A discrete set of values, sampled uniformly. */
export interface ChoiceParam {
  kind: "choice"
  choices: readonly number[]
}

export type ParamSpec = RangeParam | ChoiceParam

export type ParamValues<K extends string = string> = Readonly<Record<K, number>>

// ──────────────────────────────────────────────────
// Engagement formats
// ──────────────────────────────────────────────────

export type EngagementKind = "quiz_abcd" | "true_false" | "identify" | "infographic"

/**
 * `correct` is option[0]. `distractors` is an ordered list of wrong
 * candidates; the first three that render differently from the correct
 * text (and from each other) are used.
 */
export interface QuizOptions {
  correct: string
  distractors: readonly string[]
}

export interface QuizAbcd<K extends string, S> {
  kind: "quiz_abcd"
  options(params: ParamValues<K>, solved: S): QuizOptions
}

export interface TrueFalse<K extends string, S> {
  kind: "true_false"
  statement(params: ParamValues<K>, solved: S): { statement: string; isTrue: boolean }
}

export interface Identify<K extends string, S> {
  kind: "identify"
  /** The correct label plus the fixed label domain it was drawn from. */
  identify(params: ParamValues<K>, solved: S): { correct: string; labels: readonly string[] }
}

export interface Infographic<K extends string, S> {
  kind: "infographic"
  keyFacts(params: ParamValues<K>, solved: S): string[]
  formula(params: ParamValues<K>, solved: S): string
}

export type Engagement<K extends string, S> =
  | QuizAbcd<K, S>
  | TrueFalse<K, S>
  | Identify<K, S>
  | Infographic<K, S>

// ──────────────────────────────────────────────────
// Template
// ──────────────────────────────────────────────────

export type DiagramType =
  | "beam"
  | "fbd"
  | "fbd_cables"
  | "stress"
  | "shear"
  | "stress_strain_curve"
  | "infographic"

export interface ScenarioTemplate<K extends string = string, S = unknown> {
  id: string
  category: string
  /** Lowercase substrings matched against topic text. */
  tags: readonly string[]
  diagramType: DiagramType
  params: Readonly<Record<K, ParamSpec>>
  /** Pure. The single source of truth for the correct answer. */
  solve(params: ParamValues<K>): S
  formatHook(params: ParamValues<K>): string
  formatDiagramDescription(params: ParamValues<K>): string
  formatSteps(params: ParamValues<K>): ContentStep[]
  formatExplanation(params: ParamValues<K>, solved: S): string
  /** Overrides the caption pool for this template. */
  formatCaption?(params: ParamValues<K>, solved: S): string
  engagement: Engagement<K, S>
}

/**
 * Infers parameter names and the solution type from the literal, then
 * widens to the registry's element type.
 */
export function defineTemplate<K extends string, S>(template: ScenarioTemplate<K, S>): ScenarioTemplate {
  return template
}
