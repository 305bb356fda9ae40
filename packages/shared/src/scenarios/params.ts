import { pickOne, randomInt, type RandomSource } from "../random/index.js"
import type { ChoiceParam, ParamSpec, ParamValues, RangeParam, ScenarioTemplate } from "./types.js"

export function range(min: number, max: number, step: number, unit = ""): RangeParam {
  return { kind: "range", min, max, step, unit }
}

export function choice(choices: readonly number[]): ChoiceParam {
  return { kind: "choice", choices }
}

/** Indices 0..length-1, for choosing from a fixed table. */
export function indexChoice(length: number): ChoiceParam {
  return choice(Array.from({ length }, (_, i) => i))
}

export function sampleParam(spec: ParamSpec, random: RandomSource): number {
  switch (spec.kind) {
    case "range": {
      // Rounding absorbs float drift on fractional steps (0.05, 0.5).
      const steps = Math.round((spec.max - spec.min) / spec.step)
      const value = spec.min + randomInt(random, steps + 1) * spec.step
      return Math.round(value * 1e6) / 1e6
    }
    case "choice":
      return pickOne(random, spec.choices)
  }
}

export function sampleParameters(template: ScenarioTemplate, random: RandomSource): ParamValues {
  const values: Record<string, number> = {}
  for (const [name, spec] of Object.entries(template.params)) {
    values[name] = sampleParam(spec, random)
  }
  return values
}
