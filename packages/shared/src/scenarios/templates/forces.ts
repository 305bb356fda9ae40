import { GRAVITY, fixed, num, roundTo, toRadians } from "../format.js"
import { range } from "../params.js"
import { defineTemplate, type ScenarioTemplate } from "../types.js"

function newtons(symbol: string, value: number): string {
  return `${symbol} = ${fixed(value, 1)} N`
}

export function forceTemplates(): ScenarioTemplate[] {
  return [
    defineTemplate({
      id: "fbd_resultant",
      category: "force_equilibrium",
      tags: ["force", "resultant", "vector", "fbd", "free body", "addition", "rope"],
      diagramType: "fbd",
      params: {
        f1: range(20, 80, 10, "N"),
        f2: range(20, 80, 10, "N"),
        angle: range(45, 120, 15, "deg"),
      },
      solve: (p) => ({
        resultant: roundTo(
          Math.sqrt(p.f1 ** 2 + p.f2 ** 2 + 2 * p.f1 * p.f2 * Math.cos(toRadians(p.angle))),
          1,
        ),
      }),
      formatHook: () => "Two ropes pull a ring bolt.\nFind the resultant force.",
      formatDiagramDescription: (p) =>
        `Free body diagram with forces. Find the resultant. ` +
        `F1 = ${num(p.f1)} N at 0 degrees. F2 = ${num(p.f2)} N at ${num(p.angle)} degrees.`,
      formatSteps: (p) => [
        { text: `Given: F1 = ${num(p.f1)} N, F2 = ${num(p.f2)} N, angle = ${num(p.angle)} deg`, highlight: "forces" },
        { text: "Find: Magnitude of resultant force", highlight: "resultant" },
      ],
      formatExplanation: (p, s) =>
        `R = sqrt(F1² + F2² + 2·F1·F2·cosθ) = ` +
        `sqrt(${num(p.f1)}² + ${num(p.f2)}² + 2·${num(p.f1)}·${num(p.f2)}·cos(${num(p.angle)}°)) = ` +
        `${fixed(s.resultant, 1)} N`,
      engagement: {
        kind: "quiz_abcd",
        options: (p, s) => ({
          correct: newtons("R", s.resultant),
          distractors: [
            // scalar addition
            newtons("R", p.f1 + p.f2),
            newtons("R", Math.abs(p.f1 - p.f2)),
            newtons("R", s.resultant * 1.2),
            newtons("R", s.resultant * 0.8),
            newtons("R", s.resultant * 1.5),
          ],
        }),
      },
    }),

    defineTemplate({
      id: "fbd_cable_tension",
      category: "force_equilibrium",
      tags: ["force", "equilibrium", "cable", "tension", "hanging", "weight"],
      diagramType: "fbd_cables",
      params: {
        mass: range(10, 50, 5, "kg"),
        angle: range(30, 60, 5, "deg"),
      },
      solve: (p) => {
        const weight = p.mass * GRAVITY
        return {
          weight: roundTo(weight, 1),
          tension: roundTo(weight / (2 * Math.sin(toRadians(p.angle))), 1),
        }
      },
      formatHook: (p) => `Find the cable tension\n(${num(p.mass)} kg, θ = ${num(p.angle)}°)`,
      formatDiagramDescription: (p) =>
        `Hanging weight from two cables. mass = ${num(p.mass)} kg, angle = ${num(p.angle)} degrees from horizontal.`,
      formatSteps: (p) => [
        { text: `Given: mass = ${num(p.mass)} kg, cable angle = ${num(p.angle)}° from horizontal`, highlight: "cables" },
        { text: "Find: Tension in each cable", highlight: "tension" },
      ],
      formatExplanation: (p, s) =>
        `Equilibrium: 2T·sin(θ) = W → T = W/(2·sinθ) = ` +
        `${fixed(s.weight, 1)}/(2·sin(${num(p.angle)}°)) = ${fixed(s.tension, 1)} N`,
      engagement: {
        kind: "quiz_abcd",
        options: (_p, s) => ({
          correct: newtons("T", s.tension),
          distractors: [
            // halved the weight but dropped sinθ
            newtons("T", s.weight / 2),
            newtons("T", s.tension * 0.7),
            newtons("T", s.tension * 1.4),
            newtons("T", s.tension * 2),
          ],
        }),
      },
    }),

    defineTemplate({
      id: "fbd_inclined_plane",
      category: "force_equilibrium",
      tags: ["force", "incline", "plane", "friction", "fbd", "free body", "block", "slope"],
      diagramType: "fbd",
      params: {
        mass: range(5, 30, 5, "kg"),
        // stops short of 45° where the sin and cos components coincide
        angle: range(15, 40, 5, "deg"),
      },
      solve: (p) => {
        const weight = p.mass * GRAVITY
        return {
          weight: roundTo(weight, 1),
          normal: roundTo(weight * Math.cos(toRadians(p.angle)), 1),
          parallel: roundTo(weight * Math.sin(toRadians(p.angle)), 1),
        }
      },
      formatHook: (p) => `Find the normal force\n(m = ${num(p.mass)} kg, θ = ${num(p.angle)}°)`,
      formatDiagramDescription: (p) =>
        `Free body diagram with forces. W = ${num(p.mass * GRAVITY, 0)} N at 270 degrees. ` +
        `Block on ${num(p.angle)} deg incline. Mass = ${num(p.mass)} kg.`,
      formatSteps: (p) => [
        { text: `Given: ${num(p.mass)} kg block on ${num(p.angle)} deg incline`, highlight: "incline" },
        { text: "Find: Normal force (N) perpendicular to the slope", highlight: "normal force" },
      ],
      formatExplanation: (p, s) =>
        `N = mg x cos(θ) = ${num(p.mass)} x 9.81 x cos(${num(p.angle)}°) = ${fixed(s.normal, 1)} N`,
      engagement: {
        kind: "quiz_abcd",
        options: (_p, s) => ({
          correct: newtons("N", s.normal),
          distractors: [
            newtons("N", s.weight),
            newtons("N", s.parallel),
            newtons("N", s.normal * 0.75),
            newtons("N", s.normal * 1.25),
          ],
        }),
      },
    }),
  ]
}
