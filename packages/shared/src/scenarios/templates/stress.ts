import { fixed, num, plural, roundTo } from "../format.js"
import { choice, range } from "../params.js"
import { defineTemplate, type ScenarioTemplate } from "../types.js"

function circleArea(diameter: number): number {
  return Math.PI * (diameter / 2) ** 2
}

function mpa(symbol: string, value: number): string {
  return `${symbol} = ${fixed(value, 1)} MPa`
}

function mm(value: number): string {
  return `δ = ${fixed(value, 2)} mm`
}

export function stressTemplates(): ScenarioTemplate[] {
  return [
    defineTemplate({
      id: "stress_axial",
      category: "stress_strain",
      tags: ["stress", "axial", "rod", "bar", "tension", "compression", "cross section"],
      diagramType: "stress",
      params: {
        force: range(10, 100, 10, "kN"),
        diameter: range(20, 60, 10, "mm"),
      },
      solve: (p) => ({
        area: roundTo(circleArea(p.diameter), 1),
        stress: roundTo((p.force * 1000) / circleArea(p.diameter), 1),
      }),
      formatHook: () => "Find the axial stress (σ)",
      formatDiagramDescription: (p) =>
        `Axial stress in a circular rod. Force of ${num(p.force)} kN applied to a rod with ` +
        `diameter ${num(p.diameter)} mm.`,
      formatSteps: (p) => [
        { text: `Given: F = ${num(p.force)} kN, diameter = ${num(p.diameter)} mm`, highlight: "cross section" },
        { text: "Find: Axial stress (MPa)", highlight: "stress" },
      ],
      formatExplanation: (p, s) =>
        `A = pi*d^2/4 = pi*${num(p.diameter)}^2/4 = ${fixed(s.area, 1)} mm^2. ` +
        `sigma = F/A = ${num(p.force * 1000)}/${fixed(s.area, 1)} = ${fixed(s.stress, 1)} MPa`,
      engagement: {
        kind: "quiz_abcd",
        options: (p, s) => ({
          correct: mpa("σ", s.stress),
          distractors: [
            // dropped the /4 in the area
            mpa("σ", (p.force * 1000) / (Math.PI * p.diameter ** 2)),
            mpa("σ", s.stress / 2),
            mpa("σ", s.stress * 1.5),
            mpa("σ", s.stress * 2),
          ],
        }),
      },
    }),

    defineTemplate({
      id: "stress_shear",
      category: "stress_strain",
      tags: ["stress", "shear", "pin", "bolt", "connection"],
      diagramType: "shear",
      params: {
        force: range(10, 80, 5, "kN"),
        diameter: range(10, 25, 5, "mm"),
        bolts: range(1, 3, 1),
      },
      solve: (p) => {
        const areaOne = circleArea(p.diameter)
        return {
          areaOne: roundTo(areaOne, 1),
          shear: roundTo((p.force * 1000) / (p.bolts * areaOne), 1),
        }
      },
      formatHook: (p) => `Find the shear stress (τ)\n(${plural(p.bolts, "bolt")}, d = ${num(p.diameter)} mm)`,
      formatDiagramDescription: (p) =>
        `Shear stress in a bolt connection. Force of ${num(p.force)} kN on ${plural(p.bolts, "bolt")} with ` +
        `diameter ${num(p.diameter)} mm in single shear.`,
      formatSteps: (p) => [
        { text: `Given: F = ${num(p.force)} kN, ${num(p.bolts)} bolt(s), d = ${num(p.diameter)} mm`, highlight: "shear" },
        { text: "Find: Shear stress in each bolt (MPa)", highlight: "shear stress" },
      ],
      formatExplanation: (p, s) =>
        `A_bolt = pi*d^2/4 = ${fixed(s.areaOne, 1)} mm^2. ` +
        `τ = F/(n*A) = ${num(p.force * 1000)}/(${num(p.bolts)}*${fixed(s.areaOne, 1)}) = ${fixed(s.shear, 1)} MPa`,
      engagement: {
        kind: "quiz_abcd",
        options: (p, s) => ({
          correct: mpa("τ", s.shear),
          distractors: [
            // forgot to share the load between bolts; identical to the answer for a single bolt
            mpa("τ", s.shear * p.bolts),
            mpa("τ", s.shear * 2),
            mpa("τ", s.shear * 1.5),
            mpa("τ", s.shear * 0.6),
            mpa("τ", s.shear * 3),
          ],
        }),
      },
    }),

    defineTemplate({
      id: "strain_elongation",
      category: "stress_strain",
      tags: ["strain", "elongation", "deformation", "bar", "rod", "elastic", "young"],
      diagramType: "stress",
      params: {
        force: range(20, 100, 10, "kN"),
        length: range(1, 4, 0.5, "m"),
        diameter: range(20, 50, 10, "mm"),
        modulus: choice([200]),
      },
      solve: (p) => {
        const area = circleArea(p.diameter)
        return {
          area: roundTo(area, 2),
          delta: roundTo((p.force * 1000 * p.length * 1000) / (area * p.modulus * 1000), 2),
        }
      },
      formatHook: () => "Find the elongation\nin the bar (δ)",
      formatDiagramDescription: (p) =>
        `Axial elongation of a steel bar under tension. Force of ${num(p.force)} kN on a steel bar, ` +
        `length ${fixed(p.length, 1)} m, diameter ${num(p.diameter)} mm, modulus E = ${num(p.modulus)} GPa.`,
      formatSteps: (p) => [
        {
          text: `Given: F=${num(p.force)}kN, L=${fixed(p.length, 1)}m, d=${num(p.diameter)}mm, E=${num(p.modulus)}GPa`,
          highlight: "properties",
        },
        { text: "Find: Elongation (mm)", highlight: "deformation" },
      ],
      formatExplanation: (p, s) =>
        `delta = PL/AE = (${num(p.force * 1000)} x ${num(p.length * 1000)}) / ` +
        `(${fixed(s.area, 1)} x ${num(p.modulus * 1000)}) = ${fixed(s.delta, 2)} mm`,
      engagement: {
        kind: "quiz_abcd",
        options: (_p, s) => ({
          correct: mm(s.delta),
          distractors: [mm(s.delta * 2), mm(s.delta / 2), mm(s.delta * 1.5), mm(s.delta * 3), mm(s.delta * 10)],
        }),
      },
    }),
  ]
}
