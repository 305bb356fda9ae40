import { GRAVITY, fixed, num, plural, roundTo } from "../format.js"
import { range } from "../params.js"
import { defineTemplate, type ScenarioTemplate } from "../types.js"

function ratio(value: number): string {
  return `GR = ${fixed(value, 2)}:1`
}

export function conceptTemplates(): ScenarioTemplate[] {
  return [
    defineTemplate({
      id: "concept_hookes_law_info",
      category: "concepts",
      tags: ["hooke", "spring", "elasticity", "concept", "infographic", "law"],
      diagramType: "infographic",
      params: {
        k: range(50, 200, 25, "N/m"),
        x: range(0.1, 0.5, 0.05, "m"),
      },
      solve: (p) => ({ force: roundTo(p.k * p.x, 1) }),
      formatHook: () => "Hooke's Law",
      formatDiagramDescription: (p) =>
        `Infographic: Hooke's Law. Spring diagram. k = ${num(p.k)} N/m, x = ${fixed(p.x, 2)} m, ` +
        `F = ${fixed(p.k * p.x, 1)} N.`,
      formatSteps: (p) => [
        { text: "F = kx", highlight: "formula" },
        { text: `k = ${num(p.k)} N/m, x = ${fixed(p.x, 2)} m`, highlight: "values" },
      ],
      formatExplanation: () => "Hooke's Law: Force is proportional to displacement in the elastic region.",
      engagement: {
        kind: "infographic",
        keyFacts: (p, s) => [
          "F = kx (force = spring constant x displacement)",
          "Only valid in the elastic region",
          `Example: k = ${num(p.k)} N/m, x = ${fixed(p.x, 2)} m`,
          `F = ${fixed(s.force, 1)} N`,
        ],
        formula: () => "F = kx",
      },
    }),

    defineTemplate({
      id: "concept_hookes_law_quiz",
      category: "concepts",
      tags: ["hooke", "spring", "elasticity", "concept", "quiz"],
      diagramType: "infographic",
      params: {
        k: range(50, 200, 25, "N/m"),
        x: range(0.1, 0.5, 0.05, "m"),
      },
      solve: (p) => ({ force: roundTo(p.k * p.x, 1) }),
      formatHook: (p) => `Find the spring force\n(k = ${num(p.k)} N/m)`,
      formatDiagramDescription: (p) =>
        `Infographic: Hooke's Law. Spring diagram. k = ${num(p.k)} N/m, x = ${fixed(p.x, 2)} m.`,
      formatSteps: (p) => [
        { text: `Given: k = ${num(p.k)} N/m, x = ${fixed(p.x, 2)} m`, highlight: "spring" },
        { text: "Find: Force F", highlight: "force" },
      ],
      formatExplanation: (p, s) => `F = kx = ${num(p.k)} x ${fixed(p.x, 2)} = ${fixed(s.force, 1)} N`,
      engagement: {
        kind: "quiz_abcd",
        options: (p, s) => ({
          correct: `F = ${fixed(s.force, 1)} N`,
          distractors: [
            `F = ${fixed(s.force * 2, 1)} N`,
            `F = ${fixed(s.force / 2, 1)} N`,
            // added instead of multiplied
            `F = ${fixed(p.k + p.x, 1)} N`,
            `F = ${fixed(s.force * 3, 1)} N`,
          ],
        }),
      },
    }),

    defineTemplate({
      id: "concept_pulleys_info",
      category: "concepts",
      tags: ["pulley", "mechanical advantage", "concept", "infographic", "simple machine"],
      diagramType: "infographic",
      params: {
        pulleys: range(1, 4, 1),
        load: range(50, 200, 25, "kg"),
      },
      solve: (p) => ({
        advantage: p.pulleys,
        effort: roundTo((p.load * GRAVITY) / p.pulleys, 1),
        weight: roundTo(p.load * GRAVITY, 1),
      }),
      formatHook: () => "Pulley Systems",
      formatDiagramDescription: (p) =>
        `Infographic: Pulley system. ${plural(p.pulleys, "pulley")}, load = ${num(p.load)} kg.`,
      formatSteps: () => [
        { text: "MA = number of supporting ropes", highlight: "formula" },
        { text: "Effort = Weight / MA", highlight: "calculation" },
      ],
      formatExplanation: (_p, s) =>
        `With ${plural(s.advantage, "pulley")}, MA = ${s.advantage}. ` +
        `Effort = ${num(s.weight, 0)} N / ${s.advantage} = ${fixed(s.effort, 1)} N`,
      engagement: {
        kind: "infographic",
        keyFacts: (p, s) => [
          `Mechanical Advantage (MA) = ${s.advantage}`,
          `Weight = ${num(p.load)} kg x 9.81 = ${num(s.weight, 0)} N`,
          `Effort = ${num(s.weight, 0)} / ${s.advantage} = ${fixed(s.effort, 1)} N`,
          "More pulleys = less effort, but more rope to pull",
        ],
        formula: () => "Effort = Weight / MA",
      },
    }),

    defineTemplate({
      id: "concept_pulleys_quiz",
      category: "concepts",
      tags: ["pulley", "mechanical advantage", "concept", "quiz", "simple machine"],
      diagramType: "infographic",
      params: {
        pulleys: range(2, 4, 1),
        load: range(50, 200, 25, "kg"),
      },
      solve: (p) => ({
        effort: roundTo((p.load * GRAVITY) / p.pulleys, 1),
        weight: roundTo(p.load * GRAVITY, 1),
      }),
      formatHook: (p) => `Find the effort force\n(${num(p.pulleys)} pulleys, ${num(p.load)} kg)`,
      formatDiagramDescription: (p) =>
        `Infographic: Pulley system. ${num(p.pulleys)} pulleys, load = ${num(p.load)} kg.`,
      formatSteps: (p) => [
        { text: `Given: ${num(p.pulleys)} pulleys, load = ${num(p.load)} kg`, highlight: "pulleys" },
        { text: "Find: Effort force", highlight: "effort" },
      ],
      formatExplanation: (p, s) =>
        `MA = ${num(p.pulleys)}. Effort = ${num(s.weight, 0)} / ${num(p.pulleys)} = ${fixed(s.effort, 1)} N`,
      engagement: {
        kind: "quiz_abcd",
        options: (_p, s) => ({
          correct: `F = ${fixed(s.effort, 1)} N`,
          distractors: [
            // forgot to divide by MA
            `F = ${fixed(s.weight, 1)} N`,
            `F = ${fixed(s.effort * 2, 1)} N`,
            `F = ${fixed(s.effort * 0.5, 1)} N`,
            `F = ${fixed(s.effort * 1.5, 1)} N`,
            `F = ${fixed(s.effort * 3, 1)} N`,
          ],
        }),
      },
    }),

    defineTemplate({
      id: "concept_gears_info",
      category: "concepts",
      tags: ["gear", "ratio", "concept", "infographic", "simple machine", "transmission"],
      diagramType: "infographic",
      params: {
        driverTeeth: range(15, 30, 5, "teeth"),
        drivenTeeth: range(40, 80, 10, "teeth"),
      },
      solve: (p) => ({
        ratio: roundTo(p.drivenTeeth / p.driverTeeth, 2),
        speed: roundTo(p.driverTeeth / p.drivenTeeth, 2),
      }),
      formatHook: () => "Gear Ratios",
      formatDiagramDescription: (p) =>
        `Infographic: Gear ratio. Driver gear ${num(p.driverTeeth)} teeth, driven gear ${num(p.drivenTeeth)} teeth.`,
      formatSteps: (p) => [
        { text: "Gear Ratio = Driven / Driver", highlight: "formula" },
        {
          text: `${num(p.drivenTeeth)} / ${num(p.driverTeeth)} = ${fixed(p.drivenTeeth / p.driverTeeth, 2)}`,
          highlight: "calc",
        },
      ],
      formatExplanation: (p, s) =>
        `Gear ratio = ${num(p.drivenTeeth)} / ${num(p.driverTeeth)} = ${fixed(s.ratio, 2)}. ` +
        `Output speed = ${fixed(s.speed, 2)}x input speed, but torque is ${fixed(s.ratio, 2)}x higher.`,
      engagement: {
        kind: "infographic",
        keyFacts: (p, s) => [
          `Driver: ${num(p.driverTeeth)} teeth, Driven: ${num(p.drivenTeeth)} teeth`,
          `Gear Ratio = ${fixed(s.ratio, 2)}:1`,
          `Speed reduction: output is ${fixed(s.speed, 2)}x input speed`,
          `Torque multiplication: output is ${fixed(s.ratio, 2)}x input torque`,
        ],
        formula: () => "GR = N_driven / N_driver",
      },
    }),

    defineTemplate({
      id: "concept_gears_quiz",
      category: "concepts",
      tags: ["gear", "ratio", "concept", "quiz", "simple machine"],
      diagramType: "infographic",
      params: {
        driverTeeth: range(15, 30, 5, "teeth"),
        drivenTeeth: range(40, 80, 10, "teeth"),
      },
      solve: (p) => ({ ratio: roundTo(p.drivenTeeth / p.driverTeeth, 2) }),
      formatHook: () => "Find the gear ratio",
      formatDiagramDescription: (p) =>
        `Infographic: Gear ratio. Driver gear ${num(p.driverTeeth)} teeth, driven gear ${num(p.drivenTeeth)} teeth.`,
      formatSteps: (p) => [
        { text: `Driver: ${num(p.driverTeeth)} teeth, Driven: ${num(p.drivenTeeth)} teeth`, highlight: "gears" },
        { text: "Find: Gear ratio", highlight: "ratio" },
      ],
      formatExplanation: (p, s) =>
        `GR = Driven / Driver = ${num(p.drivenTeeth)} / ${num(p.driverTeeth)} = ${fixed(s.ratio, 2)}:1`,
      engagement: {
        kind: "quiz_abcd",
        options: (p, s) => ({
          correct: ratio(s.ratio),
          distractors: [
            // inverted
            ratio(p.driverTeeth / p.drivenTeeth),
            ratio(s.ratio * 2),
            ratio(s.ratio / 2),
            ratio(s.ratio * 1.5),
          ],
        }),
      },
    }),
  ]
}
