import { titleCase } from "../format.js"
import { indexChoice } from "../params.js"
import { defineTemplate, type ScenarioTemplate } from "../types.js"

type MaterialKey = "steel" | "aluminum" | "cast_iron"

interface Material {
  name: string
  behavior: "ductile" | "brittle"
}

export const MATERIALS: Readonly<Record<MaterialKey, Material>> = {
  steel: { name: "Mild Steel", behavior: "ductile" },
  aluminum: { name: "Aluminum 6061", behavior: "ductile" },
  cast_iron: { name: "Cast Iron", behavior: "brittle" },
}

const MATERIAL_KEYS: readonly MaterialKey[] = ["steel", "aluminum", "cast_iron"]

export const CURVE_POINTS = [
  "Yield Strength",
  "Ultimate Tensile Strength",
  "Fracture",
  "Proportional Limit",
] as const

type CurvePoint = (typeof CURVE_POINTS)[number]

// Brittle materials have no yield plateau or proportional limit to mark.
const MATERIAL_POINTS: Readonly<Record<MaterialKey, readonly CurvePoint[]>> = {
  steel: CURVE_POINTS,
  aluminum: CURVE_POINTS,
  cast_iron: ["Ultimate Tensile Strength", "Fracture"],
}

interface Statement {
  text: string
  material: MaterialKey
  isTrue: boolean
}

const STATEMENTS: readonly Statement[] = [
  { text: "Mild steel shows a clear yield plateau before strain hardening", material: "steel", isTrue: true },
  { text: "Cast iron exhibits significant necking before fracture", material: "cast_iron", isTrue: false },
  { text: "Aluminum 6061 has a higher elastic modulus than mild steel", material: "aluminum", isTrue: false },
  { text: "Cast iron fails with very little plastic deformation", material: "cast_iron", isTrue: true },
  { text: "Mild steel has greater ductility than cast iron", material: "steel", isTrue: true },
  { text: "The elastic modulus of aluminum is about 69 GPa", material: "aluminum", isTrue: true },
]

function at<T>(items: readonly T[], index: number): T {
  const item = items[index]
  if (item === undefined) {
    throw new RangeError(`Index ${index} outside table of ${items.length}`)
  }
  return item
}

function materialKey(index: number): MaterialKey {
  return at(MATERIAL_KEYS, index)
}

/** A point the material's curve actually has; wraps for brittle materials. */
function validPoint(key: MaterialKey, pointIndex: number): CurvePoint {
  const valid = MATERIAL_POINTS[key]
  return at(valid, pointIndex % valid.length)
}

export function curveTemplates(): ScenarioTemplate[] {
  return [
    defineTemplate({
      id: "ss_curve_identify",
      category: "stress_strain_curve",
      tags: ["stress", "strain", "curve", "yield", "ultimate", "fracture", "material", "interview"],
      diagramType: "stress_strain_curve",
      params: {
        materialIdx: indexChoice(MATERIAL_KEYS.length),
        pointIdx: indexChoice(CURVE_POINTS.length),
      },
      solve: (p) => {
        const key = materialKey(p.materialIdx)
        return { material: MATERIALS[key], point: validPoint(key, p.pointIdx) }
      },
      formatHook: () => "Can you identify\nthis point?",
      formatDiagramDescription: (p) => {
        const key = materialKey(p.materialIdx)
        return (
          `Stress-strain curve for ${MATERIALS[key].name}. ` +
          `Highlight point: ${validPoint(key, p.pointIdx)}. Behavior: ${MATERIALS[key].behavior}.`
        )
      },
      formatSteps: (p) => [
        { text: `Material: ${MATERIALS[materialKey(p.materialIdx)].name}`, highlight: "material" },
        { text: "Identify the highlighted point on the curve", highlight: "point" },
      ],
      formatExplanation: (_p, s) =>
        `The highlighted point is the ${s.point} on the ${s.material.name} stress-strain curve.`,
      engagement: {
        kind: "identify",
        identify: (_p, s) => ({ correct: s.point, labels: CURVE_POINTS }),
      },
    }),

    defineTemplate({
      id: "ss_curve_true_false",
      category: "stress_strain_curve",
      tags: ["stress", "strain", "curve", "material", "true false", "interview", "concept"],
      diagramType: "stress_strain_curve",
      params: {
        statementIdx: indexChoice(STATEMENTS.length),
      },
      solve: (p) => at(STATEMENTS, p.statementIdx),
      formatHook: (p) => `True or False?\n"${at(STATEMENTS, p.statementIdx).text}"`,
      formatDiagramDescription: (p) => {
        const material = MATERIALS[at(STATEMENTS, p.statementIdx).material]
        return `Stress-strain curve for ${material.name}. Behavior: ${material.behavior}. Show all labels.`
      },
      formatSteps: (p) => [{ text: at(STATEMENTS, p.statementIdx).text, highlight: "statement" }],
      formatExplanation: (_p, s) =>
        `${s.isTrue ? "TRUE" : "FALSE"}: ${s.text}. ` +
        `${titleCase(s.material)} is a ${MATERIALS[s.material].behavior} material.`,
      engagement: {
        kind: "true_false",
        statement: (_p, s) => ({ statement: s.text, isTrue: s.isTrue }),
      },
    }),

    defineTemplate({
      id: "ss_curve_whats_missing",
      category: "stress_strain_curve",
      tags: ["stress", "strain", "curve", "material", "interview", "identify"],
      diagramType: "stress_strain_curve",
      params: {
        materialIdx: indexChoice(MATERIAL_KEYS.length),
        hiddenIdx: indexChoice(CURVE_POINTS.length),
      },
      solve: (p) => {
        const key = materialKey(p.materialIdx)
        return { material: MATERIALS[key], hidden: validPoint(key, p.hiddenIdx) }
      },
      formatHook: () => "What label\nis missing?",
      formatDiagramDescription: (p) => {
        const key = materialKey(p.materialIdx)
        return (
          `Stress-strain curve for ${MATERIALS[key].name}. ` +
          `Hide label: ${validPoint(key, p.hiddenIdx)}. Behavior: ${MATERIALS[key].behavior}.`
        )
      },
      formatSteps: (p) => [
        { text: `Material: ${MATERIALS[materialKey(p.materialIdx)].name}`, highlight: "material" },
        { text: "One label has been replaced with '?', identify it", highlight: "missing" },
      ],
      formatExplanation: (_p, s) => `The missing label is the ${s.hidden}.`,
      engagement: {
        kind: "identify",
        identify: (_p, s) => ({ correct: s.hidden, labels: CURVE_POINTS }),
      },
    }),
  ]
}
