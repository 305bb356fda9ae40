import { fixed, num, roundTo, toRadians } from "../format.js"
import { range } from "../params.js"
import { defineTemplate, type ScenarioTemplate } from "../types.js"

function kNm(value: number): string {
  return `M = ${fixed(value, 1)} kNm`
}

export function momentTemplates(): ScenarioTemplate[] {
  return [
    defineTemplate({
      id: "moment_force",
      category: "moments",
      tags: ["moment", "force", "torque", "point", "lever arm"],
      diagramType: "fbd",
      params: {
        force: range(10, 50, 5, "kN"),
        distance: range(2, 8, 1, "m"),
        angle: range(30, 75, 15, "deg"),
      },
      solve: (p) => ({
        moment: roundTo(p.force * p.distance * Math.sin(toRadians(p.angle)), 1),
      }),
      formatHook: () => "Can you calculate the moment?",
      formatDiagramDescription: (p) =>
        `Free body diagram with forces. Lever problem. F = ${num(p.force)} kN at ${num(p.angle)} degrees. ` +
        `Lever arm d = ${num(p.distance)} m.`,
      formatSteps: (p) => [
        {
          text: `Given: F = ${num(p.force)} kN, d = ${num(p.distance)} m, angle = ${num(p.angle)} deg`,
          highlight: "lever arm",
        },
        { text: "Find: Moment about the pivot point", highlight: "moment" },
      ],
      formatExplanation: (p, s) =>
        `M = F x d x sin(theta) = ${num(p.force)} x ${num(p.distance)} x sin(${num(p.angle)}) = ${fixed(s.moment, 1)} kNm`,
      engagement: {
        kind: "quiz_abcd",
        options: (p, s) => ({
          correct: kNm(s.moment),
          distractors: [
            // dropped sinθ
            kNm(p.force * p.distance),
            kNm(s.moment * 1.5),
            kNm(s.moment / 2),
            kNm(s.moment * 2),
            kNm(s.moment * 3),
          ],
        }),
      },
    }),

    defineTemplate({
      id: "moment_couple",
      category: "moments",
      tags: ["moment", "couple", "torque", "pair"],
      diagramType: "fbd",
      params: {
        force: range(10, 40, 5, "kN"),
        arm: range(1, 6, 0.5, "m"),
      },
      solve: (p) => ({ moment: roundTo(p.force * p.arm, 1) }),
      formatHook: () => "Can you find the couple moment?",
      formatDiagramDescription: (p) =>
        `Free body diagram with forces. Two equal and opposite forces of ${num(p.force)} kN ` +
        `separated by ${fixed(p.arm, 1)}m.`,
      formatSteps: (p) => [
        { text: `Given: Two forces of ${num(p.force)} kN, arm = ${fixed(p.arm, 1)}m`, highlight: "couple" },
        { text: "Find: Couple moment", highlight: "moment" },
      ],
      formatExplanation: (p, s) =>
        `Couple moment = F x d = ${num(p.force)} x ${fixed(p.arm, 1)} = ${fixed(s.moment, 1)} kNm`,
      engagement: {
        kind: "quiz_abcd",
        options: (_p, s) => ({
          correct: kNm(s.moment),
          distractors: [kNm(s.moment * 2), kNm(s.moment / 2), kNm(s.moment * 0.7), kNm(s.moment * 1.5)],
        }),
      },
    }),
  ]
}
