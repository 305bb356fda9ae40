import { fixed, num, roundTo } from "../format.js"
import { range } from "../params.js"
import { defineTemplate, type ScenarioTemplate } from "../types.js"

const SS_SUPPORTS = "Pin support at left end (A), roller support at right end (B)."

function reactions(ra: number, rb: number, digits = 1): string {
  return `Ra = ${fixed(ra, digits)} kN, Rb = ${fixed(rb, digits)} kN`
}

function fixedEnd(reaction: number, moment: number): string {
  return `R = ${num(reaction)} kN, M = ${num(moment)} kNm`
}

export function beamTemplates(): ScenarioTemplate[] {
  return [
    defineTemplate({
      id: "beam_ss_center",
      category: "beam_reactions",
      tags: ["beam", "simply supported", "reaction", "center", "point load", "loading"],
      diagramType: "beam",
      params: {
        length: range(4, 12, 2, "m"),
        load: range(10, 50, 5, "kN"),
      },
      solve: (p) => ({ ra: p.load / 2, rb: p.load / 2 }),
      formatHook: () => "Can you solve this Beam loading analysis problem?",
      formatDiagramDescription: (p) =>
        `Simply supported beam, ${num(p.length)}m length. ${SS_SUPPORTS} ` +
        `Point load of ${num(p.load)} kN applied at center (${num(p.length / 2)}m from each end).`,
      formatSteps: (p) => [
        { text: `Given: ${num(p.length)}m beam with ${num(p.load)} kN center load`, highlight: "load" },
        { text: "Find: Reaction forces at A and B", highlight: "reactions" },
      ],
      formatExplanation: (p, s) =>
        `By symmetry, each support carries half the load: ${num(p.load)} / 2 = ${num(s.ra)} kN each`,
      engagement: {
        kind: "quiz_abcd",
        options: (p, s) => ({
          correct: reactions(s.ra, s.rb),
          distractors: [
            reactions(p.load, 0),
            reactions(s.ra + 2, s.rb - 2),
            reactions(s.ra * 2, s.rb * 2),
            reactions(s.ra * 1.5, s.rb * 0.5),
          ],
        }),
      },
    }),

    defineTemplate({
      id: "beam_ss_offset",
      category: "beam_reactions",
      tags: ["beam", "simply supported", "reaction", "offset", "point load", "loading", "asymmetric"],
      diagramType: "beam",
      params: {
        length: range(6, 12, 2, "m"),
        load: range(10, 40, 5, "kN"),
        distA: range(2, 4, 1, "m"),
      },
      solve: (p) => ({
        rb: roundTo((p.load * p.distA) / p.length, 1),
        ra: roundTo((p.load * (p.length - p.distA)) / p.length, 1),
      }),
      formatHook: () => "Can you solve this Beam reaction problem?",
      formatDiagramDescription: (p) =>
        `Simply supported beam, ${num(p.length)}m length. ${SS_SUPPORTS} ` +
        `Point load of ${num(p.load)} kN applied at ${num(p.distA)}m from left end.`,
      formatSteps: (p) => [
        {
          text: `Given: ${num(p.length)}m beam, ${num(p.load)} kN load at ${num(p.distA)}m from A`,
          highlight: "load position",
        },
        { text: "Find: Reaction forces Ra and Rb", highlight: "reactions" },
      ],
      formatExplanation: (p, s) =>
        `Taking moments about A: Rb = ${num(p.load)} x ${num(p.distA)} / ${num(p.length)} = ${fixed(s.rb, 1)} kN. ` +
        `Ra = ${num(p.load)} - ${fixed(s.rb, 1)} = ${fixed(s.ra, 1)} kN`,
      engagement: {
        kind: "quiz_abcd",
        options: (p, s) => ({
          correct: reactions(s.ra, s.rb),
          distractors: [
            reactions(s.rb, s.ra),
            reactions(p.load, 0),
            reactions(s.ra * 1.3, s.rb * 0.7),
            reactions(s.ra + 2, s.rb - 2),
            reactions(s.ra * 2, s.rb * 2),
          ],
        }),
      },
    }),

    defineTemplate({
      id: "beam_ss_two_loads",
      category: "beam_reactions",
      tags: ["beam", "simply supported", "reaction", "two loads", "point load", "loading", "multiple"],
      diagramType: "beam",
      params: {
        length: range(8, 12, 2, "m"),
        load1: range(10, 30, 5, "kN"),
        load2: range(10, 30, 5, "kN"),
        dist1: range(2, 3, 1, "m"),
        dist2: range(5, 7, 1, "m"),
      },
      solve: (p) => {
        const rb = (p.load1 * p.dist1 + p.load2 * p.dist2) / p.length
        return { rb: roundTo(rb, 1), ra: roundTo(p.load1 + p.load2 - rb, 1) }
      },
      formatHook: () => "Can you find the beam reactions?",
      formatDiagramDescription: (p) =>
        `Simply supported beam, ${num(p.length)}m length. ${SS_SUPPORTS} ` +
        `Point load of ${num(p.load1)} kN at ${num(p.dist1)}m from A. ` +
        `Point load of ${num(p.load2)} kN at ${num(p.dist2)}m from A.`,
      formatSteps: (p) => [
        {
          text:
            `Given: ${num(p.length)}m beam with ${num(p.load1)} kN at ${num(p.dist1)}m ` +
            `and ${num(p.load2)} kN at ${num(p.dist2)}m`,
          highlight: "loads",
        },
        { text: "Find: Reaction forces at A and B", highlight: "reactions" },
      ],
      formatExplanation: (p, s) =>
        `Sum moments about A: Rb x ${num(p.length)} = ${num(p.load1)} x ${num(p.dist1)} + ` +
        `${num(p.load2)} x ${num(p.dist2)}. Rb = ${fixed(s.rb, 1)} kN, Ra = ${fixed(s.ra, 1)} kN`,
      engagement: {
        kind: "quiz_abcd",
        options: (p, s) => ({
          correct: reactions(s.ra, s.rb),
          distractors: [
            reactions(s.rb, s.ra),
            reactions(p.load1 + p.load2, 0),
            // each support takes the load nearest to it
            reactions(p.load1, p.load2),
            reactions(s.ra * 1.3, s.rb * 0.7),
            reactions(s.ra + 3, s.rb - 3),
            reactions(s.ra * 2, s.rb * 2),
          ],
        }),
      },
    }),

    defineTemplate({
      id: "beam_cantilever_end",
      category: "beam_reactions",
      tags: ["beam", "cantilever", "reaction", "end load", "fixed", "moment"],
      diagramType: "beam",
      params: {
        length: range(2, 8, 1, "m"),
        load: range(5, 40, 5, "kN"),
      },
      solve: (p) => ({ reaction: p.load, moment: p.load * p.length }),
      formatHook: () => "Can you solve this cantilever beam problem?",
      formatDiagramDescription: (p) =>
        `Cantilever beam, ${num(p.length)}m length. Fixed support at left end (A). ` +
        `Point load of ${num(p.load)} kN applied at the free right end.`,
      formatSteps: (p) => [
        { text: `Given: ${num(p.length)}m cantilever with ${num(p.load)} kN end load`, highlight: "cantilever" },
        { text: "Find: Reaction force and moment at A", highlight: "reactions" },
      ],
      formatExplanation: (p, s) =>
        `For a cantilever: R = P = ${num(s.reaction)} kN, ` +
        `M = P x L = ${num(p.load)} x ${num(p.length)} = ${num(s.moment)} kNm`,
      formatCaption: (p) => `${num(p.load)} kN on a ${num(p.length)}m cantilever. don't forget the moment at the wall`,
      engagement: {
        kind: "quiz_abcd",
        options: (_p, s) => ({
          correct: fixedEnd(s.reaction, s.moment),
          distractors: [
            fixedEnd(s.reaction, s.moment / 2),
            fixedEnd(s.reaction / 2, s.moment),
            fixedEnd(s.reaction, s.moment * 2),
            fixedEnd(s.reaction * 2, s.moment),
          ],
        }),
      },
    }),

    defineTemplate({
      id: "beam_cantilever_mid",
      category: "beam_reactions",
      tags: ["beam", "cantilever", "reaction", "mid load", "fixed"],
      diagramType: "beam",
      params: {
        length: range(4, 8, 1, "m"),
        load: range(10, 40, 5, "kN"),
        dist: range(2, 3, 1, "m"),
      },
      solve: (p) => ({ reaction: p.load, moment: p.load * p.dist }),
      formatHook: () => "Can you solve this cantilever problem?",
      formatDiagramDescription: (p) =>
        `Cantilever beam, ${num(p.length)}m length. Fixed support at left end (A). ` +
        `Point load of ${num(p.load)} kN applied at ${num(p.dist)}m from the fixed end.`,
      formatSteps: (p) => [
        {
          text: `Given: ${num(p.length)}m cantilever, ${num(p.load)} kN at ${num(p.dist)}m from fixed end`,
          highlight: "load",
        },
        { text: "Find: Reaction force and moment at fixed support", highlight: "reactions" },
      ],
      formatExplanation: (p, s) =>
        `R = P = ${num(s.reaction)} kN (equilibrium). ` +
        `M = P x a = ${num(p.load)} x ${num(p.dist)} = ${num(s.moment)} kNm`,
      engagement: {
        kind: "quiz_abcd",
        options: (p, s) => ({
          correct: fixedEnd(s.reaction, s.moment),
          distractors: [
            // used the full length as the lever arm
            fixedEnd(s.reaction, p.load * p.length),
            fixedEnd(s.reaction / 2, s.moment),
            fixedEnd(s.reaction, s.moment / 2),
            fixedEnd(s.reaction, s.moment * 2),
            fixedEnd(s.reaction * 2, s.moment),
          ],
        }),
      },
    }),

    defineTemplate({
      id: "beam_ss_udl",
      category: "beam_reactions",
      tags: ["beam", "simply supported", "reaction", "distributed", "udl", "uniform", "loading"],
      diagramType: "beam",
      params: {
        length: range(4, 10, 2, "m"),
        w: range(2, 10, 1, "kN/m"),
      },
      solve: (p) => {
        const total = p.w * p.length
        return { total, ra: total / 2, rb: total / 2 }
      },
      formatHook: () => "Can you solve this distributed load problem?",
      formatDiagramDescription: (p) =>
        `Simply supported beam, ${num(p.length)}m length. ${SS_SUPPORTS} ` +
        `Uniformly distributed load of ${num(p.w)} kN/m along entire beam. ` +
        `Total load ${num(p.w * p.length)} kN at center.`,
      formatSteps: (p) => [
        { text: `Given: ${num(p.length)}m beam with UDL of ${num(p.w)} kN/m`, highlight: "distributed load" },
        { text: "Find: Reaction forces at A and B", highlight: "reactions" },
      ],
      formatExplanation: (p, s) =>
        `Total load = ${num(p.w)} x ${num(p.length)} = ${num(s.total)} kN. ` +
        `By symmetry: Ra = Rb = ${num(s.total)} / 2 = ${num(s.ra)} kN`,
      engagement: {
        kind: "quiz_abcd",
        options: (p, s) => ({
          correct: reactions(s.ra, s.rb, 0),
          distractors: [
            // forgot to multiply by the length
            reactions(p.w, p.w, 0),
            reactions(s.total, 0, 0),
            reactions(s.ra + 3, s.rb - 3, 0),
            reactions(s.ra * 2, s.rb * 2, 0),
          ],
        }),
      },
    }),
  ]
}
