import { describe, expect, it } from "vitest"

import { escapeXml, renderDiagramSvg, wrapText } from "../generation/diagram-renderer.js"

describe("escapeXml", () => {
  it("escapes markup characters", () => {
    expect(escapeXml(`M < 5 & "F" > 'R'`)).toBe("M &lt; 5 &amp; &quot;F&quot; &gt; &apos;R&apos;")
  })
})

describe("wrapText", () => {
  it("wraps greedily at the width", () => {
    expect(wrapText("one two three four", 9)).toEqual(["one two", "three", "four"])
  })

  it("keeps an over-long word on its own line", () => {
    expect(wrapText("a supercalifragilistic b", 5)).toEqual(["a", "supercalifragilistic", "b"])
  })

  it("returns nothing for blank input", () => {
    expect(wrapText("   ")).toEqual([])
  })
})

describe("renderDiagramSvg", () => {
  const svg = renderDiagramSvg(
    "Find Ra & Rb",
    "A 6m beam with a 12 kN load",
    ["A: 6 kN", "B: 12 kN", "C: 3 kN", "D: 24 kN"],
    "B",
  )

  it("escapes the title", () => {
    expect(svg).toContain(">Find Ra &amp; Rb</text>")
  })

  it("marks only the correct option", () => {
    const marked = svg.split("\n").filter((line) => line.includes('data-correct="true"'))
    expect(marked).toHaveLength(1)
    expect(marked[0]).toContain(">B: 12 kN</text>")
  })

  it("is a standalone SVG document", () => {
    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="1080"')).toBe(true)
    expect(svg.trimEnd().endsWith("</svg>")).toBe(true)
  })

  it("renders without options", () => {
    expect(renderDiagramSvg("Title", "Body")).not.toContain("data-correct")
  })
})
