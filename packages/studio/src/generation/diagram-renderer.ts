import { randomUUID } from "node:crypto"
import { mkdir } from "node:fs/promises"
import { join } from "node:path"

import sharp from "sharp"

export interface DiagramRenderer {
  /** Returns a reference to the stored artifact; throws on failure. */
  renderFromDescription(
    title: string,
    description: string,
    options?: readonly string[],
    correctAnswer?: string,
  ): Promise<string>
}

// ──────────────────────────────────────────────────
// SVG card
// ──────────────────────────────────────────────────

const WIDTH = 1080
const MARGIN = 64
const LINE_HEIGHT = 40
const WRAP_AT = 48

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;")
}

/** Greedy word wrap; a single word longer than `width` gets its own line. */
export function wrapText(text: string, width = WRAP_AT): string[] {
  const lines: string[] = []
  let current = ""
  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (current && current.length + 1 + word.length > width) {
      lines.push(current)
      current = word
    } else {
      current = current ? `${current} ${word}` : word
    }
  }
  if (current) lines.push(current)
  return lines
}

/**
 * Card layout: title, wrapped description, then one row per option. The row
 * whose letter matches `correctAnswer` carries `data-correct="true"`.
 */
export function renderDiagramSvg(
  title: string,
  description: string,
  options: readonly string[] = [],
  correctAnswer?: string,
): string {
  const rows: string[] = []
  let y = MARGIN + 48

  rows.push(
    `<text x="${MARGIN}" y="${y}" font-size="44" font-weight="bold">${escapeXml(title)}</text>`,
  )
  y += LINE_HEIGHT * 1.5

  for (const line of wrapText(description)) {
    rows.push(`<text x="${MARGIN}" y="${y}" font-size="28">${escapeXml(line)}</text>`)
    y += LINE_HEIGHT
  }

  if (options.length > 0) y += LINE_HEIGHT / 2
  for (const option of options) {
    const correct = correctAnswer !== undefined && option.startsWith(`${correctAnswer}:`)
    rows.push(
      `<text x="${MARGIN}" y="${y}" font-size="32"${correct ? ' data-correct="true"' : ""}>${escapeXml(option)}</text>`,
    )
    y += LINE_HEIGHT
  }

  const height = y + MARGIN
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${height}" viewBox="0 0 ${WIDTH} ${height}">`,
    `<rect width="100%" height="100%" fill="#ffffff"/>`,
    `<g font-family="Helvetica, Arial, sans-serif" fill="#111827">`,
    ...rows,
    `</g>`,
    `</svg>`,
    "",
  ].join("\n")
}

export interface CardDiagramRendererOptions {
  outputDir: string
}

/**
 * Renders the SVG card and rasterizes it to PNG under `<outputDir>/diagrams/`,
 * since platforms accept raster uploads only. Returns the file path.
 */
export class CardDiagramRenderer implements DiagramRenderer {
  private readonly dir: string

  constructor(options: CardDiagramRendererOptions) {
    this.dir = join(options.outputDir, "diagrams")
  }

  async renderFromDescription(
    title: string,
    description: string,
    options?: readonly string[],
    correctAnswer?: string,
  ): Promise<string> {
    await mkdir(this.dir, { recursive: true })
    const svg = renderDiagramSvg(title, description, options, correctAnswer)
    const path = join(this.dir, `diagram_${randomUUID()}.png`)
    await sharp(Buffer.from(svg)).png().toFile(path)
    return path
  }
}
