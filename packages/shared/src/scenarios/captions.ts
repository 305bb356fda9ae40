import { readFileSync } from "node:fs"

import { z } from "zod"

import type { EngagementKind } from "./types.js"

const CaptionPoolsSchema = z.object({
  quiz_abcd: z.array(z.string().min(1)).nonempty(),
  true_false: z.array(z.string().min(1)).nonempty(),
  identify: z.array(z.string().min(1)).nonempty(),
  infographic: z.array(z.string().min(1)).nonempty(),
})

/** Casual post captions, one pool per engagement format. */
export type CaptionPools = Readonly<Record<EngagementKind, readonly string[]>>

const DEFAULT_CAPTIONS_FILE = new URL("./captions.json", import.meta.url)

export function loadCaptionPools(file: URL | string = DEFAULT_CAPTIONS_FILE): CaptionPools {
  const raw: unknown = JSON.parse(readFileSync(file, "utf-8"))
  return CaptionPoolsSchema.parse(raw)
}
