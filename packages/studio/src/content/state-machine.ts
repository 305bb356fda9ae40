/**
 * Content status state machine.
 *
 * Status only advances forward, except the jump to `failed` from any
 * non-terminal state and the re-publish path `published → queued`.
 * `published → published` makes a duplicate delivery a no-op change.
 *
 * States:
 * - draft: row exists, nothing generated
 * - generating: synthesis pipeline running in the background
 * - ready: script and diagram present
 * - queued: a pending schedule and a queue message exist
 * - published: the platform accepted the post
 * - failed: terminal; recovery is a new request
 */

import type { ContentStatus } from "@reelsmith/shared"

export const VALID_TRANSITIONS: Readonly<Record<ContentStatus, readonly ContentStatus[]>> = {
  draft: ["generating", "failed"],
  generating: ["ready", "failed"],
  ready: ["queued", "published", "failed"],
  queued: ["published", "failed"],
  published: ["queued", "published"],
  failed: [],
}

export class InvalidTransitionError extends Error {
  readonly from: ContentStatus
  readonly to: ContentStatus

  constructor(from: ContentStatus, to: ContentStatus, reason?: string) {
    super(`Invalid content transition: ${from} → ${to}${reason ? ` (${reason})` : ""}`)
    this.name = "InvalidTransitionError"
    this.from = from
    this.to = to
  }
}

export function isValidTransition(from: ContentStatus, to: ContentStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to)
}

export function assertValidTransition(from: ContentStatus, to: ContentStatus): void {
  if (!isValidTransition(from, to)) {
    throw new InvalidTransitionError(from, to)
  }
}

/** Fields a target status depends on. */
export interface ArtifactState {
  script_text: string | null
  diagram_path: string | null
}

/**
 * `ready` needs both script and diagram; `published` needs a diagram.
 * Returns the missing artifact, or undefined when the target is reachable.
 */
export function missingArtifact(to: ContentStatus, state: ArtifactState): string | undefined {
  if (to === "ready") {
    if (!state.script_text) return "script"
    if (!state.diagram_path) return "diagram"
  }
  if (to === "published" && !state.diagram_path) return "diagram"
  return undefined
}
