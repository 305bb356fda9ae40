import type { ContentStatus } from "@reelsmith/shared"

import type { Content } from "../db/types.js"
import { NotFoundError } from "../errors.js"
import type { ContentRepository, ContentStatusPatch } from "./repository.js"
import { InvalidTransitionError, isValidTransition, missingArtifact } from "./state-machine.js"

/**
 * Applies status changes through the transition table and the artifact
 * invariants, then writes them guarded on the status that was read.
 */
export class ContentLifecycle {
  constructor(private readonly contents: ContentRepository) {}

  /**
   * Move content to `to`. Throws InvalidTransitionError when the table forbids
   * it; resolves false when a concurrent writer changed the status first.
   */
  async transition(id: number, to: ContentStatus, patch?: ContentStatusPatch): Promise<boolean> {
    const content = await this.contents.get(id)
    if (!content) throw new NotFoundError("Content", id)
    return this.apply(content, to, patch, true)
  }

  /**
   * Terminal update for background units: a forbidden transition, e.g. a
   * second delivery finalizing content that already failed, is a no-op.
   */
  async finalize(id: number, to: ContentStatus, patch?: ContentStatusPatch): Promise<boolean> {
    const content = await this.contents.get(id)
    if (!content) return false
    return this.apply(content, to, patch, false)
  }

  private async apply(
    content: Content,
    to: ContentStatus,
    patch: ContentStatusPatch | undefined,
    strict: boolean,
  ): Promise<boolean> {
    // Self-loops (a repeated publish) leave the row untouched
    if (content.status === to && isValidTransition(to, to)) return false
    if (!isValidTransition(content.status, to)) {
      if (strict) throw new InvalidTransitionError(content.status, to)
      return false
    }
    const missing = missingArtifact(to, content)
    if (missing) {
      throw new InvalidTransitionError(content.status, to, `${missing} missing`)
    }
    return this.contents.updateStatus(content.id, content.status, to, patch)
  }
}
