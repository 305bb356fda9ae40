import { isPlatform, type Platform } from "@reelsmith/shared"

import type { ContentRepository } from "../content/repository.js"
import type { Content } from "../db/types.js"
import { NotFoundError, ValidationError } from "../errors.js"

export interface Publishable {
  content: Content
  diagramPath: string
  platform: Platform
}

/**
 * Precondition for queueing or publishing, checked before any write:
 * the content exists, is READY or PUBLISHED, has a diagram, and the
 * platform is one we know.
 */
export async function loadPublishable(
  contents: Pick<ContentRepository, "get">,
  contentId: number,
  platform: string,
): Promise<Publishable> {
  const content = await contents.get(contentId)
  if (!content) throw new NotFoundError("Content", contentId)

  if (content.status !== "ready" && content.status !== "published") {
    throw new ValidationError(`Content is not ready for publishing. Status: ${content.status}`)
  }
  if (!content.diagram_path) {
    throw new ValidationError("Content has no image to publish")
  }
  if (!isPlatform(platform)) {
    throw new ValidationError(`Unknown platform: ${platform}`)
  }

  return { content, diagramPath: content.diagram_path, platform }
}
