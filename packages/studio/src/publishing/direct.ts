import type { Platform } from "@reelsmith/shared"
import type { Logger } from "@reelsmith/shared/tracing"

import type { ContentLifecycle } from "../content/lifecycle.js"
import type { ContentRepository, ScheduleRepository } from "../content/repository.js"
import { CollaboratorError, ConfigurationError, errorMessage, ValidationError } from "../errors.js"
import { classifyError } from "../worker/error-classifier.js"
import { buildCaption } from "./caption.js"
import { loadPublishable } from "./gate.js"
import { PLATFORM_NAMES, type PublisherRegistry, type PublishResult } from "./publishers/registry.js"

export interface PublishNowInput {
  contentId: number
  platform?: string
  caption?: string | null
  hashtags?: readonly string[]
}

export interface PublishNowResult {
  success: true
  platform: Platform
  post_id: string
  post_url: string
  message: string
}

export interface DirectPublisherDeps {
  contents: ContentRepository
  schedules: ScheduleRepository
  lifecycle: ContentLifecycle
  publishers: PublisherRegistry
  logger: Logger
  now: () => Date
}

/**
 * Publishes synchronously, bypassing the queue. Both outcomes leave a
 * schedule record; a failed call answers with CollaboratorError.
 */
export class DirectPublisher {
  constructor(private readonly deps: DirectPublisherDeps) {}

  async publishNow(input: PublishNowInput): Promise<PublishNowResult> {
    const { content, diagramPath, platform } = await loadPublishable(
      this.deps.contents,
      input.contentId,
      input.platform ?? "twitter",
    )

    const publisher = this.deps.publishers.get(platform)
    if (!publisher) {
      throw new ValidationError(`Platform '${platform}' is not yet supported`)
    }
    if (!publisher.isConfigured()) {
      throw new ConfigurationError(`${PLATFORM_NAMES[platform]} is not configured`)
    }

    const caption = buildCaption(content.script_data, input.caption)
    const attemptedAt = this.deps.now()

    let result: PublishResult
    try {
      result = await publisher.postImage(diagramPath, caption, input.hashtags)
    } catch (err) {
      const message = errorMessage(err)
      this.deps.logger.error("Direct publish failed", {
        contentId: content.id,
        platform,
        error: message,
        category: classifyError(err).category,
      })
      await this.deps.schedules.create({
        content_id: content.id,
        platform,
        scheduled_at: attemptedAt,
        status: "failed",
        error_message: message,
      })
      throw new CollaboratorError(platform, err)
    }

    await this.deps.schedules.create({
      content_id: content.id,
      platform,
      scheduled_at: attemptedAt,
      published_at: attemptedAt,
      status: "published",
      platform_post_id: result.postId,
    })
    await this.deps.lifecycle.transition(content.id, "published")

    this.deps.logger.info("Published content directly", {
      contentId: content.id,
      platform,
      postId: result.postId,
    })
    return {
      success: true,
      platform,
      post_id: result.postId,
      post_url: result.url,
      message: `Successfully published to ${PLATFORM_NAMES[platform]}!`,
    }
  }
}
