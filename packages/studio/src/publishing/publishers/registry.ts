import { isPlatform, type Platform, PLATFORMS } from "@reelsmith/shared"

export interface PublishResult {
  postId: string
  url: string
}

/** A social platform client. `postImage` throws on any failure. */
export interface Publisher {
  readonly platform: Platform
  isConfigured(): boolean
  postImage(imagePath: string, caption: string, hashtags?: readonly string[]): Promise<PublishResult>
}

export interface PlatformStatus {
  platform: Platform
  name: string
  configured: boolean
}

export const PLATFORM_NAMES: Readonly<Record<Platform, string>> = {
  twitter: "Twitter/X",
  youtube: "YouTube Shorts",
  tiktok: "TikTok",
  instagram: "Instagram Reels",
}

export class PublisherRegistry {
  private readonly publishers = new Map<Platform, Publisher>()

  constructor(publishers: readonly Publisher[] = []) {
    for (const publisher of publishers) {
      if (this.publishers.has(publisher.platform)) {
        throw new Error(`Duplicate publisher for platform: ${publisher.platform}`)
      }
      this.publishers.set(publisher.platform, publisher)
    }
  }

  /** Undefined for platforms nobody implements yet. */
  get(platform: string): Publisher | undefined {
    return isPlatform(platform) ? this.publishers.get(platform) : undefined
  }

  statuses(): PlatformStatus[] {
    return PLATFORMS.map((platform) => ({
      platform,
      name: PLATFORM_NAMES[platform],
      configured: this.publishers.get(platform)?.isConfigured() ?? false,
    }))
  }
}
