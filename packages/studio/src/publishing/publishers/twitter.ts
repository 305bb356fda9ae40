import { access } from "node:fs/promises"

import { TwitterApi } from "twitter-api-v2"

import type { TwitterCredentials } from "../../config.js"
import { ConfigurationError } from "../../errors.js"
import { composeTweet } from "../caption.js"
import type { Publisher, PublishResult } from "./registry.js"

/** The two calls a post needs; injected in tests. */
export interface TweetClient {
  uploadMedia(imagePath: string): Promise<string>
  tweet(text: string, mediaId: string): Promise<string>
}

export function createTweetClient(credentials: TwitterCredentials): TweetClient {
  const api = new TwitterApi({
    appKey: credentials.apiKey,
    appSecret: credentials.apiSecret,
    accessToken: credentials.accessToken,
    accessSecret: credentials.accessTokenSecret,
  })
  return {
    // media upload still goes through v1.1
    uploadMedia: (imagePath) => api.v1.uploadMedia(imagePath),
    tweet: async (text, mediaId) => {
      const response = await api.v2.tweet(text, { media: { media_ids: [mediaId] } })
      return response.data.id
    },
  }
}

export class TwitterPublisher implements Publisher {
  readonly platform = "twitter" as const
  private readonly client: TweetClient | undefined

  constructor(credentials: TwitterCredentials | undefined, client?: TweetClient) {
    this.client = client ?? (credentials ? createTweetClient(credentials) : undefined)
  }

  isConfigured(): boolean {
    return this.client !== undefined
  }

  async postImage(
    imagePath: string,
    caption: string,
    hashtags?: readonly string[],
  ): Promise<PublishResult> {
    if (!this.client) {
      throw new ConfigurationError("Twitter is not configured. Set the TWITTER_* credentials.")
    }

    try {
      await access(imagePath)
    } catch {
      throw new Error(`Image not found: ${imagePath}`)
    }

    const mediaId = await this.client.uploadMedia(imagePath)
    const postId = await this.client.tweet(composeTweet(caption, hashtags), mediaId)
    return { postId, url: `https://twitter.com/i/status/${postId}` }
  }
}
