import { z } from "zod"

export const DEFAULT_CAPTION = "Check this out!"

export const TWEET_MAX_LENGTH = 280

const CaptionSourceSchema = z.object({
  tweet_text: z.string().optional(),
  hook_text: z.string().optional(),
  cta_text: z.string().optional(),
})

/**
 * Caption for a post: the custom caption, else the script's tweet text,
 * else hook and call to action, else the hook alone, else a stock line.
 */
export function buildCaption(scriptData: unknown, customCaption?: string | null): string {
  if (customCaption) return customCaption

  const parsed = CaptionSourceSchema.safeParse(scriptData ?? {})
  const source = parsed.success ? parsed.data : {}

  if (source.tweet_text) return source.tweet_text
  const hook = source.hook_text ?? ""
  if (source.cta_text) return `${hook}\n\n${source.cta_text}`
  return hook || DEFAULT_CAPTION
}

const ELLIPSIS = "..."
const TAG_SEPARATOR = "\n\n"

/** Length as the platform counts it: code points, not UTF-16 units. */
export function tweetLength(text: string): number {
  return Array.from(text).length
}

function truncateCodePoints(text: string, max: number): string {
  return Array.from(text).slice(0, Math.max(0, max)).join("")
}

/** Leading hashtags whose joined form fits `budget`; the rest are dropped. */
function fitHashtags(tags: readonly string[], budget: number): string {
  let kept = ""
  for (const tag of tags) {
    const next = kept ? `${kept} ${tag}` : tag
    if (tweetLength(next) > budget) break
    kept = next
  }
  return kept
}

/**
 * Tweet body: caption plus hashtags after a blank line, at most
 * `TWEET_MAX_LENGTH` code points. Over the limit, trailing hashtags that
 * cannot fit are dropped, then the caption is cut and ends in "...".
 */
export function composeTweet(caption: string, hashtags: readonly string[] = []): string {
  const normalised = hashtags.map((tag) => `#${tag.replace(/^#+/, "")}`)
  const allTags = normalised.join(" ")
  const full = allTags ? `${caption}${TAG_SEPARATOR}${allTags}` : caption
  if (tweetLength(full) <= TWEET_MAX_LENGTH) return full

  const tags = fitHashtags(normalised, TWEET_MAX_LENGTH - ELLIPSIS.length - TAG_SEPARATOR.length)
  if (tags) {
    const untrimmed = `${caption}${TAG_SEPARATOR}${tags}`
    if (tweetLength(untrimmed) <= TWEET_MAX_LENGTH) return untrimmed
  }

  const suffix = tags ? `${ELLIPSIS}${TAG_SEPARATOR}${tags}` : ELLIPSIS
  return `${truncateCodePoints(caption, TWEET_MAX_LENGTH - tweetLength(suffix))}${suffix}`
}
