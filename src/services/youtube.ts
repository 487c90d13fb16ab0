import { ok, err, type Result } from '../utils/result.js'
import { logger as defaultLogger } from '../utils/logger.js'
import { fetchPage, type FetchPageOptions } from './http.js'
import { parsePageMetadata } from './html.js'

/**
 * Watch page used to resolve a video title. Public page - no API key needed.
 */
export const YOUTUBE_WATCH_URL = 'https://www.youtube.com/watch?v='

/**
 * Video pages are titled "<video title> - YouTube".
 */
const SITE_SUFFIX = /\s*-\s*YouTube\s*$/

export function buildWatchUrl(videoId: string): string {
  return `${YOUTUBE_WATCH_URL}${encodeURIComponent(videoId)}`
}

export function stripSiteSuffix(title: string): string {
  return title.replace(SITE_SUFFIX, '').trim()
}

/**
 * Fetch the watch page for `videoId` and return its title without the site suffix.
 * Returns Result type - never throws.
 */
export async function fetchVideoTitle(
  videoId: string,
  options: FetchPageOptions = {}
): Promise<Result<string>> {
  const log = options.logger ?? defaultLogger
  const page = await fetchPage(buildWatchUrl(videoId), options)

  if (!page.ok) {
    return err(page.error)
  }

  const { title } = parsePageMetadata(page.data)
  const cleaned = title === null ? '' : stripSiteSuffix(title)

  if (cleaned === '') {
    log.warn('Video page has no title', {
      event: 'video_title_missing',
      videoId,
    })
    return err('Video title not found')
  }

  log.debug('Video title fetched', {
    event: 'video_title_fetched',
    videoId,
    title: cleaned,
  })

  return ok(cleaned)
}
