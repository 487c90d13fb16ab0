/**
 * Link Handler
 *
 * Turns one candidate URL into at most one reply:
 * 1. Classify: video host → video-title strategy, anything else → page strategy
 * 2. Video: extract the id from the marker table, fetch the watch page title
 * 3. Page: fetch the URL, summarise title + meta description
 *
 * Failures never leave this module as exceptions - they become `skipped` outcomes.
 */

import { logger as defaultLogger, errorMessage, type Logger } from '../utils/logger.js'
import { extractVideoId, isVideoUrl } from '../utils/urls.js'
import { formatPageReply, formatVideoReply } from '../utils/format.js'
import { fetchVideoTitle } from '../services/youtube.js'
import { fetchPageSummary } from '../services/pageMetadata.js'
import { enriched, skipped, type EnrichmentOutcome } from '../types/handlers.js'

export type LinkStrategy = 'video' | 'page'

export interface EnrichmentContext {
  fetchTimeoutMs: number
  userAgent?: string
  logger?: Logger
}

export function classifyLink(url: string): LinkStrategy {
  return isVideoUrl(url) ? 'video' : 'page'
}

async function enrichVideoLink(url: string, context: EnrichmentContext, log: Logger): Promise<EnrichmentOutcome> {
  const videoId = extractVideoId(url)

  if (videoId === null) {
    // Channel pages, playlists etc. - not an error
    log.debug('No video id in link', { event: 'video_id_missing', url })
    return skipped(url, 'No video id in URL')
  }

  const title = await fetchVideoTitle(videoId, {
    timeoutMs: context.fetchTimeoutMs,
    userAgent: context.userAgent,
    logger: log,
  })

  if (!title.ok) {
    log.warn('Video title unavailable', { event: 'video_enrichment_failed', url, videoId, error: title.error })
    return skipped(url, title.error)
  }

  return enriched(url, formatVideoReply(title.data))
}

async function enrichPageLink(url: string, context: EnrichmentContext, log: Logger): Promise<EnrichmentOutcome> {
  const summary = await fetchPageSummary(url, {
    timeoutMs: context.fetchTimeoutMs,
    userAgent: context.userAgent,
    logger: log,
  })

  if (!summary.ok) {
    log.warn('Page summary unavailable', { event: 'page_enrichment_failed', url, error: summary.error })
    return skipped(url, summary.error)
  }

  return enriched(url, formatPageReply(summary.data.title, summary.data.description))
}

/**
 * Enrich a single candidate URL.
 * Always resolves; the outcome says whether anything should be sent.
 */
export async function enrichLink(url: string, context: EnrichmentContext): Promise<EnrichmentOutcome> {
  const strategy = classifyLink(url)
  const log = (context.logger ?? defaultLogger).child({ strategy })

  let outcome: EnrichmentOutcome
  try {
    outcome =
      strategy === 'video'
        ? await enrichVideoLink(url, context, log)
        : await enrichPageLink(url, context, log)
  } catch (error) {
    log.error('Link enrichment threw', {
      event: 'link_enrichment_error',
      url,
      error: errorMessage(error),
    })
    return skipped(url, errorMessage(error))
  }

  if (outcome.kind === 'ok') {
    log.debug('Link enriched', {
      event: 'link_enriched',
      url,
      reply: outcome.text,
    })
  }

  return outcome
}
