import { ok, err, type Result } from '../utils/result.js'
import { logger as defaultLogger, errorMessage, type Logger } from '../utils/logger.js'

/**
 * Default timeout for page fetches in milliseconds.
 * Overridden by FETCH_TIMEOUT_MS.
 */
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; channel-relay-bot/1.0)'

export interface FetchPageOptions {
  timeoutMs?: number
  userAgent?: string
  logger?: Logger
}

/**
 * Fetch a page body as text.
 * Returns Result type - never throws. Non-2xx, timeout and network errors are all err().
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<Result<string>> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
  const log = options.logger ?? defaultLogger
  const startTime = Date.now()
  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      redirect: 'follow',
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
      },
    })

    if (!response.ok) {
      clearTimeout(timeoutId)
      log.warn('Page fetch returned error status', {
        event: 'page_fetch_status',
        url,
        status: response.status,
        latencyMs: Date.now() - startTime,
      })
      return err(`HTTP error: ${response.status}`)
    }

    // Body read stays under the same deadline
    const body = await response.text()
    clearTimeout(timeoutId)

    log.debug('Page fetched', {
      event: 'page_fetched',
      url,
      status: response.status,
      bytes: body.length,
      latencyMs: Date.now() - startTime,
    })

    return ok(body)
  } catch (error) {
    clearTimeout(timeoutId)
    const latencyMs = Date.now() - startTime

    if (error instanceof Error && error.name === 'AbortError') {
      log.warn('Page fetch timeout', {
        event: 'page_fetch_timeout',
        url,
        latencyMs,
        timeoutMs,
      })
      return err('Page fetch timeout')
    }

    log.warn('Page fetch failed', {
      event: 'page_fetch_error',
      url,
      error: errorMessage(error),
      latencyMs,
    })
    return err(errorMessage(error))
  }
}
