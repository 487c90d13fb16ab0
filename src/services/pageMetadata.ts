import { ok, err, type Result } from '../utils/result.js'
import { logger as defaultLogger } from '../utils/logger.js'
import { NO_DESCRIPTION, NO_TITLE } from '../utils/format.js'
import { fetchPage, type FetchPageOptions } from './http.js'
import { parsePageMetadata } from './html.js'

/**
 * Title and description of a generic page, with fallbacks applied.
 */
export interface PageSummary {
  title: string
  description: string
}

/**
 * Fetch `url` and summarise it from its <title> and meta description.
 * Missing markup falls back to NO_TITLE / NO_DESCRIPTION; only fetch failures are err().
 */
export async function fetchPageSummary(
  url: string,
  options: FetchPageOptions = {}
): Promise<Result<PageSummary>> {
  const log = options.logger ?? defaultLogger
  const page = await fetchPage(url, options)

  if (!page.ok) {
    return err(page.error)
  }

  const metadata = parsePageMetadata(page.data)
  const summary: PageSummary = {
    title: metadata.title ?? NO_TITLE,
    description: metadata.description ?? NO_DESCRIPTION,
  }

  log.debug('Page summary built', {
    event: 'page_summary_built',
    url,
    hasTitle: metadata.title !== null,
    hasDescription: metadata.description !== null,
  })

  return ok(summary)
}
