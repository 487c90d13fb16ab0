import { collectUrls } from '../utils/urls.js'
import { STOCK_COMMAND } from '../handlers/stock.js'

/**
 * Route destinations for message handling.
 */
export type RouteDestination = 'STOCK_HANDLER' | 'LINK_HANDLER' | 'IGNORE'

/**
 * Result of routing a message.
 * `urls` is only populated for LINK_HANDLER.
 */
export interface RouteResult {
  destination: RouteDestination
  urls: string[]
}

export function isStockCommand(text: string): boolean {
  return text.startsWith(STOCK_COMMAND)
}

/**
 * Route a message to the appropriate handler.
 * Pure function - no side effects, easy to test.
 *
 * Routing priority:
 * 1. Starts with `!stock` → STOCK_HANDLER (links in command lines are not enriched)
 * 2. At least one candidate URL → LINK_HANDLER
 * 3. Otherwise → IGNORE
 *
 * @param maxUrls - Cap on candidate URLs kept (0 = no cap)
 */
export function routeMessage(text: string, maxUrls = 0): RouteResult {
  if (isStockCommand(text)) {
    return { destination: 'STOCK_HANDLER', urls: [] }
  }

  const urls = collectUrls(text, maxUrls)
  if (urls.length > 0) {
    return { destination: 'LINK_HANDLER', urls }
  }

  return { destination: 'IGNORE', urls: [] }
}
