/**
 * Handler Result Types
 *
 * Shapes passed between the router, the handlers and the dispatcher.
 */

/**
 * One message received in the joined channel.
 */
export interface InboundMessage {
  readonly channelName: string
  readonly senderText: string
  readonly rawText: string
}

/**
 * Outcome of a single link enrichment.
 * Only `ok` reaches the channel; `skipped` keeps the reason for logs and tests.
 */
export type EnrichmentOutcome =
  | { kind: 'ok'; url: string; text: string }
  | { kind: 'skipped'; url: string; reason: string }

export function enriched(url: string, text: string): EnrichmentOutcome {
  return { kind: 'ok', url, text }
}

export function skipped(url: string, reason: string): EnrichmentOutcome {
  return { kind: 'skipped', url, reason }
}

/**
 * A well-formed `!stock SYMBOL` request. Symbol is uppercased.
 */
export interface TickerRequest {
  symbol: string
}

/**
 * Price fallback tiers, in the order they are tried.
 */
export const PRICE_TIERS = ['REGULAR', 'PRE_MARKET', 'AFTER_HOURS', 'PREVIOUS_CLOSE'] as const

export type PriceTier = (typeof PRICE_TIERS)[number]

/**
 * Typed view of a provider response, one optional field per tier.
 * Filled in by the provider adapter; nothing downstream reads raw provider keys.
 */
export interface ProviderQuote {
  symbol: string
  displayName?: string
  currency?: string
  regularMarketPrice?: number
  preMarketPrice?: number
  postMarketPrice?: number
  previousClose?: number
}

/**
 * A resolved price for one tier. Built per request, never cached.
 */
export interface PriceQuote {
  companyName: string
  tickerSymbol: string
  currencyCode: string
  priceValue: number
  priceTier: PriceTier
}

/**
 * Result of handling one `!stock` line. `reply` is always sent.
 */
export interface StockHandlerResult {
  reply: string
  symbol: string | null
  quote: PriceQuote | null
}
