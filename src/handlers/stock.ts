/**
 * Stock Handler
 *
 * Handles `!stock SYMBOL` lines by:
 * 1. Validating the command shape (exactly two tokens, else usage reply)
 * 2. Looking up the symbol with the price provider
 * 3. Picking the first tier that has a price: regular → pre-market → after-hours → previous close
 * 4. Phrasing the reply for that tier
 *
 * Always produces exactly one reply. Provider errors become a fixed error reply.
 */

import { logger as defaultLogger, errorMessage, type Logger } from '../utils/logger.js'
import {
  STOCK_USAGE,
  UNKNOWN_CURRENCY,
  formatNoPriceData,
  formatNoQuote,
  formatQuoteReply,
  formatStockError,
} from '../utils/format.js'
import { fetchQuote, type PriceProvider } from '../services/yahooFinance.js'
import {
  PRICE_TIERS,
  type PriceQuote,
  type PriceTier,
  type ProviderQuote,
  type StockHandlerResult,
  type TickerRequest,
} from '../types/handlers.js'

export const STOCK_COMMAND = '!stock'

type TierPriceField = 'regularMarketPrice' | 'preMarketPrice' | 'postMarketPrice' | 'previousClose'

/**
 * ProviderQuote field read for each tier.
 */
export const TIER_PRICE_FIELD = {
  REGULAR: 'regularMarketPrice',
  PRE_MARKET: 'preMarketPrice',
  AFTER_HOURS: 'postMarketPrice',
  PREVIOUS_CLOSE: 'previousClose',
} as const satisfies Record<PriceTier, TierPriceField>

export interface StockContext {
  fetchTimeoutMs: number
  logger?: Logger
  /** Defaults to Yahoo Finance */
  priceProvider?: PriceProvider
}

/**
 * Parse a command line into a TickerRequest.
 * Returns null for any shape other than `!stock SYMBOL`.
 */
export function parseStockCommand(line: string): TickerRequest | null {
  const parts = line.trim().split(/\s+/)
  if (parts.length !== 2) return null
  return { symbol: parts[1].toUpperCase() }
}

/**
 * Resolve the first tier with a price. Null when no tier has one.
 */
export function selectPriceQuote(symbol: string, quote: ProviderQuote): PriceQuote | null {
  for (const tier of PRICE_TIERS) {
    const price = quote[TIER_PRICE_FIELD[tier]]
    if (price !== undefined) {
      return {
        companyName: quote.displayName ?? symbol,
        tickerSymbol: symbol,
        currencyCode: quote.currency ?? UNKNOWN_CURRENCY,
        priceValue: price,
        priceTier: tier,
      }
    }
  }
  return null
}

/**
 * Handle a `!stock` line. Never throws.
 */
export async function handleStockCommand(line: string, context: StockContext): Promise<StockHandlerResult> {
  const log = context.logger ?? defaultLogger
  const request = parseStockCommand(line)

  if (request === null) {
    log.debug('Stock command malformed', { event: 'stock_usage', tokens: line.trim().split(/\s+/).length })
    return { reply: STOCK_USAGE, symbol: null, quote: null }
  }

  const { symbol } = request
  const provider = context.priceProvider ?? fetchQuote

  log.info('Stock lookup requested', { event: 'stock_lookup', symbol })

  let lookup: Awaited<ReturnType<PriceProvider>>
  try {
    lookup = await provider(symbol, { timeoutMs: context.fetchTimeoutMs, logger: log })
  } catch (error) {
    log.error('Price provider threw', { event: 'stock_provider_error', symbol, error: errorMessage(error) })
    return { reply: formatStockError(symbol), symbol, quote: null }
  }

  if (!lookup.ok) {
    log.error('Price provider failed', { event: 'stock_provider_error', symbol, error: lookup.error })
    return { reply: formatStockError(symbol), symbol, quote: null }
  }

  if (lookup.data === null) {
    return { reply: formatNoQuote(symbol), symbol, quote: null }
  }

  const quote = selectPriceQuote(symbol, lookup.data)

  if (quote === null) {
    log.info('No price in any tier', { event: 'stock_no_price', symbol })
    return { reply: formatNoPriceData(symbol), symbol, quote: null }
  }

  log.info('Stock quote resolved', {
    event: 'stock_quote_resolved',
    symbol,
    tier: quote.priceTier,
    price: quote.priceValue,
  })

  return { reply: formatQuoteReply(quote), symbol, quote }
}
