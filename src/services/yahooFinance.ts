import { z } from 'zod'
import yahooFinance from 'yahoo-finance2'
import { ok, err, toResult, type Result } from '../utils/result.js'
import { logger as defaultLogger, type Logger } from '../utils/logger.js'
import { withTimeout } from '../utils/timeout.js'
import type { ProviderQuote } from '../types/handlers.js'

// The client prints its survey notice with console.log on first use
yahooFinance.suppressNotices(['yahooSurvey'])

/**
 * Timeout for quote lookups in milliseconds. Overridden by FETCH_TIMEOUT_MS.
 */
export const QUOTE_TIMEOUT_MS = 10_000

/**
 * Zod schema for the subset of the Yahoo Finance quote we read.
 * Yahoo omits or nulls fields that do not apply to the current session.
 */
const YahooQuoteSchema = z.object({
  symbol: z.string(),
  longName: z.string().nullish(),
  shortName: z.string().nullish(),
  currency: z.string().nullish(),
  regularMarketPrice: z.number().nullish(),
  preMarketPrice: z.number().nullish(),
  postMarketPrice: z.number().nullish(),
  regularMarketPreviousClose: z.number().nullish(),
})

export type YahooQuoteResponse = z.infer<typeof YahooQuoteSchema>

export interface QuoteLookupOptions {
  timeoutMs?: number
  logger?: Logger
}

/**
 * A price source. Resolves ok(null) when the provider knows nothing about the symbol.
 */
export type PriceProvider = (
  symbol: string,
  options?: QuoteLookupOptions
) => Promise<Result<ProviderQuote | null>>

/**
 * Map the validated Yahoo response onto the tiered ProviderQuote fields.
 */
export function toProviderQuote(raw: YahooQuoteResponse): ProviderQuote {
  return {
    symbol: raw.symbol,
    displayName: raw.longName ?? raw.shortName ?? undefined,
    currency: raw.currency ?? undefined,
    regularMarketPrice: raw.regularMarketPrice ?? undefined,
    preMarketPrice: raw.preMarketPrice ?? undefined,
    postMarketPrice: raw.postMarketPrice ?? undefined,
    previousClose: raw.regularMarketPreviousClose ?? undefined,
  }
}

/**
 * Look up a quote on Yahoo Finance.
 * Returns Result type - never throws.
 */
export async function fetchQuote(
  symbol: string,
  options: QuoteLookupOptions = {}
): Promise<Result<ProviderQuote | null>> {
  const timeoutMs = options.timeoutMs ?? QUOTE_TIMEOUT_MS
  const log = options.logger ?? defaultLogger
  const startTime = Date.now()

  const response = await toResult(withTimeout(yahooFinance.quote(symbol), timeoutMs, 'Quote lookup'))
  const latencyMs = Date.now() - startTime

  if (!response.ok) {
    log.error('Quote lookup failed', {
      event: 'quote_lookup_error',
      symbol,
      error: response.error,
      latencyMs,
    })
    return err(response.error)
  }

  if (response.data === undefined || response.data === null) {
    log.info('Quote lookup returned nothing', {
      event: 'quote_not_found',
      symbol,
      latencyMs,
    })
    return ok(null)
  }

  const parsed = YahooQuoteSchema.safeParse(response.data)

  if (!parsed.success) {
    log.error('Quote response validation failed', {
      event: 'quote_validation_error',
      symbol,
      error: parsed.error.message,
      latencyMs,
    })
    return err('Invalid quote response format')
  }

  const quote = toProviderQuote(parsed.data)

  log.debug('Quote fetched', {
    event: 'quote_fetched',
    ...quote,
    latencyMs,
  })

  return ok(quote)
}
