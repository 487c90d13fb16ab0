/**
 * Reply Formatting
 *
 * Every string the bot sends goes through one of these builders.
 * Channel replies are single lines: the transport splits on line breaks
 * and on anything longer than its line length.
 */

import type { PriceQuote } from '../types/handlers.js'

export const VIDEO_REPLY_PREFIX = 'YouTube Title: '
export const PAGE_REPLY_PREFIX = 'Page Info: '

export const NO_TITLE = 'No Title'
export const NO_DESCRIPTION = 'No Description'
export const UNKNOWN_CURRENCY = 'N/A'

export const STOCK_USAGE = 'Usage: !stock TICKER'

/**
 * UTF-8 budget for one reply's text. A 512-byte IRC line also carries the
 * sender prefix, `PRIVMSG <channel> :` and CRLF; the client splits long
 * text by UTF-16 length, which never exceeds the UTF-8 length.
 */
export const MAX_REPLY_BYTES = 350

export const TRUNCATION_MARK = '…'

export function utf8Length(text: string): number {
  return Buffer.byteLength(text, 'utf8')
}

/**
 * Collapse CR/LF and runs of whitespace into single spaces.
 */
export function toSingleLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

/**
 * Cut `text` to at most `maxBytes` UTF-8 bytes, ending in TRUNCATION_MARK.
 * Cuts fall between code points, never inside one.
 */
export function truncateReply(text: string, maxBytes: number = MAX_REPLY_BYTES): string {
  if (utf8Length(text) <= maxBytes) return text

  const budget = maxBytes - utf8Length(TRUNCATION_MARK)
  let kept = ''
  let used = 0
  for (const char of text) {
    const size = utf8Length(char)
    if (used + size > budget) break
    kept += char
    used += size
  }
  return `${kept.trimEnd()}${TRUNCATION_MARK}`
}

/**
 * Final shape of every outgoing line: one line, within the byte budget.
 */
export function toReplyLine(text: string): string {
  return truncateReply(toSingleLine(text))
}

export function formatVideoReply(title: string): string {
  return toSingleLine(`${VIDEO_REPLY_PREFIX}${title}`)
}

export function formatPageReply(title: string, description: string): string {
  return toSingleLine(`${PAGE_REPLY_PREFIX}Title: ${title}, Description: ${description}`)
}

/**
 * Render a price the way a quote feed prints it: no rounding, no grouping.
 * 189.84 → "189.84", 200 → "200"
 */
export function formatPrice(price: number): string {
  return String(price)
}

/**
 * Phrase a quote according to the tier it was resolved from.
 */
export function formatQuoteReply(quote: PriceQuote): string {
  const head = `${quote.companyName} (${quote.tickerSymbol})`
  const amount = `${formatPrice(quote.priceValue)} ${quote.currencyCode}`

  switch (quote.priceTier) {
    case 'REGULAR':
      return `${head} is currently trading at ${amount}`
    case 'PRE_MARKET':
      return `${head} is trading at ${amount} in pre-market trading.`
    case 'AFTER_HOURS':
      return `${head} is trading at ${amount} in after-hours trading.`
    case 'PREVIOUS_CLOSE':
      return `${head} closed at ${amount} on the last trading day.`
  }
}

export function formatNoPriceData(symbol: string): string {
  return `No price data available for ticker: ${symbol}`
}

export function formatNoQuote(symbol: string): string {
  return `Could not retrieve data for ticker: ${symbol}`
}

export function formatStockError(symbol: string): string {
  return `Error fetching data for ticker: ${symbol}. Please try again later.`
}
