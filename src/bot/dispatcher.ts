/**
 * Message Dispatcher
 *
 * Runs the routed handler for one inbound channel message and sends its replies.
 * Link enrichments for the same message run concurrently; each reply goes out as
 * soon as its URL resolves, so reply order may differ from link order.
 * Every reply is flattened and cut to one IRC line before sending.
 */

import { logger as defaultLogger, errorMessage, type Logger } from '../utils/logger.js'
import { toReplyLine } from '../utils/format.js'
import { enrichLink } from '../handlers/link.js'
import { handleStockCommand } from '../handlers/stock.js'
import type { PriceProvider } from '../services/yahooFinance.js'
import type { InboundMessage } from '../types/handlers.js'
import { routeMessage, type RouteDestination } from './router.js'

/**
 * Send one line to a channel. May be sync or async; a throw counts as a failed send.
 */
export type ReplySender = (channel: string, text: string) => void | Promise<void>

export interface DispatchContext {
  reply: ReplySender
  fetchTimeoutMs: number
  /** 0 = no cap */
  maxUrlsPerMessage?: number
  userAgent?: string
  priceProvider?: PriceProvider
  logger?: Logger
}

export interface DispatchSummary {
  destination: RouteDestination
  repliesSent: number
  skipped: number
}

async function sendReply(
  message: InboundMessage,
  text: string,
  context: DispatchContext,
  log: Logger
): Promise<boolean> {
  try {
    await context.reply(message.channelName, toReplyLine(text))
    return true
  } catch (error) {
    log.error('Reply send failed', {
      event: 'reply_send_error',
      channel: message.channelName,
      error: errorMessage(error),
    })
    return false
  }
}

/**
 * Dispatch one message. Never throws.
 */
export async function dispatchMessage(
  message: InboundMessage,
  context: DispatchContext
): Promise<DispatchSummary> {
  const log = (context.logger ?? defaultLogger).child({ channel: message.channelName })
  const route = routeMessage(message.rawText, context.maxUrlsPerMessage ?? 0)

  log.debug('Message routed', {
    event: 'message_routed',
    destination: route.destination,
    sender: message.senderText,
    urlCount: route.urls.length,
  })

  if (route.destination === 'STOCK_HANDLER') {
    const result = await handleStockCommand(message.rawText, {
      fetchTimeoutMs: context.fetchTimeoutMs,
      priceProvider: context.priceProvider,
      logger: log,
    })
    const sent = await sendReply(message, result.reply, context, log)
    return { destination: route.destination, repliesSent: sent ? 1 : 0, skipped: 0 }
  }

  if (route.destination === 'LINK_HANDLER') {
    let repliesSent = 0
    let skippedCount = 0

    // Each URL settles on its own; one failure cannot reject the batch
    await Promise.all(
      route.urls.map(async (url) => {
        const outcome = await enrichLink(url, {
          fetchTimeoutMs: context.fetchTimeoutMs,
          userAgent: context.userAgent,
          logger: log,
        })

        if (outcome.kind === 'skipped') {
          skippedCount++
          return
        }

        if (await sendReply(message, outcome.text, context, log)) {
          repliesSent++
        }
      })
    )

    log.info('Links processed', {
      event: 'links_processed',
      urlCount: route.urls.length,
      repliesSent,
      skipped: skippedCount,
    })

    return { destination: route.destination, repliesSent, skipped: skippedCount }
  }

  return { destination: 'IGNORE', repliesSent: 0, skipped: 0 }
}
