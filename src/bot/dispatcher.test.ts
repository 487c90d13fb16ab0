import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest'

vi.mock('../handlers/link.js', () => ({
  enrichLink: vi.fn(),
}))

vi.mock('../services/yahooFinance.js', () => ({
  fetchQuote: vi.fn(),
}))

import { dispatchMessage, type DispatchContext, type ReplySender } from './dispatcher.js'
import { enrichLink } from '../handlers/link.js'
import type { PriceProvider } from '../services/yahooFinance.js'
import type { InboundMessage } from '../types/handlers.js'
import type { Logger } from '../utils/logger.js'

const mockEnrichLink = vi.mocked(enrichLink)

function createMockLogger(): Logger {
  const log: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => log,
  }
  return log
}

function message(rawText: string): InboundMessage {
  return { channelName: '#testing', senderText: 'alice', rawText }
}

describe('dispatchMessage', () => {
  let reply: Mock<ReplySender>
  let provider: Mock<PriceProvider>
  let log: Logger
  let context: DispatchContext

  beforeEach(() => {
    vi.clearAllMocks()
    reply = vi.fn<ReplySender>()
    provider = vi.fn<PriceProvider>()
    log = createMockLogger()
    context = { reply, fetchTimeoutMs: 3000, priceProvider: provider, logger: log }
  })

  it('sends nothing for messages without links or commands', async () => {
    const summary = await dispatchMessage(message('just chatting'), context)

    expect(summary).toEqual({ destination: 'IGNORE', repliesSent: 0, skipped: 0 })
    expect(reply).not.toHaveBeenCalled()
    expect(mockEnrichLink).not.toHaveBeenCalled()
  })

  it('answers a stock command with exactly one reply', async () => {
    provider.mockResolvedValue({
      ok: true,
      data: { symbol: 'AAPL', displayName: 'Apple Inc.', currency: 'USD', regularMarketPrice: 189.84 },
    })

    const summary = await dispatchMessage(message('!stock aapl'), context)

    expect(summary).toEqual({ destination: 'STOCK_HANDLER', repliesSent: 1, skipped: 0 })
    expect(reply).toHaveBeenCalledTimes(1)
    expect(reply).toHaveBeenCalledWith('#testing', 'Apple Inc. (AAPL) is currently trading at 189.84 USD')
  })

  it('does not enrich links on a stock command line', async () => {
    provider.mockResolvedValue({ ok: true, data: null })

    await dispatchMessage(message('!stock AAPL https://example.com'), context)

    expect(mockEnrichLink).not.toHaveBeenCalled()
    expect(reply).toHaveBeenCalledWith('#testing', 'Usage: !stock TICKER')
  })

  it('sends one reply per enriched link', async () => {
    mockEnrichLink.mockImplementation(async (url) => ({ kind: 'ok', url, text: `Page Info: ${url}` }))

    const summary = await dispatchMessage(message('https://a.example and https://b.example'), context)

    expect(summary).toEqual({ destination: 'LINK_HANDLER', repliesSent: 2, skipped: 0 })
    expect(reply).toHaveBeenCalledWith('#testing', 'Page Info: https://a.example')
    expect(reply).toHaveBeenCalledWith('#testing', 'Page Info: https://b.example')
  })

  it('passes fetch settings to the enricher', async () => {
    mockEnrichLink.mockResolvedValue({ kind: 'skipped', url: 'https://a.example', reason: 'HTTP error: 500' })

    await dispatchMessage(message('https://a.example'), { ...context, userAgent: 'test-agent' })

    expect(mockEnrichLink).toHaveBeenCalledWith('https://a.example', {
      fetchTimeoutMs: 3000,
      userAgent: 'test-agent',
      logger: log,
    })
  })

  it('keeps sending when one link fails', async () => {
    mockEnrichLink.mockImplementation(async (url) =>
      url.includes('bad')
        ? { kind: 'skipped', url, reason: 'Page fetch timeout' }
        : { kind: 'ok', url, text: `Page Info: ${url}` }
    )

    const summary = await dispatchMessage(
      message('https://one.example https://bad.example https://two.example'),
      context
    )

    expect(summary).toEqual({ destination: 'LINK_HANDLER', repliesSent: 2, skipped: 1 })
    expect(reply).toHaveBeenCalledTimes(2)
  })

  it('enriches duplicate links once per occurrence', async () => {
    mockEnrichLink.mockImplementation(async (url) => ({ kind: 'ok', url, text: 'Page Info: same' }))

    const summary = await dispatchMessage(message('https://a.example https://a.example'), context)

    expect(mockEnrichLink).toHaveBeenCalledTimes(2)
    expect(summary.repliesSent).toBe(2)
  })

  it('honours the per-message link cap', async () => {
    mockEnrichLink.mockImplementation(async (url) => ({ kind: 'ok', url, text: url }))

    await dispatchMessage(message('https://a.example https://b.example https://c.example'), {
      ...context,
      maxUrlsPerMessage: 1,
    })

    expect(mockEnrichLink).toHaveBeenCalledTimes(1)
    expect(mockEnrichLink).toHaveBeenCalledWith('https://a.example', expect.anything())
  })

  it('starts every enrichment before any finishes', async () => {
    const started: string[] = []
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })
    mockEnrichLink.mockImplementation(async (url) => {
      started.push(url)
      await gate
      return { kind: 'ok', url, text: url }
    })

    const pending = dispatchMessage(message('https://a.example https://b.example'), context)
    await vi.waitFor(() => expect(started).toHaveLength(2))
    release()
    const summary = await pending

    expect(summary.repliesSent).toBe(2)
  })

  it('flattens multi-line replies to one line', async () => {
    mockEnrichLink.mockResolvedValue({
      kind: 'ok',
      url: 'https://a.example',
      text: 'Page Info: Title: A\r\nB, Description: C',
    })

    await dispatchMessage(message('https://a.example'), context)

    expect(reply).toHaveBeenCalledWith('#testing', 'Page Info: Title: A B, Description: C')
  })

  it('sends a long page summary as one capped line', async () => {
    mockEnrichLink.mockResolvedValue({
      kind: 'ok',
      url: 'https://a.example',
      text: `Page Info: Title: T, Description: ${'word '.repeat(120)}`,
    })

    const summary = await dispatchMessage(message('https://a.example'), context)

    expect(summary.repliesSent).toBe(1)
    expect(reply).toHaveBeenCalledTimes(1)
    expect(reply).toHaveBeenCalledWith(
      '#testing',
      `Page Info: Title: T, Description: ${'word '.repeat(62)}wor…`
    )
  })

  it('caps multi-byte replies by bytes', async () => {
    mockEnrichLink.mockResolvedValue({
      kind: 'ok',
      url: 'https://a.example',
      text: `YouTube Title: ${'日本語'.repeat(60)}`,
    })

    await dispatchMessage(message('https://a.example'), context)

    expect(reply).toHaveBeenCalledTimes(1)
    const sent = String(reply.mock.calls[0][1])
    expect(Buffer.byteLength(sent, 'utf8')).toBeLessThanOrEqual(350)
    expect(sent).toBe(`YouTube Title: ${'日本語'.repeat(60).slice(0, 110)}…`)
  })

  it('counts a failed send as not sent', async () => {
    reply.mockRejectedValue(new Error('not connected'))
    mockEnrichLink.mockResolvedValue({ kind: 'ok', url: 'https://a.example', text: 'Page Info: x' })

    const summary = await dispatchMessage(message('https://a.example'), context)

    expect(summary.repliesSent).toBe(0)
    expect(log.error).toHaveBeenCalledWith('Reply send failed', {
      event: 'reply_send_error',
      channel: '#testing',
      error: 'not connected',
    })
  })
})
