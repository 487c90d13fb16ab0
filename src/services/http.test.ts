import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { fetchPage, DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_USER_AGENT } from './http.js'
import type { Logger } from '../utils/logger.js'

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

function htmlResponse(body: string, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(body),
  }
}

/**
 * fetch that only settles when its signal aborts.
 */
function hangingFetch() {
  return vi.fn().mockImplementation(
    (_url: string, options: { signal?: AbortSignal }) =>
      new Promise((_, reject) => {
        options.signal?.addEventListener('abort', () => {
          reject(new DOMException('Aborted', 'AbortError'))
        })
      })
  )
}

describe('fetchPage', () => {
  let log: Logger

  beforeEach(() => {
    vi.useFakeTimers()
    log = createMockLogger()
  })

  afterEach(() => {
    vi.useRealTimers()
    vi.unstubAllGlobals()
  })

  it('defaults to a 10 second timeout', () => {
    expect(DEFAULT_FETCH_TIMEOUT_MS).toBe(10_000)
  })

  it('returns the body on 2xx', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(htmlResponse('<title>Hi</title>')))

    const result = await fetchPage('https://example.com', { logger: log })

    expect(result).toEqual({ ok: true, data: '<title>Hi</title>' })
  })

  it('sends an abort signal and the user agent', async () => {
    const mockFetch = vi.fn().mockResolvedValue(htmlResponse(''))
    vi.stubGlobal('fetch', mockFetch)

    await fetchPage('https://example.com', { logger: log })

    expect(mockFetch).toHaveBeenCalledWith(
      'https://example.com',
      expect.objectContaining({
        signal: expect.any(AbortSignal),
        headers: expect.objectContaining({ 'User-Agent': DEFAULT_USER_AGENT }),
      })
    )
  })

  it('uses a custom user agent', async () => {
    const mockFetch = vi.fn().mockResolvedValue(htmlResponse(''))
    vi.stubGlobal('fetch', mockFetch)

    await fetchPage('https://example.com', { logger: log, userAgent: 'test-agent' })

    expect(mockFetch).toHaveBeenCalledWith(
      'https://example.com',
      expect.objectContaining({ headers: expect.objectContaining({ 'User-Agent': 'test-agent' }) })
    )
  })

  it('returns err on non-2xx status', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(htmlResponse('missing', 404)))

    const result = await fetchPage('https://example.com/gone', { logger: log })

    expect(result).toEqual({ ok: false, error: 'HTTP error: 404' })
    expect(log.warn).toHaveBeenCalledWith(
      'Page fetch returned error status',
      expect.objectContaining({ event: 'page_fetch_status', status: 404 })
    )
  })

  it('returns err on network failure', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')))

    const result = await fetchPage('https://unreachable.example', { logger: log })

    expect(result).toEqual({ ok: false, error: 'fetch failed' })
    expect(log.warn).toHaveBeenCalledWith(
      'Page fetch failed',
      expect.objectContaining({ event: 'page_fetch_error', error: 'fetch failed' })
    )
  })

  it('times out after the configured bound', async () => {
    vi.stubGlobal('fetch', hangingFetch())

    const resultPromise = fetchPage('https://slow.example', { logger: log, timeoutMs: 500 })
    await vi.advanceTimersByTimeAsync(500)
    const result = await resultPromise

    expect(result).toEqual({ ok: false, error: 'Page fetch timeout' })
    expect(log.warn).toHaveBeenCalledWith(
      'Page fetch timeout',
      expect.objectContaining({ event: 'page_fetch_timeout', timeoutMs: 500 })
    )
  })

  it('does not time out before the bound', async () => {
    let resolveFetch: (value: ReturnType<typeof htmlResponse>) => void = () => {}
    vi.stubGlobal(
      'fetch',
      vi.fn().mockImplementation(
        () =>
          new Promise((resolve) => {
            resolveFetch = resolve
          })
      )
    )

    const resultPromise = fetchPage('https://slow.example', { logger: log, timeoutMs: 500 })
    await vi.advanceTimersByTimeAsync(499)
    resolveFetch(htmlResponse('late but fine'))
    const result = await resultPromise

    expect(result).toEqual({ ok: true, data: 'late but fine' })
  })

  it('leaves no timer behind after success', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(htmlResponse('')))

    await fetchPage('https://example.com', { logger: log })

    expect(vi.getTimerCount()).toBe(0)
  })
})
