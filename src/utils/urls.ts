/**
 * Link detection for channel messages.
 * Pure string functions - no network, no parsing beyond substring checks.
 */

/**
 * Tokens starting with this prefix are forwarded as candidate URLs.
 * Matches both http and https; the rest of the token is not validated.
 */
export const URL_PREFIX = 'http'

/**
 * Hosts whose links go through the video-title strategy.
 */
export const VIDEO_HOST_MARKERS = ['youtube.com', 'youtu.be'] as const

/**
 * Marker table for video id extraction. First matching marker wins;
 * the id runs from the marker to `endMarker` or the end of the URL.
 */
export interface VideoIdMarker {
  marker: string
  endMarker: string
}

export const VIDEO_ID_MARKERS: readonly VideoIdMarker[] = [
  { marker: 'watch?v=', endMarker: '&' },
  { marker: '/shorts/', endMarker: '?' },
  { marker: 'youtu.be/', endMarker: '?' },
]

/**
 * Lazily yield candidate URLs in the order they appear.
 * Duplicates are kept; an empty or whitespace-only message yields nothing.
 */
export function* extractUrls(text: string): Generator<string, void, undefined> {
  for (const token of text.split(/\s+/)) {
    if (token.startsWith(URL_PREFIX)) {
      yield token
    }
  }
}

/**
 * Materialise candidate URLs, keeping at most `limit` of them (0 = no limit).
 */
export function collectUrls(text: string, limit = 0): string[] {
  const urls: string[] = []
  for (const url of extractUrls(text)) {
    if (limit > 0 && urls.length >= limit) break
    urls.push(url)
  }
  return urls
}

export function isVideoUrl(url: string): boolean {
  return VIDEO_HOST_MARKERS.some((host) => url.includes(host))
}

/**
 * Take the text between `marker` and the next `endMarker` (or the end).
 * Returns null when the marker is missing or the slice is empty.
 */
export function sliceAfterMarker(url: string, { marker, endMarker }: VideoIdMarker): string | null {
  const start = url.indexOf(marker)
  if (start === -1) return null

  const rest = url.slice(start + marker.length)
  const end = rest.indexOf(endMarker)
  const id = end === -1 ? rest : rest.slice(0, end)
  return id === '' ? null : id
}

/**
 * Drop a `#fragment`; it never belongs to the video id.
 */
export function stripFragment(url: string): string {
  const hash = url.indexOf('#')
  return hash === -1 ? url : url.slice(0, hash)
}

/**
 * Extract a video id using the marker table.
 *
 * Examples:
 * - ".../watch?v=ABC123&t=5" → "ABC123"
 * - ".../shorts/XYZ789?feature=share" → "XYZ789"
 * - "https://youtu.be/Q1W2E3" → "Q1W2E3"
 * - "https://youtu.be/Q1W2E3#t=30" → "Q1W2E3"
 * - "https://www.youtube.com/@channel" → null
 */
export function extractVideoId(
  url: string,
  markers: readonly VideoIdMarker[] = VIDEO_ID_MARKERS
): string | null {
  const target = stripFragment(url)
  const match = markers.find(({ marker }) => target.includes(marker))
  return match ? sliceAfterMarker(target, match) : null
}
