/**
 * HTML metadata extraction.
 * Reads only what the enrichers need: the document title and the meta description.
 */

import * as cheerio from 'cheerio'

export interface PageMetadata {
  /** Trimmed <title> text, null when missing or empty */
  title: string | null
  /** Trimmed <meta name="description"> content, null when missing or empty */
  description: string | null
}

function clean(value: string | undefined): string | null {
  if (value === undefined) return null
  const trimmed = value.trim()
  return trimmed === '' ? null : trimmed
}

export function parsePageMetadata(html: string): PageMetadata {
  const $ = cheerio.load(html)

  return {
    title: clean($('title').first().text()),
    description: clean($('meta[name="description"]').first().attr('content')),
  }
}
