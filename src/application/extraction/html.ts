import { JSDOM } from 'jsdom'

export function parseHtml(html: string): Document {
  return new JSDOM(html).window.document
}

/** Decode HTML entities that survive JSON-LD extraction ("&amp;" → "&"). */
export function decodeEntities(text: string): string {
  if (!text.includes('&')) return text
  return JSDOM.fragment(`<p>${text}</p>`).textContent ?? text
}

const BLOCK_SELECTOR = 'h1, h2, h3, h4, li, p, dt, dd, td'

/**
 * Flatten a page into one line per block element, in document order.
 * Script/style contents and nested blocks are not repeated.
 */
export function extractPageLines(html: string): string[] {
  const doc = parseHtml(html)
  doc.querySelectorAll('script, style, noscript, nav, footer, header').forEach((el) => el.remove())

  const lines: string[] = []
  for (const el of doc.querySelectorAll(BLOCK_SELECTOR)) {
    if (el.querySelector(BLOCK_SELECTOR)) continue
    const text = (el.textContent ?? '').replace(/\s+/g, ' ').trim()
    if (!text) continue
    lines.push(el.tagName === 'LI' ? `- ${text}` : text)
  }
  return lines
}
