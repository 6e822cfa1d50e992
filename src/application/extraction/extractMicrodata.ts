/**
 * Extract Schema.org Recipe data from HTML using Microdata (itemprop/itemscope).
 * Returns JSON-LD-shaped objects so the same field mapping handles both layers.
 */

import { parseHtml } from './html.ts'
import type { JsonObject } from './extractJsonLd.ts'

const ARRAY_PROPS = new Set(['recipeIngredient', 'ingredients', 'recipeInstructions', 'step'])

export function extractMicrodata(html: string): JsonObject[] {
  const doc = parseHtml(html)
  return Array.from(doc.querySelectorAll('[itemtype*="schema.org/Recipe"]')).map((el) => ({
    ...extractItemScope(el),
    '@type': 'Recipe',
  }))
}

function extractItemScope(root: Element): JsonObject {
  const result: JsonObject = {}

  const walk = (parent: Element) => {
    for (const child of Array.from(parent.children)) {
      const prop = child.getAttribute('itemprop')
      const isScope = child.hasAttribute('itemscope')

      if (prop) {
        if (isScope) {
          const nested = extractItemScope(child)
          const nestedType = child.getAttribute('itemtype')
          if (nestedType) nested['@type'] = nestedType.split('/').pop() ?? ''
          addValue(result, prop, nested)
        } else {
          addValue(result, prop, propertyValue(child))
        }
      } else if (!isScope) {
        walk(child)
      }
    }
  }

  walk(root)
  return result
}

function propertyValue(el: Element): string {
  const text = () => el.textContent?.replace(/\s+/g, ' ').trim() ?? ''
  switch (el.tagName.toLowerCase()) {
    case 'meta':
      return el.getAttribute('content') ?? ''
    case 'img':
      return el.getAttribute('src') ?? el.getAttribute('content') ?? ''
    case 'a':
    case 'link':
      return el.getAttribute('href') ?? ''
    case 'time':
      return el.getAttribute('datetime') ?? text()
    case 'data':
      return el.getAttribute('value') ?? text()
    default:
      return text()
  }
}

function addValue(obj: JsonObject, key: string, value: unknown): void {
  const existing = obj[key]
  if (Array.isArray(existing)) {
    existing.push(value)
  } else if (existing !== undefined) {
    obj[key] = [existing, value]
  } else {
    obj[key] = ARRAY_PROPS.has(key) ? [value] : value
  }
}
