import { numericQuantity } from 'numeric-quantity'
import type { Range } from '@domain/models/Ingredient.ts'

const UNICODE_FRACTIONS: Record<string, string> = {
  '¼': '1/4',
  '½': '1/2',
  '¾': '3/4',
  '⅓': '1/3',
  '⅔': '2/3',
  '⅛': '1/8',
  '⅜': '3/8',
  '⅝': '5/8',
  '⅞': '7/8',
}

/** Replace unicode fraction characters with ASCII equivalents ("1½" becomes "1 1/2"). */
export function normalizeUnicodeFractions(text: string): string {
  let result = text
  for (const [unicode, ascii] of Object.entries(UNICODE_FRACTIONS)) {
    result = result.replace(new RegExp(`(\\d)${unicode}`, 'g'), `$1 ${ascii}`)
    result = result.replace(new RegExp(unicode, 'g'), ascii)
  }
  return result
}

const NUMBER = String.raw`\d+\s+\d+\/\d+|\d+\/\d+|\d+[.,]\d+|\d+`
const QTY_PATTERN = new RegExp(`^(${NUMBER})`)
const RANGE_PATTERN = new RegExp(`^(${NUMBER})\\s*(?:[-–—]|to)\\s*(${NUMBER})`)

export interface QuantityResult {
  qty: number | Range | null
  remainder: string
}

/** European cards write "1,5 kg"; numeric-quantity only reads the dot form. */
function toNumber(text: string): number {
  return numericQuantity(text.replace(/(\d),(\d)/, '$1.$2'))
}

/** Parse a numeric quantity (single value or range) from the front of a string. */
export function parseQuantity(text: string): QuantityResult {
  const trimmed = text.trim()

  const rangeMatch = trimmed.match(RANGE_PATTERN)
  if (rangeMatch) {
    const min = toNumber(rangeMatch[1])
    const max = toNumber(rangeMatch[2])
    if (!isNaN(min) && !isNaN(max)) {
      return { qty: { min, max }, remainder: trimmed.slice(rangeMatch[0].length).trim() }
    }
  }

  const qtyMatch = trimmed.match(QTY_PATTERN)
  if (qtyMatch) {
    const value = toNumber(qtyMatch[1])
    if (!isNaN(value)) {
      return { qty: value, remainder: trimmed.slice(qtyMatch[0].length).trim() }
    }
  }

  return { qty: null, remainder: trimmed }
}
