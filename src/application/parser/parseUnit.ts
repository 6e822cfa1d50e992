import { UNIT_MAP } from '@domain/constants/units.ts'

export interface UnitResult {
  unit: string | null
  remainder: string
}

// Longest spellings first so "fl oz" wins over "fl"
const UNIT_KEYS = Object.keys(UNIT_MAP).sort((a, b) => b.length - a.length || a.localeCompare(b))

/**
 * Parse a unit from the front of a string and return its canonical name.
 * Single-letter spellings ("c", "t", "g", "l") only count when followed by a
 * space, a period or the end of the text.
 */
export function parseUnit(text: string): UnitResult {
  const trimmed = text.trim()
  const lower = trimmed.toLowerCase()

  for (const key of UNIT_KEYS) {
    if (!lower.startsWith(key)) continue

    const nextChar = lower[key.length]
    if (nextChar && /[a-zà-ÿ]/.test(nextChar)) continue
    if (key.length === 1 && nextChar && nextChar !== '.' && nextChar !== ' ') continue

    const remainder = trimmed.slice(key.length).replace(/^\.?\s*/, '').replace(/^of\s+/i, '')
    return { unit: UNIT_MAP[key], remainder }
  }

  return { unit: null, remainder: trimmed }
}
