import type { RawIngredientMention } from '@domain/models/Ingredient.ts'
import { normalizeUnicodeFractions, parseQuantity } from './parseQuantity.ts'
import { parseUnit } from './parseUnit.ts'
import { parseParenthetical } from './parseParenthetical.ts'
import { parsePrepNotes } from './parsePrepNotes.ts'

function normalize(raw: string): string {
  return normalizeUnicodeFractions(raw.trim()).replace(/^[-*•]\s*/, '').replace(/\s+/g, ' ')
}

/**
 * Parse one raw ingredient line into a mention.
 *
 * Pipeline:
 * 1. Normalize whitespace, list bullets and unicode fractions
 * 2. Extract parentheticals as notes ("optional" inside them sets the flag)
 * 3. Parse quantity, then unit, from the front
 * 4. Split prep phrases from the ingredient name
 */
export function parseMention(raw: string, id: string): RawIngredientMention {
  const { text: withoutParens, notes } = parseParenthetical(normalize(raw))

  let optionalFromParen = false
  const keptNotes = notes.filter((note) => {
    if (/^optional$/i.test(note)) {
      optionalFromParen = true
      return false
    }
    return true
  })

  const { qty, remainder: afterQty } = parseQuantity(withoutParens)
  const { unit, remainder: afterUnit } = parseUnit(afterQty)
  const { ingredient, prep, optional } = parsePrepNotes(afterUnit)

  return {
    id,
    raw: raw.trim(),
    text: ingredient,
    quantity: qty,
    unit,
    prep,
    notes: keptNotes.length > 0 ? keptNotes.join('; ') : null,
    optional: optional || optionalFromParen,
  }
}

/** Parse a list of lines; blank lines are dropped and ids follow line order. */
export function parseMentions(rawLines: readonly string[]): RawIngredientMention[] {
  return rawLines
    .filter((line) => line.trim())
    .map((line, i) => parseMention(line, `ing_${i + 1}`))
}
