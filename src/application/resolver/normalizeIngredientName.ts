import { parseMention } from '@application/parser/IngredientParser.ts'

const NO_STRIP_SUFFIXES = ['ss', 'us', 'is']

/** Strip a basic English plural from one word ("tomatoes" → "tomato", "berries" → "berry"). */
export function singularize(word: string): string {
  if (word.length <= 3 || !word.endsWith('s') || NO_STRIP_SUFFIXES.some((s) => word.endsWith(s))) return word
  if (word.endsWith('ies')) return word.slice(0, -3) + 'y'
  if (word.endsWith('ves')) return word.slice(0, -3) + 'f'
  if (word.endsWith('oes')) return word.slice(0, -2)
  if (/(ches|shes|xes|zes)$/.test(word)) return word.slice(0, -2)
  return word.slice(0, -1)
}

/**
 * Normalize an ingredient name to its catalog key: accents folded,
 * lowercased, punctuation dropped, whitespace collapsed and the trailing
 * word singularized.
 */
export function normalizeIngredientName(name: string): string {
  const words = name
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter(Boolean)
  if (words.length === 0) return ''
  words[words.length - 1] = singularize(words[words.length - 1])
  return words.join(' ')
}

/** Key for a whole ingredient line: quantity, unit, notes and prep are parsed off first. */
export function ingredientLineKey(raw: string): string {
  return normalizeIngredientName(parseMention(raw, 'key').text)
}
