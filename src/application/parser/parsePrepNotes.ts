import phrases from './prepPhrases.json'

const byLengthDesc = (a: string, b: string) => b.length - a.length
const TRAILING = [...phrases.trailing].sort(byLengthDesc)
// Only multi-word leading preps: bare "ground" belongs to "ground beef"
const LEADING = [...phrases.leading].sort(byLengthDesc)

export interface PrepResult {
  ingredient: string
  prep: string | null
  optional: boolean
}

/**
 * Split preparation phrases from the ingredient name: "onions, finely diced",
 * "salt to taste" and "freshly ground black pepper". Also detects "optional".
 */
export function parsePrepNotes(text: string): PrepResult {
  let remaining = text.trim()
  let optional = false
  let prep: string | null = null

  if (/\boptional\b/i.test(remaining)) {
    optional = true
    remaining = remaining.replace(/,?\s*optional\b/i, '').trim()
  }

  const commaIndex = remaining.indexOf(',')
  if (commaIndex > 0) {
    const afterComma = remaining.slice(commaIndex + 1).trim()
    const afterLower = afterComma.toLowerCase()
    if (TRAILING.some((p) => afterLower.startsWith(p))) {
      prep = afterComma
      remaining = remaining.slice(0, commaIndex).trim()
    }
  }

  if (prep === null) {
    const lower = remaining.toLowerCase()
    const trailing = TRAILING.find((p) => lower.endsWith(' ' + p))
    if (trailing) {
      prep = remaining.slice(remaining.length - trailing.length)
      remaining = remaining.slice(0, remaining.length - trailing.length).trim()
    }
  }

  if (prep === null) {
    const lower = remaining.toLowerCase()
    const leading = LEADING.find((p) => lower.startsWith(p + ' '))
    if (leading) {
      prep = remaining.slice(0, leading.length)
      remaining = remaining.slice(leading.length).trim()
    }
  }

  return { ingredient: remaining.replace(/[,;:]+$/, '').trim(), prep, optional }
}
