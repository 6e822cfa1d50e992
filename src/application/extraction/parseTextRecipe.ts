/** A line kept by the text parser, pointing back at its source line. */
export interface TextLine {
  text: string
  sourceIndex: number
}

export interface ParsedTextRecipe {
  title: string
  ingredientLines: TextLine[]
  stepLines: TextLine[]
}

const INGREDIENT_HEADER = /^(=\s*)?(ingredients|ingredienti|you will need)\s*:?$/i
const STEP_HEADER = /^(instructions|steps|directions|method|preparation|procedimento|preparazione)\s*:?$/i
const MEASURED_LINE = /^\d+([.,/]\d+)?\s*(cups?|tbsps?|tsps?|tablespoons?|teaspoons?|oz|lbs?|g|kg|ml|l|cl|pinch|cloves?)\b/i

/**
 * Parse plain text (pasted, OCR'd or scraped) into title, ingredient lines
 * and step lines. The first non-empty line is the title. Lines are assigned by
 * explicit headers, else by format: bullets and measured lines are
 * ingredients, numbered lines and cooking sentences are steps.
 */
export function parseTextRecipe(text: string | readonly string[]): ParsedTextRecipe {
  const source = typeof text === 'string' ? text.split('\n') : text
  const lines = source
    .map((line, sourceIndex) => ({ line, sourceIndex }))
    .filter(({ line }) => line.trim())

  if (lines.length === 0) return { title: '', ingredientLines: [], stepLines: [] }

  const title = lines[0].line.replace(/^[<®=\-[\]0-9.#*]+\s*/, '').trim()
  const ingredientLines: TextLine[] = []
  const stepLines: TextLine[] = []
  let section: 'unknown' | 'ingredients' | 'steps' = 'unknown'

  for (const { line, sourceIndex } of lines.slice(1)) {
    const trimmed = line.trim()

    if (INGREDIENT_HEADER.test(trimmed)) {
      section = 'ingredients'
      continue
    }
    if (STEP_HEADER.test(trimmed)) {
      section = 'steps'
      continue
    }

    const cleaned = trimmed.replace(/^[-*•]\s*/, '').replace(/^\d+[.)]\s+/, '').trim()
    if (!cleaned) continue

    if (section === 'ingredients') {
      ingredientLines.push({ text: cleaned, sourceIndex })
    } else if (section === 'steps') {
      for (const sentence of splitSentences(cleaned)) stepLines.push({ text: sentence, sourceIndex })
    } else if (/^[-*•]\s/.test(trimmed) || MEASURED_LINE.test(cleaned)) {
      ingredientLines.push({ text: cleaned, sourceIndex })
    } else if (/^\d+[.)]\s/.test(trimmed)) {
      stepLines.push({ text: cleaned, sourceIndex })
    } else if (hasCookingVerbs(cleaned)) {
      for (const sentence of splitSentences(cleaned)) stepLines.push({ text: sentence, sourceIndex })
    }
  }

  return { title, ingredientLines, stepLines }
}

/** Split on sentence boundaries; abbreviations like "oz." are followed by lowercase. */
function splitSentences(text: string): string[] {
  const sentences = text
    .split(/\.(?:\s+)(?=[A-Z])/)
    .map((s) => s.trim().replace(/\.$/, '').trim())
    .filter((s) => s.length > 0)
  return sentences.length > 0 ? sentences : [text]
}

const COOKING_VERBS = /\b(cook|bake|roast|grill|saut[eé]|fry|simmer|boil|steam|broil|braise|stir|mix|combine|whisk|fold|blend|chop|dice|slice|mince|peel|drain|heat|preheat|melt|pour|add|toss|season|marinate|spread|serve|refrigerat|chill|freeze|let\s+sit|set\s+aside|bring\s+to|top\s+with|remove\s+from|place\s+in|transfer|arrange)\b/i

function hasCookingVerbs(line: string): boolean {
  return line.length > 20 && COOKING_VERBS.test(line)
}
