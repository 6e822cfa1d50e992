export interface ParentheticalResult {
  text: string
  notes: string[]
}

/** Pull "(...)" groups out of an ingredient line and keep their contents as notes. */
export function parseParenthetical(text: string): ParentheticalResult {
  const notes: string[] = []
  const cleaned = text
    .replace(/\(([^)]*)\)/g, (_match, content: string) => {
      if (content.trim()) notes.push(content.trim())
      return ' '
    })
    .replace(/\s{2,}/g, ' ')
    .trim()

  return { text: cleaned, notes }
}
