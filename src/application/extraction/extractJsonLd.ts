/**
 * Extract JSON-LD Recipe data from an HTML string.
 *
 * Handles:
 * - Multiple <script type="application/ld+json"> blocks
 * - @graph arrays containing Recipe
 * - Array @type (e.g. ["Recipe", "HowTo"])
 */

export type JsonObject = Record<string, unknown>

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isRecipeType(type: unknown): boolean {
  const matches = (t: unknown) => typeof t === 'string' && (t === 'Recipe' || t.endsWith('/Recipe'))
  return Array.isArray(type) ? type.some(matches) : matches(type)
}

function findRecipes(node: unknown): JsonObject[] {
  if (Array.isArray(node)) return node.flatMap(findRecipes)
  if (!isJsonObject(node)) return []
  if (isRecipeType(node['@type'])) return [node]
  if (Array.isArray(node['@graph'])) return node['@graph'].flatMap(findRecipes)
  return []
}

/** Return every raw schema.org Recipe object found in the page's JSON-LD blocks. */
export function extractJsonLd(html: string): JsonObject[] {
  const recipes: JsonObject[] = []
  const scriptPattern = /<script[^>]*type\s*=\s*["']application\/ld\+json["'][^>]*>([\s\S]*?)<\/script>/gi

  for (const match of html.matchAll(scriptPattern)) {
    const content = match[1].trim()
    if (!content) continue
    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch {
      // Sites ship broken blocks next to valid ones; skip just this block
      continue
    }
    recipes.push(...findRecipes(parsed))
  }

  return recipes
}
