import type { DraftFields, FieldConfidence } from '@domain/models/ExtractionDraft.ts'
import { ingredientPath, instructionPath } from '@domain/models/ExtractionDraft.ts'
import type { InstructionStep } from '@domain/models/Step.ts'
import { toCourseCategory } from '@domain/constants/courseCategories.ts'
import { parseMentions } from '@application/parser/IngredientParser.ts'
import { decodeEntities } from './html.ts'
import { isJsonObject, type JsonObject } from './extractJsonLd.ts'
import { parseIsoDuration } from './parseDuration.ts'
import { mentionConfidence } from './scoring.ts'

/** Parse recipeYield ("6 servings", "6", ["6"]) to a number. */
function parseServings(raw: unknown): number | null {
  const text = Array.isArray(raw) ? String(raw[0] ?? '') : raw == null ? '' : String(raw)
  const match = text.match(/(\d+)/)
  return match ? parseInt(match[1], 10) : null
}

/** Normalize image to one URL: string, array, ImageObject or contentUrl. */
function normalizeImage(raw: unknown): string | null {
  const first = Array.isArray(raw) ? raw[0] : raw
  if (typeof first === 'string') return first || null
  if (isJsonObject(first)) {
    const url = first.url ?? first.contentUrl
    return typeof url === 'string' && url ? url : null
  }
  return null
}

function toStringArray(raw: unknown): string[] {
  if (typeof raw === 'string') return raw.split(',').map((s) => decodeEntities(s.trim())).filter(Boolean)
  if (Array.isArray(raw)) return raw.map((s) => decodeEntities(String(s).trim())).filter(Boolean)
  return []
}

/**
 * Normalize recipeInstructions to steps.
 * Handles: single string, string[], HowToStep[], HowToSection[].
 */
function normalizeSteps(raw: unknown): InstructionStep[] {
  const texts: string[] = []
  const add = (text: unknown) => {
    if (typeof text !== 'string') return
    const trimmed = decodeEntities(text.replace(/\s+/g, ' ').trim())
    if (trimmed) texts.push(trimmed)
  }

  if (typeof raw === 'string') {
    raw.split(/\n+/).forEach((line) => add(line.replace(/^\d+\.\s*/, '')))
  } else if (Array.isArray(raw)) {
    for (const item of raw) {
      if (typeof item === 'string') {
        add(item)
      } else if (isJsonObject(item)) {
        const type = typeof item['@type'] === 'string' ? item['@type'] : ''
        if (type.endsWith('HowToSection') && Array.isArray(item.itemListElement)) {
          for (const sub of item.itemListElement) add(isJsonObject(sub) ? sub.text : sub)
        } else {
          add(item.text)
        }
      }
    }
  }

  return texts.map((text, i) => ({ id: `step_${i + 1}`, order: i + 1, text }))
}

export interface SchemaRecipeReading {
  fields: Partial<DraftFields>
  fieldConfidence: FieldConfidence
}

/**
 * Map a schema.org Recipe object (from JSON-LD or microdata) to draft fields,
 * scoring each field at `base` when present.
 */
export function schemaRecipeFields(recipe: JsonObject, base: number): SchemaRecipeReading {
  const fields: Partial<DraftFields> = {}
  const conf: FieldConfidence = {}

  if (typeof recipe.name === 'string' && recipe.name.trim()) {
    fields.title = decodeEntities(recipe.name.trim())
    conf.title = base
  }

  const rawIngredients = Array.isArray(recipe.recipeIngredient)
    ? recipe.recipeIngredient
    : Array.isArray(recipe.ingredients)
      ? recipe.ingredients
      : []
  const mentions = parseMentions(rawIngredients.map((line) => decodeEntities(String(line))))
  if (mentions.length > 0) {
    fields.ingredients = mentions
    for (const mention of mentions) conf[ingredientPath(mention.id)] = mentionConfidence(mention, base)
  }

  const steps = normalizeSteps(recipe.recipeInstructions)
  if (steps.length > 0) {
    fields.instructions = steps
    for (const step of steps) conf[instructionPath(step.id)] = base
  }

  const servings = parseServings(recipe.recipeYield)
  if (servings !== null) {
    fields.servings = servings
    conf.servings = base
  }

  const prep = parseIsoDuration(recipe.prepTime)
  if (prep !== null) {
    fields.prepTimeMinutes = prep
    conf.prepTimeMinutes = base
  }

  const cook = parseIsoDuration(recipe.cookTime)
  if (cook !== null) {
    fields.cookTimeMinutes = cook
    conf.cookTimeMinutes = base
  }

  const course = toCourseCategory(toStringArray(recipe.recipeCategory))
  if (course !== null) {
    fields.courseCategory = course
    conf.courseCategory = base
  }

  const image = normalizeImage(recipe.image)
  if (image !== null) {
    fields.imageUrl = image
    conf.imageUrl = base
  }

  return { fields, fieldConfidence: conf }
}
