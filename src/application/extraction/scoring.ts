import type { RawIngredientMention } from '@domain/models/Ingredient.ts'
import {
  ingredientPath,
  instructionPath,
  type DraftFields,
  type FieldConfidence,
  type FieldPath,
  type ScalarField,
} from '@domain/models/ExtractionDraft.ts'

export const SCALAR_FIELDS: readonly ScalarField[] = [
  'title',
  'servings',
  'prepTimeMinutes',
  'cookTimeMinutes',
  'courseCategory',
  'imageUrl',
]

export function isScalarField(path: string): path is ScalarField {
  return SCALAR_FIELDS.some((field) => field === path)
}

export const clamp01 = (value: number): number => Math.min(1, Math.max(0, value))

/**
 * Confidence that a parsed mention is unambiguous. An empty name, or digits
 * left inside the name ("2-3 (14 oz) cans" style lines), halve the source's
 * own confidence.
 */
export function mentionConfidence(mention: RawIngredientMention, base: number): number {
  if (!mention.text || /\d/.test(mention.text)) return clamp01(base * 0.5)
  return clamp01(base)
}

export function linePaths(fields: Pick<DraftFields, 'ingredients' | 'instructions'>): FieldPath[] {
  return [
    ...fields.ingredients.map((m) => ingredientPath(m.id)),
    ...fields.instructions.map((s) => instructionPath(s.id)),
  ]
}

export function lineScores(
  fields: Partial<DraftFields>,
  conf: FieldConfidence,
  list: 'ingredients' | 'instructions',
): number[] {
  if (list === 'ingredients') return (fields.ingredients ?? []).map((m) => conf[ingredientPath(m.id)] ?? 0)
  return (fields.instructions ?? []).map((s) => conf[instructionPath(s.id)] ?? 0)
}

export function isPresent(fields: Partial<DraftFields>, key: keyof DraftFields): boolean {
  const value = fields[key]
  if (Array.isArray(value)) return value.length > 0
  return value !== null && value !== undefined && value !== ''
}

/** Confidence of a whole field: the stored score for scalars, the mean line score for lists. */
export function fieldScore(fields: Partial<DraftFields>, conf: FieldConfidence, key: keyof DraftFields): number {
  if (!isPresent(fields, key)) return 0
  if (key === 'ingredients' || key === 'instructions') {
    const scores = lineScores(fields, conf, key)
    return scores.reduce((sum, s) => sum + s, 0) / scores.length
  }
  return conf[key] ?? 0
}

/**
 * Fraction of the required fields (title, ingredients, instructions) that
 * were parsed at or above the threshold. A list counts as the fraction of its
 * lines that clear the threshold.
 */
export function overallConfidence(fields: Partial<DraftFields>, conf: FieldConfidence, threshold: number): number {
  const title = isPresent(fields, 'title') && (conf.title ?? 0) >= threshold ? 1 : 0
  const listShare = (list: 'ingredients' | 'instructions') => {
    const scores = lineScores(fields, conf, list)
    return scores.length === 0 ? 0 : scores.filter((s) => s >= threshold).length / scores.length
  }
  return clamp01((title + listShare('ingredients') + listShare('instructions')) / 3)
}

/** Every present field path whose confidence is below the threshold. */
export function lowConfidencePaths(fields: DraftFields, conf: FieldConfidence, threshold: number): FieldPath[] {
  const scalars = SCALAR_FIELDS.filter((key) => isPresent(fields, key) && (conf[key] ?? 0) < threshold)
  const lines = linePaths(fields).filter((path) => (conf[path] ?? 0) < threshold)
  return [...scalars, ...lines]
}
