import {
  emptyFields,
  ingredientPath,
  instructionPath,
  type DraftFields,
  type ExtractionMethod,
  type FieldConfidence,
  type FieldPath,
} from '@domain/models/ExtractionDraft.ts'
import type { RawExtraction } from './ExtractionStrategy.ts'
import { fieldScore, isPresent, lineScores } from './scoring.ts'

export interface MergedExtraction {
  fields: DraftFields
  fieldConfidence: FieldConfidence
  fieldMethods: Partial<Record<keyof DraftFields, ExtractionMethod>>
}

export function emptyMerge(): MergedExtraction {
  return { fields: emptyFields(), fieldConfidence: {}, fieldMethods: {} }
}

const FIELD_KEYS: ReadonlyArray<keyof DraftFields> = [
  'title',
  'ingredients',
  'instructions',
  'servings',
  'prepTimeMinutes',
  'cookTimeMinutes',
  'courseCategory',
  'imageUrl',
]

function pathsOf(fields: Partial<DraftFields>, key: keyof DraftFields): FieldPath[] {
  if (key === 'ingredients') return (fields.ingredients ?? []).map((m) => ingredientPath(m.id))
  if (key === 'instructions') return (fields.instructions ?? []).map((s) => instructionPath(s.id))
  return [key]
}

function setField<K extends keyof DraftFields>(target: DraftFields, source: Partial<DraftFields>, key: K): void {
  const value: DraftFields[K] | undefined = source[key]
  if (value !== undefined) target[key] = value
}

/**
 * A list is taken or kept as a whole, since line ids from two strategies do
 * not pair up. It is replaced only while none of its lines reaches the
 * threshold and the incoming lines average above its best line.
 */
function shouldReplace(current: MergedExtraction, next: RawExtraction, key: keyof DraftFields, threshold: number): boolean {
  if (!isPresent(current.fields, key)) return true
  const incoming = fieldScore(next.fields, next.fieldConfidence, key)
  if (key === 'ingredients' || key === 'instructions') {
    const best = Math.max(...lineScores(current.fields, current.fieldConfidence, key))
    return best < threshold && incoming > best
  }
  const existing = fieldScore(current.fields, current.fieldConfidence, key)
  return existing < threshold && incoming > existing
}

/**
 * Most-specific-wins merge: a later (fallback) result only fills a field the
 * current result left empty, or replaces one below the threshold with a
 * higher-confidence reading.
 */
export function mergeExtraction(current: MergedExtraction, next: RawExtraction, threshold: number): MergedExtraction {
  const merged: MergedExtraction = {
    fields: { ...current.fields },
    fieldConfidence: { ...current.fieldConfidence },
    fieldMethods: { ...current.fieldMethods },
  }

  for (const key of FIELD_KEYS) {
    if (!isPresent(next.fields, key) || !shouldReplace(current, next, key, threshold)) continue

    for (const path of pathsOf(current.fields, key)) delete merged.fieldConfidence[path]
    setField(merged.fields, next.fields, key)
    for (const path of pathsOf(next.fields, key)) merged.fieldConfidence[path] = next.fieldConfidence[path] ?? 0
    merged.fieldMethods[key] = next.method
  }

  return merged
}
