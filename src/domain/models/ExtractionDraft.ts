import type { RawIngredientMention } from './Ingredient.ts'
import type { InstructionStep } from './Step.ts'
import type { CourseCategory } from '@domain/constants/courseCategories.ts'
import type { SourceModality } from './RawSource.ts'

export type ExtractionMethod =
  | 'manual-form'
  | 'manual-text'
  | 'vision'
  | 'ocr-text'
  | 'json-ld'
  | 'microdata'
  | 'page-text'
  | 'course-classifier'
  | 'manual'

export interface DraftFields {
  title: string | null
  ingredients: RawIngredientMention[]
  instructions: InstructionStep[]
  servings: number | null
  prepTimeMinutes: number | null
  cookTimeMinutes: number | null
  courseCategory: CourseCategory | null
  imageUrl: string | null
}

export type ScalarField = Exclude<keyof DraftFields, 'ingredients' | 'instructions'>

/**
 * Field paths address one scored unit of a draft: a scalar field by name, or
 * a single ingredient/instruction line by its stable id.
 */
export type FieldPath = ScalarField | `ingredient:${string}` | `instruction:${string}`

export type FieldConfidence = Partial<Record<FieldPath, number>>

export interface StrategyAttempt {
  method: ExtractionMethod
  outcome: 'success' | 'failure'
  confidence: number | null
  tries: number
  error: string | null
}

export interface ExtractionDraft {
  id: string
  sourceId: string
  modality: SourceModality
  sourceUrl: string | null
  fields: DraftFields
  fieldConfidence: FieldConfidence
  fieldMethods: Partial<Record<keyof DraftFields, ExtractionMethod>>
  confidence: number
  method: ExtractionMethod
  fallbackDepth: number
  fullyManual: boolean
  attempts: StrategyAttempt[]
  /** Courses a classifier proposed, most likely first; empty when none ran. */
  suggestedCategories: CourseCategory[]
  createdAt: string
}

export function ingredientPath(mentionId: string): FieldPath {
  return `ingredient:${mentionId}`
}

export function instructionPath(stepId: string): FieldPath {
  return `instruction:${stepId}`
}

export function emptyFields(): DraftFields {
  return {
    title: null,
    ingredients: [],
    instructions: [],
    servings: null,
    prepTimeMinutes: null,
    cookTimeMinutes: null,
    courseCategory: null,
    imageUrl: null,
  }
}
