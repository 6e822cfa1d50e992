import type { Range } from './Ingredient.ts'
import type { InstructionStep } from './Step.ts'
import type { CourseCategory } from '@domain/constants/courseCategories.ts'
import type { ExtractionMethod } from './ExtractionDraft.ts'
import type { SourceModality } from './RawSource.ts'

export interface RecipeIngredientLine {
  entryId: string
  /** The ingredient name as written in the source. */
  name: string
  raw: string
  quantity: number | Range | null
  unit: string | null
  prep: string | null
  notes: string | null
  optional: boolean
}

export interface RecipeProvenance {
  sourceId: string
  modality: SourceModality
  url: string | null
  method: ExtractionMethod
}

export interface Recipe {
  id: string
  lineageId: string
  version: number
  title: string
  ingredients: RecipeIngredientLine[]
  instructions: InstructionStep[]
  courseCategory: CourseCategory | null
  /** Kept for reference after the reviewer settled `courseCategory`. */
  suggestedCategories: CourseCategory[]
  servings: number | null
  prepTimeMinutes: number | null
  cookTimeMinutes: number | null
  imageUrl: string | null
  source: RecipeProvenance
  calorieEstimate: number | null
  ingredientIds: string[]
  committedAt: string
}
