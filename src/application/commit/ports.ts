import type { CalorieCache, MasterIngredientEntry } from '@domain/models/MasterIngredientEntry.ts'
import type { CourseCategory } from '@domain/constants/courseCategories.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { RecipeCommitted } from '@domain/models/RecipeCommitted.ts'

export interface CalorieFacts {
  kcalPer100g: number
  source: string
}

export interface CalorieLookup {
  /** Null when the backend knows nothing about the ingredient. */
  lookupCalories(name: string, signal: AbortSignal): Promise<CalorieFacts | null>
}

/** Receives committed-recipe events. Delivery is at-least-once, so consumers must be idempotent. */
export interface CommitEventSink {
  publish(event: RecipeCommitted): Promise<void>
}

/** How one recipe line gets its catalog entry. */
export type EntryRequest =
  | { kind: 'existing'; entryId: string; alias: string | null }
  | { kind: 'create'; canonicalName: string; normalizedKey: string }

export interface CommitPlan {
  draftId: string
  recipeId: string
  lineageId: string
  /** One per recipe line, in line order. */
  entries: EntryRequest[]
  /** Looked-up calories by normalized key, filled onto entries that have none. */
  calories: ReadonlyMap<string, CalorieCache>
  /**
   * Build the recipe once every line is bound to an entry. Called inside
   * the storage transaction, so it must not await.
   */
  buildRecipe(entries: readonly MasterIngredientEntry[], version: number): Recipe
  buildEvent(recipe: Recipe): RecipeCommitted
}

export interface CommitResult {
  recipe: Recipe
  /** Null when the review had already been committed. */
  event: RecipeCommitted | null
}

/** Storage side of a commit: everything in `apply` lands together or not at all. */
export interface CommitStore {
  apply(plan: CommitPlan): Promise<CommitResult>
  recordFailure(draftId: string, message: string): Promise<void>
  pendingEvents(): Promise<RecipeCommitted[]>
  markDelivered(eventId: string): Promise<void>
}

export interface RecipeRepository {
  get(recipeId: string): Promise<Recipe | undefined>
  listByCategory(category: CourseCategory): Promise<Recipe[]>
  listContainingIngredient(entryId: string): Promise<Recipe[]>
  /** Every version of a recipe, oldest first. */
  listLineage(lineageId: string): Promise<Recipe[]>
}
