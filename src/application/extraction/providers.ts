import type { ImagePayload } from '@domain/models/RawSource.ts'
import type { CourseCategory } from '@domain/constants/courseCategories.ts'

/** A piece of text read by a provider together with its own confidence in [0,1]. */
export interface ScoredText {
  text: string
  confidence: number
}

/** What a vision backend read from a recipe photo. Anything it could not see is null or empty. */
export interface VisionReading {
  title: ScoredText | null
  ingredients: ScoredText[]
  steps: ScoredText[]
  servings: ScoredText | null
  prepTime: ScoredText | null
  cookTime: ScoredText | null
}

export interface VisionRecipeProvider {
  readRecipe(image: ImagePayload, signal: AbortSignal): Promise<VisionReading>
}

export interface OcrTextProvider {
  /** Recognised lines in reading order. */
  recognizeLines(image: ImagePayload, signal: AbortSignal): Promise<ScoredText[]>
}

export interface PageFetcher {
  fetchHtml(url: string, signal: AbortSignal): Promise<string>
}

export interface CourseSuggestion {
  category: CourseCategory
  confidence: number
}

export interface CourseClassifier {
  /** Ranked suggestions, most likely first. Empty when the text fits no course. */
  classify(recipeText: string, signal: AbortSignal): Promise<CourseSuggestion[]>
}

/** Loads a page's HTML, at most once per URL while a cached copy is fresh. */
export interface PageSource {
  load(url: string, signal: AbortSignal): Promise<string>
}
