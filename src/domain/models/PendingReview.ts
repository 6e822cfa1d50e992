import type { ExtractionDraft, FieldPath } from './ExtractionDraft.ts'
import type { IngredientMatchCandidate } from './IngredientMatchCandidate.ts'

export type ReviewState = 'AwaitingUser' | 'Confirmed' | 'Discarded'

export interface CommitProgress {
  status: 'pending' | 'committed'
  recipeId: string | null
  attempts: number
  lastError: string | null
}

export interface RecipeRevision {
  lineageId: string
  previousRecipeId: string
  previousVersion: number
}

export interface PendingReview {
  draftId: string
  version: number
  state: ReviewState
  /** Null once the review is discarded. */
  draft: ExtractionDraft | null
  candidates: IngredientMatchCandidate[]
  unresolvedFields: FieldPath[]
  commit: CommitProgress | null
  revisionOf: RecipeRevision | null
  createdAt: string
  updatedAt: string
}
