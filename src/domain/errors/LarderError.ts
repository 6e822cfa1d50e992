/**
 * Application error types.
 *
 * Every error a caller can see carries a typed code, a user-safe message and
 * the concrete next action the caller can offer.
 */

export type LarderErrorCode =
  | 'EXTRACTION_FAILED'
  | 'REVIEW_NOT_FOUND'
  | 'REVIEW_VERSION_CONFLICT'
  | 'REVIEW_INCOMPLETE'
  | 'INVALID_REVIEW_TRANSITION'
  | 'INVALID_FIELD'
  | 'CATALOG_ENTRY_NOT_FOUND'
  | 'RECIPE_NOT_FOUND'
  | 'COMMIT_FAILED'

export type NextAction = 'retry' | 'correct' | 'cancel' | 'reload'

export class LarderError extends Error {
  public readonly code: LarderErrorCode
  public readonly safeMessage: string
  public readonly nextAction: NextAction
  public readonly details?: Record<string, unknown>

  constructor(
    code: LarderErrorCode,
    safeMessage: string,
    nextAction: NextAction,
    options: { cause?: unknown; details?: Record<string, unknown> } = {},
  ) {
    super(safeMessage, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'LarderError'
    this.code = code
    this.safeMessage = safeMessage
    this.nextAction = nextAction
    this.details = options.details
  }

  toJSON(): { code: LarderErrorCode; message: string; nextAction: NextAction; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.safeMessage,
      nextAction: this.nextAction,
      ...(this.details && { details: this.details }),
    }
  }
}

/** A single extraction strategy failed; distinct from a low-confidence success. */
export class ExtractionFailure extends LarderError {
  /** False when retrying cannot help, e.g. the page has no recipe markup. */
  public readonly retryable: boolean
  public tries = 1

  constructor(method: string, reason: string, options: { cause?: unknown; retryable?: boolean } = {}) {
    super('EXTRACTION_FAILED', `${method} extraction failed: ${reason}`, 'retry', {
      cause: options.cause,
      details: { method },
    })
    this.name = 'ExtractionFailure'
    this.retryable = options.retryable ?? true
  }
}

export class ReviewNotFoundError extends LarderError {
  constructor(draftId: string) {
    super('REVIEW_NOT_FOUND', `No review exists for draft ${draftId}`, 'cancel', { details: { draftId } })
    this.name = 'ReviewNotFoundError'
  }
}

export class ReviewVersionConflictError extends LarderError {
  constructor(draftId: string, expected: number, actual: number) {
    super(
      'REVIEW_VERSION_CONFLICT',
      'This review was changed in another session. Reload it and apply your change again.',
      'reload',
      { details: { draftId, expectedVersion: expected, currentVersion: actual } },
    )
    this.name = 'ReviewVersionConflictError'
  }
}

export interface ReviewBlockers {
  pendingMentions: string[]
  unresolvedFields: string[]
  missingTitle: boolean
}

export class ReviewIncompleteError extends LarderError {
  public readonly blockers: ReviewBlockers

  constructor(draftId: string, blockers: ReviewBlockers) {
    super('REVIEW_INCOMPLETE', 'Some ingredients or fields still need your confirmation.', 'correct', {
      details: { draftId, ...blockers },
    })
    this.name = 'ReviewIncompleteError'
    this.blockers = blockers
  }
}

export class InvalidReviewTransitionError extends LarderError {
  constructor(draftId: string, from: string, action: string) {
    super('INVALID_REVIEW_TRANSITION', `Cannot ${action} a review that is ${from}`, 'cancel', {
      details: { draftId, state: from, action },
    })
    this.name = 'InvalidReviewTransitionError'
  }
}

export class InvalidFieldError extends LarderError {
  constructor(field: string, reason: string) {
    super('INVALID_FIELD', `Invalid value for ${field}: ${reason}`, 'correct', { details: { field } })
    this.name = 'InvalidFieldError'
  }
}

export class CatalogEntryNotFoundError extends LarderError {
  constructor(entryId: string) {
    super('CATALOG_ENTRY_NOT_FOUND', `Ingredient ${entryId} is not in the catalog`, 'correct', {
      details: { entryId },
    })
    this.name = 'CatalogEntryNotFoundError'
  }
}

export class RecipeNotFoundError extends LarderError {
  constructor(recipeId: string) {
    super('RECIPE_NOT_FOUND', `Recipe ${recipeId} does not exist`, 'cancel', { details: { recipeId } })
    this.name = 'RecipeNotFoundError'
  }
}

export class CommitFailureError extends LarderError {
  constructor(draftId: string, cause: unknown) {
    super('COMMIT_FAILED', 'Saving the recipe failed. Nothing was saved; try again.', 'retry', {
      cause,
      details: { draftId },
    })
    this.name = 'CommitFailureError'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
