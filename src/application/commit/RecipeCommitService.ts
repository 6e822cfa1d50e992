import type { ExtractionDraft } from '@domain/models/ExtractionDraft.ts'
import { ingredientPath, instructionPath } from '@domain/models/ExtractionDraft.ts'
import type { IngredientMatchCandidate } from '@domain/models/IngredientMatchCandidate.ts'
import type { CalorieCache } from '@domain/models/MasterIngredientEntry.ts'
import type { PendingReview } from '@domain/models/PendingReview.ts'
import type { Recipe, RecipeIngredientLine } from '@domain/models/Recipe.ts'
import type { RecipeCommitted } from '@domain/models/RecipeCommitted.ts'
import type { CourseCategory } from '@domain/constants/courseCategories.ts'
import {
  CommitFailureError,
  InvalidReviewTransitionError,
  LarderError,
  RecipeNotFoundError,
  ReviewIncompleteError,
  ReviewNotFoundError,
  errorMessage,
} from '@domain/errors/LarderError.ts'
import { generateId } from '@application/ids.ts'
import type { CatalogStore } from '@application/catalog/CatalogStore.ts'
import { normalizeIngredientName } from '@application/resolver/normalizeIngredientName.ts'
import type { ReviewGate } from '@application/review/ReviewGate.ts'
import { reviewBlockers } from '@application/review/ReviewGate.ts'
import type { ReviewRepository } from '@application/review/ReviewRepository.ts'
import { callWithRetry, type RetryPolicy } from '@application/extraction/callWithRetry.ts'
import { estimateCalories } from './estimateCalories.ts'
import type {
  CalorieLookup,
  CommitEventSink,
  CommitPlan,
  CommitResult,
  CommitStore,
  EntryRequest,
  RecipeRepository,
} from './ports.ts'

export interface CommitServiceDeps {
  reviews: ReviewRepository
  catalog: CatalogStore
  store: CommitStore
  recipes: RecipeRepository
  calories: CalorieLookup
  /** Timeout and retries for each calorie lookup. */
  retry: RetryPolicy
  events: CommitEventSink
  gate: ReviewGate
  now?: () => Date
}

/**
 * Turns a Confirmed review into an immutable Recipe, growing the catalog as
 * needed. The catalog, recipe, review and outbox writes land in one storage
 * transaction; events go out after it commits.
 */
export class RecipeCommitService {
  private readonly now: () => Date

  constructor(private readonly deps: CommitServiceDeps) {
    this.now = deps.now ?? (() => new Date())
  }

  async commit(draftId: string): Promise<Recipe> {
    const review = await this.deps.reviews.get(draftId)
    if (!review) throw new ReviewNotFoundError(draftId)

    if (review.commit?.status === 'committed' && review.commit.recipeId) {
      return this.getRecipe(review.commit.recipeId)
    }
    if (review.state !== 'Confirmed' || !review.draft) {
      throw new InvalidReviewTransitionError(draftId, review.state, 'commit')
    }
    const blockers = reviewBlockers(review)
    if (blockers.pendingMentions.length > 0 || blockers.unresolvedFields.length > 0 || blockers.missingTitle) {
      throw new ReviewIncompleteError(draftId, blockers)
    }

    const plan = await this.plan(review, review.draft)
    let result: CommitResult
    try {
      result = await this.deps.store.apply(plan)
    } catch (err) {
      if (err instanceof LarderError) throw err
      console.error(`[Larder] commit of draft ${draftId} failed:`, err)
      await this.recordFailure(draftId, err)
      throw new CommitFailureError(draftId, err)
    }

    if (result.event) await this.deliver(result.event)
    return result.recipe
  }

  /** Redeliver outbox events left by failed dispatches; returns how many were delivered. */
  async flushOutbox(): Promise<number> {
    let delivered = 0
    for (const event of await this.deps.store.pendingEvents()) {
      if (await this.deliver(event)) delivered++
    }
    return delivered
  }

  /** Open a review pre-filled from a committed recipe; its commit adds a version to the lineage. */
  async reviseRecipe(recipeId: string): Promise<PendingReview> {
    const recipe = await this.getRecipe(recipeId)
    const boundEntries: Record<string, string> = {}
    const draft: ExtractionDraft = {
      id: generateId('draft'),
      sourceId: recipe.source.sourceId,
      modality: recipe.source.modality,
      sourceUrl: recipe.source.url,
      fields: {
        title: recipe.title,
        ingredients: recipe.ingredients.map((line, i) => {
          const id = `ing_${i + 1}`
          boundEntries[id] = line.entryId
          return {
            id,
            raw: line.raw,
            text: line.name,
            quantity: line.quantity,
            unit: line.unit,
            prep: line.prep,
            notes: line.notes,
            optional: line.optional,
          }
        }),
        instructions: recipe.instructions.map((step) => ({ ...step })),
        servings: recipe.servings,
        prepTimeMinutes: recipe.prepTimeMinutes,
        cookTimeMinutes: recipe.cookTimeMinutes,
        courseCategory: recipe.courseCategory,
        imageUrl: recipe.imageUrl,
      },
      fieldConfidence: {},
      fieldMethods: {},
      confidence: 1,
      method: 'manual',
      fallbackDepth: 0,
      fullyManual: false,
      attempts: [],
      suggestedCategories: [...recipe.suggestedCategories],
      createdAt: this.now().toISOString(),
    }
    for (const key of ['title', 'servings', 'prepTimeMinutes', 'cookTimeMinutes', 'courseCategory', 'imageUrl'] as const) {
      draft.fieldConfidence[key] = 1
      draft.fieldMethods[key] = 'manual'
    }
    for (const m of draft.fields.ingredients) draft.fieldConfidence[ingredientPath(m.id)] = 1
    for (const s of draft.fields.instructions) draft.fieldConfidence[instructionPath(s.id)] = 1

    return this.deps.gate.open(draft, {
      boundEntries,
      revisionOf: { lineageId: recipe.lineageId, previousRecipeId: recipe.id, previousVersion: recipe.version },
    })
  }

  async getRecipe(recipeId: string): Promise<Recipe> {
    const recipe = await this.deps.recipes.get(recipeId)
    if (!recipe) throw new RecipeNotFoundError(recipeId)
    return recipe
  }

  listByCategory(category: CourseCategory): Promise<Recipe[]> {
    return this.deps.recipes.listByCategory(category)
  }

  listContainingIngredient(entryId: string): Promise<Recipe[]> {
    return this.deps.recipes.listContainingIngredient(entryId)
  }

  listLineage(lineageId: string): Promise<Recipe[]> {
    return this.deps.recipes.listLineage(lineageId)
  }

  /** The failure is only bookkeeping; when storage refuses it too, the commit error still stands. */
  private async recordFailure(draftId: string, cause: unknown): Promise<void> {
    try {
      await this.deps.store.recordFailure(draftId, errorMessage(cause))
    } catch (err) {
      console.error(`[Larder] could not record the failed commit of draft ${draftId}:`, err)
    }
  }

  /** False when the event stays in the outbox for the next flush. Never throws. */
  private async deliver(event: RecipeCommitted): Promise<boolean> {
    try {
      await this.deps.events.publish(event)
    } catch (err) {
      console.error(`[Larder] delivery of ${event.type} ${event.eventId} failed, kept in outbox:`, err)
      return false
    }
    try {
      await this.deps.store.markDelivered(event.eventId)
    } catch (err) {
      console.error(`[Larder] ${event.eventId} was delivered but could not leave the outbox; it will be sent again:`, err)
      return false
    }
    return true
  }

  /** Everything that needs I/O outside storage (calorie lookups) happens here, before the transaction. */
  private async plan(review: PendingReview, draft: ExtractionDraft): Promise<CommitPlan> {
    const candidates = new Map(review.candidates.map((c) => [c.mentionId, c]))
    const mentions = draft.fields.ingredients
    const entries: EntryRequest[] = []
    const wanted = new Map<string, string>()

    for (const mention of mentions) {
      const candidate = candidates.get(mention.id)
      if (!candidate) {
        throw new ReviewIncompleteError(review.draftId, {
          pendingMentions: [mention.id],
          unresolvedFields: [],
          missingTitle: false,
        })
      }
      const request = this.entryRequest(candidate, mention.text)
      entries.push(request)

      if (request.kind === 'existing') {
        const entry = await this.deps.catalog.get(request.entryId)
        if (entry && !entry.calories) wanted.set(entry.normalizedKey, entry.canonicalName)
      } else {
        const entry = await this.deps.catalog.findByNormalizedKey(request.normalizedKey)
        if (!entry) wanted.set(request.normalizedKey, request.canonicalName)
        else if (!entry.calories) wanted.set(entry.normalizedKey, entry.canonicalName)
      }
    }

    const calories = await this.lookupCalories(wanted)
    const recipeId = generateId('recipe')
    const lineageId = review.revisionOf?.lineageId ?? recipeId
    const committedAt = this.now().toISOString()

    return {
      draftId: review.draftId,
      recipeId,
      lineageId,
      entries,
      calories,
      buildRecipe: (bound, version) => {
        const lines: RecipeIngredientLine[] = mentions.map((mention, i) => ({
          entryId: bound[i].id,
          name: mention.text,
          raw: mention.raw,
          quantity: mention.quantity,
          unit: mention.unit,
          prep: mention.prep,
          notes: mention.notes,
          optional: mention.optional,
        }))
        return {
          id: recipeId,
          lineageId,
          version,
          title: draft.fields.title ?? '',
          ingredients: lines,
          instructions: draft.fields.instructions,
          courseCategory: draft.fields.courseCategory,
          suggestedCategories: draft.suggestedCategories,
          servings: draft.fields.servings,
          prepTimeMinutes: draft.fields.prepTimeMinutes,
          cookTimeMinutes: draft.fields.cookTimeMinutes,
          imageUrl: draft.fields.imageUrl,
          source: { sourceId: draft.sourceId, modality: draft.modality, url: draft.sourceUrl, method: draft.method },
          calorieEstimate: estimateCalories(lines, new Map(bound.map((entry) => [entry.id, entry]))),
          ingredientIds: [...new Set(bound.map((entry) => entry.id))],
          committedAt,
        }
      },
      buildEvent: (recipe) => ({
        type: 'RecipeCommitted',
        eventId: generateId('evt'),
        recipeId: recipe.id,
        lineageId: recipe.lineageId,
        version: recipe.version,
        occurredAt: committedAt,
      }),
    }
  }

  private entryRequest(candidate: IngredientMatchCandidate, mentionText: string): EntryRequest {
    if (candidate.decision === 'user-created-new' || candidate.entryId === null) {
      return {
        kind: 'create',
        canonicalName: candidate.proposedName,
        normalizedKey: normalizeIngredientName(candidate.proposedName),
      }
    }
    return {
      kind: 'existing',
      entryId: candidate.entryId,
      alias: candidate.decision === 'user-confirmed-match' && mentionText.trim() ? mentionText.trim() : null,
    }
  }

  private async lookupCalories(wanted: ReadonlyMap<string, string>): Promise<Map<string, CalorieCache>> {
    const found = new Map<string, CalorieCache>()
    for (const [key, name] of wanted) {
      try {
        const { value: facts } = await callWithRetry(
          'calorie-lookup',
          (signal) => this.deps.calories.lookupCalories(name, signal),
          this.deps.retry,
        )
        if (facts) found.set(key, { ...facts, fetchedAt: this.now().toISOString() })
      } catch (err) {
        console.warn(`[Larder] calorie lookup for "${name}" failed, committing without it:`, errorMessage(err))
      }
    }
    return found
  }
}
