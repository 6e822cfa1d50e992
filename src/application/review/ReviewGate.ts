import { z } from 'zod'
import type { ExtractionDraft, FieldPath, ScalarField } from '@domain/models/ExtractionDraft.ts'
import { ingredientPath, instructionPath } from '@domain/models/ExtractionDraft.ts'
import type { IngredientMatchCandidate } from '@domain/models/IngredientMatchCandidate.ts'
import { ACCEPTED_DECISIONS } from '@domain/models/IngredientMatchCandidate.ts'
import type { PendingReview, RecipeRevision } from '@domain/models/PendingReview.ts'
import { toCourseCategory, type CourseCategory } from '@domain/constants/courseCategories.ts'
import {
  CatalogEntryNotFoundError,
  InvalidFieldError,
  InvalidReviewTransitionError,
  ReviewIncompleteError,
  ReviewNotFoundError,
  type ReviewBlockers,
} from '@domain/errors/LarderError.ts'
import { parseMention } from '@application/parser/IngredientParser.ts'
import { parseInformalDuration } from '@application/extraction/parseDuration.ts'
import { isScalarField, lowConfidencePaths, overallConfidence } from '@application/extraction/scoring.ts'
import type { CatalogStore } from '@application/catalog/CatalogStore.ts'
import type { IngredientResolver } from '@application/resolver/IngredientResolver.ts'
import { normalizeIngredientName } from '@application/resolver/normalizeIngredientName.ts'
import type { ReviewRepository } from './ReviewRepository.ts'

export interface ReviewGateOptions {
  threshold: number
  /** AwaitingUser reviews untouched for this long are discarded by `purgeExpired`. */
  reviewTtlMs: number
  now?: () => Date
}

export interface OpenReviewOptions {
  revisionOf?: RecipeRevision | null
  /** Mentions already bound to an entry (a revised recipe's lines), keyed by mention id. */
  boundEntries?: Readonly<Record<string, string>>
}

const imageUrlSchema = z.string().trim().url()

export function reviewBlockers(review: PendingReview): ReviewBlockers {
  return {
    pendingMentions: review.candidates.filter((c) => !ACCEPTED_DECISIONS.has(c.decision)).map((c) => c.mentionId),
    unresolvedFields: [...review.unresolvedFields],
    missingTitle: !review.draft?.fields.title,
  }
}

function isBlocked(blockers: ReviewBlockers): boolean {
  return blockers.pendingMentions.length > 0 || blockers.unresolvedFields.length > 0 || blockers.missingTitle
}

function hasPath(draft: ExtractionDraft, path: FieldPath): boolean {
  if (path.startsWith('ingredient:')) return draft.fields.ingredients.some((m) => ingredientPath(m.id) === path)
  if (path.startsWith('instruction:')) return draft.fields.instructions.some((s) => instructionPath(s.id) === path)
  return true
}

/**
 * Durable human-in-the-loop checkpoint between extraction and commit. Every
 * edit is a version-checked self-transition on AwaitingUser; a stale
 * version is rejected without touching the stored review.
 */
export class ReviewGate {
  private readonly now: () => Date

  constructor(
    private readonly reviews: ReviewRepository,
    private readonly catalog: CatalogStore,
    private readonly resolver: IngredientResolver,
    private readonly options: ReviewGateOptions,
  ) {
    this.now = options.now ?? (() => new Date())
  }

  async open(draft: ExtractionDraft, options: OpenReviewOptions = {}): Promise<PendingReview> {
    const snapshot = await this.catalog.snapshot()
    const bound = options.boundEntries ?? {}
    const resolved = this.resolver.resolve(draft.fields.ingredients, snapshot)
    const candidates = resolved.map((candidate): IngredientMatchCandidate => {
      const entry = snapshot.find((e) => e.id === bound[candidate.mentionId])
      if (!entry) return candidate
      const mention = draft.fields.ingredients.find((m) => m.id === candidate.mentionId)
      return {
        ...candidate,
        entryId: entry.id,
        score: this.resolver.scoreEntry(normalizeIngredientName(mention?.text ?? ''), entry),
        decision: 'user-confirmed-match',
      }
    })

    const timestamp = this.now().toISOString()
    const review: PendingReview = {
      draftId: draft.id,
      version: 1,
      state: 'AwaitingUser',
      draft,
      candidates,
      unresolvedFields: lowConfidencePaths(draft.fields, draft.fieldConfidence, this.options.threshold),
      commit: null,
      revisionOf: options.revisionOf ?? null,
      createdAt: timestamp,
      updatedAt: timestamp,
    }
    await this.reviews.create(review)
    return review
  }

  async get(draftId: string): Promise<PendingReview> {
    const review = await this.reviews.get(draftId)
    if (!review) throw new ReviewNotFoundError(draftId)
    return review
  }

  async confirmMatch(draftId: string, expectedVersion: number, mentionId: string, entryId: string): Promise<PendingReview> {
    const entry = await this.catalog.get(entryId)
    if (!entry) throw new CatalogEntryNotFoundError(entryId)
    return this.edit(draftId, expectedVersion, 'confirm a match on', (review, draft) => {
      const mention = draft.fields.ingredients.find((m) => m.id === mentionId)
      const key = normalizeIngredientName(mention?.text ?? '')
      return this.withCandidate(review, mentionId, (c) => ({
        ...c,
        entryId,
        score: this.resolver.scoreEntry(key, entry),
        decision: 'user-confirmed-match',
      }))
    })
  }

  async createNew(draftId: string, expectedVersion: number, mentionId: string, name?: string): Promise<PendingReview> {
    return this.edit(draftId, expectedVersion, 'create an ingredient on', (review) =>
      this.withCandidate(review, mentionId, (c) => {
        const proposedName = name?.trim() || c.proposedName
        if (!normalizeIngredientName(proposedName)) throw new InvalidFieldError(ingredientPath(mentionId), 'name is empty')
        return { ...c, entryId: null, decision: 'user-created-new', proposedName }
      }),
    )
  }

  async rejectSuggestion(draftId: string, expectedVersion: number, mentionId: string): Promise<PendingReview> {
    return this.edit(draftId, expectedVersion, 'reject a suggestion on', (review) =>
      this.withCandidate(review, mentionId, (c) => ({ ...c, entryId: null, decision: 'rejected' })),
    )
  }

  /** Keep a low-confidence field as extracted. */
  async acceptField(draftId: string, expectedVersion: number, path: FieldPath): Promise<PendingReview> {
    return this.edit(draftId, expectedVersion, 'accept a field on', (review, draft) => {
      if (!hasPath(draft, path)) throw new InvalidFieldError(path, 'no such field')
      return { ...review, unresolvedFields: review.unresolvedFields.filter((p) => p !== path) }
    })
  }

  /** Replace a field with the user's value. A corrected ingredient line is re-parsed and re-resolved. */
  async correctField(draftId: string, expectedVersion: number, path: FieldPath, value: string): Promise<PendingReview> {
    const snapshot = path.startsWith('ingredient:') ? await this.catalog.snapshot() : []
    return this.edit(draftId, expectedVersion, 'correct a field on', (review, draft) => {
      if (!hasPath(draft, path)) throw new InvalidFieldError(path, 'no such field')
      const next = structuredClone(draft)
      let candidates = review.candidates

      if (path.startsWith('ingredient:')) {
        if (!value.trim()) throw new InvalidFieldError(path, 'ingredient line is empty')
        const mentionId = path.slice('ingredient:'.length)
        const mention = parseMention(value, mentionId)
        next.fields.ingredients = next.fields.ingredients.map((m) => (m.id === mentionId ? mention : m))
        const [candidate] = this.resolver.resolve([mention], snapshot)
        candidates = candidates.map((c) => (c.mentionId === mentionId ? candidate : c))
      } else if (path.startsWith('instruction:')) {
        if (!value.trim()) throw new InvalidFieldError(path, 'step is empty')
        next.fields.instructions = next.fields.instructions.map((s) =>
          instructionPath(s.id) === path ? { ...s, text: value.trim() } : s,
        )
      } else if (isScalarField(path)) {
        this.applyScalar(next, path, value)
      } else {
        throw new InvalidFieldError(path, 'no such field')
      }

      next.fieldConfidence[path] = 1
      next.confidence = overallConfidence(next.fields, next.fieldConfidence, this.options.threshold)
      return {
        ...review,
        draft: next,
        candidates,
        unresolvedFields: review.unresolvedFields.filter((p) => p !== path),
      }
    })
  }

  async removeIngredient(draftId: string, expectedVersion: number, mentionId: string): Promise<PendingReview> {
    return this.edit(draftId, expectedVersion, 'remove an ingredient from', (review, draft) => {
      const path = ingredientPath(mentionId)
      if (!hasPath(draft, path)) throw new InvalidFieldError(path, 'no such ingredient')
      const next = structuredClone(draft)
      next.fields.ingredients = next.fields.ingredients.filter((m) => m.id !== mentionId)
      delete next.fieldConfidence[path]
      next.confidence = overallConfidence(next.fields, next.fieldConfidence, this.options.threshold)
      return {
        ...review,
        draft: next,
        candidates: review.candidates.filter((c) => c.mentionId !== mentionId),
        unresolvedFields: review.unresolvedFields.filter((p) => p !== path),
      }
    })
  }

  async setCourseCategory(
    draftId: string,
    expectedVersion: number,
    category: CourseCategory | null,
  ): Promise<PendingReview> {
    return this.edit(draftId, expectedVersion, 'set the course of', (review, draft) => {
      const next = structuredClone(draft)
      next.fields.courseCategory = category
      next.fieldConfidence.courseCategory = 1
      next.fieldMethods.courseCategory = 'manual'
      return { ...review, draft: next, unresolvedFields: review.unresolvedFields.filter((p) => p !== 'courseCategory') }
    })
  }

  /** AwaitingUser → Confirmed, only with every mention bound and every field resolved. */
  async confirm(draftId: string, expectedVersion: number): Promise<PendingReview> {
    return this.edit(draftId, expectedVersion, 'confirm', (review) => {
      const blockers = reviewBlockers(review)
      if (isBlocked(blockers)) throw new ReviewIncompleteError(draftId, blockers)
      return {
        ...review,
        state: 'Confirmed',
        commit: { status: 'pending', recipeId: null, attempts: 0, lastError: null },
      }
    })
  }

  /** Drop a review at any point before confirmation. Discarding twice is a no-op. */
  async discard(draftId: string): Promise<PendingReview> {
    return this.reviews.update(draftId, null, (review) => {
      if (review.state === 'Discarded') return review
      if (review.state !== 'AwaitingUser') throw new InvalidReviewTransitionError(draftId, review.state, 'discard')
      return this.discarded(review)
    })
  }

  /**
   * Discard reviews left AwaitingUser for longer than the TTL; returns how
   * many were dropped. A review confirmed or edited since it was listed is
   * left alone.
   */
  async purgeExpired(now: Date = this.now()): Promise<number> {
    const cutoff = new Date(now.getTime() - this.options.reviewTtlMs).toISOString()
    const expired = await this.reviews.listAwaitingUserUpdatedBefore(cutoff)
    let purged = 0
    for (const { draftId } of expired) {
      let dropped = false
      await this.reviews.update(draftId, null, (review) => {
        if (review.state !== 'AwaitingUser' || review.updatedAt >= cutoff) return review
        dropped = true
        return this.discarded(review)
      })
      if (dropped) purged++
    }
    if (purged > 0) console.info(`[Larder] purged ${purged} abandoned review(s)`)
    return purged
  }

  private discarded(review: PendingReview): PendingReview {
    return {
      ...review,
      version: review.version + 1,
      state: 'Discarded',
      draft: null,
      candidates: [],
      unresolvedFields: [],
      updatedAt: this.now().toISOString(),
    }
  }

  private edit(
    draftId: string,
    expectedVersion: number,
    action: string,
    change: (review: PendingReview, draft: ExtractionDraft) => PendingReview,
  ): Promise<PendingReview> {
    return this.reviews.update(draftId, expectedVersion, (review) => {
      if (review.state !== 'AwaitingUser' || !review.draft) {
        throw new InvalidReviewTransitionError(draftId, review.state, action)
      }
      const changed = change(review, review.draft)
      return { ...changed, version: review.version + 1, updatedAt: this.now().toISOString() }
    })
  }

  private withCandidate(
    review: PendingReview,
    mentionId: string,
    change: (candidate: IngredientMatchCandidate) => IngredientMatchCandidate,
  ): PendingReview {
    if (!review.candidates.some((c) => c.mentionId === mentionId)) {
      throw new InvalidFieldError(ingredientPath(mentionId), 'no such ingredient')
    }
    return { ...review, candidates: review.candidates.map((c) => (c.mentionId === mentionId ? change(c) : c)) }
  }

  private applyScalar(draft: ExtractionDraft, field: ScalarField, value: string): void {
    const text = value.trim()
    switch (field) {
      case 'title':
        if (!text) throw new InvalidFieldError(field, 'title is empty')
        draft.fields.title = text
        break
      case 'servings': {
        const servings = /^\d+$/.test(text) ? parseInt(text, 10) : 0
        if (servings <= 0) throw new InvalidFieldError(field, 'expected a whole number of servings')
        draft.fields.servings = servings
        break
      }
      case 'prepTimeMinutes':
      case 'cookTimeMinutes': {
        const minutes = parseInformalDuration(text)
        if (minutes === null) throw new InvalidFieldError(field, 'expected a duration such as "1 hr 15 min"')
        draft.fields[field] = minutes
        break
      }
      case 'courseCategory': {
        const course = toCourseCategory([text])
        if (course === null) throw new InvalidFieldError(field, `unknown course "${text}"`)
        draft.fields.courseCategory = course
        break
      }
      case 'imageUrl': {
        const parsed = imageUrlSchema.safeParse(text)
        if (!parsed.success) throw new InvalidFieldError(field, 'expected an absolute URL')
        draft.fields.imageUrl = parsed.data
        break
      }
    }
    draft.fieldMethods[field] = 'manual'
  }
}
