import { describe, it, expect, beforeEach } from 'vitest'
import {
  CatalogEntryNotFoundError,
  InvalidFieldError,
  InvalidReviewTransitionError,
  ReviewIncompleteError,
  ReviewVersionConflictError,
} from '@domain/errors/LarderError.ts'
import type { MasterIngredientEntry } from '@domain/models/MasterIngredientEntry.ts'
import { ReviewGate } from '@application/review/ReviewGate.ts'
import type { ReviewRepository } from '@application/review/ReviewRepository.ts'
import { DexieReviewRepository } from '@infrastructure/db/reviewRepository.ts'
import { createTestLarder, formSource, seedCatalog, type TestLarder } from '../support/testLarder.ts'

const DAY_MS = 24 * 60 * 60 * 1000

describe('ReviewGate', () => {
  let larder: TestLarder
  let entries: Record<string, MasterIngredientEntry>

  beforeEach(async () => {
    larder = createTestLarder()
    entries = await seedCatalog(larder, ['flour', 'salt', 'tomato'])
  })

  async function openForm(payload: Parameters<typeof formSource>[0] = {}) {
    const draft = await larder.orchestrator.extract(formSource(payload))
    return larder.gate.open(draft)
  }

  describe('open', () => {
    it('should start at version 1 with resolver candidates', async () => {
      const review = await openForm()

      expect(review.state).toBe('AwaitingUser')
      expect(review.version).toBe(1)
      expect(review.unresolvedFields).toEqual([])
      expect(review.candidates.map((c) => [c.mentionId, c.decision, c.entryId])).toEqual([
        ['ing_1', 'auto-accepted', entries.flour.id],
        ['ing_2', 'auto-accepted', entries.salt.id],
        ['ing_3', 'needs-review', entries.tomato.id],
      ])
      expect(await larder.gate.get(review.draftId)).toEqual(review)
    })

    it('should ignore a course label that names an object built-in', async () => {
      const review = await openForm({ courseCategory: 'Constructor' })

      expect(review.draft?.fields.courseCategory).toBeNull()
      expect((await larder.gate.get(review.draftId)).draft?.fields.courseCategory).toBeNull()
    })

    it('should list low-confidence fields as unresolved', async () => {
      const draft = await larder.orchestrator.extract(formSource())
      draft.fieldConfidence['instruction:step_2'] = 0.3
      const review = await larder.gate.open(draft)
      expect(review.unresolvedFields).toEqual(['instruction:step_2'])
    })
  })

  describe('confirm', () => {
    it('should refuse while a mention is unbound and leave the review untouched', async () => {
      const review = await openForm()

      const err = await larder.gate.confirm(review.draftId, 1).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ReviewIncompleteError)
      expect(err instanceof ReviewIncompleteError && err.blockers).toEqual({
        pendingMentions: ['ing_3'],
        unresolvedFields: [],
        missingTitle: false,
      })
      expect(await larder.gate.get(review.draftId)).toEqual(review)
    })

    it('should move to Confirmed once every mention is bound', async () => {
      const review = await openForm()
      await larder.gate.confirmMatch(review.draftId, 1, 'ing_3', entries.tomato.id)

      const confirmed = await larder.gate.confirm(review.draftId, 2)

      expect(confirmed.state).toBe('Confirmed')
      expect(confirmed.version).toBe(3)
      expect(confirmed.commit).toEqual({ status: 'pending', recipeId: null, attempts: 0, lastError: null })
    })

    it('should reject edits after confirmation', async () => {
      const review = await openForm({ ingredientLines: ['flour'] })
      await larder.gate.confirm(review.draftId, 1)

      await expect(larder.gate.removeIngredient(review.draftId, 2, 'ing_1')).rejects.toBeInstanceOf(
        InvalidReviewTransitionError,
      )
    })
  })

  describe('versioning', () => {
    it('should reject a stale version without applying the edit', async () => {
      const review = await openForm()
      await larder.gate.rejectSuggestion(review.draftId, 1, 'ing_3')

      const err = await larder.gate.confirmMatch(review.draftId, 1, 'ing_3', entries.tomato.id).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ReviewVersionConflictError)
      expect(err instanceof ReviewVersionConflictError && err.nextAction).toBe('reload')
      const stored = await larder.gate.get(review.draftId)
      expect(stored.version).toBe(2)
      expect(stored.candidates[2]).toMatchObject({ entryId: null, decision: 'rejected' })
    })
  })

  describe('ingredient decisions', () => {
    it('should record a confirmed match with its similarity score', async () => {
      const review = await openForm()
      const next = await larder.gate.confirmMatch(review.draftId, 1, 'ing_3', entries.tomato.id)

      expect(next.candidates[2].decision).toBe('user-confirmed-match')
      expect(next.candidates[2].score).toBeCloseTo(6 / 7, 10)
    })

    it('should refuse a match to an unknown entry', async () => {
      const review = await openForm()
      await expect(larder.gate.confirmMatch(review.draftId, 1, 'ing_3', 'entry_missing')).rejects.toBeInstanceOf(
        CatalogEntryNotFoundError,
      )
    })

    it('should refuse a decision on an unknown mention', async () => {
      const review = await openForm()
      await expect(larder.gate.rejectSuggestion(review.draftId, 1, 'ing_9')).rejects.toBeInstanceOf(InvalidFieldError)
    })

    it('should create a new entry under the user-given name', async () => {
      const review = await openForm()
      const next = await larder.gate.createNew(review.draftId, 1, 'ing_3', '  Roma tomato ')

      expect(next.candidates[2]).toMatchObject({ entryId: null, decision: 'user-created-new', proposedName: 'Roma tomato' })
    })

    it('should fall back to the mention text when no name is given', async () => {
      const review = await openForm()
      const next = await larder.gate.createNew(review.draftId, 1, 'ing_3', '   ')
      expect(next.candidates[2].proposedName).toBe('tomatoe')
    })

    it('should drop a removed ingredient together with its candidate', async () => {
      const review = await openForm()
      const next = await larder.gate.removeIngredient(review.draftId, 1, 'ing_3')

      expect(next.draft?.fields.ingredients.map((m) => m.id)).toEqual(['ing_1', 'ing_2'])
      expect(next.candidates.map((c) => c.mentionId)).toEqual(['ing_1', 'ing_2'])
      expect((await larder.gate.confirm(review.draftId, 2)).state).toBe('Confirmed')
    })
  })

  describe('field corrections', () => {
    it('should re-parse and re-resolve a corrected ingredient line', async () => {
      const review = await openForm()
      const next = await larder.gate.correctField(review.draftId, 1, 'ingredient:ing_3', '3 Tomatoes, diced')

      expect(next.draft?.fields.ingredients[2]).toMatchObject({
        id: 'ing_3',
        text: 'Tomatoes',
        quantity: 3,
        prep: 'diced',
      })
      expect(next.candidates[2]).toMatchObject({ entryId: entries.tomato.id, decision: 'auto-accepted', score: 1 })
      expect(next.draft?.fieldConfidence['ingredient:ing_3']).toBe(1)
    })

    it('should clear an unresolved field once corrected', async () => {
      const draft = await larder.orchestrator.extract(formSource())
      draft.fieldConfidence['instruction:step_2'] = 0.3
      const review = await larder.gate.open(draft)

      const next = await larder.gate.correctField(review.draftId, 1, 'instruction:step_2', ' Bake for 40 minutes. ')

      expect(next.draft?.fields.instructions[1].text).toBe('Bake for 40 minutes.')
      expect(next.unresolvedFields).toEqual([])
    })

    it('should clear an unresolved field once accepted as is', async () => {
      const draft = await larder.orchestrator.extract(formSource())
      draft.fieldConfidence['instruction:step_2'] = 0.3
      const review = await larder.gate.open(draft)

      const next = await larder.gate.acceptField(review.draftId, 1, 'instruction:step_2')

      expect(next.draft?.fields.instructions[1].text).toBe('Bake.')
      expect(next.unresolvedFields).toEqual([])
    })

    it('should parse scalar corrections', async () => {
      const review = await openForm()
      let next = await larder.gate.correctField(review.draftId, 1, 'servings', '4')
      next = await larder.gate.correctField(review.draftId, 2, 'cookTimeMinutes', '1 hr 15 min')
      next = await larder.gate.correctField(review.draftId, 3, 'title', '  Country Bread ')

      expect(next.draft?.fields).toMatchObject({ servings: 4, cookTimeMinutes: 75, title: 'Country Bread' })
      expect(next.draft?.fieldMethods.servings).toBe('manual')
      expect(next.version).toBe(4)
    })

    it.each([
      ['servings', 'four'],
      ['servings', '0'],
      ['cookTimeMinutes', 'a while'],
      ['imageUrl', 'not a url'],
      ['title', '   '],
      ['courseCategory', 'brunchy'],
    ] as const)('should reject %s = %j', async (path, value) => {
      const review = await openForm()
      await expect(larder.gate.correctField(review.draftId, 1, path, value)).rejects.toBeInstanceOf(InvalidFieldError)
      expect((await larder.gate.get(review.draftId)).version).toBe(1)
    })

    it('should reject a correction to a line that does not exist', async () => {
      const review = await openForm()
      await expect(larder.gate.correctField(review.draftId, 1, 'instruction:step_9', 'Rest.')).rejects.toBeInstanceOf(
        InvalidFieldError,
      )
    })

    it('should set the course category', async () => {
      const review = await openForm()
      const next = await larder.gate.setCourseCategory(review.draftId, 1, 'dessert')
      expect(next.draft?.fields.courseCategory).toBe('dessert')
    })
  })

  describe('discard', () => {
    it('should drop the draft and be idempotent', async () => {
      const review = await openForm()

      const discarded = await larder.gate.discard(review.draftId)
      const again = await larder.gate.discard(review.draftId)

      expect(discarded).toMatchObject({ state: 'Discarded', draft: null, candidates: [], version: 2 })
      expect(again.version).toBe(2)
      await expect(larder.gate.acceptField(review.draftId, 2, 'title')).rejects.toBeInstanceOf(
        InvalidReviewTransitionError,
      )
    })

    it('should not discard a confirmed review', async () => {
      const review = await openForm({ ingredientLines: ['salt'] })
      await larder.gate.confirm(review.draftId, 1)
      await expect(larder.gate.discard(review.draftId)).rejects.toBeInstanceOf(InvalidReviewTransitionError)
    })
  })

  describe('purgeExpired', () => {
    it('should discard reviews idle past the TTL and keep recent ones', async () => {
      let clock = new Date('2024-03-01T12:00:00.000Z')
      larder = createTestLarder({ now: () => clock })
      await seedCatalog(larder, ['flour', 'salt', 'tomato'])

      const stale = await openForm()
      clock = new Date(clock.getTime() + 8 * DAY_MS)
      const fresh = await openForm()

      expect(await larder.gate.purgeExpired()).toBe(1)
      expect((await larder.gate.get(stale.draftId)).state).toBe('Discarded')
      expect((await larder.gate.get(fresh.draftId)).state).toBe('AwaitingUser')
    })

    it('should skip a review confirmed after it was listed and purge the rest', async () => {
      let clock = new Date('2024-03-01T12:00:00.000Z')
      larder = createTestLarder({ now: () => clock })
      await seedCatalog(larder, ['flour'])
      const confirmedLate = await openForm({ ingredientLines: ['flour'] })
      const abandoned = await openForm({ ingredientLines: ['flour'] })
      clock = new Date(clock.getTime() + 8 * DAY_MS)

      const stored = new DexieReviewRepository(larder.db)
      const confirmingMidPurge: ReviewRepository = {
        get: (draftId) => stored.get(draftId),
        create: (review) => stored.create(review),
        update: (draftId, expectedVersion, mutate) => stored.update(draftId, expectedVersion, mutate),
        listAwaitingUserUpdatedBefore: async (cutoff) => {
          const listed = await stored.listAwaitingUserUpdatedBefore(cutoff)
          await larder.gate.confirm(confirmedLate.draftId, 1)
          return listed
        },
      }
      const gate = new ReviewGate(confirmingMidPurge, larder.catalog, larder.resolver, {
        threshold: 0.6,
        reviewTtlMs: 7 * DAY_MS,
        now: () => clock,
      })

      expect(await gate.purgeExpired()).toBe(1)
      expect(await larder.gate.get(confirmedLate.draftId)).toMatchObject({ state: 'Confirmed', version: 2 })
      expect((await larder.gate.get(abandoned.draftId)).state).toBe('Discarded')
    })
  })
})
