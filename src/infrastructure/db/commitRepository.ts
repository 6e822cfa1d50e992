import type { MasterIngredientEntry } from '@domain/models/MasterIngredientEntry.ts'
import type { RecipeCommitted } from '@domain/models/RecipeCommitted.ts'
import { CatalogEntryNotFoundError, InvalidReviewTransitionError, ReviewNotFoundError } from '@domain/errors/LarderError.ts'
import type { CommitPlan, CommitResult, CommitStore } from '@application/commit/ports.ts'
import type { LarderDB } from './database.ts'
import { DexieCatalogRepository } from './catalogRepository.ts'

export class DexieCommitStore implements CommitStore {
  private readonly catalog: DexieCatalogRepository

  constructor(private readonly db: LarderDB) {
    this.catalog = new DexieCatalogRepository(db)
  }

  /**
   * One read-write transaction over catalog, recipes, reviews and outbox.
   * Any throw inside rolls every write back.
   */
  async apply(plan: CommitPlan): Promise<CommitResult> {
    const { db } = this
    return db.transaction('rw', [db.catalog, db.recipes, db.reviews, db.outbox], async () => {
      const review = await db.reviews.get(plan.draftId)
      if (!review) throw new ReviewNotFoundError(plan.draftId)
      if (review.commit?.status === 'committed' && review.commit.recipeId) {
        const existing = await db.recipes.get(review.commit.recipeId)
        if (existing) return { recipe: existing, event: null }
      }
      if (review.state !== 'Confirmed') throw new InvalidReviewTransitionError(plan.draftId, review.state, 'commit')

      const bound: MasterIngredientEntry[] = []
      for (const request of plan.entries) {
        let entry: MasterIngredientEntry
        if (request.kind === 'create') {
          entry = await this.catalog.createIfAbsent({
            canonicalName: request.canonicalName,
            normalizedKey: request.normalizedKey,
          })
        } else {
          const found = await db.catalog.get(request.entryId)
          if (!found) throw new CatalogEntryNotFoundError(request.entryId)
          entry = request.alias ? await this.catalog.updateAliases(found.id, [request.alias]) : found
        }

        const calories = plan.calories.get(entry.normalizedKey)
        if (!entry.calories && calories) {
          entry = { ...entry, calories }
          await db.catalog.put(entry)
        }
        bound.push(entry)
      }

      const latest = await db.recipes.where('[lineageId+version]').between([plan.lineageId, 0], [plan.lineageId, Infinity]).last()

      // usageCount counts lineages: a revision only adds entries its previous version lacked
      const counted = new Set(latest?.ingredientIds ?? [])
      const used = new Map(bound.map((entry) => [entry.id, entry]))
      for (const entry of used.values()) {
        if (!counted.has(entry.id)) await db.catalog.put({ ...entry, usageCount: entry.usageCount + 1 })
      }

      const recipe = plan.buildRecipe(bound, (latest?.version ?? 0) + 1)
      await db.recipes.add(recipe)

      await db.reviews.put({
        ...review,
        commit: {
          status: 'committed',
          recipeId: recipe.id,
          attempts: (review.commit?.attempts ?? 0) + 1,
          lastError: null,
        },
        updatedAt: recipe.committedAt,
      })

      const event = plan.buildEvent(recipe)
      await db.outbox.add({ eventId: event.eventId, occurredAt: event.occurredAt, event })
      return { recipe, event }
    })
  }

  async recordFailure(draftId: string, message: string): Promise<void> {
    await this.db.transaction('rw', this.db.reviews, async () => {
      const review = await this.db.reviews.get(draftId)
      if (!review) return
      await this.db.reviews.put({
        ...review,
        commit: {
          status: 'pending',
          recipeId: null,
          attempts: (review.commit?.attempts ?? 0) + 1,
          lastError: message,
        },
        updatedAt: new Date().toISOString(),
      })
    })
  }

  async pendingEvents(): Promise<RecipeCommitted[]> {
    const records = await this.db.outbox.orderBy('occurredAt').toArray()
    return records.map((record) => record.event)
  }

  async markDelivered(eventId: string): Promise<void> {
    await this.db.outbox.delete(eventId)
  }
}
