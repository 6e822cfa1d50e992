import type { PendingReview } from '@domain/models/PendingReview.ts'
import { ReviewNotFoundError, ReviewVersionConflictError } from '@domain/errors/LarderError.ts'
import type { ReviewRepository } from '@application/review/ReviewRepository.ts'
import type { LarderDB } from './database.ts'

export class DexieReviewRepository implements ReviewRepository {
  constructor(private readonly db: LarderDB) {}

  async get(draftId: string): Promise<PendingReview | undefined> {
    return this.db.reviews.get(draftId)
  }

  async create(review: PendingReview): Promise<void> {
    await this.db.reviews.add(review)
  }

  async update(
    draftId: string,
    expectedVersion: number | null,
    mutate: (current: PendingReview) => PendingReview,
  ): Promise<PendingReview> {
    return this.db.transaction('rw', this.db.reviews, async () => {
      const current = await this.db.reviews.get(draftId)
      if (!current) throw new ReviewNotFoundError(draftId)
      if (expectedVersion !== null && current.version !== expectedVersion) {
        throw new ReviewVersionConflictError(draftId, expectedVersion, current.version)
      }
      const next = mutate(current)
      if (next !== current) await this.db.reviews.put(next)
      return next
    })
  }

  async listAwaitingUserUpdatedBefore(cutoff: string): Promise<PendingReview[]> {
    return this.db.reviews
      .where('updatedAt')
      .below(cutoff)
      .filter((review) => review.state === 'AwaitingUser')
      .toArray()
  }
}
