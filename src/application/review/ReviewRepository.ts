import type { PendingReview } from '@domain/models/PendingReview.ts'

export interface ReviewRepository {
  get(draftId: string): Promise<PendingReview | undefined>
  create(review: PendingReview): Promise<void>
  /**
   * Read-modify-write one review atomically. When `expectedVersion` is a
   * number and differs from the stored one, raises
   * `ReviewVersionConflictError` and writes nothing; `null` skips the check.
   * `mutate` runs inside the storage transaction and must not await.
   */
  update(
    draftId: string,
    expectedVersion: number | null,
    mutate: (current: PendingReview) => PendingReview,
  ): Promise<PendingReview>
  listAwaitingUserUpdatedBefore(cutoff: string): Promise<PendingReview[]>
}
