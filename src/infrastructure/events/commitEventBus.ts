import type { RecipeCommitted } from '@domain/models/RecipeCommitted.ts'
import type { CommitEventSink } from '@application/commit/ports.ts'

export type RecipeCommittedListener = (event: RecipeCommitted) => void | Promise<void>

/**
 * In-process sink. Listeners run in subscription order and are awaited; a
 * throwing listener fails the publish so the event stays in the outbox.
 */
export class CommitEventBus implements CommitEventSink {
  private listeners: RecipeCommittedListener[] = []

  subscribe(listener: RecipeCommittedListener): () => void {
    this.listeners = [...this.listeners, listener]
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener)
    }
  }

  async publish(event: RecipeCommitted): Promise<void> {
    for (const listener of this.listeners) {
      await listener(event)
    }
  }
}
