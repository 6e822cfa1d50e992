import Dexie, { type DexieOptions, type Table } from 'dexie'
import type { MasterIngredientEntry } from '@domain/models/MasterIngredientEntry.ts'
import type { PendingReview } from '@domain/models/PendingReview.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import type { RecipeCommitted } from '@domain/models/RecipeCommitted.ts'

export interface PageCacheEntry {
  canonicalUrl: string
  fetchedAt: number
  html: string
}

export interface OutboxRecord {
  eventId: string
  occurredAt: string
  event: RecipeCommitted
}

export interface StorageFactory {
  indexedDB: NonNullable<DexieOptions['indexedDB']>
  IDBKeyRange: NonNullable<DexieOptions['IDBKeyRange']>
}

/** The host's own IndexedDB, or null where there is none (plain Node). */
export function hostStorage(): StorageFactory | null {
  if (typeof indexedDB === 'undefined' || typeof IDBKeyRange === 'undefined') return null
  return { indexedDB, IDBKeyRange }
}

export class LarderDB extends Dexie {
  catalog!: Table<MasterIngredientEntry, string>
  reviews!: Table<PendingReview, string>
  recipes!: Table<Recipe, string>
  pageCache!: Table<PageCacheEntry, string>
  outbox!: Table<OutboxRecord, string>

  constructor(name: string, storage: StorageFactory) {
    super(name, { indexedDB: storage.indexedDB, IDBKeyRange: storage.IDBKeyRange })

    this.version(1).stores({
      catalog: 'id, &normalizedKey, *aliasKeys, canonicalName',
      reviews: 'draftId, state, updatedAt',
      recipes: 'id, lineageId, [lineageId+version], courseCategory, *ingredientIds, committedAt',
      pageCache: 'canonicalUrl, fetchedAt',
      outbox: 'eventId, occurredAt',
    })
  }
}
