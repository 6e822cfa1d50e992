import type { CalorieCache, MasterIngredientEntry } from '@domain/models/MasterIngredientEntry.ts'

export interface NewCatalogEntry {
  canonicalName: string
  normalizedKey: string
  calories?: CalorieCache | null
}

/** The master ingredient catalog. Entries are never deleted and aliases only grow. */
export interface CatalogStore {
  findByNormalizedKey(key: string): Promise<MasterIngredientEntry | undefined>
  /** Create the entry unless one already holds its key; returns whichever entry now holds it. */
  createIfAbsent(entry: NewCatalogEntry): Promise<MasterIngredientEntry>
  /** Append aliases not yet known to the entry; returns the updated entry. */
  updateAliases(entryId: string, aliases: readonly string[]): Promise<MasterIngredientEntry>
  /** Point-in-time copy of every entry, unsynchronized with writers. */
  snapshot(): Promise<MasterIngredientEntry[]>
  get(entryId: string): Promise<MasterIngredientEntry | undefined>
}
