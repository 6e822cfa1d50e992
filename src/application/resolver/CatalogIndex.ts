import type { MasterIngredientEntry } from '@domain/models/MasterIngredientEntry.ts'

/**
 * Narrows the catalog to the entries worth scoring for a key. Implementations
 * may prune (n-gram or prefix indexes) but must never drop an entry that
 * would score at or above the review threshold.
 */
export interface CatalogIndex {
  candidatesFor(key: string): Iterable<MasterIngredientEntry>
}

export type CatalogIndexFactory = (entries: readonly MasterIngredientEntry[]) => CatalogIndex

/** Scores every entry. */
export class LinearCatalogIndex implements CatalogIndex {
  constructor(private readonly entries: readonly MasterIngredientEntry[]) {}

  candidatesFor(): Iterable<MasterIngredientEntry> {
    return this.entries
  }
}

export const linearCatalogIndex: CatalogIndexFactory = (entries) => new LinearCatalogIndex(entries)
