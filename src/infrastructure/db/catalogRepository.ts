import type { MasterIngredientEntry } from '@domain/models/MasterIngredientEntry.ts'
import { CatalogEntryNotFoundError } from '@domain/errors/LarderError.ts'
import type { CatalogStore, NewCatalogEntry } from '@application/catalog/CatalogStore.ts'
import { normalizeIngredientName } from '@application/resolver/normalizeIngredientName.ts'
import { generateId } from '@application/ids.ts'
import type { LarderDB } from './database.ts'

export class DexieCatalogRepository implements CatalogStore {
  constructor(private readonly db: LarderDB) {}

  async findByNormalizedKey(key: string): Promise<MasterIngredientEntry | undefined> {
    return this.db.catalog.where('normalizedKey').equals(key).first()
  }

  /** Joins the caller's transaction when there is one. */
  async createIfAbsent(entry: NewCatalogEntry): Promise<MasterIngredientEntry> {
    return this.db.transaction('rw', this.db.catalog, async () => {
      const existing = await this.findByNormalizedKey(entry.normalizedKey)
      if (existing) return existing
      const created: MasterIngredientEntry = {
        id: generateId('entry'),
        canonicalName: entry.canonicalName.trim(),
        aliases: [],
        aliasKeys: [],
        normalizedKey: entry.normalizedKey,
        calories: entry.calories ?? null,
        usageCount: 0,
        createdAt: new Date().toISOString(),
      }
      await this.db.catalog.add(created)
      return created
    })
  }

  async updateAliases(entryId: string, aliases: readonly string[]): Promise<MasterIngredientEntry> {
    return this.db.transaction('rw', this.db.catalog, async () => {
      const entry = await this.db.catalog.get(entryId)
      if (!entry) throw new CatalogEntryNotFoundError(entryId)
      const known = new Set([entry.normalizedKey, ...entry.aliasKeys])
      const added: string[] = []
      const addedKeys: string[] = []
      for (const alias of aliases) {
        const key = normalizeIngredientName(alias)
        if (!key || known.has(key)) continue
        known.add(key)
        added.push(alias.trim())
        addedKeys.push(key)
      }
      if (added.length === 0) return entry
      const updated = { ...entry, aliases: [...entry.aliases, ...added], aliasKeys: [...entry.aliasKeys, ...addedKeys] }
      await this.db.catalog.put(updated)
      return updated
    })
  }

  async snapshot(): Promise<MasterIngredientEntry[]> {
    return this.db.catalog.toArray()
  }

  async get(entryId: string): Promise<MasterIngredientEntry | undefined> {
    return this.db.catalog.get(entryId)
  }
}
