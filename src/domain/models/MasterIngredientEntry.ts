export interface CalorieCache {
  kcalPer100g: number
  source: string
  fetchedAt: string
}

export interface MasterIngredientEntry {
  id: string
  canonicalName: string
  /** Append-only. */
  aliases: string[]
  /** Normalized form of each alias, same order as `aliases`. */
  aliasKeys: string[]
  normalizedKey: string
  calories: CalorieCache | null
  /** How many committed recipes use this entry. */
  usageCount: number
  createdAt: string
}
