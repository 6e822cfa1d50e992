import type { Range } from '@domain/models/Ingredient.ts'
import type { MasterIngredientEntry } from '@domain/models/MasterIngredientEntry.ts'
import type { RecipeIngredientLine } from '@domain/models/Recipe.ts'
import { WEIGHT_TO_G } from '@domain/constants/units.ts'

function amount(quantity: number | Range | null): number | null {
  if (quantity === null) return null
  return typeof quantity === 'number' ? quantity : (quantity.min + quantity.max) / 2
}

/**
 * Sum kcalPer100g × grams / 100 over lines measured by weight whose entry
 * has cached calories. Ranges count at their midpoint. Null when no line
 * contributes.
 */
export function estimateCalories(
  lines: readonly RecipeIngredientLine[],
  entriesById: ReadonlyMap<string, MasterIngredientEntry>,
): number | null {
  let total = 0
  let contributed = false
  for (const line of lines) {
    const qty = amount(line.quantity)
    const gramsPerUnit = line.unit ? WEIGHT_TO_G[line.unit] : undefined
    const kcal = entriesById.get(line.entryId)?.calories?.kcalPer100g
    if (qty === null || gramsPerUnit === undefined || kcal === undefined) continue
    total += (kcal * qty * gramsPerUnit) / 100
    contributed = true
  }
  return contributed ? Math.round(total) : null
}
