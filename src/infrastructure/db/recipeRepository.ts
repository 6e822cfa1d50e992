import type { Recipe } from '@domain/models/Recipe.ts'
import type { CourseCategory } from '@domain/constants/courseCategories.ts'
import type { RecipeRepository } from '@application/commit/ports.ts'
import type { LarderDB } from './database.ts'

export class DexieRecipeRepository implements RecipeRepository {
  constructor(private readonly db: LarderDB) {}

  async get(recipeId: string): Promise<Recipe | undefined> {
    return this.db.recipes.get(recipeId)
  }

  async listByCategory(category: CourseCategory): Promise<Recipe[]> {
    return this.db.recipes.where('courseCategory').equals(category).sortBy('committedAt')
  }

  async listContainingIngredient(entryId: string): Promise<Recipe[]> {
    return this.db.recipes.where('ingredientIds').equals(entryId).sortBy('committedAt')
  }

  async listLineage(lineageId: string): Promise<Recipe[]> {
    return this.db.recipes.where('[lineageId+version]').between([lineageId, 0], [lineageId, Infinity]).toArray()
  }
}
