export interface RecipeCommitted {
  type: 'RecipeCommitted'
  eventId: string
  recipeId: string
  lineageId: string
  version: number
  occurredAt: string
}
