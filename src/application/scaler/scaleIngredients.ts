import type { Ingredient } from '@domain/models/Ingredient.ts'
import { scaleQuantity } from './scaleQuantity.ts'

export function scaleIngredient(ingredient: Ingredient, factor: number): Ingredient {
  return { ...ingredient, quantity: scaleQuantity(ingredient.quantity, factor) }
}

/** Scale every ingredient independently, keeping document order. */
export function scaleIngredients(ingredients: readonly Ingredient[], factor: number): Ingredient[] {
  return ingredients.map((ing) => scaleIngredient(ing, factor))
}
