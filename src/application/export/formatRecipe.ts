import type { Recipe } from '@domain/models/Recipe.ts'
import { formatIngredient } from './formatIngredient.ts'

/**
 * Render a recipe back to Markdown. Each ingredient keeps its own trailing
 * newline, so nothing is inserted between items.
 */
export function formatRecipe(recipe: Recipe): string {
  return recipe.preface + recipe.ingredients.map(formatIngredient).join('') + recipe.instructions
}
