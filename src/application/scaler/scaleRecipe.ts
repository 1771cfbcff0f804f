import type { Recipe } from '@domain/models/Recipe.ts'
import { parseRecipe } from '@application/parser/RecipeParser.ts'
import { formatRecipe } from '@application/export/formatRecipe.ts'
import { assertScaleFactor } from './scaleQuantity.ts'
import { scaleIngredients } from './scaleIngredients.ts'

/**
 * Scale every ingredient of a recipe. Preface and instructions are carried
 * over untouched; the ingredient list is rebuilt.
 */
export function scaleRecipe(recipe: Recipe, factor: number): Recipe {
  assertScaleFactor(factor)
  return {
    preface: recipe.preface,
    ingredients: scaleIngredients(recipe.ingredients, factor),
    instructions: recipe.instructions,
  }
}

/** Parse, scale and render a Markdown recipe in one go. */
export function scaleRecipeText(text: string, factor: number): string {
  return formatRecipe(scaleRecipe(parseRecipe(text), factor))
}
