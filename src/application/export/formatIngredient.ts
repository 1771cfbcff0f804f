import type { Ingredient } from '@domain/models/Ingredient.ts'
import { LIST_MARKER } from '@domain/constants/markdown.ts'
import { formatQuantity } from '@application/scaler/formatQuantity.ts'

/**
 * Render an ingredient back to its list item.
 * Examples: "- 1 cup flour\n", "  - 2 eggs\n", "- salt to taste\n"
 */
export function formatIngredient(ingredient: Ingredient): string {
  const { indent, quantity, name } = ingredient
  const prefix = `${indent}${LIST_MARKER}`
  if (quantity.kind === 'none') return `${prefix}${name}`
  return `${prefix}${formatQuantity(quantity)} ${name}`
}
