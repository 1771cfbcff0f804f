import type { Ingredient } from './Ingredient.ts'

export interface Recipe {
  /** Everything up to and including the ingredients header and its blank line. */
  readonly preface: string
  /** List items in document order. */
  readonly ingredients: readonly Ingredient[]
  /** Everything after the ingredient list, starting at the next header. */
  readonly instructions: string
}
