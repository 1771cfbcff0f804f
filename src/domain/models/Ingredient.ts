import type { Quantity } from './Quantity.ts'

/**
 * One list item of the ingredients section.
 *
 * `indent` is everything before the `- ` marker and `name` everything after
 * the quantity, including wrapped lines and the trailing newline, so that
 * rendering reproduces the item byte for byte.
 */
export interface Ingredient {
  readonly indent: string
  readonly quantity: Quantity
  readonly name: string
}
