import type { Ingredient } from '@domain/models/Ingredient.ts'
import { NO_QUANTITY, type Quantity } from '@domain/models/Quantity.ts'
import { LIST_MARKER } from '@domain/constants/markdown.ts'
import { parseAmount } from './parseAmount.ts'
import { parseVolume } from './parseVolume.ts'

interface QuantityResult {
  quantity: Quantity
  name: string
}

/** Split on the first two spaces: "1 cup flour" -> ["1", "cup", "flour"]. */
function splitTwice(text: string): [string, string, string] | null {
  const first = text.indexOf(' ')
  if (first === -1) return null
  const second = text.indexOf(' ', first + 1)
  if (second === -1) return null
  return [text.slice(0, first), text.slice(first + 1, second), text.slice(second + 1)]
}

function splitOnce(text: string): [string, string] | null {
  const index = text.indexOf(' ')
  if (index === -1) return null
  return [text.slice(0, index), text.slice(index + 1)]
}

/**
 * Detect the quantity at the front of an item's text.
 *
 * Order matters: an amount followed by a known unit is a volume, a lone
 * amount is a simple count, and anything else has no quantity.
 */
function parseLeadingQuantity(tail: string): QuantityResult {
  const triple = splitTwice(tail)
  if (triple) {
    const [amount, unit, name] = triple
    const volume = parseVolume(amount, unit)
    if (volume) return { quantity: { kind: 'volume', volume }, name }
  }

  const pair = splitOnce(tail)
  if (pair) {
    const [amount, name] = pair
    const simple = parseAmount(amount)
    if (simple !== null) return { quantity: { kind: 'simple', amount: simple }, name }
  }

  return { quantity: NO_QUANTITY, name: tail }
}

/**
 * Parse one list item (as produced by the ingredient segmenter) into an
 * Ingredient. Text before the first `- ` is kept verbatim as the indent.
 *
 * Throws when the text has no list marker: the segmenter never produces
 * such an item, so reaching it means the caller broke that contract.
 */
export function parseIngredient(item: string): Ingredient {
  const markerIndex = item.indexOf(LIST_MARKER)
  if (markerIndex === -1) {
    throw new Error(`Attempted to parse a non-ingredient line: ${JSON.stringify(item)}`)
  }

  const indent = item.slice(0, markerIndex)
  const { quantity, name } = parseLeadingQuantity(item.slice(markerIndex + LIST_MARKER.length))

  return { indent, quantity, name }
}

/** Parse a list of segmented items. */
export function parseIngredients(items: Iterable<string>): Ingredient[] {
  return Array.from(items, parseIngredient)
}
