import type { Quantity } from '@domain/models/Quantity.ts'
import { formatVolume } from './formatVolume.ts'

/**
 * Format a quantity the way it appears in front of an ingredient name.
 *
 * Examples:
 * - none -> ""
 * - simple 2 -> "2"
 * - simple 0.5 -> "0.5"
 * - volume of 288 quarter-teaspoons -> "1 + 1/2 cups"
 */
export function formatQuantity(quantity: Quantity): string {
  switch (quantity.kind) {
    case 'none':
      return ''
    case 'simple':
      return String(quantity.amount)
    case 'volume':
      return formatVolume(quantity.volume)
  }
}
