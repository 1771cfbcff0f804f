import { numericQuantity } from 'numeric-quantity'

/**
 * A whole amount token: "2", "1.5", ".5", "3/4", or a single unicode
 * fraction like "½". Anchored at both ends, so tokens carrying a newline,
 * digit grouping ("1,000") or an exponent ("1e3") don't match.
 */
const AMOUNT_PATTERN = /^(?:\d+\/\d+|\d+(?:\.\d+)?|\.\d+|[¼-¾⅐-⅞])$/

/**
 * Parse a single amount token. Returns null for anything else.
 *
 * Rounding is disabled so "1/3" of a cup stays exactly 64 quarter-teaspoons.
 */
export function parseAmount(token: string): number | null {
  if (!AMOUNT_PATTERN.test(token)) return null
  const value = numericQuantity(token, { round: false })
  return Number.isFinite(value) ? value : null
}
