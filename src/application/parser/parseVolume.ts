import { UNIT_TO_QUARTER_TSP } from '@domain/constants/units.ts'
import { createVolume, type Volume } from '@domain/models/Volume.ts'
import { parseAmount } from './parseAmount.ts'
import { parseUnit } from './parseUnit.ts'

/**
 * Parse an (amount, unit) token pair into a Volume.
 * Returns null when either token isn't understood, so the caller can fall
 * back to a simple or absent quantity.
 */
export function parseVolume(amountText: string, unitText: string): Volume | null {
  const amount = parseAmount(amountText)
  if (amount === null || amount < 0) return null

  const unit = parseUnit(unitText)
  if (unit === null) return null

  return createVolume(amount * UNIT_TO_QUARTER_TSP[unit])
}
