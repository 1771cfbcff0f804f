import { createVolume, type Volume } from '@domain/models/Volume.ts'
import type { Quantity } from '@domain/models/Quantity.ts'

/** Scale factors must be finite and greater than zero. */
export function assertScaleFactor(factor: number): void {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new RangeError(`Scale factor must be a positive number, got ${factor}`)
  }
}

export function scaleVolume(volume: Volume, factor: number): Volume {
  assertScaleFactor(factor)
  return createVolume(volume.quarterTeaspoons * factor)
}

/**
 * Scale a quantity by a factor.
 * - none -> unchanged ("salt to taste" stays unmeasured)
 * - simple -> amount multiplied
 * - volume -> quarter-teaspoons multiplied, no rounding
 */
export function scaleQuantity(quantity: Quantity, factor: number): Quantity {
  assertScaleFactor(factor)
  switch (quantity.kind) {
    case 'none':
      return quantity
    case 'simple':
      return { kind: 'simple', amount: quantity.amount * factor }
    case 'volume':
      return { kind: 'volume', volume: scaleVolume(quantity.volume, factor) }
  }
}
