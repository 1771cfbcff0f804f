import type { Volume } from './Volume.ts'

/** No amount attached, e.g. "salt to taste". */
export interface NoQuantity {
  readonly kind: 'none'
}

/** A bare number with no recognised unit, e.g. "2 eggs". */
export interface SimpleQuantity {
  readonly kind: 'simple'
  readonly amount: number
}

export interface VolumeQuantity {
  readonly kind: 'volume'
  readonly volume: Volume
}

export type Quantity = NoQuantity | SimpleQuantity | VolumeQuantity

export const NO_QUANTITY: NoQuantity = { kind: 'none' }
