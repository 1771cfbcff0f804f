import { VOLUME_UNIT_MAP, type VolumeUnit } from '@domain/constants/units.ts'

/**
 * Match a whole unit token against the volume aliases.
 * Case-insensitive. Returns the canonical unit, or null for anything that
 * isn't a volume (counts, weights, ingredient words).
 */
export function parseUnit(token: string): VolumeUnit | null {
  const lower = token.toLowerCase()
  return Object.hasOwn(VOLUME_UNIT_MAP, lower) ? VOLUME_UNIT_MAP[lower] : null
}
