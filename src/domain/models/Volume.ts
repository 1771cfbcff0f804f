/** An exact volume, counted in quarter-teaspoons. Never negative. */
export interface Volume {
  readonly quarterTeaspoons: number
}

export function createVolume(quarterTeaspoons: number): Volume {
  if (!Number.isFinite(quarterTeaspoons) || quarterTeaspoons < 0) {
    throw new RangeError(`Invalid volume: ${quarterTeaspoons} quarter-teaspoons`)
  }
  return { quarterTeaspoons }
}
