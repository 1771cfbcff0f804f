/**
 * Volume sizes in quarter-teaspoons, the smallest amount a recipe can
 * express exactly. Every supported subdivision, from 1/16 tsp up to whole
 * cups, is a whole or simple fractional multiple of it.
 */
export const QUARTER_TEASPOONS = {
  cup: 192,
  threeQuarterCup: 144,
  twoThirdsCup: 128,
  halfCup: 96,
  thirdCup: 64,
  quarterCup: 48,
  tablespoon: 12,
  halfTablespoon: 6,
  teaspoon: 4,
  halfTeaspoon: 2,
  quarterTeaspoon: 1,
} as const

export type VolumeUnit = 'cup' | 'tablespoon' | 'teaspoon'

/** Maps lowercase unit spellings to a canonical volume unit. */
export const VOLUME_UNIT_MAP: Record<string, VolumeUnit> = {
  // Cup
  cup: 'cup',
  cups: 'cup',

  // Tablespoon
  tablespoon: 'tablespoon',
  tablespoons: 'tablespoon',
  tb: 'tablespoon',
  tbs: 'tablespoon',
  tbsp: 'tablespoon',
  tbsps: 'tablespoon',

  // Teaspoon
  teaspoon: 'teaspoon',
  teaspoons: 'teaspoon',
  tsp: 'teaspoon',
  tsps: 'teaspoon',
}

/** Size of each canonical unit in quarter-teaspoons. */
export const UNIT_TO_QUARTER_TSP: Record<VolumeUnit, number> = {
  cup: QUARTER_TEASPOONS.cup,
  tablespoon: QUARTER_TEASPOONS.tablespoon,
  teaspoon: QUARTER_TEASPOONS.teaspoon,
}
