import { QUARTER_TEASPOONS as QT } from '@domain/constants/units.ts'
import type { Volume } from '@domain/models/Volume.ts'

/** Tokens emitted for one unit, plus what's left for the smaller units. */
interface UnitGroup {
  whole: number
  tokens: string[]
  remainder: number
}

/** Cup fractions, largest first. At most one can fire per volume. */
const CUP_FRACTIONS: [number, string][] = [
  [QT.threeQuarterCup, '3/4'],
  [QT.twoThirdsCup, '2/3'],
  [QT.halfCup, '1/2'],
  [QT.thirdCup, '1/3'],
  [QT.quarterCup, '1/4'],
]

/** Leftover teaspoon fractions smaller than 1/4 tsp that have a name. */
const SMALL_TSP_FRACTIONS: Record<number, string> = {
  0.0625: '1/16',
  0.125: '1/8',
}

/** Split off whole units. `whole` is derived from the `%` remainder so the two always agree. */
function takeWhole(qtrTsps: number, size: number): UnitGroup {
  const remainder = qtrTsps % size
  const whole = Math.round((qtrTsps - remainder) / size)
  return { whole, tokens: whole > 0 ? [String(whole)] : [], remainder }
}

function takeCups(qtrTsps: number): UnitGroup {
  const group = takeWhole(qtrTsps, QT.cup)
  for (const [size, label] of CUP_FRACTIONS) {
    if (group.remainder >= size) {
      group.tokens.push(label)
      group.remainder -= size
    }
  }
  return group
}

function takeTablespoons(qtrTsps: number): UnitGroup {
  const group = takeWhole(qtrTsps, QT.tablespoon)
  // 2 tsp and up is left for the teaspoon group
  if (group.remainder >= QT.halfTablespoon && group.remainder < 2 * QT.teaspoon) {
    group.tokens.push('1/2')
    group.remainder -= QT.halfTablespoon
  }
  return group
}

function takeTeaspoons(qtrTsps: number): UnitGroup {
  const group = takeWhole(qtrTsps, QT.teaspoon)
  if (group.remainder >= QT.halfTeaspoon) {
    group.tokens.push('1/2')
    group.remainder -= QT.halfTeaspoon
  }
  if (group.remainder >= QT.quarterTeaspoon) {
    group.tokens.push('1/4')
    group.remainder -= QT.quarterTeaspoon
  }
  if (group.remainder > 0) {
    const tsps = group.remainder / QT.teaspoon
    group.tokens.push(SMALL_TSP_FRACTIONS[tsps] ?? String(tsps))
    group.remainder = 0
  }
  return group
}

/**
 * "1 + 1/2" + "cups". A group is plural when it has more than one whole unit
 * or more than one token; an empty group renders as nothing.
 */
function labelGroup({ whole, tokens }: UnitGroup, singular: string, plural: string): string {
  if (tokens.length === 0) return ''
  const isPlural = whole > 1 || tokens.length > 1
  return `${tokens.join(' + ')} ${isPlural ? plural : singular}`
}

/**
 * Render a volume as cooks write it, largest unit first.
 *
 * Examples:
 * - 192 -> "1 cup"
 * - 336 -> "1 + 3/4 cups"
 * - 108 -> "1/2 cup + 1 tbsp"
 * - 6 -> "1/2 tbsp"
 * - 0.25 -> "1/16 tsp"
 * - 0 -> ""
 */
export function formatVolume(volume: Volume): string {
  const cups = takeCups(volume.quarterTeaspoons)
  const tablespoons = takeTablespoons(cups.remainder)
  const teaspoons = takeTeaspoons(tablespoons.remainder)

  return [
    labelGroup(cups, 'cup', 'cups'),
    labelGroup(tablespoons, 'tbsp', 'tbsps'),
    labelGroup(teaspoons, 'tsp', 'tsps'),
  ]
    .filter((part) => part.length > 0)
    .join(' + ')
}
