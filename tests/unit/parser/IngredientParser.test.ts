import { describe, it, expect } from 'vitest'
import { parseIngredient, parseIngredients } from '@application/parser/IngredientParser.ts'
import type { Quantity } from '@domain/models/Quantity.ts'
import fixtures from './fixtures/ingredients.json'

interface Fixture {
  line: string
  indent: string
  kind: string
  amount: number | null
  name: string
}

function amountOf(quantity: Quantity): number | null {
  switch (quantity.kind) {
    case 'none':
      return null
    case 'simple':
      return quantity.amount
    case 'volume':
      return quantity.volume.quarterTeaspoons
  }
}

describe('IngredientParser', () => {
  const typedFixtures: Fixture[] = fixtures

  for (const fixture of typedFixtures) {
    it(`should parse: ${JSON.stringify(fixture.line)}`, () => {
      const result = parseIngredient(fixture.line)

      expect(result.indent).toBe(fixture.indent)
      expect(result.quantity.kind).toBe(fixture.kind)
      expect(result.name).toBe(fixture.name)

      if (fixture.amount === null) {
        expect(amountOf(result.quantity)).toBeNull()
      } else {
        expect(amountOf(result.quantity)).toBeCloseTo(fixture.amount, 6)
      }
    })
  }
})

describe('IngredientParser edge cases', () => {
  it('keeps wrapped lines and the trailing newline in the name', () => {
    const result = parseIngredient('- 3 cups water\n  warm, not hot\n')
    expect(result.quantity).toEqual({ kind: 'volume', volume: { quarterTeaspoons: 576 } })
    expect(result.name).toBe('water\n  warm, not hot\n')
  })

  it('tries a volume before a simple count', () => {
    const result = parseIngredient('- 2 tbs butter')
    expect(result.quantity.kind).toBe('volume')
    expect(result.name).toBe('butter')
  })

  it('falls back to a simple count when the unit is unknown', () => {
    const result = parseIngredient('- 2 cloves garlic')
    expect(result.quantity).toEqual({ kind: 'simple', amount: 2 })
    expect(result.name).toBe('cloves garlic')
  })

  it('has no quantity when the tail is a single word', () => {
    const result = parseIngredient('- 3')
    expect(result.quantity).toEqual({ kind: 'none' })
    expect(result.name).toBe('3')
  })

  it('handles unicode fraction ½', () => {
    const result = parseIngredient('- ½ cup milk')
    expect(result.quantity).toEqual({ kind: 'volume', volume: { quarterTeaspoons: 96 } })
  })

  it('keeps text before the marker as the indent', () => {
    const result = parseIngredient('Dry:\n- 1 cup flour\n')
    expect(result.indent).toBe('Dry:\n')
    expect(result.name).toBe('flour\n')
  })

  it('throws on a line without a list marker', () => {
    expect(() => parseIngredient('1 cup flour')).toThrow('Attempted to parse a non-ingredient line')
  })

  it('parses every item of a list', () => {
    const result = parseIngredients(['- 1 cup flour\n', '- 2 eggs\n'])
    expect(result.map((ing) => ing.quantity.kind)).toEqual(['volume', 'simple'])
  })
})
