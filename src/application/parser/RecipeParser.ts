import type { Recipe } from '@domain/models/Recipe.ts'
import { INGREDIENTS_HEADER, NEXT_SECTION } from '@domain/constants/markdown.ts'
import { parseIngredients } from './IngredientParser.ts'
import { IngredientSegmenter } from './segmentIngredients.ts'

/**
 * Parse a Markdown recipe into preface, ingredients and instructions.
 *
 * The ingredient list is whatever follows the exact `## Ingredients` header
 * and blank line, up to the next `##` header (or the end of the document).
 * Without that header the whole document is kept as the preface.
 */
export function parseRecipe(text: string): Recipe {
  const headerIndex = text.indexOf(INGREDIENTS_HEADER)
  if (headerIndex === -1) {
    console.warn('[recipe-scale] No "## Ingredients" section found, keeping the document as-is')
    return { preface: text, ingredients: [], instructions: '' }
  }

  const ingredientsStart = headerIndex + INGREDIENTS_HEADER.length
  const preface = text.slice(0, ingredientsStart)
  const rest = text.slice(ingredientsStart)

  const sectionEnd = rest.indexOf(NEXT_SECTION)
  const block = sectionEnd === -1 ? rest : rest.slice(0, sectionEnd)
  const instructions = sectionEnd === -1 ? '' : rest.slice(sectionEnd)

  return {
    preface,
    ingredients: parseIngredients(new IngredientSegmenter(block)),
    instructions,
  }
}
