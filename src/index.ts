export type { Volume } from '@domain/models/Volume.ts'
export type { Quantity, NoQuantity, SimpleQuantity, VolumeQuantity } from '@domain/models/Quantity.ts'
export type { Ingredient } from '@domain/models/Ingredient.ts'
export type { Recipe } from '@domain/models/Recipe.ts'
export type { VolumeUnit } from '@domain/constants/units.ts'
export { createVolume } from '@domain/models/Volume.ts'
export { NO_QUANTITY } from '@domain/models/Quantity.ts'
export { QUARTER_TEASPOONS, VOLUME_UNIT_MAP } from '@domain/constants/units.ts'

export { parseAmount } from '@application/parser/parseAmount.ts'
export { parseUnit } from '@application/parser/parseUnit.ts'
export { parseVolume } from '@application/parser/parseVolume.ts'
export { parseIngredient, parseIngredients } from '@application/parser/IngredientParser.ts'
export { IngredientSegmenter, segmentIngredients } from '@application/parser/segmentIngredients.ts'
export { parseRecipe } from '@application/parser/RecipeParser.ts'

export { formatVolume } from '@application/scaler/formatVolume.ts'
export { formatQuantity } from '@application/scaler/formatQuantity.ts'
export { scaleVolume, scaleQuantity } from '@application/scaler/scaleQuantity.ts'
export { scaleIngredient, scaleIngredients } from '@application/scaler/scaleIngredients.ts'
export { scaleRecipe, scaleRecipeText } from '@application/scaler/scaleRecipe.ts'

export { formatIngredient } from '@application/export/formatIngredient.ts'
export { formatRecipe } from '@application/export/formatRecipe.ts'
