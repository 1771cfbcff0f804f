/** Header that separates the preface from the ingredient list. */
export const INGREDIENTS_HEADER = '\n## Ingredients\n\n'

/** Start of the section that follows the ingredient list. */
export const NEXT_SECTION = '\n##'

/** Marker that opens every ingredient list item. */
export const LIST_MARKER = '- '
