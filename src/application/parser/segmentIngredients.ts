import { LIST_MARKER } from '@domain/constants/markdown.ts'

/**
 * Walks the raw ingredients block one list item at a time.
 *
 * Each item runs from the start of the remaining text through its `- `
 * marker line and any wrapped or nested lines, up to (not including) the
 * next line whose trimmed text starts with `-`. The last item takes the rest
 * of the block. Concatenating every item gives back the block, as long as it
 * contains at least one marker.
 */
export class IngredientSegmenter implements IterableIterator<string> {
  private rest: string

  constructor(block: string) {
    this.rest = block
  }

  next(): IteratorResult<string> {
    const src = this.rest
    const markerIndex = src.indexOf(LIST_MARKER)
    if (markerIndex === -1) {
      this.rest = ''
      return { done: true, value: undefined }
    }

    // The marker's own line belongs to this item; start looking on the next one.
    let lineStart = src.indexOf('\n', markerIndex + LIST_MARKER.length) + 1
    while (lineStart > 0 && lineStart < src.length) {
      const lineEnd = src.indexOf('\n', lineStart)
      const line = lineEnd === -1 ? src.slice(lineStart) : src.slice(lineStart, lineEnd)
      if (line.trimStart().startsWith('-')) {
        this.rest = src.slice(lineStart)
        return { done: false, value: src.slice(0, lineStart) }
      }
      lineStart = lineEnd + 1
    }

    this.rest = ''
    return { done: false, value: src }
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this
  }
}

/** Split an ingredients block into its list items. */
export function segmentIngredients(block: string): string[] {
  return Array.from(new IngredientSegmenter(block))
}
