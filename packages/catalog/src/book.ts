/**
 * A book. Books are never mutated once created.
 */
export interface Book {
  /**
   * Identifier of this book instance.
   */
  readonly id: string

  readonly title: string

  readonly author: string

  /**
   * Category of the book. Matched against shelf names when organizing.
   */
  readonly category: string

  readonly isbn: string
}

/**
 * Creates a frozen {@link Book}.
 */
export function createBook(fields: Book): Book {
  return Object.freeze({
    id: fields.id,
    title: fields.title,
    author: fields.author,
    category: fields.category,
    isbn: fields.isbn,
  })
}
