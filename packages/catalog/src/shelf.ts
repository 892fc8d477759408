import { Book } from './book'

/**
 * A named shelf of books.
 */
export interface Shelf {
  /**
   * Name of the shelf. Books whose category equals this name are placed on
   * this shelf when organizing.
   */
  name: string

  /**
   * Books of this shelf, in shelf order.
   */
  books: Book[]
}

/**
 * Options for sorting books by title.
 */
export interface SortOptions {
  /**
   * Compare case-folded titles. By default titles are compared by their
   * UTF-16 code units, so "Zeta" sorts before "alpha".
   */
  ignoreCase?: boolean
}

/**
 * Creates a shelf with a copy of the given books.
 */
export function createShelf(
  name: string,
  books: readonly Book[] = []
): Shelf {
  return { name, books: [...books] }
}

/**
 * Appends books to the shelf in the given order.
 */
export function addBooks(shelf: Shelf, books: Iterable<Book>) {
  for (const book of books) {
    shelf.books.push(book)
  }
}

/**
 * Sorts the books of the shelf in place by ascending title. Books with equal
 * titles keep their relative order.
 */
export function sortBooksByTitle(shelf: Shelf, options?: SortOptions) {
  const key = options?.ignoreCase ? foldCase : (title: string) => title
  shelf.books.sort((a, b) => compare(key(a.title), key(b.title)))
}

/**
 * Returns the distinct categories of the books on the shelf.
 */
export function shelfCategories(shelf: Shelf) {
  return new Set(shelf.books.map((book) => book.category))
}

function compare(a: string, b: string) {
  if (a < b) {
    return -1
  }
  if (a > b) {
    return 1
  }
  return 0
}

// upper-casing first maps "ß" to "SS", which toLowerCase alone keeps as is
function foldCase(value: string) {
  return value.toUpperCase().toLowerCase()
}
