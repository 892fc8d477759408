import { Book } from './book'
import { Room } from './room'
import {
  addBooks,
  Shelf,
  shelfCategories,
  sortBooksByTitle,
  SortOptions,
} from './shelf'

/**
 * A catalog operates on the shelves of a single room. It has no state of its
 * own; every operation reads or mutates the room.
 */
export interface Catalog {
  readonly room: Room
}

/**
 * Creates a catalog for the given room.
 */
export function createCatalog(room: Room): Catalog {
  if (!room) {
    throw new Error('A catalog needs a room.')
  }
  return { room }
}

/**
 * Places each book of the pile on the first shelf whose name equals the
 * book's category. Books without a matching shelf are not placed anywhere.
 *
 * Books that go to the same shelf are appended after the shelf's current
 * books, in pile order. The pile itself is not modified.
 */
export function organizeBooksByCategory(
  catalog: Catalog,
  pile: Iterable<Book>
) {
  const placements = new Map<Shelf, Book[]>()

  for (const book of Array.from(pile)) {
    const shelf = catalog.room.shelves.find((s) => s.name === book.category)
    if (!shelf) {
      continue
    }

    const books = placements.get(shelf)
    if (books) {
      books.push(book)
    } else {
      placements.set(shelf, [book])
    }
  }

  for (const [shelf, books] of placements) {
    addBooks(shelf, books)
  }
}

/**
 * Sorts the books on every shelf of the room by title.
 */
export function sortBooksOnAllShelves(
  catalog: Catalog,
  options?: SortOptions
) {
  for (const shelf of catalog.room.shelves) {
    sortBooksByTitle(shelf, options)
  }
}

/**
 * Renders the room as text:
 *
 * ```
 * Room: Bob
 *   Shelf: Fiction (1 books; categories: Fiction)
 *     - Dune by Frank Herbert [Fiction] (id=b001)
 * ```
 */
export function dump(catalog: Catalog) {
  const { room } = catalog
  const lines = [`Room: ${room.owner}`]

  for (const shelf of room.shelves) {
    const categories = [...shelfCategories(shelf)].sort().join(', ') || '-'
    const count = `${shelf.books.length} books`
    lines.push(`  Shelf: ${shelf.name} (${count}; categories: ${categories})`)
    for (const book of shelf.books) {
      const entry = `${book.title} by ${book.author} [${book.category}]`
      lines.push(`    - ${entry} (id=${book.id})`)
    }
  }

  return lines.join('\n')
}
