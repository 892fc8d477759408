import { Catalog } from './catalog'
import { shelfCategories } from './shelf'

/**
 * A book together with the name of the shelf it stands on.
 */
export interface CatalogRow {
  id: string
  title: string
  author: string
  category: string
  isbn: string
  shelfName: string
}

/**
 * Number of books of a category on the shelves with the given name.
 */
export interface CategoryCount {
  shelfName: string
  category: string
  count: number
}

/**
 * Throws if books of one category stand on shelves with different names.
 */
export function verifyCategoryPlacement(catalog: Catalog) {
  const seen = new Map<string, string>()

  for (const shelf of catalog.room.shelves) {
    for (const category of shelfCategories(shelf)) {
      const other = seen.get(category)
      if (other !== undefined && other !== shelf.name) {
        const shelves = `"${other}" and "${shelf.name}"`
        throw new Error(
          `Category "${category}" was found on shelves ${shelves}.`
        )
      }
      seen.set(category, shelf.name)
    }
  }
}

/**
 * Returns one row per book, in room and shelf order.
 */
export function toRows(catalog: Catalog): CatalogRow[] {
  return catalog.room.shelves.flatMap((shelf) =>
    shelf.books.map((book) => ({
      id: book.id,
      title: book.title,
      author: book.author,
      category: book.category,
      isbn: book.isbn,
      shelfName: shelf.name,
    }))
  )
}

/**
 * Counts the books per shelf name and category. Shelves that share a name are
 * counted together. Results are ordered by first appearance.
 */
export function countByShelfAndCategory(catalog: Catalog): CategoryCount[] {
  const counts = new Map<string, Map<string, number>>()

  for (const row of toRows(catalog)) {
    let byCategory = counts.get(row.shelfName)
    if (!byCategory) {
      byCategory = new Map()
      counts.set(row.shelfName, byCategory)
    }
    byCategory.set(row.category, (byCategory.get(row.category) || 0) + 1)
  }

  const result: CategoryCount[] = []
  for (const [shelfName, byCategory] of counts) {
    for (const [category, count] of byCategory) {
      result.push({ shelfName, category, count })
    }
  }
  return result
}
