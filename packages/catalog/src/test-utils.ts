import { randomUUID } from '@shelfwise/testing'
import { ApiResponse } from '@shelfwise/core'
import { Book, createBook } from './book'
import { Room } from './room'
import { Shelf } from './shelf'

export function makeBook(options?: Partial<Book>): Book {
  return createBook({
    id: options?.id || randomUUID(),
    title: options?.title || 'Foo',
    author: options?.author || 'Jane Doe',
    category: options?.category || 'Fiction',
    isbn: options?.isbn || '978-0-000-00000-0',
  })
}

export function makeRoomResponse(
  options?: Partial<ApiResponse<Room>>
): ApiResponse<Room> {
  return {
    owner: options?.owner || 'Bob',
    shelves: options?.shelves || [],
  }
}

export function makeShelfResponse(
  options?: Partial<ApiResponse<Shelf>>
): ApiResponse<Shelf> {
  return {
    name: options?.name || 'Fiction',
    books: options?.books || [],
  }
}

export function makeBookResponse(
  options?: Partial<ApiResponse<Book>>
): ApiResponse<Book> {
  return { ...makeBook(options) }
}

/**
 * Returns `[title, id]` pairs of the books on the shelf, in shelf order.
 */
export function titlesAndIds(shelf: Shelf) {
  return shelf.books.map((book) => [book.title, book.id])
}
