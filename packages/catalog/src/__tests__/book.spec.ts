import { createBook } from '../book'

test('createBook', () => {
  const book = createBook({
    id: 'b001',
    title: 'Dune',
    author: 'Frank Herbert',
    category: 'SciFi',
    isbn: '978-0-000-00000-1',
  })

  expect(book).toEqual({
    id: 'b001',
    title: 'Dune',
    author: 'Frank Herbert',
    category: 'SciFi',
    isbn: '978-0-000-00000-1',
  })
  expect(Object.isFrozen(book)).toBe(true)
})
